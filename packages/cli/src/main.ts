#!/usr/bin/env node
/**
 * @bank-import/cli — Entry point.
 */

import { run } from "./cli.js";

run(process.argv.slice(2), process.env, { stdout: process.stdout, stderr: process.stderr })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  });
