/**
 * @bank-import/cli — Command-line arguments.
 */

import { parseArgs } from "node:util";

export const USAGE = `Usage: bank-import [options] <file|glob>...

Imports bank statement files into the ledger. Transactions already in the
ledger are skipped, so a file can be imported again safely.

Options:
  -o, --output <path|->      report target, "-" for stdout
                             (default: RESULT_FILE, else stdout)
  -e, --environment <path>   env file to load (default: .env)
  -j, --job <id>             job id written into each internal note
      --dry-run              import into an in-memory copy of the ledger;
                             nothing is written
  -h, --help                 show this help`;

export interface CliOptions {
  readonly patterns: readonly string[];
  readonly output?: string | undefined;
  readonly envFile: string;
  readonly jobId?: string | undefined;
  readonly dryRun: boolean;
  readonly help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseRaw(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: "string", short: "o" },
        environment: { type: "string", short: "e" },
        job: { type: "string", short: "j" },
        "dry-run": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws {UsageError} on unknown options, missing values or no inputs
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const parsed = parseRaw(argv);
  const { values, positionals } = parsed;
  const help = values.help === true;

  if (!help && positionals.length === 0) {
    throw new UsageError("No statement files given");
  }
  if (values.job !== undefined && values.job.trim() === "") {
    throw new UsageError("Job id cannot be empty");
  }

  return {
    patterns: positionals,
    output: values.output,
    envFile: values.environment ?? ".env",
    jobId: values.job,
    dryRun: values["dry-run"] === true,
    help,
  };
}
