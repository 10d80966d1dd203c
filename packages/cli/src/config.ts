/**
 * @bank-import/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Values from an optional env file are read with dotenv and sit under
 * whatever the process environment already sets.
 */

import { readFileSync } from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .transform((v) => v === "true" || v === "1")
  .default("false");

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

export const ConfigSchema = z.object({
  // Provenance written into every internal note
  APP_NAME: z.string().min(1).default("bank-import"),
  APP_VERSION: z.string().min(1).default("0.1.0"),
  JOB_ID: z.string().min(1).default("n/a"),

  // Ledger
  LEDGER_FILE: z.string().min(1).default("ledger.jsonl"),

  // Mapping defaults
  DEFAULT_BANK_CODE: optionalText,
  TARGET_ACCOUNT_CODE: optionalText,

  // Report
  RESULT_FILE: z.string().default(""),
  REPORT_PRETTY: booleanFlag,

  // Logging
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: booleanFlag,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Validate configuration from an environment map.
 *
 * @throws {ConfigError} if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Environment with the variables of `envFile` filled in underneath.
 *
 * A missing env file is not an error; every variable then comes from
 * `base` alone.
 *
 * @throws {ConfigError} if the file exists but cannot be read
 */
export function loadEnvironment(
  envFile: string,
  base: Record<string, string | undefined> = process.env,
): Record<string, string | undefined> {
  let text: string;
  try {
    text = readFileSync(envFile, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return { ...base };
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`cannot read env file ${envFile}: ${reason}`]);
  }

  const fromFile = dotenv.parse(text);
  const merged: Record<string, string | undefined> = { ...fromFile };
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
