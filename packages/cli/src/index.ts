/**
 * @bank-import/cli — Operator command for importing bank statements.
 */

export { run, exitCodeFor, EXIT_OK, EXIT_IMPORT_FAILED, EXIT_USAGE } from "./cli.js";
export type { CliIo } from "./cli.js";
export { parseCliArgs, UsageError, USAGE } from "./args.js";
export type { CliOptions } from "./args.js";
export { ConfigSchema, ConfigError, loadConfig, loadEnvironment } from "./config.js";
export type { AppConfig } from "./config.js";
export { expandInputs } from "./inputs.js";
export type { ExpandOptions } from "./inputs.js";
export {
  JsonStatementParser,
  parseStatementJson,
  StatementFileSchema,
  TransactionSchema,
} from "./json-statement-parser.js";
export { createLogger } from "./logger.js";
