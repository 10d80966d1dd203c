/**
 * @bank-import/cli — Command runner.
 *
 * run() is the whole command: arguments → config → inputs → import →
 * report → exit code. It never calls process.exit, so it can be driven
 * from tests with fake streams.
 *
 * Exit codes:
 *   0  success or warning
 *   1  the import (or batch) ended with status error
 *   2  usage or configuration error
 */

import chalk from "chalk";
import type { Logger } from "pino";
import { InMemoryLedger, JsonlLedger } from "@bank-import/ledger";
import type { LedgerClientFactory } from "@bank-import/ledger";
import {
  BatchImporter,
  ImportEngine,
  ImportError,
  STDOUT_TARGET,
  errorMessage,
  buildReport,
  writeReport,
} from "@bank-import/importer";
import type { StatementParser } from "@bank-import/importer";
import type { AnyImportResult, ImportStatus } from "@bank-import/types";
import { USAGE, UsageError, parseCliArgs } from "./args.js";
import type { CliOptions } from "./args.js";
import { ConfigError, loadConfig, loadEnvironment } from "./config.js";
import type { AppConfig } from "./config.js";
import { expandInputs } from "./inputs.js";
import { JsonStatementParser } from "./json-statement-parser.js";
import { createLogger } from "./logger.js";

export const EXIT_OK = 0;
export const EXIT_IMPORT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  /** Overrides the logger built from LOG_LEVEL / LOG_PRETTY */
  readonly logger?: Logger | undefined;
  /** Overrides the statement parser (default: JsonStatementParser) */
  readonly parser?: StatementParser | undefined;
  readonly now?: (() => Date) | undefined;
}

export function exitCodeFor(status: ImportStatus): number {
  return status === "error" ? EXIT_IMPORT_FAILED : EXIT_OK;
}

function notice(io: CliIo, line: string): void {
  io.stderr.write(line + "\n");
}

// =============================================================================
// Run
// =============================================================================

export async function run(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  io: CliIo,
): Promise<number> {
  let options: CliOptions;
  let config: AppConfig;
  let ledger: LedgerClientFactory;
  const now = io.now ?? (() => new Date());
  try {
    options = parseCliArgs(argv);
    if (options.help) {
      io.stdout.write(USAGE + "\n");
      return EXIT_OK;
    }
    config = loadConfig(loadEnvironment(options.envFile, env));
    ledger = await openLedger(config, options.dryRun, now);
  } catch (error) {
    if (error instanceof UsageError) {
      notice(io, chalk.red(`Error: ${error.message}`));
      notice(io, USAGE);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      notice(io, chalk.red(error.message));
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = io.logger ?? createLogger(config);
  const paths = await expandInputs(options.patterns);

  logger.info(
    { fileCount: paths.length, dryRun: options.dryRun, ledgerFile: config.LEDGER_FILE },
    "Starting bank statement import",
  );

  const engine = new ImportEngine({
    parser: io.parser ?? new JsonStatementParser(),
    ledger,
    mapping: {
      appName: config.APP_NAME,
      appVersion: config.APP_VERSION,
      jobId: options.jobId ?? config.JOB_ID,
      defaultBankCode: config.DEFAULT_BANK_CODE,
      targetAccount: config.TARGET_ACCOUNT_CODE,
    },
    logger,
    now,
  });

  const firstPath = paths[0];
  const result: AnyImportResult =
    paths.length === 1 && firstPath !== undefined
      ? await engine.importFile(firstPath)
      : await new BatchImporter(engine, { logger, now }).importFiles(paths);

  const target = options.output ?? (config.RESULT_FILE !== "" ? config.RESULT_FILE : STDOUT_TARGET);
  try {
    await writeReport(buildReport(result), target, {
      pretty: config.REPORT_PRETTY,
      stdout: io.stdout,
    });
    if (target !== STDOUT_TARGET) {
      notice(io, chalk.green(`Report saved to ${target}`));
    }
  } catch (error) {
    if (!(error instanceof ImportError)) throw error;
    logger.error({ code: error.code, target }, error.message);
    notice(io, chalk.yellow(error.message));
  }

  return exitCodeFor(result.status);
}

/**
 * Client factory over the configured journal. A dry run works on an
 * in-memory copy of it, so duplicates are still detected and nothing is
 * written.
 *
 * @throws {ConfigError} if the journal location is unusable
 */
async function openLedger(
  config: AppConfig,
  dryRun: boolean,
  now: () => Date,
): Promise<LedgerClientFactory> {
  let journal: JsonlLedger;
  try {
    journal = new JsonlLedger({ filePath: config.LEDGER_FILE, now });
  } catch (error) {
    throw new ConfigError([`LEDGER_FILE: ${errorMessage(error)}`]);
  }
  if (!dryRun) {
    return () => journal.client();
  }

  const recorded = await journal.readRecords();
  if (recorded === false) {
    throw new ConfigError([`LEDGER_FILE: cannot read ledger journal ${config.LEDGER_FILE}`]);
  }
  const copy = new InMemoryLedger({ now });
  copy.seed(recorded.map((r) => r.movement));
  return () => copy.client();
}
