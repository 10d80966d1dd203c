/**
 * @bank-import/importer — Collaborator and configuration types.
 */

import type { Logger } from "pino";
import type { LedgerClientFactory } from "@bank-import/ledger";
import type { ImportResult, ParsedStatement } from "@bank-import/types";
import type { MapperOptions } from "./transaction-mapper.js";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Turns a statement file into parsed records.
 * Any rejection is a parse failure of that file.
 */
export interface StatementParser {
  parse(filePath: string): Promise<ParsedStatement>;
}

/**
 * Anything that imports one file into a result. The batch importer
 * drives this, so it can be pointed at the engine or at a stand-in.
 */
export interface FileImporter {
  importFile(filePath: string): Promise<ImportResult>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface ImportEngineConfig {
  readonly parser: StatementParser;
  /** Opens a fresh ledger client; called per lookup and per write */
  readonly ledger: LedgerClientFactory;
  readonly mapping: Omit<MapperOptions, "now">;
  readonly logger?: Logger | undefined;
  /** Clock for timestamps, elapsed time and the date fallback */
  readonly now?: (() => Date) | undefined;
  /** Existence probe for input files (default: fs.existsSync) */
  readonly fileExists?: ((filePath: string) => boolean) | undefined;
}

export interface BatchImporterConfig {
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}
