/**
 * Duplicate Checker
 *
 * Asks the ledger whether a transaction identity is already recorded.
 *
 * Every lookup opens its own client from the factory, so a lookup can
 * never see or disturb a movement another client has staged.
 *
 * A lookup that cannot run is an error, never "not found": reading a
 * failure as absence would let a duplicate through.
 */

import type { Logger } from "pino";
import type { LedgerClientFactory } from "@bank-import/ledger";
import { describeFilter, noteContains } from "@bank-import/ledger";
import { wrapIdentity } from "./identity.js";
import { ImportError } from "./errors.js";
import { silentLogger } from "./logger.js";

export class DuplicateChecker {
  private readonly openClient: LedgerClientFactory;
  private readonly logger: Logger;

  constructor(openClient: LedgerClientFactory, logger: Logger = silentLogger()) {
    this.openClient = openClient;
    this.logger = logger;
  }

  /**
   * @throws {ImportError} DUPLICATE_CHECK_FAILURE when the ledger listing fails
   */
  async exists(identity: string): Promise<boolean> {
    const checker = this.openClient();
    const filter = noteContains(wrapIdentity(identity));
    const handle = checker.query(filter, `TransactionID: ${identity}`);

    this.logger.debug({ identity, filter: describeFilter(filter) }, "Checking ledger for identity");

    const found = await checker.list(handle);
    if (found === false) {
      throw new ImportError(
        "DUPLICATE_CHECK_FAILURE",
        `Error fetching records for transaction check: ${identity}`,
      );
    }

    return found.length > 0;
  }
}
