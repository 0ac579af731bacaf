/**
 * @tally/ledger — Logging.
 *
 * Accounts log through pino. Without an injected logger they use
 * `silentLogger`, so the engine stays quiet when embedded.
 */

import pino from "pino";
import type { Logger } from "pino";

export const silentLogger: Logger = pino({ level: "silent" });

/**
 * Derive the ledger's logger from an application root logger.
 */
export function createLedgerLogger(parent: Logger): Logger {
  return parent.child({ component: "ledger" });
}
