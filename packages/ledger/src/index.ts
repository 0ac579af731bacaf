/**
 * @tally/ledger — In-memory account engine with an append-only audit trail.
 *
 * Two account variants share one operation vocabulary:
 * - Account: balance never goes negative
 * - CreditAccount: balance may go down to -creditLimit, and every
 *   operation records whether credit was drawn upon
 *
 * Design rules:
 * - Invalid input throws LedgerError and leaves no trace in history
 * - Policy rejections return false and are recorded with status "fail"
 * - Recorded operations are frozen and never modified or removed
 */

// Account variants
export { Account } from "./account.js";
export { CreditAccount } from "./credit-account.js";

// Factory
export {
  openAccount,
  parseAccountSpec,
  AccountSpecSchema,
  StandardAccountSpecSchema,
  CreditAccountSpecSchema,
} from "./open-account.js";
export type {
  AccountSpec,
  StandardAccountSpec,
  CreditAccountSpec,
  LedgerAccount,
} from "./open-account.js";

// Operation log
export {
  OperationLog,
  formatTimestamp,
  creditUsedFlag,
  toHistoryRecord,
} from "./operation-log.js";
export type { OperationLogContext } from "./operation-log.js";

// Validation
export {
  validateAmount,
  validateHolder,
  validateOpeningBalance,
  validateCreditLimit,
  depositedBalance,
} from "./validation.js";

// Logging
export { silentLogger, createLedgerLogger } from "./logger.js";

// Types
export type {
  AccountContract,
  AccountOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
