/**
 * @tally/types — Shared domain types for the Tally packages.
 *
 * - Account and operation vocabulary
 * - Operation records and their history projection
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  AccountKind,
  OperationKind,
  OperationStatus,
  CreditUsage,
  Operation,
  HistoryRecord,
} from "./financial.js";

// Runtime type guards
export {
  isAccountKind,
  isOperationKind,
  isOperationStatus,
  isCreditUsage,
  isRealNumber,
  isOperation,
  isHistoryRecord,
} from "./guards.js";
