/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally domain types.
 * These enable safe runtime validation at system boundaries
 * (deserialized history, values handed over by untyped callers).
 */

import type {
  AccountKind,
  CreditUsage,
  HistoryRecord,
  Operation,
  OperationKind,
  OperationStatus,
} from "./financial.js";

// =============================================================================
// Enumerations
// =============================================================================

const ACCOUNT_KINDS = new Set<string>(["standard", "credit"]);
const OPERATION_KINDS = new Set<string>(["deposit", "withdraw"]);
const OPERATION_STATUSES = new Set<string>(["success", "fail"]);
const CREDIT_USAGES = new Set<string>(["unset", "not-used", "used"]);

export function isAccountKind(value: unknown): value is AccountKind {
  return typeof value === "string" && ACCOUNT_KINDS.has(value);
}

export function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === "string" && OPERATION_KINDS.has(value);
}

export function isOperationStatus(value: unknown): value is OperationStatus {
  return typeof value === "string" && OPERATION_STATUSES.has(value);
}

export function isCreditUsage(value: unknown): value is CreditUsage {
  return typeof value === "string" && CREDIT_USAGES.has(value);
}

// =============================================================================
// Numbers
// =============================================================================

/** A real number: a number that is neither NaN nor infinite. */
export function isRealNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

// =============================================================================
// Records
// =============================================================================

export function isOperation(value: unknown): value is Operation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isOperationKind(v.kind) &&
    isRealNumber(v.amount) &&
    v.amount > 0 &&
    v.timestamp instanceof Date &&
    isRealNumber(v.balanceAfter) &&
    isOperationStatus(v.status) &&
    isCreditUsage(v.creditUsage)
  );
}

const HISTORY_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

export function isHistoryRecord(value: unknown): value is HistoryRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isOperationKind(v.opType) &&
    isRealNumber(v.amount) &&
    v.amount > 0 &&
    typeof v.timestamp === "string" &&
    HISTORY_TIMESTAMP.test(v.timestamp) &&
    isRealNumber(v.balanceAfter) &&
    isOperationStatus(v.status) &&
    (v.creditUsed === null || typeof v.creditUsed === "boolean")
  );
}
