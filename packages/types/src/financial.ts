/**
 * Financial Types
 *
 * Primitives shared by every account variant.
 *
 * Rules:
 * - Amounts and balances are plain numbers (real values, never NaN or Infinity)
 * - Operation records are frozen once created
 * - The history of an account is append-only by contract
 */

/**
 * The two account variants.
 * A standard account never goes negative; a credit account may go
 * down to minus its credit limit.
 */
export type AccountKind = "standard" | "credit";

/** What an operation attempted to do. */
export type OperationKind = "deposit" | "withdraw";

/**
 * Outcome of an attempted operation.
 * A policy rejection (insufficient funds, credit floor) is a "fail".
 */
export type OperationStatus = "success" | "fail";

/**
 * Whether credit was drawn upon by an operation.
 *
 * - "unset"    → not applicable (standard accounts)
 * - "not-used" → credit account, balance stayed at or above zero
 * - "used"     → credit account, balance was or became negative
 */
export type CreditUsage = "unset" | "not-used" | "used";

/**
 * A single attempted operation and its outcome.
 * Produced only by account entities.
 */
export interface Operation {
  readonly kind: OperationKind;

  /** The requested amount, even when the operation was rejected */
  readonly amount: number;

  /** Captured when the record is created */
  readonly timestamp: Date;

  /**
   * Account balance at the moment the record was created.
   * For a rejected operation this is the unchanged balance.
   */
  readonly balanceAfter: number;

  readonly status: OperationStatus;

  readonly creditUsage: CreditUsage;
}

/**
 * The read-only row handed to callers of `getHistory()`.
 */
export interface HistoryRecord {
  readonly opType: OperationKind;
  readonly amount: number;

  /** Local time, second precision: "YYYY-MM-DD HH:MM:SS" */
  readonly timestamp: string;

  readonly balanceAfter: number;
  readonly status: OperationStatus;

  /** null for standard accounts */
  readonly creditUsed: boolean | null;
}
