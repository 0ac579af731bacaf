/**
 * @tally/ledger — Internal types for the account engine.
 *
 * These extend the shared @tally/types with structures used only
 * within this package.
 *
 * Rules:
 * - Input errors throw, policy rejections return false
 * - Stored operations are never mutated
 */

import type { Logger } from "pino";
import type {
  AccountKind,
  HistoryRecord,
  Operation,
} from "@tally/types";

// ─── Account Contract ────────────────────────────────────────────────────

/**
 * Operations every account variant answers to.
 */
export interface AccountContract {
  readonly kind: AccountKind;
  readonly holder: string;

  /** Always true once the amount is valid. */
  deposit(amount: number): boolean;

  /** True if applied, false if rejected by the account's bound policy. */
  withdraw(amount: number): boolean;

  getBalance(): number;

  /** Fresh projection on every call. */
  getHistory(): HistoryRecord[];

  getOperations(): readonly Operation[];
}

// ─── Options ─────────────────────────────────────────────────────────────

/**
 * Optional collaborators for an account.
 */
export interface AccountOptions {
  /** Timestamp source for operation records. Defaults to `new Date()`. */
  readonly clock?: (() => Date) | undefined;

  /** Defaults to the silent logger. */
  readonly logger?: Logger | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for account operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_BALANCE"
  | "INVALID_CREDIT_LIMIT"
  | "INVALID_HOLDER"
  | "INVALID_ACCOUNT_SPEC";

/**
 * Structured error from the account engine.
 * Always thrown — never returns error codes silently, never recorded in history.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
