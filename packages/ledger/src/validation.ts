/**
 * @tally/ledger — Input validation shared by both account variants.
 *
 * Every check throws a LedgerError before any state is touched.
 * Nothing rejected here ever reaches the operation history.
 */

import { isRealNumber } from "@tally/types";
import { LedgerError } from "./types.js";

/**
 * Describe a rejected value without coercing it; `String()` throws on
 * null-prototype objects and on objects with a throwing `toString`.
 */
function describeValue(value: unknown): string {
  return typeof value === "number" ? String(value) : typeof value;
}

/**
 * Validate an operation amount: a real number strictly above zero.
 */
export function validateAmount(amount: unknown): number {
  if (!isRealNumber(amount)) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be a real number, got: ${describeValue(amount)}`);
  }
  if (amount <= 0) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be positive, got: ${String(amount)}`);
  }
  return amount;
}

/**
 * Validate an account holder and return it trimmed.
 */
export function validateHolder(holder: unknown): string {
  if (typeof holder !== "string" || holder.trim() === "") {
    throw new LedgerError("INVALID_HOLDER", "Account holder must be a non-empty string");
  }
  return holder.trim();
}

/**
 * Validate an opening balance against the variant's floor
 * (0 for standard accounts, -creditLimit for credit accounts).
 */
export function validateOpeningBalance(balance: unknown, floor: number): number {
  if (!isRealNumber(balance)) {
    throw new LedgerError("INVALID_BALANCE", `Balance must be a real number, got: ${describeValue(balance)}`);
  }
  if (balance < floor) {
    throw new LedgerError(
      "INVALID_BALANCE",
      `Opening balance ${String(balance)} is below the allowed floor of ${String(floor)}`,
    );
  }
  return balance;
}

/**
 * Validate a credit limit: a real number, zero or above.
 */
export function validateCreditLimit(limit: unknown): number {
  if (!isRealNumber(limit)) {
    throw new LedgerError("INVALID_CREDIT_LIMIT", `Credit limit must be a real number, got: ${describeValue(limit)}`);
  }
  if (limit < 0) {
    throw new LedgerError("INVALID_CREDIT_LIMIT", `Credit limit cannot be negative, got: ${String(limit)}`);
  }
  return limit;
}

/**
 * Compute the balance after a deposit, refusing a sum that is no longer
 * a real number.
 */
export function depositedBalance(balance: number, amount: number): number {
  const next = balance + amount;
  if (!isRealNumber(next)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Depositing ${String(amount)} would overflow the balance of ${String(balance)}`,
    );
  }
  return next;
}
