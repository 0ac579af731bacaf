/**
 * @tally/ledger — Standard account.
 *
 * Balance can never go negative. A withdrawal larger than the balance
 * is rejected, recorded with status "fail", and reported as `false`.
 *
 * API surface:
 * - deposit() — Add funds
 * - withdraw() — Remove funds if covered by the balance
 * - getBalance() — Current balance
 * - getHistory() — Projection of every recorded attempt
 * - getOperations() — Copies of the raw operation records
 */

import type { HistoryRecord, Operation } from "@tally/types";
import { OperationLog } from "./operation-log.js";
import type { AccountContract, AccountOptions } from "./types.js";
import {
  depositedBalance,
  validateAmount,
  validateHolder,
  validateOpeningBalance,
} from "./validation.js";

export class Account implements AccountContract {
  public readonly kind = "standard" as const;
  public readonly holder: string;

  private _balance: number;
  private readonly _log: OperationLog;

  /**
   * @throws {LedgerError} INVALID_HOLDER for an empty or blank holder
   * @throws {LedgerError} INVALID_BALANCE for a non-real or negative balance
   */
  constructor(holder: string, balance: number = 0, options?: AccountOptions) {
    this.holder = validateHolder(holder);
    this._balance = validateOpeningBalance(balance, 0);
    this._log = new OperationLog({ holder: this.holder, accountKind: this.kind }, options);
  }

  deposit(amount: number): boolean {
    const value = validateAmount(amount);

    this._balance = depositedBalance(this._balance, value);
    this._log.record("deposit", value, this._balance, "success", "unset");
    return true;
  }

  withdraw(amount: number): boolean {
    const value = validateAmount(amount);

    if (value > this._balance) {
      this._log.record("withdraw", value, this._balance, "fail", "unset");
      return false;
    }

    this._balance -= value;
    this._log.record("withdraw", value, this._balance, "success", "unset");
    return true;
  }

  getBalance(): number {
    return this._balance;
  }

  getHistory(): HistoryRecord[] {
    return this._log.project();
  }

  getOperations(): readonly Operation[] {
    return this._log.getOperations();
  }
}
