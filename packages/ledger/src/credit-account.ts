/**
 * @tally/ledger — Credit account.
 *
 * The balance may go negative, down to -creditLimit. Each recorded
 * operation says whether credit was drawn upon:
 * - deposits never use credit
 * - an applied withdrawal uses credit if the balance was negative
 *   before it or is negative after it
 * - a rejected withdrawal uses credit only if the account was already
 *   negative
 */

import type { CreditUsage, HistoryRecord, Operation } from "@tally/types";
import { OperationLog } from "./operation-log.js";
import type { AccountContract, AccountOptions } from "./types.js";
import {
  depositedBalance,
  validateAmount,
  validateCreditLimit,
  validateHolder,
  validateOpeningBalance,
} from "./validation.js";

function usage(inCredit: boolean): CreditUsage {
  return inCredit ? "used" : "not-used";
}

export class CreditAccount implements AccountContract {
  public readonly kind = "credit" as const;
  public readonly holder: string;

  private _balance: number;
  private readonly _creditLimit: number;
  private readonly _log: OperationLog;

  /**
   * Unlike the standard account, the opening balance only has to stay
   * at or above -creditLimit.
   *
   * @throws {LedgerError} INVALID_CREDIT_LIMIT for a non-real or negative limit
   * @throws {LedgerError} INVALID_BALANCE for a non-real balance or one below -creditLimit
   * @throws {LedgerError} INVALID_HOLDER for an empty or blank holder
   */
  constructor(
    holder: string,
    balance: number = 0,
    creditLimit: number = 0,
    options?: AccountOptions,
  ) {
    this._creditLimit = validateCreditLimit(creditLimit);
    this._balance = validateOpeningBalance(balance, -this._creditLimit);
    this.holder = validateHolder(holder);
    this._log = new OperationLog({ holder: this.holder, accountKind: this.kind }, options);
  }

  deposit(amount: number): boolean {
    const value = validateAmount(amount);

    this._balance = depositedBalance(this._balance, value);
    this._log.record("deposit", value, this._balance, "success", "not-used");
    return true;
  }

  withdraw(amount: number): boolean {
    const value = validateAmount(amount);

    const newBalance = this._balance - value;
    if (newBalance < -this._creditLimit) {
      this._log.record("withdraw", value, this._balance, "fail", usage(this._balance < 0));
      return false;
    }

    const wasInCredit = this._balance < 0;
    this._balance = newBalance;
    this._log.record(
      "withdraw",
      value,
      this._balance,
      "success",
      usage(wasInCredit || this._balance < 0),
    );
    return true;
  }

  getBalance(): number {
    return this._balance;
  }

  getCreditLimit(): number {
    return this._creditLimit;
  }

  /** Unused borrowing capacity: balance + creditLimit. */
  getAvailableCredit(): number {
    return this._balance + this._creditLimit;
  }

  getHistory(): HistoryRecord[] {
    return this._log.project();
  }

  getOperations(): readonly Operation[] {
    return this._log.getOperations();
  }
}
