/**
 * @tally/ledger — Append-only operation log.
 *
 * Every attempted deposit or withdrawal that passes input validation
 * becomes exactly one frozen Operation, appended in creation order.
 * Rejected attempts are recorded too, with status "fail".
 *
 * API surface:
 * - record() — Create, freeze and append one operation
 * - getOperations() — Copy of the stored records
 * - project() — History rows for callers
 *
 * There is NO update() or remove().
 */

import type { Logger } from "pino";
import type {
  AccountKind,
  CreditUsage,
  HistoryRecord,
  Operation,
  OperationKind,
  OperationStatus,
} from "@tally/types";
import { silentLogger } from "./logger.js";
import type { AccountOptions } from "./types.js";

// ─── Projection Helpers ──────────────────────────────────────────────────

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Render a Date as "YYYY-MM-DD HH:MM:SS" in local time.
 */
export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear()).padStart(4, "0")}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Map the tri-state credit usage onto the history's boolean | null.
 */
export function creditUsedFlag(usage: CreditUsage): boolean | null {
  switch (usage) {
    case "unset":
      return null;
    case "not-used":
      return false;
    case "used":
      return true;
  }
}

export function toHistoryRecord(op: Operation): HistoryRecord {
  return {
    opType: op.kind,
    amount: op.amount,
    timestamp: formatTimestamp(op.timestamp),
    balanceAfter: op.balanceAfter,
    status: op.status,
    creditUsed: creditUsedFlag(op.creditUsage),
  };
}

// ─── Log ─────────────────────────────────────────────────────────────────

export interface OperationLogContext {
  readonly holder: string;
  readonly accountKind: AccountKind;
}

export class OperationLog {
  private readonly _operations: Operation[] = [];
  private readonly _clock: () => Date;
  private readonly _logger: Logger;

  constructor(context: OperationLogContext, options?: AccountOptions) {
    this._clock = options?.clock ?? (() => new Date());
    this._logger = (options?.logger ?? silentLogger).child({
      holder: context.holder,
      accountKind: context.accountKind,
    });
  }

  /**
   * Append one operation. The timestamp never goes backwards: if the
   * clock reports an earlier time than the last record, the last
   * record's time is reused.
   */
  record(
    kind: OperationKind,
    amount: number,
    balanceAfter: number,
    status: OperationStatus,
    creditUsage: CreditUsage,
  ): void {
    const op: Operation = Object.freeze({
      kind,
      amount,
      timestamp: this._nextTimestamp(),
      balanceAfter,
      status,
      creditUsage,
    });
    this._operations.push(op);

    const fields = { opType: kind, amount, balanceAfter };
    if (status === "success") {
      this._logger.debug(fields, "operation applied");
    } else {
      this._logger.info(
        { ...fields, creditUsed: creditUsedFlag(creditUsage) },
        "operation rejected",
      );
    }
  }

  private _nextTimestamp(): Date {
    const now = this._clock();
    const last = this._operations[this._operations.length - 1];
    if (last !== undefined && now.getTime() < last.timestamp.getTime()) {
      return new Date(last.timestamp.getTime());
    }
    return new Date(now.getTime());
  }

  /**
   * Copies of the stored records; each carries its own Date so callers
   * cannot reach the stored timestamps.
   */
  getOperations(): readonly Operation[] {
    return this._operations.map((op) =>
      Object.freeze({ ...op, timestamp: new Date(op.timestamp.getTime()) }),
    );
  }

  project(): HistoryRecord[] {
    return this._operations.map(toHistoryRecord);
  }
}
