/**
 * @tally/demo — Account walkthrough.
 *
 * Drives a standard account and a credit account through a short
 * sequence of deposits and withdrawals, printing each outcome, the
 * resulting balances and the full history.
 *
 * Uses the real ledger package directly. Output goes through a sink so
 * the walkthrough can run against a terminal or a test buffer.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import type { HistoryRecord } from "@tally/types";
import { createLedgerLogger, openAccount, silentLogger } from "@tally/ledger";
import type { LedgerAccount } from "@tally/ledger";

// =============================================================================
// Types
// =============================================================================

export interface WalkthroughStep {
  readonly op: "deposit" | "withdraw";
  readonly amount: number;
}

export interface WalkthroughOptions {
  readonly out: (line: string) => void;
  readonly creditLimit: number;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly colors?: ChalkInstance | undefined;
}

export interface WalkthroughSummary {
  readonly standardBalance: number;
  readonly creditBalance: number;
  readonly availableCredit: number;
}

export const STANDARD_STEPS: readonly WalkthroughStep[] = [
  { op: "deposit", amount: 50 },
  { op: "withdraw", amount: 500 },
  { op: "withdraw", amount: 120 },
];

export const CREDIT_STEPS: readonly WalkthroughStep[] = [
  { op: "withdraw", amount: 100 },
  { op: "withdraw", amount: 250 },
  { op: "deposit", amount: 80 },
];

// =============================================================================
// Formatting
// =============================================================================

/**
 * One history row as a single line, without colors.
 */
export function formatHistoryRow(row: HistoryRecord): string {
  const credit = row.creditUsed === null ? "" : `  creditUsed=${String(row.creditUsed)}`;
  return (
    `${row.timestamp}  ${row.opType.padEnd(8)} ${String(row.amount).padStart(8)}` +
    `  ${row.status.padEnd(7)}  balance=${String(row.balanceAfter)}${credit}`
  );
}

// =============================================================================
// Walkthrough
// =============================================================================

function runSteps(
  account: LedgerAccount,
  steps: readonly WalkthroughStep[],
  out: (line: string) => void,
  c: ChalkInstance,
): void {
  for (const step of steps) {
    const applied = step.op === "deposit" ? account.deposit(step.amount) : account.withdraw(step.amount);
    const label = `${step.op} ${String(step.amount)}`;
    if (applied) {
      out(c.green("    ✓ ") + c.white(label));
    } else {
      out(c.yellow("    ! ") + c.yellow(`${label} rejected`));
    }
  }
}

function printHistory(account: LedgerAccount, out: (line: string) => void, c: ChalkInstance): void {
  out(c.gray("    History:"));
  for (const row of account.getHistory()) {
    const line = `      ${formatHistoryRow(row)}`;
    out(row.status === "success" ? c.white(line) : c.yellow(line));
  }
}

/**
 * Run both scenarios and return the final figures.
 */
export function runWalkthrough(options: WalkthroughOptions): WalkthroughSummary {
  const { out } = options;
  const c = options.colors ?? chalk;
  const accountOptions = {
    clock: options.clock,
    logger: createLedgerLogger(options.logger ?? silentLogger),
  };

  out(c.cyan.bold("  Standard account"));
  const standard = openAccount({ kind: "standard", holder: "Ivan", balance: 100 }, accountOptions);
  runSteps(standard, STANDARD_STEPS, out, c);
  out(c.white("    Balance: ") + c.cyan.bold(String(standard.getBalance())));
  printHistory(standard, out, c);

  out("");

  out(c.cyan.bold("  Credit account"));
  const credit = openAccount(
    { kind: "credit", holder: "Petr", balance: 0, creditLimit: options.creditLimit },
    accountOptions,
  );
  runSteps(credit, CREDIT_STEPS, out, c);
  out(c.white("    Balance: ") + c.cyan.bold(String(credit.getBalance())));
  out(c.white("    Available credit: ") + c.cyan.bold(String(credit.getAvailableCredit())));
  printHistory(credit, out, c);

  return {
    standardBalance: standard.getBalance(),
    creditBalance: credit.getBalance(),
    availableCredit: credit.getAvailableCredit(),
  };
}
