/**
 * @tally/ledger — Account factory.
 *
 * Opens either variant from a tagged spec. `parseAccountSpec` checks the
 * shape of untrusted input with Zod; the domain rules (blank holders,
 * balance floors, negative limits) stay with the constructors.
 */

import { z } from "zod";
import type { ZodError } from "zod";
import { Account } from "./account.js";
import { CreditAccount } from "./credit-account.js";
import type { AccountOptions } from "./types.js";
import { LedgerError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const StandardAccountSpecSchema = z.object({
  kind: z.literal("standard"),
  holder: z.string(),
  balance: z.number().optional(),
});

export const CreditAccountSpecSchema = z.object({
  kind: z.literal("credit"),
  holder: z.string(),
  balance: z.number().optional(),
  creditLimit: z.number().optional(),
});

export const AccountSpecSchema = z.discriminatedUnion("kind", [
  StandardAccountSpecSchema,
  CreditAccountSpecSchema,
]);

export type StandardAccountSpec = z.infer<typeof StandardAccountSpecSchema>;
export type CreditAccountSpec = z.infer<typeof CreditAccountSpecSchema>;
export type AccountSpec = z.infer<typeof AccountSpecSchema>;

/** Either account variant; narrow on `kind`. */
export type LedgerAccount = Account | CreditAccount;

// =============================================================================
// Parsing
// =============================================================================

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse an untrusted value into an AccountSpec.
 *
 * @throws {LedgerError} INVALID_ACCOUNT_SPEC when the shape is wrong
 */
export function parseAccountSpec(input: unknown): AccountSpec {
  const result = AccountSpecSchema.safeParse(input);
  if (!result.success) {
    throw new LedgerError(
      "INVALID_ACCOUNT_SPEC",
      `Invalid account spec: ${formatZodIssues(result.error)}`,
    );
  }
  return result.data;
}

// =============================================================================
// Factory
// =============================================================================

export function openAccount(spec: StandardAccountSpec, options?: AccountOptions): Account;
export function openAccount(spec: CreditAccountSpec, options?: AccountOptions): CreditAccount;
export function openAccount(spec: AccountSpec, options?: AccountOptions): LedgerAccount;
export function openAccount(spec: AccountSpec, options?: AccountOptions): LedgerAccount {
  switch (spec.kind) {
    case "standard":
      return new Account(spec.holder, spec.balance, options);
    case "credit":
      return new CreditAccount(spec.holder, spec.balance, spec.creditLimit, options);
  }
}
