/**
 * Tests for shared input validation.
 */

import { describe, it, expect } from "vitest";
import {
  depositedBalance,
  validateAmount,
  validateCreditLimit,
  validateHolder,
  validateOpeningBalance,
} from "../src/validation.js";
import { LedgerError } from "../src/types.js";

describe("validateAmount", () => {
  it("returns a positive amount unchanged", () => {
    expect(validateAmount(0.01)).toBe(0.01);
    expect(validateAmount(1_000_000)).toBe(1_000_000);
  });

  it.each([0, -0, -1, -0.5])("rejects non-positive %s", (amount) => {
    expect(() => validateAmount(amount)).toThrow(LedgerError);
    expect(() => validateAmount(amount)).toThrow(/must be positive/);
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY, "10", null, undefined, {}])(
    "rejects non-real %s",
    (amount) => {
      expect(() => validateAmount(amount)).toThrow(/must be a real number/);
    },
  );

  it("names the type of a value it cannot print", () => {
    expect(() => validateAmount(Object.create(null))).toThrow(
      new LedgerError("INVALID_AMOUNT", "Amount must be a real number, got: object"),
    );
    expect(() => validateAmount(Symbol("ten"))).toThrow("Amount must be a real number, got: symbol");
  });

  it("uses the INVALID_AMOUNT code", () => {
    try {
      validateAmount(-1);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      if (err instanceof LedgerError) {
        expect(err.code).toBe("INVALID_AMOUNT");
        expect(err.name).toBe("LedgerError");
      }
    }
  });
});

describe("validateHolder", () => {
  it("trims surrounding whitespace", () => {
    expect(validateHolder("\t Ivan Petrov \n")).toBe("Ivan Petrov");
  });

  it.each(["", "   ", "\n\t", 42, null])("rejects %s", (holder) => {
    expect(() => validateHolder(holder)).toThrow(/non-empty string/);
  });
});

describe("validateOpeningBalance", () => {
  it("accepts the floor itself", () => {
    expect(validateOpeningBalance(0, 0)).toBe(0);
    expect(validateOpeningBalance(-300, -300)).toBe(-300);
  });

  it("rejects a balance below the floor", () => {
    expect(() => validateOpeningBalance(-1, 0)).toThrow(
      "Opening balance -1 is below the allowed floor of 0",
    );
  });

  it("rejects non-real balances", () => {
    expect(() => validateOpeningBalance(Number.NaN, 0)).toThrow(/must be a real number/);
    expect(() => validateOpeningBalance("100", 0)).toThrow(/must be a real number/);
  });

  it("rejects a null-prototype object with INVALID_BALANCE", () => {
    expect(() => validateOpeningBalance(Object.create(null), 0)).toThrow(
      new LedgerError("INVALID_BALANCE", "Balance must be a real number, got: object"),
    );
  });
});

describe("validateCreditLimit", () => {
  it("accepts zero and positive limits", () => {
    expect(validateCreditLimit(0)).toBe(0);
    expect(validateCreditLimit(300)).toBe(300);
  });

  it("rejects a negative limit", () => {
    expect(() => validateCreditLimit(-0.01)).toThrow(/cannot be negative/);
  });

  it("rejects an infinite limit", () => {
    expect(() => validateCreditLimit(Number.POSITIVE_INFINITY)).toThrow(/must be a real number/);
  });

  it("rejects a null-prototype object with INVALID_CREDIT_LIMIT", () => {
    expect(() => validateCreditLimit(Object.create(null))).toThrow(
      new LedgerError("INVALID_CREDIT_LIMIT", "Credit limit must be a real number, got: object"),
    );
  });
});

describe("depositedBalance", () => {
  it("returns the sum", () => {
    expect(depositedBalance(100, 50)).toBe(150);
    expect(depositedBalance(-100, 80)).toBe(-20);
  });

  it("refuses a sum that overflows to Infinity", () => {
    expect(() => depositedBalance(Number.MAX_VALUE, Number.MAX_VALUE)).toThrow(
      new LedgerError(
        "INVALID_AMOUNT",
        `Depositing ${String(Number.MAX_VALUE)} would overflow the balance of ${String(Number.MAX_VALUE)}`,
      ),
    );
  });
});
