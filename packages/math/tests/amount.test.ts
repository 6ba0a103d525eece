/**
 * Tests for decimal-string amounts.
 */

import { describe, it, expect } from "vitest";
import { parseAmount, formatAmount, isAmountString } from "../src/amount.js";
import { MathError } from "../src/errors.js";

describe("parseAmount", () => {
  it("parses unsigned integers", () => {
    expect(parseAmount("0")).toBe(0n);
    expect(parseAmount("1000000")).toBe(1_000_000n);
  });

  it("parses values beyond Number.MAX_SAFE_INTEGER exactly", () => {
    expect(parseAmount("123456789012345678901234567890")).toBe(
      123456789012345678901234567890n,
    );
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  42 ")).toBe(42n);
  });

  it("rejects empty strings", () => {
    expect(() => parseAmount("")).toThrow(MathError);
    expect(() => parseAmount("   ")).toThrow('Invalid amount: "   "');
  });

  it("rejects signs, decimals and exponents", () => {
    expect(() => parseAmount("-5")).toThrow('Invalid amount format: "-5"');
    expect(() => parseAmount("1.5")).toThrow('Invalid amount format: "1.5"');
    expect(() => parseAmount("1e6")).toThrow('Invalid amount format: "1e6"');
  });

  it("reports INVALID_FORMAT", () => {
    try {
      parseAmount("abc");
    } catch (e) {
      expect((e as MathError).code).toBe("INVALID_FORMAT");
    }
  });
});

describe("formatAmount", () => {
  it("renders bigints as decimal strings", () => {
    expect(formatAmount(0n)).toBe("0");
    expect(formatAmount(996n)).toBe("996");
    expect(formatAmount(10n ** 20n)).toBe("100000000000000000000");
  });
});

describe("isAmountString", () => {
  it("accepts only unsigned integer strings", () => {
    expect(isAmountString("100")).toBe(true);
    expect(isAmountString("-1")).toBe(false);
    expect(isAmountString("1.0")).toBe(false);
    expect(isAmountString(100)).toBe(false);
  });
});
