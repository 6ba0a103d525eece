/**
 * Property tests for the lending ledger.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { LendingError } from "../src/types.js";
import { ASSET, STARTING_BALANCE, createLendingFixture } from "./fixtures.js";

describe("lending properties", () => {
  it("deposit then withdraw restores every balance", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 1n, max: STARTING_BALANCE }), (amount) => {
        const { ledger, custody } = createLendingFixture();

        ledger.deposit("alice", amount);
        ledger.withdraw("alice", amount);

        expect(ledger.getDepositBalance("alice")).toBe(0n);
        expect(ledger.getProtocolStats().totalDeposited).toBe(0n);
        expect(custody.balanceOf("alice", ASSET)).toBe(STARTING_BALANCE);
      }),
    );
  });

  it("accepts a first loan exactly when collateral * 100 / amount >= 150", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 100_000n }),
        fc.bigInt({ min: 1n, max: 300_000n }),
        (amount, collateral) => {
          const { ledger } = createLendingFixture();
          const expected = (collateral * 100n) / amount >= 150n;

          let accepted = true;
          try {
            ledger.borrow("alice", amount, collateral);
          } catch (e) {
            expect(e).toBeInstanceOf(LendingError);
            accepted = false;
          }

          expect(accepted).toBe(expected);
          expect(ledger.getBorrowedBalance("alice")).toBe(expected ? amount : 0n);
        },
      ),
    );
  });

  it("never lets a fresh loan fall below 150% at its own block", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 1n, max: 100_000n }), (amount) => {
        const { ledger } = createLendingFixture();
        const collateral = (amount * 3n + 1n) / 2n;
        const loan = ledger.borrow("alice", amount, collateral);
        expect(ledger.isHealthy(loan.loanId)).toBe(true);
      }),
    );
  });
});
