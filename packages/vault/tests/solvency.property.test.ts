/**
 * Property tests: solvency and lock monotonicity hold across random
 * operation sequences.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { BalanceToken, TokenError } from "@splitvault/token";
import { VaultError } from "../src/types.js";
import { createHarness, VAULT } from "./harness.js";
import type { Harness } from "./harness.js";

const ACCOUNTS = ["alice", "bob", "carol", "dave"] as const;
const UNLIMITED = 10n ** 30n;

const account = fc.constantFrom(...ACCOUNTS);

const step = fc.oneof(
  fc.record({ kind: fc.constant("convert" as const), who: account, amount: fc.integer({ min: 1, max: 50_000 }) }),
  fc.record({ kind: fc.constant("redeem" as const), who: account, amount: fc.integer({ min: 1, max: 50_000 }) }),
  fc.record({ kind: fc.constant("initiate" as const), who: account }),
  fc.record({
    kind: fc.constant("vote" as const),
    who: account,
    side: fc.constantFrom("accept" as const, "decline" as const),
    weight: fc.integer({ min: 1, max: 3_000 }),
  }),
  fc.record({ kind: fc.constant("advance" as const), seconds: fc.integer({ min: 1, max: 400_000 }) }),
  fc.record({ kind: fc.constant("resolve" as const), who: account }),
  fc.record({ kind: fc.constant("fees" as const), who: account }),
  fc.record({ kind: fc.constant("reward" as const), who: account, currency: fc.constantFrom("base" as const, "governance" as const) }),
  fc.record({ kind: fc.constant("moveGovernance" as const), from: account, to: account, amount: fc.integer({ min: 1, max: 2_000 }) }),
  fc.record({ kind: fc.constant("moveClaim" as const), from: account, to: account, amount: fc.integer({ min: 1, max: 20_000 }) }),
);

type Step = typeof step extends fc.Arbitrary<infer T> ? T : never;

function setup(zeroVotePolicy: "refund" | "reject"): Harness {
  const base = new BalanceToken({
    symbol: "TKN",
    allocations: ACCOUNTS.map((a) => ({ account: a, amount: 1_000_000n })),
  });
  const governance = new BalanceToken({
    symbol: "GOV",
    allocations: ACCOUNTS.map((a) => ({ account: a, amount: 10_000n })),
  });
  for (const a of ACCOUNTS) {
    base.approve(a, VAULT, UNLIMITED);
    governance.approve(a, VAULT, UNLIMITED);
  }
  return createHarness({ zeroVotePolicy }, { base, governance });
}

function apply(h: Harness, s: Step): void {
  switch (s.kind) {
    case "convert":
      h.vault.convert(s.who, BigInt(s.amount));
      return;
    case "redeem":
      h.vault.redeem(s.who, BigInt(s.amount));
      return;
    case "initiate":
      h.vault.initiateDispute(s.who);
      return;
    case "vote":
      h.vault.vote(s.who, s.side, BigInt(s.weight));
      return;
    case "advance":
      h.clock.now += s.seconds;
      return;
    case "resolve":
      h.vault.resolveDispute(s.who);
      return;
    case "fees":
      h.vault.withdrawOwedFees(s.who);
      return;
    case "reward":
      if (s.currency === "base") h.vault.withdrawBaseTokenReward(s.who);
      else h.vault.withdrawGovernanceTokenReward(s.who);
      return;
    case "moveGovernance":
      h.governance.transfer(s.from, s.to, BigInt(s.amount));
      return;
    case "moveClaim":
      h.vault.cToken.transfer(s.from, s.to, BigInt(s.amount));
      h.vault.iToken.transfer(s.from, s.to, BigInt(s.amount));
      return;
  }
}

/** Run a step; precondition failures are expected, anything else is a bug. */
function attempt(h: Harness, s: Step): void {
  try {
    apply(h, s);
  } catch (err) {
    if (err instanceof VaultError) return;
    if (err instanceof TokenError && s.kind.startsWith("move")) return;
    throw err;
  }
}

describe("Vault invariants", () => {
  for (const policy of ["refund", "reject"] as const) {
    it(`stays solvent under random operations (zero-vote policy ${policy})`, () => {
      fc.assert(
        fc.property(fc.array(step, { maxLength: 60 }), (steps) => {
          const h = setup(policy);
          let wasLocked = h.vault.isLocked();

          for (const s of steps) {
            attempt(h, s);

            const report = h.vault.solvency();
            expect(report.base.held).toBeGreaterThanOrEqual(report.base.owed);
            expect(report.governance.held).toBeGreaterThanOrEqual(report.governance.owed);

            const fees = h.vault.getFees();
            expect(fees.remainingFees).toBeLessThanOrEqual(fees.accruedFees);
            if (h.vault.isLocked()) {
              expect(h.vault.cToken.totalSupply()).toBe(h.vault.iToken.totalSupply());
            } else {
              expect(h.vault.cToken.totalSupply()).toBeGreaterThanOrEqual(h.vault.iToken.totalSupply());
            }

            if (!wasLocked) expect(h.vault.isLocked()).toBe(false);
            wasLocked = h.vault.isLocked();
          }
        }),
        { numRuns: 100 },
      );
    });
  }

  it("appends at most one event per operation on a valid hash chain", () => {
    fc.assert(
      fc.property(fc.array(step, { maxLength: 40 }), (steps) => {
        const h = setup("refund");
        for (const s of steps) {
          const before = h.store.streamVersion("vault:vault");
          attempt(h, s);
          expect(h.store.streamVersion("vault:vault") - before).toBeLessThanOrEqual(1);
        }
        expect(h.store.verifyIntegrity().valid).toBe(true);
      }),
      { numRuns: 50 },
    );
  });
});
