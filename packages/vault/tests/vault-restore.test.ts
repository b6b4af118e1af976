/**
 * Tests for Vault.snapshot and Vault.fromSnapshot.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Vault } from "../src/vault.js";
import type { VaultSnapshot } from "../src/types.js";
import { castVote, convert, createHarness, endVoting, openDispute, START, VAULT, WEEK } from "./harness.js";
import type { Harness } from "./harness.js";

// =============================================================================
// Helpers
// =============================================================================

function restore(h: Harness, snapshot: VaultSnapshot): Vault {
  return Vault.fromSnapshot(
    snapshot,
    { baseToken: h.base, governanceToken: h.governance },
    { clock: () => h.clock.now, eventStore: h.store },
  );
}

/** Simulate a trip through storage. */
function viaJson(value: unknown): VaultSnapshot {
  return JSON.parse(JSON.stringify(value));
}

function expectInvalid(h: Harness, snapshot: VaultSnapshot): void {
  try {
    restore(h, snapshot);
    expect.unreachable();
  } catch (err) {
    expect(err).toMatchObject({ name: "VaultError", code: "INVALID_SNAPSHOT" });
  }
}

// =============================================================================
// Tests
// =============================================================================

describe("Vault snapshots", () => {
  let h: Harness;
  let snapshot: VaultSnapshot;

  beforeEach(() => {
    h = createHarness();
    convert(h, "alice", 4_040n);
    h.vault.withdrawOwedFees("dave");
    openDispute(h, "bob");
    castVote(h, "erin", "decline", 300n);
    castVote(h, "frank", "accept", 100n);
    snapshot = viaJson(h.vault.snapshot());
  });

  it("serializes amounts as strings", () => {
    expect(snapshot).toMatchObject({
      version: 1,
      locked: true,
      accruedFees: "40",
      remainingFees: "30",
      feeSnapshots: { dave: "40" },
      dispute: {
        initiator: "bob",
        initiationAmount: "1000",
        endTime: START + WEEK,
        acceptWeight: "100",
        declineWeight: "300",
        open: true,
      },
      votes: [
        { voter: "erin", side: "decline", weight: "300" },
        { voter: "frank", side: "accept", weight: "100" },
      ],
      savedAt: "2023-11-14T22:13:20.000Z",
    });
    expect(snapshot.config).toEqual({
      address: VAULT,
      oracleCondition: "Did the bridge pay out by 2026-12-31?",
      disputeDurationSeconds: WEEK,
      initiationAmountDenominator: "4",
      feeDenominator: "100",
      zeroVotePolicy: "refund",
      cTokenSymbol: "cTKN",
      iTokenSymbol: "iTKN",
    });
  });

  it("restores every piece of vault state", () => {
    const restored = restore(h, snapshot);

    expect(restored.isLocked()).toBe(true);
    expect(restored.phase()).toBe("disputing");
    expect(restored.getDispute()).toEqual(h.vault.getDispute());
    expect(restored.getVotes()).toEqual(h.vault.getVotes());
    expect(restored.getFees()).toEqual({ accruedFees: 40n, remainingFees: 30n });
    expect(restored.getOwedFees("dave")).toBe(0n);
    expect(restored.iToken.balanceOf("alice")).toBe(4_000n);
    expect(restored.cToken.totalSupply()).toBe(4_000n);
    expect(restored.solvency().solvent).toBe(true);
  });

  it("continues the dispute after a restore", () => {
    const restored = restore(h, snapshot);
    h.clock.now = START + WEEK + 1;

    const resolution = restored.resolveDispute("carol");

    expect(resolution.credits).toEqual([
      { account: "erin", governanceToken: 400n, baseToken: 1_000n },
    ]);
    expect(restored.getPendingRewards("erin")).toEqual({ baseToken: 1_000n, governanceToken: 400n });
  });

  it("round-trips pending rewards", () => {
    h.clock.now = START + WEEK + 1;
    h.vault.resolveDispute("carol");
    const restored = restore(h, viaJson(h.vault.snapshot()));

    expect(restored.getPendingRewards("erin")).toEqual({ baseToken: 1_000n, governanceToken: 400n });
    expect(restored.phase()).toBe("idle");
    expect(restored.getDispute()?.open).toBe(false);
  });

  it("rejects an unknown version", () => {
    expectInvalid(h, viaJson({ ...snapshot, version: 2 }));
  });

  it("rejects malformed amounts", () => {
    expectInvalid(h, { ...snapshot, accruedFees: "-1" });
    expectInvalid(h, { ...snapshot, rewards: { erin: { baseToken: "1.5", governanceToken: "0" } } });
  });

  it("rejects remaining fees above accrued fees", () => {
    expectInvalid(h, { ...snapshot, remainingFees: "41" });
  });

  it("rejects weights that disagree with the votes", () => {
    expectInvalid(h, { ...snapshot, votes: snapshot.votes.slice(1) });
  });

  it("rejects claim tokens owned by another account", () => {
    expectInvalid(h, { ...snapshot, cToken: { ...snapshot.cToken, owner: "mallory" } });
  });

  it("rejects a claim token ledger that does not add up", () => {
    expectInvalid(h, { ...snapshot, iToken: { ...snapshot.iToken, totalSupply: "1" } });
  });

  it("rejects an invalid configuration", () => {
    expectInvalid(h, { ...snapshot, config: { ...snapshot.config, feeDenominator: "0" } });
  });
});

describe("Vault snapshots with unusual account ids", () => {
  it("keeps rewards and fee snapshots of an account named __proto__", () => {
    const h = createHarness();
    convert(h, "alice", 4_040n);
    h.governance.transfer("erin", "__proto__", 300n);
    expect(h.vault.withdrawOwedFees("__proto__")).toBe(3n);

    openDispute(h, "bob");
    castVote(h, "__proto__", "decline", 300n);
    endVoting(h);
    h.vault.resolveDispute("carol");
    expect(h.vault.getPendingRewards("__proto__")).toEqual({ baseToken: 1_000n, governanceToken: 300n });

    const restored = restore(h, viaJson(h.vault.snapshot()));

    expect(restored.getPendingRewards("__proto__")).toEqual({ baseToken: 1_000n, governanceToken: 300n });
    expect(restored.withdrawGovernanceTokenReward("__proto__")).toBe(300n);
    expect(restored.getOwedFees("__proto__")).toBe(0n);
    expect(() => restored.withdrawOwedFees("__proto__")).toThrow('No fees owed to "__proto__"');
  });
});
