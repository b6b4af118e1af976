/**
 * Tests for DisputeEngine and the pure resolution math.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { DisputeEngine, computeResolution } from "../src/dispute-engine.js";
import type { Dispute, Vote } from "../src/types.js";
import { VaultError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function dispute(acceptWeight: bigint, declineWeight: bigint): Dispute {
  return {
    initiator: "bob",
    initiationAmount: 1_000n,
    endTime: 100,
    acceptWeight,
    declineWeight,
    open: true,
  };
}

describe("DisputeEngine", () => {
  let engine: DisputeEngine;

  beforeEach(() => {
    engine = new DisputeEngine();
  });

  it("starts with an empty slot", () => {
    expect(engine.current()).toBeNull();
    expect(engine.isOpen()).toBe(false);
    expect(engine.lockedStake()).toBe(0n);
  });

  it("opens a dispute and clears earlier votes", () => {
    engine.open("bob", 10n, 100);
    engine.castVote("dave", "accept", 5n, 50);
    engine.resolve(101, true, "refund");

    engine.open("carol", 20n, 300);

    expect(engine.currentVotes()).toEqual([]);
    expect(engine.current()).toEqual({
      initiator: "carol",
      initiationAmount: 20n,
      endTime: 300,
      acceptWeight: 0n,
      declineWeight: 0n,
      open: true,
    });
  });

  it("tracks stake and collateral only while open", () => {
    engine.open("bob", 10n, 100);
    engine.castVote("dave", "accept", 5n, 50);
    engine.castVote("erin", "decline", 7n, 60);

    expect(engine.lockedStake()).toBe(12n);
    expect(engine.lockedCollateral()).toBe(10n);

    engine.resolve(101, true, "refund");

    expect(engine.lockedStake()).toBe(0n);
    expect(engine.lockedCollateral()).toBe(0n);
  });

  it("hands out copies", () => {
    engine.open("bob", 10n, 100);
    const view = engine.currentVotes();
    engine.castVote("dave", "accept", 5n, 50);
    expect(view).toEqual([]);
  });

  it("restores an exported state", () => {
    engine.open("bob", 10n, 100);
    const state = engine.exportState();
    engine.castVote("dave", "accept", 5n, 50);

    engine.importState(state);

    expect(engine.currentVotes()).toEqual([]);
    expect(engine.current()?.acceptWeight).toBe(0n);
  });

  it("refuses to resolve at endTime", () => {
    engine.open("bob", 10n, 100);
    expect(() => engine.resolve(100, true, "refund")).toThrow("Voting runs until 100, now is 100");
  });
});

describe("computeResolution", () => {
  it("splits the accept stake and the collateral among decline voters", () => {
    const votes: Vote[] = [
      { voter: "dave", side: "decline", weight: 100n },
      { voter: "erin", side: "decline", weight: 300n },
      { voter: "frank", side: "accept", weight: 100n },
    ];

    const resolution = computeResolution(dispute(100n, 400n), votes, true, "refund");

    expect(resolution).toEqual({
      outcome: "decline",
      locked: true,
      acceptWeight: 100n,
      declineWeight: 400n,
      refund: 0n,
      credits: [
        { account: "dave", governanceToken: 125n, baseToken: 250n },
        { account: "erin", governanceToken: 375n, baseToken: 750n },
      ],
    });
  });

  it("floors each vote entry before summing per account", () => {
    const votes: Vote[] = [
      { voter: "dave", side: "accept", weight: 1n },
      { voter: "dave", side: "accept", weight: 1n },
      { voter: "erin", side: "accept", weight: 1n },
      { voter: "frank", side: "decline", weight: 2n },
    ];

    const resolution = computeResolution(dispute(3n, 2n), votes, true, "refund");

    // each entry earns 1 + floor(2 × 1 / 3) = 1
    expect(resolution.credits).toEqual([
      { account: "dave", governanceToken: 2n, baseToken: 0n },
      { account: "erin", governanceToken: 1n, baseToken: 0n },
    ]);
    expect(resolution.locked).toBe(false);
    expect(resolution.refund).toBe(1_000n);
  });

  it("rejects an empty dispute under the reject policy", () => {
    expect(() => computeResolution(dispute(0n, 0n), [], true, "reject")).toThrow(VaultError);
  });

  it("voids an empty dispute under the refund policy", () => {
    expect(computeResolution(dispute(0n, 0n), [], false, "refund")).toMatchObject({
      outcome: "void",
      locked: false,
      refund: 1_000n,
    });
  });
});
