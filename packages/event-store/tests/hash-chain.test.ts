/**
 * Tests for the event hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@splitvault/types";
import { GENESIS_HASH, hashLink, sealLink, verifyChain } from "../src/hash-chain.js";
import type { ChainLink, StoredEvent } from "../src/types.js";

function event(type: string, amount: string): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `id-${type}-${amount}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: "op-1",
      source: "vault",
    },
    payload: { amount },
  };
}

function chain(...events: Array<[streamId: string, e: DomainEvent]>): StoredEvent[] {
  const log: StoredEvent[] = [];
  const versions = new Map<string, number>();
  for (const [streamId, e] of events) {
    const version = (versions.get(streamId) ?? 0) + 1;
    versions.set(streamId, version);
    log.push(
      sealLink({
        event: e,
        streamId,
        version,
        position: log.length + 1,
        appendedAt: "2026-01-01T00:00:00.000Z",
        previousHash: log.at(-1)?.hash ?? GENESIS_HASH,
      }),
    );
  }
  return log;
}

describe("hashLink", () => {
  const link: ChainLink = {
    event: event("vault.converted", "1000"),
    streamId: "vault:a",
    version: 1,
    position: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
    previousHash: GENESIS_HASH,
  };

  it("produces a 64-character hex digest", () => {
    expect(hashLink(link)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order", () => {
    const reordered: ChainLink = {
      previousHash: GENESIS_HASH,
      appendedAt: "2026-01-01T00:00:00.000Z",
      position: 1,
      version: 1,
      streamId: "vault:a",
      event: { payload: { amount: "1000" }, metadata: link.event.metadata, type: "vault.converted" },
    };
    expect(hashLink(reordered)).toBe(hashLink(link));
  });

  it("covers the previous hash", () => {
    expect(hashLink({ ...link, previousHash: "other" })).not.toBe(hashLink(link));
  });

  it("covers the payload", () => {
    expect(hashLink({ ...link, event: event("vault.converted", "1001") })).not.toBe(hashLink(link));
  });
});

describe("verifyChain", () => {
  it("accepts an empty log", () => {
    expect(verifyChain([])).toEqual({ valid: true, checked: 0 });
  });

  it("accepts a well-formed log across streams", () => {
    const log = chain(
      ["vault:a", event("vault.converted", "1")],
      ["vault:b", event("vault.converted", "2")],
      ["vault:a", event("vault.redeemed", "1")],
    );
    expect(log.map((e) => e.version)).toEqual([1, 1, 2]);
    expect(verifyChain(log)).toEqual({ valid: true, checked: 3 });
  });

  it("reports a modified payload", () => {
    const log = chain(["vault:a", event("vault.converted", "1")], ["vault:a", event("vault.converted", "2")]);
    const [first, second] = log;
    if (first === undefined || second === undefined) throw new Error("expected two events");

    const tampered = [first, { ...second, event: event("vault.converted", "9") }];
    expect(verifyChain(tampered)).toEqual({
      valid: false,
      checked: 1,
      brokenAt: 2,
      reason: "Event at position 2 was modified",
    });
  });

  it("reports a dropped event", () => {
    const log = chain(
      ["vault:a", event("vault.converted", "1")],
      ["vault:b", event("vault.converted", "2")],
      ["vault:a", event("vault.converted", "3")],
    );
    const [first, , third] = log;
    if (first === undefined || third === undefined) throw new Error("expected three events");

    expect(verifyChain([first, third])).toEqual({
      valid: false,
      checked: 1,
      brokenAt: 3,
      reason: "Expected position 2, found 3",
    });
  });

  it("reports a broken link even when the hash is recomputed", () => {
    const log = chain(["vault:a", event("vault.converted", "1")], ["vault:a", event("vault.converted", "2")]);
    const [first, second] = log;
    if (first === undefined || second === undefined) throw new Error("expected two events");

    const relinked = sealLink({ ...second, previousHash: GENESIS_HASH });
    expect(verifyChain([first, relinked])).toMatchObject({
      valid: false,
      brokenAt: 2,
      reason: "Event at position 2 does not link to its predecessor",
    });
  });

  it("reports a stream version gap", () => {
    const log = chain(["vault:a", event("vault.converted", "1")]);
    const [first] = log;
    if (first === undefined) throw new Error("expected one event");

    const skipped = sealLink({ ...first, version: 2 });
    expect(verifyChain([skipped])).toMatchObject({
      valid: false,
      brokenAt: 1,
      reason: 'Stream "vault:a" expected version 1, found 2',
    });
  });
});
