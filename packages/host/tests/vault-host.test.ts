/**
 * Tests for VaultHost — logging, auditing, status and persistence.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore } from "@splitvault/event-store";
import { VaultError } from "@splitvault/vault";
import { loadConfig } from "../src/config.js";
import { createLogger } from "../src/logger.js";
import { VaultHost } from "../src/vault-host.js";
import type { HostSnapshot, VaultHostOptions } from "../src/vault-host.js";

const START = 1_700_000_000;

type LogLine = Record<string, unknown>;

function setup(logLevel: "info" | "debug" = "info"): {
  options: VaultHostOptions;
  lines: LogLine[];
} {
  const lines: LogLine[] = [];
  const config = loadConfig({
    NODE_ENV: "test",
    LOG_LEVEL: logLevel,
    ORACLE_CONDITION: "Did the bridge pay out by 2026-12-31?",
  });
  const logger = createLogger(config, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  let nextId = 0;
  return {
    lines,
    options: {
      config,
      logger,
      baseAllocations: [
        { account: "alice", amount: 100_000n },
        { account: "bob", amount: 100_000n },
      ],
      governanceAllocations: [{ account: "dave", amount: 1_000n }],
      clock: () => START,
      eventStore: new InMemoryEventStore({ now: () => new Date(0) }),
      idGenerator: () => `evt-${++nextId}`,
    },
  };
}

describe("VaultHost", () => {
  let host: VaultHost;
  let lines: LogLine[];

  beforeEach(() => {
    const s = setup();
    lines = s.lines;
    host = new VaultHost(s.options);
  });

  it("logs readiness on construction", () => {
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      service: "splitvault",
      vault: "vault",
      locked: true,
      restored: false,
      msg: "Vault host ready",
    });
  });

  it("creates the collaborator assets from the configuration", () => {
    expect(host.baseToken.symbol).toBe("TKN");
    expect(host.governanceToken.symbol).toBe("GOV");
    expect(host.baseToken.balanceOf("alice")).toBe(100_000n);
    expect(host.governanceToken.balanceOf("dave")).toBe(1_000n);
  });

  describe("committed operations", () => {
    beforeEach(() => {
      host.baseToken.approve("alice", "vault", 10_000n);
      host.convert("alice", 10_000n);
    });

    it("logs at info with the operation fields", () => {
      expect(lines[1]).toMatchObject({
        level: 30,
        vault: "vault",
        op: "convert",
        caller: "alice",
        amount: "10000",
        fee: "100",
        minted: "9900",
        msg: "convert committed",
      });
    });

    it("records an audit entry", () => {
      expect(host.auditLog.query()).toEqual([
        {
          seq: 1,
          timestamp: "2023-11-14T22:13:20.000Z",
          vault: "vault",
          action: "convert",
          actor: "alice",
          fields: { amount: "10000", fee: "100", minted: "9900" },
        },
      ]);
    });

    it("reports status", () => {
      expect(host.status()).toEqual({
        vault: "vault",
        oracleCondition: "Did the bridge pay out by 2026-12-31?",
        locked: true,
        phase: "idle",
        accruedFees: "100",
        remainingFees: "100",
        solvent: true,
        events: 1,
      });
    });
  });

  describe("rejected operations", () => {
    it("logs the vault error code at warn and rethrows", () => {
      expect(() => host.redeem("bob", 5n)).toThrow(VaultError);

      expect(lines[1]).toMatchObject({
        level: 40,
        op: "redeem",
        caller: "bob",
        code: "INSUFFICIENT_BALANCE",
        reason: '"bob" holds 0 cTKN, redemption needs 5',
        msg: "redeem rejected",
      });
    });

    it("does not audit a rejected operation", () => {
      expect(() => host.vote("dave", "accept", 5n)).toThrow("No dispute is open");
      expect(host.auditLog.size).toBe(0);
    });
  });

  it("logs a failed event delivery at error and still commits", () => {
    host.eventStore.subscribe(host.vault.streamId, () => {
      throw new Error("listener failed");
    });
    host.baseToken.approve("alice", "vault", 1_000n);

    expect(host.convert("alice", 1_000n)).toEqual({ fee: 10n, minted: 990n });

    expect(lines[1]).toMatchObject({
      level: 50,
      vault: "vault",
      type: "vault.converted",
      eventId: "evt-1",
      err: { message: "listener failed" },
      msg: "Event delivery failed",
    });
    expect(lines[2]).toMatchObject({ level: 30, msg: "convert committed" });
    expect(host.auditLog.size).toBe(1);
  });

  it("forwards appended events to the debug log until closed", () => {
    const s = setup("debug");
    const debugHost = new VaultHost(s.options);
    debugHost.baseToken.approve("alice", "vault", 1_000n);

    debugHost.convert("alice", 1_000n);
    const appended = s.lines.filter((l) => l["msg"] === "Event appended");
    expect(appended).toEqual([
      expect.objectContaining({ level: 20, type: "vault.converted", version: 1 }),
    ]);

    debugHost.close();
    debugHost.baseToken.approve("alice", "vault", 1_000n);
    debugHost.convert("alice", 1_000n);
    expect(s.lines.filter((l) => l["msg"] === "Event appended")).toHaveLength(1);
  });

  describe("snapshot", () => {
    it("restores the vault and both assets", () => {
      host.baseToken.approve("alice", "vault", 10_000n);
      host.convert("alice", 10_000n);
      host.baseToken.approve("bob", "vault", 2_475n);
      host.initiateDispute("bob");

      const json = JSON.stringify(host.snapshot(), (_key, value: unknown) =>
        typeof value === "bigint" ? value.toString() : value,
      );
      const parsed: HostSnapshot = JSON.parse(json);

      const s = setup();
      const restored = VaultHost.fromSnapshot(parsed, s.options);

      expect(restored.baseToken.balanceOf("alice")).toBe(90_000n);
      expect(restored.baseToken.balanceOf("bob")).toBe(100_000n - 2_475n);
      expect(restored.vault.cToken.balanceOf("alice")).toBe(9_900n);
      expect(restored.vault.getDispute()).toMatchObject({
        initiator: "bob",
        initiationAmount: 2_475n,
      });
      expect(restored.status().phase).toBe("disputing");
      expect(s.lines[0]).toMatchObject({ msg: "Vault host ready", restored: true });
    });

    it("restores the event log when no store is supplied", () => {
      host.baseToken.approve("alice", "vault", 10_000n);
      host.convert("alice", 10_000n);
      const parsed: HostSnapshot = JSON.parse(JSON.stringify(host.snapshot()));

      const s = setup();
      const restored = VaultHost.fromSnapshot(parsed, { ...s.options, eventStore: undefined });
      expect(restored.status().events).toBe(1);

      restored.baseToken.approve("alice", "vault", 1_000n);
      restored.convert("alice", 1_000n);
      expect(restored.eventStore.read("vault:vault").map((e) => e.event.type)).toEqual([
        "vault.converted",
        "vault.converted",
      ]);
      expect(restored.eventStore.verifyIntegrity().valid).toBe(true);
    });
  });
});
