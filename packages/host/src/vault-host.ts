/**
 * VaultHost — Composition root for the vault and its collaborators.
 *
 * Wires the base and governance assets, the vault and its event store.
 * Every operation goes through the host so it is logged and, once
 * committed, recorded in the audit log. Domain packages never log.
 *
 * Log levels:
 * - info: committed operation
 * - warn: operation refused by a vault precondition (with its code)
 * - error: anything unexpected
 */

import { InMemoryEventStore } from "@splitvault/event-store";
import type { EventStore, StoredEvent, Subscription } from "@splitvault/event-store";
import { BalanceToken, formatAmount } from "@splitvault/token";
import type { TokenAllocation, TokenSnapshot } from "@splitvault/token";
import { Vault, VaultError } from "@splitvault/vault";
import type {
  ConversionResult,
  Dispute,
  RedemptionResult,
  Resolution,
  VaultOptions,
  VaultPhase,
  VaultSnapshot,
  Vote,
  VoteSide,
} from "@splitvault/vault";
import type { AccountId } from "@splitvault/types";
import type { Logger } from "pino";
import { AuditLog } from "./audit-log.js";
import type { AuditFields, HostOperation } from "./audit-log.js";
import { toVaultConfig } from "./config.js";
import type { HostConfig } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export interface VaultHostOptions {
  readonly config: HostConfig;
  readonly logger: Logger;

  /** Genesis balances of the collaborator assets */
  readonly baseAllocations?: readonly TokenAllocation[] | undefined;
  readonly governanceAllocations?: readonly TokenAllocation[] | undefined;

  /** Unix seconds. Default: wall clock */
  readonly clock?: (() => number) | undefined;
  readonly eventStore?: EventStore | undefined;
  readonly idGenerator?: (() => string) | undefined;
}

/** Persisted state of the host: the vault, both collaborator ledgers and the event log. */
export interface HostSnapshot {
  readonly version: 1;
  readonly vault: VaultSnapshot;
  readonly baseToken: TokenSnapshot;
  readonly governanceToken: TokenSnapshot;
  readonly events: readonly StoredEvent[];
}

export interface HostStatus {
  readonly vault: AccountId;
  readonly oracleCondition: string;
  readonly locked: boolean;
  readonly phase: VaultPhase;
  readonly accruedFees: string;
  readonly remainingFees: string;
  readonly solvent: boolean;
  readonly events: number;
}

// =============================================================================
// Host
// =============================================================================

export class VaultHost {
  readonly baseToken: BalanceToken;
  readonly governanceToken: BalanceToken;
  readonly vault: Vault;
  readonly eventStore: EventStore;
  readonly auditLog: AuditLog;

  private readonly logger: Logger;
  private readonly subscription: Subscription;

  constructor(options: VaultHostOptions, restored?: HostSnapshot) {
    const clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
    this.logger = options.logger;
    this.eventStore = options.eventStore
      ?? (restored === undefined ? new InMemoryEventStore() : InMemoryEventStore.fromLog(restored.events));
    this.auditLog = new AuditLog(() => new Date(clock() * 1000));

    if (restored === undefined) {
      this.baseToken = new BalanceToken({
        symbol: options.config.BASE_SYMBOL,
        allocations: options.baseAllocations,
      });
      this.governanceToken = new BalanceToken({
        symbol: options.config.GOVERNANCE_SYMBOL,
        allocations: options.governanceAllocations,
      });
    } else {
      this.baseToken = BalanceToken.fromSnapshot(restored.baseToken);
      this.governanceToken = BalanceToken.fromSnapshot(restored.governanceToken);
    }

    const collaborators = { baseToken: this.baseToken, governanceToken: this.governanceToken };
    const vaultOptions: VaultOptions = {
      clock,
      eventStore: this.eventStore,
      idGenerator: options.idGenerator,
      onEventError: (error, event) => {
        this.logger.error(
          { err: error, vault: options.config.VAULT_ADDRESS, type: event.type, eventId: event.metadata.eventId },
          "Event delivery failed",
        );
      },
    };
    this.vault = restored === undefined
      ? new Vault(toVaultConfig(options.config), collaborators, vaultOptions)
      : Vault.fromSnapshot(restored.vault, collaborators, vaultOptions);

    this.subscription = this.eventStore.subscribe(this.vault.streamId, (stored) => {
      this.logger.debug(
        { vault: this.vault.address, type: stored.event.type, version: stored.version },
        "Event appended",
      );
    });

    this.logger.info(
      { vault: this.vault.address, locked: this.vault.isLocked(), restored: restored !== undefined },
      "Vault host ready",
    );
  }

  /**
   * Rebuild a host, its assets and its vault from a snapshot. The event
   * log is restored too unless `options.eventStore` supplies a store.
   */
  static fromSnapshot(snapshot: HostSnapshot, options: VaultHostOptions): VaultHost {
    return new VaultHost(options, snapshot);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  convert(caller: AccountId, amount: bigint): ConversionResult {
    return this.execute("convert", caller, () => this.vault.convert(caller, amount), (r) => ({
      amount: formatAmount(amount),
      fee: formatAmount(r.fee),
      minted: formatAmount(r.minted),
    }));
  }

  redeem(caller: AccountId, amount: bigint): RedemptionResult {
    return this.execute("redeem", caller, () => this.vault.redeem(caller, amount), (r) => ({
      amount: formatAmount(r.amount),
      locked: r.locked,
    }));
  }

  initiateDispute(caller: AccountId): Dispute {
    return this.execute("initiateDispute", caller, () => this.vault.initiateDispute(caller), (d) => ({
      initiationAmount: formatAmount(d.initiationAmount),
      endTime: d.endTime,
    }));
  }

  vote(caller: AccountId, side: VoteSide, weight: bigint): Vote {
    return this.execute("vote", caller, () => this.vault.vote(caller, side, weight), (v) => ({
      side: v.side,
      weight: formatAmount(v.weight),
    }));
  }

  resolveDispute(caller: AccountId): Resolution {
    return this.execute("resolveDispute", caller, () => this.vault.resolveDispute(caller), (r) => ({
      outcome: r.outcome,
      locked: r.locked,
      credited: r.credits.length,
    }));
  }

  withdrawOwedFees(caller: AccountId): bigint {
    return this.execute("withdrawOwedFees", caller, () => this.vault.withdrawOwedFees(caller), (a) => ({
      amount: formatAmount(a),
    }));
  }

  withdrawGovernanceTokenReward(caller: AccountId): bigint {
    return this.execute(
      "withdrawGovernanceTokenReward",
      caller,
      () => this.vault.withdrawGovernanceTokenReward(caller),
      (a) => ({ amount: formatAmount(a) }),
    );
  }

  withdrawBaseTokenReward(caller: AccountId): bigint {
    return this.execute(
      "withdrawBaseTokenReward",
      caller,
      () => this.vault.withdrawBaseTokenReward(caller),
      (a) => ({ amount: formatAmount(a) }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Status & persistence
  // ───────────────────────────────────────────────────────────────────────

  status(): HostStatus {
    const fees = this.vault.getFees();
    return {
      vault: this.vault.address,
      oracleCondition: this.vault.oracleCondition,
      locked: this.vault.isLocked(),
      phase: this.vault.phase(),
      accruedFees: formatAmount(fees.accruedFees),
      remainingFees: formatAmount(fees.remainingFees),
      solvent: this.vault.solvency().solvent,
      events: this.eventStore.streamVersion(this.vault.streamId),
    };
  }

  snapshot(): HostSnapshot {
    return {
      version: 1,
      vault: this.vault.snapshot(),
      baseToken: this.baseToken.snapshot(),
      governanceToken: this.governanceToken.snapshot(),
      events: this.eventStore.readAll(),
    };
  }

  /** Stop forwarding vault events to the logger. */
  close(): void {
    this.subscription.unsubscribe();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(
    op: HostOperation,
    caller: AccountId,
    run: () => T,
    describe: (result: T) => AuditFields,
  ): T {
    const log = this.logger.child({ vault: this.vault.address, op, caller });

    let result: T;
    try {
      result = run();
    } catch (error) {
      if (error instanceof VaultError) {
        log.warn({ code: error.code, reason: error.message }, `${op} rejected`);
      } else {
        log.error({ err: error }, `${op} failed`);
      }
      throw error;
    }

    const fields = describe(result);
    log.info(fields, `${op} committed`);
    this.auditLog.record(this.vault.address, op, caller, fields);
    return result;
  }
}
