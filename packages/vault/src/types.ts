/**
 * Vault Types
 *
 * Domain types for the split vault. The vault runs three engines over
 * one shared state:
 *
 * 1. Conversion — base asset in, cToken + iToken out (and back)
 * 2. Disputes — initiate, vote, resolve; slashing and redistribution
 * 3. Fees & rewards — pro-rata fee shares, pending reward balances
 *
 * Rules:
 * - Amounts are bigint in memory and strings when serialized
 * - Views handed to callers are copies; internal records never leak
 * - Every failure is a VaultError with a stable code
 */

import type { AccountId, AmountString, DomainEvent, TransferableAsset } from "@splitvault/types";
import type { EventStore } from "@splitvault/event-store";
import type { TokenSnapshot } from "@splitvault/token";

// =============================================================================
// Disputes
// =============================================================================

export type VoteSide = "accept" | "decline";

/**
 * What happens when a dispute with no votes is resolved.
 *
 * - "refund": the initiator gets the deposit back, lock state is kept
 * - "reject": resolution fails with NO_VOTES_CAST and the dispute stays open
 */
export type ZeroVotePolicy = "refund" | "reject";

/** "void" marks a dispute closed without any votes. */
export type ResolutionOutcome = "accept" | "decline" | "void";

/** Derived from the dispute slot; the lock flag is independent of it. */
export type VaultPhase = "idle" | "disputing";

/**
 * The single dispute slot. Stays in place (closed) after resolution
 * until the next dispute replaces it.
 */
export interface Dispute {
  readonly initiator: AccountId;
  /** Base-asset collateral posted by the initiator */
  readonly initiationAmount: bigint;
  /** Unix seconds; votes are accepted while now <= endTime */
  readonly endTime: number;
  readonly acceptWeight: bigint;
  readonly declineWeight: bigint;
  readonly open: boolean;
}

/** One stake-locking vote. Re-votes are separate entries. */
export interface Vote {
  readonly voter: AccountId;
  readonly side: VoteSide;
  readonly weight: bigint;
}

/** Rewards credited to one account by a resolution. */
export interface RewardCredit {
  readonly account: AccountId;
  readonly governanceToken: bigint;
  readonly baseToken: bigint;
}

export interface Resolution {
  readonly outcome: ResolutionOutcome;
  /** Lock state after resolution */
  readonly locked: boolean;
  readonly acceptWeight: bigint;
  readonly declineWeight: bigint;
  /** Base asset returned to the initiator */
  readonly refund: bigint;
  /** Per-account totals, in order of each account's first vote */
  readonly credits: readonly RewardCredit[];
}

// =============================================================================
// Conversion & Fees
// =============================================================================

export interface ConversionResult {
  readonly fee: bigint;
  /** Amount minted of each claim token */
  readonly minted: bigint;
}

export interface RedemptionResult {
  readonly amount: bigint;
  /** Lock state the redemption ran under */
  readonly locked: boolean;
  readonly burnedCToken: bigint;
  readonly burnedIToken: bigint;
}

export interface FeeTotals {
  /** Every fee ever collected */
  readonly accruedFees: bigint;
  /** Collected fees not yet withdrawn */
  readonly remainingFees: bigint;
}

export interface PendingRewards {
  readonly baseToken: bigint;
  readonly governanceToken: bigint;
}

export type RewardCurrency = "base" | "governance";

// =============================================================================
// Solvency
// =============================================================================

export interface HoldingsReport {
  /** What the vault actually holds */
  readonly held: bigint;
  /** What the vault owes out of those holdings */
  readonly owed: bigint;
}

export interface SolvencyReport {
  readonly base: HoldingsReport;
  readonly governance: HoldingsReport;
  readonly solvent: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** Account id the vault holds custody under */
  readonly address: AccountId;

  /** Opaque description of the tracked condition; never interpreted */
  readonly oracleCondition: string;

  /** Default: 604800 (7 days) */
  readonly disputeDurationSeconds?: number | undefined;

  /** Initiation collateral = iToken supply / this. Default: 4n */
  readonly initiationAmountDenominator?: bigint | undefined;

  /** Conversion fee = amount / this. Default: 100n */
  readonly feeDenominator?: bigint | undefined;

  /** Default: "refund" */
  readonly zeroVotePolicy?: ZeroVotePolicy | undefined;

  /** Defaults: "c" / "i" + base asset symbol */
  readonly cTokenSymbol?: string | undefined;
  readonly iTokenSymbol?: string | undefined;
}

/** VaultConfig with every default applied. */
export interface ResolvedVaultConfig {
  readonly address: AccountId;
  readonly oracleCondition: string;
  readonly disputeDurationSeconds: number;
  readonly initiationAmountDenominator: bigint;
  readonly feeDenominator: bigint;
  readonly zeroVotePolicy: ZeroVotePolicy;
  readonly cTokenSymbol: string;
  readonly iTokenSymbol: string;
}

/** Assets the vault uses but does not own. */
export interface VaultCollaborators {
  readonly baseToken: TransferableAsset;
  readonly governanceToken: TransferableAsset;
}

export interface VaultOptions {
  /** Current time in unix seconds. Default: wall clock */
  readonly clock?: (() => number) | undefined;

  /** Where domain events go. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;

  /** Event id source. Default: crypto.randomUUID */
  readonly idGenerator?: (() => string) | undefined;

  /**
   * Receives an event the store rejected or a store listener threw on.
   * The operation has committed by then and still returns normally.
   * Default: kept in `eventFailures()`.
   */
  readonly onEventError?: ((error: unknown, event: DomainEvent) => void) | undefined;
}

/** An event whose append or delivery failed after its operation committed. */
export interface EventFailure {
  readonly event: DomainEvent;
  readonly error: unknown;
}

// =============================================================================
// Snapshot — Serialization
// =============================================================================

export interface SerializedVaultConfig {
  readonly address: AccountId;
  readonly oracleCondition: string;
  readonly disputeDurationSeconds: number;
  readonly initiationAmountDenominator: AmountString;
  readonly feeDenominator: AmountString;
  readonly zeroVotePolicy: ZeroVotePolicy;
  readonly cTokenSymbol: string;
  readonly iTokenSymbol: string;
}

export interface SerializedDispute {
  readonly initiator: AccountId;
  readonly initiationAmount: AmountString;
  readonly endTime: number;
  readonly acceptWeight: AmountString;
  readonly declineWeight: AmountString;
  readonly open: boolean;
}

export interface SerializedVote {
  readonly voter: AccountId;
  readonly side: VoteSide;
  readonly weight: AmountString;
}

export interface SerializedRewards {
  readonly baseToken: AmountString;
  readonly governanceToken: AmountString;
}

/**
 * Complete vault state for persistence.
 * Collaborator assets are not included; the vault does not own them.
 */
export interface VaultSnapshot {
  readonly version: 1;
  readonly config: SerializedVaultConfig;
  readonly locked: boolean;
  readonly accruedFees: AmountString;
  readonly remainingFees: AmountString;
  readonly feeSnapshots: Readonly<Record<AccountId, AmountString>>;
  readonly rewards: Readonly<Record<AccountId, SerializedRewards>>;
  readonly dispute: SerializedDispute | null;
  readonly votes: readonly SerializedVote[];
  readonly cToken: TokenSnapshot;
  readonly iToken: TokenSnapshot;
  readonly savedAt: string;
}

// =============================================================================
// Events
// =============================================================================

/** Event types appended to the `vault:<address>` stream. */
export type VaultEventType =
  | "vault.converted"
  | "vault.redeemed"
  | "vault.dispute.initiated"
  | "vault.voted"
  | "vault.dispute.resolved"
  | "vault.fees.withdrawn"
  | "vault.reward.withdrawn";

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_CONFIG"
  | "INVALID_SNAPSHOT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE_OR_BALANCE"
  | "DISPUTE_ALREADY_OPEN"
  | "DISPUTE_NOT_OPEN"
  | "VOTING_CLOSED"
  | "VOTING_STILL_ACTIVE"
  | "NO_VOTES_CAST"
  | "NO_REWARD_OWED"
  | "NO_FEES_OWED"
  | "COLLABORATOR_FAILED"
  | "REENTRANT_CALL"
  | "ROLLBACK_FAILED";

/**
 * Structured error from the vault.
 * Collaborator failures carry the collaborator's error as `cause`.
 */
export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
  }
}
