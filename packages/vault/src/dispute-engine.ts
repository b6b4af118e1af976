/**
 * Dispute Engine — the single dispute slot and its votes.
 *
 * Lifecycle: open → (votes while now <= endTime) → resolve after endTime.
 *
 * Rules:
 * - At most one dispute is open at a time
 * - Opening a dispute replaces the previous (closed) one and clears votes
 * - Votes are stake-locking; re-votes are separate entries
 * - Resolution math is pure: computeResolution() never touches state
 * - Floor-division dust stays with the vault
 */

import { formatAmount, mulDivFloor, parseAmount } from "@splitvault/token";
import type { AccountId } from "@splitvault/types";
import type {
  Dispute,
  Resolution,
  RewardCredit,
  SerializedDispute,
  SerializedVote,
  Vote,
  VoteSide,
  ZeroVotePolicy,
} from "./types.js";
import { VaultError } from "./types.js";

/** Copyable state of the engine, used for rollback and snapshots. */
export interface DisputeState {
  readonly dispute: Dispute | null;
  readonly votes: readonly Vote[];
}

export class DisputeEngine {
  private dispute: Dispute | null = null;
  private votes: Vote[] = [];

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  current(): Dispute | null {
    return this.dispute === null ? null : { ...this.dispute };
  }

  isOpen(): boolean {
    return this.dispute?.open === true;
  }

  currentVotes(): readonly Vote[] {
    return this.votes.map((vote) => ({ ...vote }));
  }

  /**
   * Governance stake held for the open dispute (zero once it closes).
   */
  lockedStake(): bigint {
    if (this.dispute === null || !this.dispute.open) return 0n;
    return this.dispute.acceptWeight + this.dispute.declineWeight;
  }

  /**
   * Initiation collateral held for the open dispute.
   */
  lockedCollateral(): bigint {
    if (this.dispute === null || !this.dispute.open) return 0n;
    return this.dispute.initiationAmount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  open(initiator: AccountId, initiationAmount: bigint, endTime: number): Dispute {
    if (this.isOpen()) {
      throw new VaultError("DISPUTE_ALREADY_OPEN", "A dispute is already open");
    }

    this.dispute = {
      initiator,
      initiationAmount,
      endTime,
      acceptWeight: 0n,
      declineWeight: 0n,
      open: true,
    };
    this.votes = [];
    return { ...this.dispute };
  }

  castVote(voter: AccountId, side: VoteSide, weight: bigint, now: number): Vote {
    const dispute = this.requireOpen();
    if (now > dispute.endTime) {
      throw new VaultError(
        "VOTING_CLOSED",
        `Voting ended at ${dispute.endTime}, now is ${now}`,
      );
    }

    const vote: Vote = { voter, side, weight };
    this.votes.push(vote);
    this.dispute = side === "accept"
      ? { ...dispute, acceptWeight: dispute.acceptWeight + weight }
      : { ...dispute, declineWeight: dispute.declineWeight + weight };
    return { ...vote };
  }

  /**
   * Settle the open dispute and close it.
   * Throws without changing anything when it cannot be resolved yet.
   */
  resolve(now: number, locked: boolean, policy: ZeroVotePolicy): Resolution {
    const dispute = this.requireOpen();
    if (now <= dispute.endTime) {
      throw new VaultError(
        "VOTING_STILL_ACTIVE",
        `Voting runs until ${dispute.endTime}, now is ${now}`,
      );
    }

    const resolution = computeResolution(dispute, this.votes, locked, policy);
    this.dispute = { ...dispute, open: false };
    return resolution;
  }

  // ───────────────────────────────────────────────────────────────────────
  // State transfer
  // ───────────────────────────────────────────────────────────────────────

  exportState(): DisputeState {
    return { dispute: this.dispute, votes: [...this.votes] };
  }

  importState(state: DisputeState): void {
    this.dispute = state.dispute;
    this.votes = [...state.votes];
  }

  serializeDispute(): SerializedDispute | null {
    if (this.dispute === null) return null;
    return {
      initiator: this.dispute.initiator,
      initiationAmount: formatAmount(this.dispute.initiationAmount),
      endTime: this.dispute.endTime,
      acceptWeight: formatAmount(this.dispute.acceptWeight),
      declineWeight: formatAmount(this.dispute.declineWeight),
      open: this.dispute.open,
    };
  }

  serializeVotes(): SerializedVote[] {
    return this.votes.map((vote) => ({
      voter: vote.voter,
      side: vote.side,
      weight: formatAmount(vote.weight),
    }));
  }

  static stateFrom(
    dispute: SerializedDispute | null,
    votes: readonly SerializedVote[],
  ): DisputeState {
    return {
      dispute: dispute === null
        ? null
        : {
            initiator: dispute.initiator,
            initiationAmount: parseAmount(dispute.initiationAmount),
            endTime: dispute.endTime,
            acceptWeight: parseAmount(dispute.acceptWeight),
            declineWeight: parseAmount(dispute.declineWeight),
            open: dispute.open,
          },
      votes: votes.map((vote) => ({
        voter: vote.voter,
        side: vote.side,
        weight: parseAmount(vote.weight),
      })),
    };
  }

  private requireOpen(): Dispute {
    if (this.dispute === null || !this.dispute.open) {
      throw new VaultError("DISPUTE_NOT_OPEN", "No dispute is open");
    }
    return this.dispute;
  }
}

// =============================================================================
// Resolution math
// =============================================================================

/**
 * Decide a dispute and compute every reward it credits.
 *
 * - accept wins only on strictly greater weight; the initiator is refunded,
 *   accept voters split the decline stake, the vault unlocks
 * - decline wins ties; decline voters split the accept stake and the
 *   initiation collateral, lock state is unchanged
 * - no votes: "refund" returns the collateral, "reject" throws NO_VOTES_CAST
 *
 * Each vote entry is floored on its own; entries are then summed per
 * account in the order of that account's first vote.
 */
export function computeResolution(
  dispute: Dispute,
  votes: readonly Vote[],
  locked: boolean,
  policy: ZeroVotePolicy,
): Resolution {
  const { acceptWeight, declineWeight, initiationAmount } = dispute;

  if (acceptWeight === 0n && declineWeight === 0n) {
    if (policy === "reject") {
      throw new VaultError("NO_VOTES_CAST", "Cannot resolve a dispute nobody voted on");
    }
    return {
      outcome: "void",
      locked,
      acceptWeight,
      declineWeight,
      refund: initiationAmount,
      credits: [],
    };
  }

  if (acceptWeight > declineWeight) {
    const credits = aggregate(
      votes
        .filter((vote) => vote.side === "accept")
        .map((vote) => ({
          account: vote.voter,
          governanceToken: vote.weight + mulDivFloor(declineWeight, vote.weight, acceptWeight),
          baseToken: 0n,
        })),
    );
    return {
      outcome: "accept",
      locked: false,
      acceptWeight,
      declineWeight,
      refund: initiationAmount,
      credits,
    };
  }

  const credits = aggregate(
    votes
      .filter((vote) => vote.side === "decline")
      .map((vote) => ({
        account: vote.voter,
        governanceToken: vote.weight + mulDivFloor(acceptWeight, vote.weight, declineWeight),
        baseToken: mulDivFloor(initiationAmount, vote.weight, declineWeight),
      })),
  );
  return {
    outcome: "decline",
    locked,
    acceptWeight,
    declineWeight,
    refund: 0n,
    credits,
  };
}

function aggregate(entries: readonly RewardCredit[]): RewardCredit[] {
  const totals = new Map<AccountId, RewardCredit>();
  for (const entry of entries) {
    const existing = totals.get(entry.account);
    totals.set(entry.account, existing === undefined
      ? entry
      : {
          account: entry.account,
          governanceToken: existing.governanceToken + entry.governanceToken,
          baseToken: existing.baseToken + entry.baseToken,
        });
  }
  return [...totals.values()];
}
