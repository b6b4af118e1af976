/**
 * Vault snapshot validation.
 *
 * Snapshots usually arrive as parsed JSON, so the static type is not
 * trusted: every field is checked before any state is rebuilt.
 */

import { isAccountId, isAmountString, isRecord } from "@splitvault/types";
import type { AccountId } from "@splitvault/types";
import { isZeroVotePolicy } from "./config.js";
import type {
  SerializedDispute,
  SerializedVote,
  VaultSnapshot,
} from "./types.js";
import { VaultError } from "./types.js";

function invalid(message: string): VaultError {
  return new VaultError("INVALID_SNAPSHOT", message);
}

function assertAmount(value: unknown, label: string): asserts value is string {
  if (!isAmountString(value)) {
    throw invalid(`${label} is not an amount: "${String(value)}"`);
  }
}

/**
 * Throws INVALID_SNAPSHOT unless the snapshot is well formed and
 * internally consistent.
 */
export function assertVaultSnapshot(snapshot: VaultSnapshot): void {
  if (!isRecord(snapshot) || snapshot.version !== 1) {
    throw invalid("Unsupported vault snapshot version");
  }

  const { config } = snapshot;
  if (!isRecord(config) || !isAccountId(config.address)) {
    throw invalid("Snapshot config is missing a vault address");
  }
  if (typeof config.oracleCondition !== "string") {
    throw invalid("Snapshot config is missing the oracle condition");
  }
  assertAmount(config.initiationAmountDenominator, "initiationAmountDenominator");
  assertAmount(config.feeDenominator, "feeDenominator");
  if (!isZeroVotePolicy(config.zeroVotePolicy)) {
    throw invalid(`Unknown zeroVotePolicy: "${String(config.zeroVotePolicy)}"`);
  }
  if (typeof snapshot.locked !== "boolean") {
    throw invalid("locked must be a boolean");
  }

  // ─── Fees & rewards ────────────────────────────────────────────────

  assertAmount(snapshot.accruedFees, "accruedFees");
  assertAmount(snapshot.remainingFees, "remainingFees");
  if (BigInt(snapshot.remainingFees) > BigInt(snapshot.accruedFees)) {
    throw invalid("remainingFees exceeds accruedFees");
  }
  if (!isRecord(snapshot.feeSnapshots) || !isRecord(snapshot.rewards)) {
    throw invalid("feeSnapshots and rewards must be objects");
  }
  for (const [account, value] of Object.entries(snapshot.feeSnapshots)) {
    assertAccount(account);
    assertAmount(value, `feeSnapshots["${account}"]`);
    if (BigInt(value) > BigInt(snapshot.accruedFees)) {
      throw invalid(`feeSnapshots["${account}"] exceeds accruedFees`);
    }
  }
  for (const [account, pending] of Object.entries(snapshot.rewards)) {
    assertAccount(account);
    if (!isRecord(pending)) {
      throw invalid(`rewards["${account}"] must be an object`);
    }
    assertAmount(pending.baseToken, `rewards["${account}"].baseToken`);
    assertAmount(pending.governanceToken, `rewards["${account}"].governanceToken`);
  }

  // ─── Dispute ───────────────────────────────────────────────────────

  if (!Array.isArray(snapshot.votes)) {
    throw invalid("votes must be an array");
  }
  for (const vote of snapshot.votes) {
    assertVote(vote);
  }
  if (snapshot.dispute === null) {
    if (snapshot.votes.length > 0) {
      throw invalid("Snapshot has votes but no dispute");
    }
  } else {
    assertDispute(snapshot.dispute, snapshot.votes);
  }

  // ─── Claim tokens ──────────────────────────────────────────────────

  for (const token of [snapshot.cToken, snapshot.iToken]) {
    if (!isRecord(token) || token.kind !== "claim" || token.owner !== config.address) {
      throw invalid(`Claim token snapshots must be owned by "${config.address}"`);
    }
  }
}

function assertAccount(account: AccountId): void {
  if (!isAccountId(account)) {
    throw invalid(`Invalid account id: "${account}"`);
  }
}

function assertVote(vote: SerializedVote): void {
  if (!isRecord(vote) || !isAccountId(vote.voter)) {
    throw invalid("Vote entry is missing a voter");
  }
  if (vote.side !== "accept" && vote.side !== "decline") {
    throw invalid(`Unknown vote side: "${String(vote.side)}"`);
  }
  assertAmount(vote.weight, "vote weight");
}

function assertDispute(dispute: SerializedDispute, votes: readonly SerializedVote[]): void {
  if (!isRecord(dispute) || !isAccountId(dispute.initiator)) {
    throw invalid("Dispute is missing an initiator");
  }
  if (!Number.isSafeInteger(dispute.endTime) || typeof dispute.open !== "boolean") {
    throw invalid("Dispute endTime or open flag is malformed");
  }
  assertAmount(dispute.initiationAmount, "initiationAmount");
  assertAmount(dispute.acceptWeight, "acceptWeight");
  assertAmount(dispute.declineWeight, "declineWeight");

  let accept = 0n;
  let decline = 0n;
  for (const vote of votes) {
    if (vote.side === "accept") accept += BigInt(vote.weight);
    else decline += BigInt(vote.weight);
  }
  if (accept !== BigInt(dispute.acceptWeight) || decline !== BigInt(dispute.declineWeight)) {
    throw invalid("Dispute weights do not match its votes");
  }
}
