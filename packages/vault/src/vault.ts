/**
 * Vault — split vault controller.
 *
 * Composes:
 * - Conversion (base asset ⇄ cToken + iToken)
 * - DisputeEngine (initiate, vote, resolve)
 * - FeeLedger (fee shares, pending rewards)
 * - OperationGuard (reentrancy block, rollback)
 *
 * Every operation follows the same path: validate, pre-check collaborator
 * balances, mutate internal state, call collaborators, commit. A failure
 * anywhere restores internal state and compensates completed calls.
 * One domain event is appended per committed operation.
 */

import { randomUUID } from "node:crypto";
import { InMemoryEventStore } from "@splitvault/event-store";
import type { EventStore } from "@splitvault/event-store";
import { ClaimToken, formatAmount } from "@splitvault/token";
import { isAccountId } from "@splitvault/types";
import type { AccountId, ClaimTokenService, DomainEvent, TransferableAsset } from "@splitvault/types";
import { resolveVaultConfig, serializeVaultConfig } from "./config.js";
import { assertCanRedeem, planRedemption, quoteConversion } from "./conversion.js";
import { DisputeEngine } from "./dispute-engine.js";
import type { DisputeState } from "./dispute-engine.js";
import { FeeLedger } from "./fee-ledger.js";
import type { FeeLedgerState } from "./fee-ledger.js";
import { OperationGuard } from "./operation-guard.js";
import type { UnitOfWork } from "./operation-guard.js";
import { assertVaultSnapshot } from "./snapshot.js";
import type {
  ConversionResult,
  Dispute,
  EventFailure,
  FeeTotals,
  PendingRewards,
  RedemptionResult,
  Resolution,
  ResolvedVaultConfig,
  RewardCurrency,
  SolvencyReport,
  VaultCollaborators,
  VaultConfig,
  VaultErrorCode,
  VaultEventType,
  VaultOptions,
  VaultPhase,
  VaultSnapshot,
  Vote,
  VoteSide,
} from "./types.js";
import { VaultError } from "./types.js";

/** Internal state captured before each operation. */
interface VaultImage {
  readonly locked: boolean;
  readonly fees: FeeLedgerState;
  readonly disputes: DisputeState;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly config: ResolvedVaultConfig;
  readonly streamId: string;

  private readonly baseToken: TransferableAsset;
  private readonly governanceToken: TransferableAsset;
  private _cToken: ClaimToken;
  private _iToken: ClaimToken;

  private locked = true;
  private readonly fees = new FeeLedger();
  private readonly disputes = new DisputeEngine();
  private readonly guard: OperationGuard<VaultImage>;

  private readonly clock: () => number;
  private readonly eventStore: EventStore;
  private readonly idGenerator: () => string;
  private readonly onEventError: (error: unknown, event: DomainEvent) => void;
  private readonly failedEvents: EventFailure[] = [];

  constructor(config: VaultConfig, collaborators: VaultCollaborators, options: VaultOptions = {}) {
    this.config = resolveVaultConfig(config, collaborators.baseToken.symbol);
    this.streamId = `vault:${this.config.address}`;
    this.baseToken = collaborators.baseToken;
    this.governanceToken = collaborators.governanceToken;

    this._cToken = new ClaimToken({ symbol: this.config.cTokenSymbol, owner: this.config.address });
    this._iToken = new ClaimToken({ symbol: this.config.iTokenSymbol, owner: this.config.address });

    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
    this.eventStore = options.eventStore ?? new InMemoryEventStore();
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.onEventError = options.onEventError ?? ((error, event) => {
      this.failedEvents.push({ event, error });
    });

    this.guard = new OperationGuard<VaultImage>(
      () => ({
        locked: this.locked,
        fees: this.fees.exportState(),
        disputes: this.disputes.exportState(),
      }),
      (image) => {
        this.locked = image.locked;
        this.fees.importState(image.fees);
        this.disputes.importState(image.disputes);
      },
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  get address(): AccountId {
    return this.config.address;
  }

  get oracleCondition(): string {
    return this.config.oracleCondition;
  }

  get cToken(): ClaimTokenService {
    return this._cToken;
  }

  get iToken(): ClaimTokenService {
    return this._iToken;
  }

  isLocked(): boolean {
    return this.locked;
  }

  phase(): VaultPhase {
    return this.disputes.isOpen() ? "disputing" : "idle";
  }

  getDispute(): Dispute | null {
    return this.disputes.current();
  }

  /** Events that failed to append or deliver, oldest first. */
  eventFailures(): readonly EventFailure[] {
    return [...this.failedEvents];
  }

  getVotes(): readonly Vote[] {
    return this.disputes.currentVotes();
  }

  getFees(): FeeTotals {
    return this.fees.totals();
  }

  getPendingRewards(account: AccountId): PendingRewards {
    return this.fees.pendingRewards(account);
  }

  /**
   * Fee share `account` could withdraw right now.
   */
  getOwedFees(account: AccountId): bigint {
    return this.fees.owedShare(
      account,
      this.governanceToken.balanceOf(account),
      this.governanceToken.totalSupply(),
    );
  }

  /**
   * Compare what the vault holds with what it owes, per asset.
   */
  solvency(): SolvencyReport {
    const pending = this.fees.pendingTotals();
    const baseHeld = this.baseToken.balanceOf(this.address);
    const baseOwed =
      this._iToken.totalSupply() +
      this.fees.totals().remainingFees +
      this.disputes.lockedCollateral() +
      pending.baseToken;
    const governanceHeld = this.governanceToken.balanceOf(this.address);
    const governanceOwed = this.disputes.lockedStake() + pending.governanceToken;

    return {
      base: { held: baseHeld, owed: baseOwed },
      governance: { held: governanceHeld, owed: governanceOwed },
      solvent: baseHeld >= baseOwed && governanceHeld >= governanceOwed,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Conversion
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit base asset, receive cToken and iToken net of the fee.
   * The caller must have approved the vault for `amount`.
   */
  convert(caller: AccountId, amount: bigint): ConversionResult {
    const result = this.guard.run("convert", (work) => {
      assertAccount(caller);
      assertPositive(amount, "Conversion amount");

      const quote = quoteConversion(amount, this.config.feeDenominator);
      this.fees.accrue(quote.fee);
      this.pull(work, this.baseToken, caller, amount);
      this.mint(work, this._cToken, caller, quote.minted);
      this.mint(work, this._iToken, caller, quote.minted);
      return quote;
    });

    this.emit("vault.converted", caller, {
      account: caller,
      amount: formatAmount(amount),
      fee: formatAmount(result.fee),
      minted: formatAmount(result.minted),
    });
    return result;
  }

  /**
   * Burn claim tokens for base asset. Locked: both tokens; unlocked:
   * the iToken alone.
   */
  redeem(caller: AccountId, amount: bigint): RedemptionResult {
    const result = this.guard.run("redeem", (work) => {
      assertAccount(caller);
      assertPositive(amount, "Redemption amount");

      const plan = planRedemption(amount, this.locked);
      assertCanRedeem(caller, plan, this._cToken, this._iToken);

      this.burn(work, this._cToken, caller, plan.cToken);
      this.burn(work, this._iToken, caller, plan.iToken);
      this.pay(work, this.baseToken, caller, amount);
      return {
        amount,
        locked: this.locked,
        burnedCToken: plan.cToken,
        burnedIToken: plan.iToken,
      };
    });

    this.emit("vault.redeemed", caller, {
      account: caller,
      amount: formatAmount(amount),
      locked: result.locked,
    });
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Disputes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a dispute, posting iToken supply / initiationAmountDenominator
   * of base asset as collateral.
   */
  initiateDispute(caller: AccountId): Dispute {
    const dispute = this.guard.run("initiateDispute", (work) => {
      assertAccount(caller);

      const amount = this._iToken.totalSupply() / this.config.initiationAmountDenominator;
      const opened = this.disputes.open(
        caller,
        amount,
        this.clock() + this.config.disputeDurationSeconds,
      );
      this.pull(work, this.baseToken, caller, amount);
      return opened;
    });

    this.emit("vault.dispute.initiated", caller, {
      initiator: dispute.initiator,
      initiationAmount: formatAmount(dispute.initiationAmount),
      endTime: dispute.endTime,
    });
    return dispute;
  }

  /**
   * Stake governance asset on one side of the open dispute.
   */
  vote(caller: AccountId, side: VoteSide, weight: bigint): Vote {
    const vote = this.guard.run("vote", (work) => {
      assertAccount(caller);
      assertPositive(weight, "Vote weight");

      const cast = this.disputes.castVote(caller, side, weight, this.clock());
      this.pull(work, this.governanceToken, caller, weight);
      return cast;
    });

    this.emit("vault.voted", caller, {
      voter: vote.voter,
      side: vote.side,
      weight: formatAmount(vote.weight),
    });
    return vote;
  }

  /**
   * Settle the dispute once voting has ended. Anyone may call this.
   */
  resolveDispute(caller: AccountId): Resolution {
    const resolution = this.guard.run("resolveDispute", (work) => {
      assertAccount(caller);

      const initiator = this.disputes.current()?.initiator;
      const settled = this.disputes.resolve(this.clock(), this.locked, this.config.zeroVotePolicy);
      for (const credit of settled.credits) {
        this.fees.credit(credit.account, credit);
      }
      this.locked = settled.locked;
      if (initiator !== undefined) {
        this.pay(work, this.baseToken, initiator, settled.refund);
      }
      return settled;
    });

    this.emit("vault.dispute.resolved", caller, {
      outcome: resolution.outcome,
      locked: resolution.locked,
      acceptWeight: formatAmount(resolution.acceptWeight),
      declineWeight: formatAmount(resolution.declineWeight),
    });
    return resolution;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fees & Rewards
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay out the caller's share of fees accrued since their last withdrawal.
   */
  withdrawOwedFees(caller: AccountId): bigint {
    const share = this.guard.run("withdrawOwedFees", (work) => {
      assertAccount(caller);

      const owed = this.getOwedFees(caller);
      if (owed === 0n) {
        throw new VaultError("NO_FEES_OWED", `No fees owed to "${caller}"`);
      }
      this.fees.recordWithdrawal(caller, owed);
      this.pay(work, this.baseToken, caller, owed);
      return owed;
    });

    this.emit("vault.fees.withdrawn", caller, {
      account: caller,
      amount: formatAmount(share),
    });
    return share;
  }

  withdrawGovernanceTokenReward(caller: AccountId): bigint {
    return this.withdrawReward(caller, "governance");
  }

  withdrawBaseTokenReward(caller: AccountId): bigint {
    return this.withdrawReward(caller, "base");
  }

  private withdrawReward(caller: AccountId, currency: RewardCurrency): bigint {
    const operation = currency === "base" ? "withdrawBaseTokenReward" : "withdrawGovernanceTokenReward";
    const amount = this.guard.run(operation, (work) => {
      assertAccount(caller);

      const pending = this.fees.takeReward(caller, currency);
      if (pending === 0n) {
        throw new VaultError("NO_REWARD_OWED", `No ${currency} reward owed to "${caller}"`);
      }
      const asset = currency === "base" ? this.baseToken : this.governanceToken;
      this.pay(work, asset, caller, pending);
      return pending;
    });

    this.emit("vault.reward.withdrawn", caller, {
      account: caller,
      currency,
      amount: formatAmount(amount),
    });
    return amount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (Persistence)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Serialize the vault's own state, including both claim-token ledgers.
   */
  snapshot(): VaultSnapshot {
    const totals = this.fees.totals();
    return {
      version: 1,
      config: serializeVaultConfig(this.config),
      locked: this.locked,
      accruedFees: formatAmount(totals.accruedFees),
      remainingFees: formatAmount(totals.remainingFees),
      feeSnapshots: this.fees.serializeSnapshots(),
      rewards: this.fees.serializeRewards(),
      dispute: this.disputes.serializeDispute(),
      votes: this.disputes.serializeVotes(),
      cToken: this._cToken.snapshot(),
      iToken: this._iToken.snapshot(),
      savedAt: timestampOf(this.clock()),
    };
  }

  /**
   * Rebuild a vault from a snapshot. Collaborators are supplied again;
   * their balances are not part of the snapshot.
   *
   * @throws VaultError INVALID_SNAPSHOT on malformed or inconsistent input
   */
  static fromSnapshot(
    snapshot: VaultSnapshot,
    collaborators: VaultCollaborators,
    options: VaultOptions = {},
  ): Vault {
    assertVaultSnapshot(snapshot);
    const { config } = snapshot;

    try {
      const vault = new Vault(
        {
          ...config,
          initiationAmountDenominator: BigInt(config.initiationAmountDenominator),
          feeDenominator: BigInt(config.feeDenominator),
        },
        collaborators,
        options,
      );

      const cToken = ClaimToken.fromSnapshot(snapshot.cToken);
      const iToken = ClaimToken.fromSnapshot(snapshot.iToken);
      if (cToken.symbol !== vault.config.cTokenSymbol || iToken.symbol !== vault.config.iTokenSymbol) {
        throw new VaultError("INVALID_SNAPSHOT", "Claim token symbols do not match the vault config");
      }

      vault._cToken = cToken;
      vault._iToken = iToken;
      vault.locked = snapshot.locked;
      vault.fees.importState(
        FeeLedger.stateFrom(
          snapshot.accruedFees,
          snapshot.remainingFees,
          snapshot.feeSnapshots,
          snapshot.rewards,
        ),
      );
      vault.disputes.importState(DisputeEngine.stateFrom(snapshot.dispute, snapshot.votes));
      return vault;
    } catch (error) {
      if (error instanceof VaultError && error.code === "INVALID_SNAPSHOT") throw error;
      throw new VaultError("INVALID_SNAPSHOT", `Snapshot rejected: ${messageOf(error)}`, {
        cause: error,
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Collaborator calls
  // ───────────────────────────────────────────────────────────────────────

  /** Move funds from `from` into the vault; refunded on rollback. */
  private pull(work: UnitOfWork, asset: TransferableAsset, from: AccountId, amount: bigint): void {
    if (amount === 0n) return;
    work.step(
      `pull ${amount.toString()} ${asset.symbol} from "${from}"`,
      () =>
        callAsset("INSUFFICIENT_ALLOWANCE_OR_BALANCE", `Pull of ${asset.symbol} from "${from}"`, () =>
          asset.transferFrom(this.address, from, this.address, amount),
        ),
      () =>
        callAsset("ROLLBACK_FAILED", `Refund of ${asset.symbol} to "${from}"`, () =>
          asset.transfer(this.address, from, amount),
        ),
    );
  }

  /** Pay funds out of the vault. Payouts are always the final step. */
  private pay(work: UnitOfWork, asset: TransferableAsset, to: AccountId, amount: bigint): void {
    if (amount === 0n) return;
    work.step(`pay ${amount.toString()} ${asset.symbol} to "${to}"`, () =>
      callAsset("COLLABORATOR_FAILED", `Payout of ${asset.symbol} to "${to}"`, () =>
        asset.transfer(this.address, to, amount),
      ),
    );
  }

  private mint(work: UnitOfWork, token: ClaimToken, to: AccountId, amount: bigint): void {
    if (amount === 0n) return;
    work.step(
      `mint ${amount.toString()} ${token.symbol} to "${to}"`,
      () => callAsset("COLLABORATOR_FAILED", `Mint of ${token.symbol}`, () => token.mint(this.address, to, amount)),
      () => token.burn(this.address, to, amount),
    );
  }

  private burn(work: UnitOfWork, token: ClaimToken, from: AccountId, amount: bigint): void {
    if (amount === 0n) return;
    work.step(
      `burn ${amount.toString()} ${token.symbol} from "${from}"`,
      () => callAsset("INSUFFICIENT_BALANCE", `Burn of ${token.symbol}`, () => token.burn(this.address, from, amount)),
      () => token.mint(this.address, from, amount),
    );
  }

  private emit(type: VaultEventType, actor: AccountId, payload: Record<string, unknown>): void {
    const id = this.idGenerator();
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: id,
        timestamp: timestampOf(this.clock()),
        actor,
        correlationId: id,
        source: "vault",
      },
      payload,
    };
    // Committed: failures from here on go to onEventError, never to the caller.
    try {
      this.eventStore.append(this.streamId, [event]);
    } catch (error) {
      this.onEventError(error, event);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function assertAccount(account: AccountId): void {
  if (!isAccountId(account)) {
    throw new VaultError("INVALID_ACCOUNT", `Invalid account id: "${String(account)}"`);
  }
}

function assertPositive(amount: bigint, label: string): void {
  if (typeof amount !== "bigint" || amount <= 0n) {
    throw new VaultError("INVALID_AMOUNT", `${label} must be positive, got ${String(amount)}`);
  }
}

/**
 * Run a collaborator call, turning a thrown error or a `false` result
 * into a VaultError. VaultErrors (e.g. REENTRANT_CALL) pass through.
 */
function callAsset(code: VaultErrorCode, description: string, call: () => unknown): void {
  let result: unknown;
  try {
    result = call();
  } catch (error) {
    if (error instanceof VaultError) throw error;
    throw new VaultError(code, `${description} failed: ${messageOf(error)}`, { cause: error });
  }
  if (result === false) {
    throw new VaultError(code, `${description} was refused`);
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function timestampOf(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}
