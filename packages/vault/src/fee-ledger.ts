/**
 * Fee & Reward Ledger — what the vault owes its participants.
 *
 * Tracks:
 * - accruedFees: every conversion fee ever collected (never decreases)
 * - remainingFees: collected fees not yet withdrawn
 * - per-account fee snapshot: accruedFees at the account's last withdrawal
 * - per-account pending rewards in base and governance asset
 *
 * A fee share is floor(newFees × governanceBalance / governanceSupply),
 * where newFees is everything accrued since the account's snapshot. The
 * snapshot ignores how the account's governance balance moved in between.
 *
 * Rules:
 * - All arithmetic is bigint with floor division
 * - remainingFees <= accruedFees, and neither goes negative
 * - A share is capped at remainingFees, so withdrawals never draw on
 *   collateral backing the claim tokens
 */

import { formatAmount, mulDivFloor, parseAmount, sumAmounts } from "@splitvault/token";
import type { AccountId } from "@splitvault/types";
import type {
  FeeTotals,
  PendingRewards,
  RewardCurrency,
  SerializedRewards,
} from "./types.js";

/** Copyable state of the ledger, used for rollback and snapshots. */
export interface FeeLedgerState {
  readonly accruedFees: bigint;
  readonly remainingFees: bigint;
  readonly feeSnapshots: ReadonlyMap<AccountId, bigint>;
  readonly baseRewards: ReadonlyMap<AccountId, bigint>;
  readonly governanceRewards: ReadonlyMap<AccountId, bigint>;
}

export class FeeLedger {
  private accruedFees = 0n;
  private remainingFees = 0n;
  private readonly feeSnapshots: Map<AccountId, bigint> = new Map();
  private readonly baseRewards: Map<AccountId, bigint> = new Map();
  private readonly governanceRewards: Map<AccountId, bigint> = new Map();

  // ───────────────────────────────────────────────────────────────────────
  // Fees
  // ───────────────────────────────────────────────────────────────────────

  totals(): FeeTotals {
    return { accruedFees: this.accruedFees, remainingFees: this.remainingFees };
  }

  accrue(fee: bigint): void {
    this.accruedFees += fee;
    this.remainingFees += fee;
  }

  /**
   * Fees accrued since the account last withdrew.
   */
  newFeesFor(account: AccountId): bigint {
    return this.accruedFees - (this.feeSnapshots.get(account) ?? 0n);
  }

  /**
   * The account's current fee share, given its governance position.
   */
  owedShare(account: AccountId, governanceBalance: bigint, governanceSupply: bigint): bigint {
    const newFees = this.newFeesFor(account);
    if (newFees === 0n || governanceSupply === 0n) {
      return 0n;
    }
    const share = mulDivFloor(newFees, governanceBalance, governanceSupply);
    return share < this.remainingFees ? share : this.remainingFees;
  }

  /**
   * Book a fee withdrawal and move the account's snapshot to the
   * current accrued total.
   */
  recordWithdrawal(account: AccountId, share: bigint): void {
    this.remainingFees -= share;
    this.feeSnapshots.set(account, this.accruedFees);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rewards
  // ───────────────────────────────────────────────────────────────────────

  credit(account: AccountId, reward: PendingRewards): void {
    if (reward.baseToken > 0n) {
      this.baseRewards.set(account, (this.baseRewards.get(account) ?? 0n) + reward.baseToken);
    }
    if (reward.governanceToken > 0n) {
      this.governanceRewards.set(
        account,
        (this.governanceRewards.get(account) ?? 0n) + reward.governanceToken,
      );
    }
  }

  pendingRewards(account: AccountId): PendingRewards {
    return {
      baseToken: this.baseRewards.get(account) ?? 0n,
      governanceToken: this.governanceRewards.get(account) ?? 0n,
    };
  }

  /**
   * Remove and return the account's whole pending balance in one currency.
   */
  takeReward(account: AccountId, currency: RewardCurrency): bigint {
    const book = currency === "base" ? this.baseRewards : this.governanceRewards;
    const amount = book.get(account) ?? 0n;
    book.delete(account);
    return amount;
  }

  /** Sum of pending rewards across all accounts. */
  pendingTotals(): PendingRewards {
    return {
      baseToken: sumAmounts(this.baseRewards.values()),
      governanceToken: sumAmounts(this.governanceRewards.values()),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // State transfer
  // ───────────────────────────────────────────────────────────────────────

  exportState(): FeeLedgerState {
    return {
      accruedFees: this.accruedFees,
      remainingFees: this.remainingFees,
      feeSnapshots: new Map(this.feeSnapshots),
      baseRewards: new Map(this.baseRewards),
      governanceRewards: new Map(this.governanceRewards),
    };
  }

  importState(state: FeeLedgerState): void {
    this.accruedFees = state.accruedFees;
    this.remainingFees = state.remainingFees;
    replace(this.feeSnapshots, state.feeSnapshots);
    replace(this.baseRewards, state.baseRewards);
    replace(this.governanceRewards, state.governanceRewards);
  }

  // Records are built with Object.fromEntries so every account id,
  // "__proto__" included, becomes an own property.

  serializeSnapshots(): Record<AccountId, string> {
    return Object.fromEntries(
      [...this.feeSnapshots].map(([account, value]): [AccountId, string] => [account, formatAmount(value)]),
    );
  }

  serializeRewards(): Record<AccountId, SerializedRewards> {
    const accounts = new Set([...this.baseRewards.keys(), ...this.governanceRewards.keys()]);
    return Object.fromEntries(
      [...accounts].map((account): [AccountId, SerializedRewards] => {
        const pending = this.pendingRewards(account);
        return [
          account,
          {
            baseToken: formatAmount(pending.baseToken),
            governanceToken: formatAmount(pending.governanceToken),
          },
        ];
      }),
    );
  }

  /**
   * Rebuild ledger state from serialized parts.
   * Amount strings are parsed strictly; malformed input throws TokenError.
   */
  static stateFrom(
    accruedFees: string,
    remainingFees: string,
    feeSnapshots: Readonly<Record<AccountId, string>>,
    rewards: Readonly<Record<AccountId, SerializedRewards>>,
  ): FeeLedgerState {
    const snapshots = new Map<AccountId, bigint>();
    for (const [account, value] of Object.entries(feeSnapshots)) {
      snapshots.set(account, parseAmount(value));
    }
    const base = new Map<AccountId, bigint>();
    const governance = new Map<AccountId, bigint>();
    for (const [account, pending] of Object.entries(rewards)) {
      const baseAmount = parseAmount(pending.baseToken);
      const governanceAmount = parseAmount(pending.governanceToken);
      if (baseAmount > 0n) base.set(account, baseAmount);
      if (governanceAmount > 0n) governance.set(account, governanceAmount);
    }
    return {
      accruedFees: parseAmount(accruedFees),
      remainingFees: parseAmount(remainingFees),
      feeSnapshots: snapshots,
      baseRewards: base,
      governanceRewards: governance,
    };
  }
}

function replace<K, V>(target: Map<K, V>, source: ReadonlyMap<K, V>): void {
  target.clear();
  for (const [key, value] of source) {
    target.set(key, value);
  }
}
