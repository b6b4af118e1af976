/**
 * @splitvault/token — Transferable balance ledger.
 *
 * An in-process fungible token: balances, allowances, total supply.
 * Serves as the base asset and the governance asset, and as the
 * foundation of ClaimToken.
 *
 * API surface:
 * - balanceOf() / totalSupply() / allowance()
 * - approve() — set a spender's allowance
 * - transfer() — move funds as the acting account
 * - transferFrom() — move funds on behalf of an owner, consuming allowance
 * - snapshot() / fromSnapshot() — serialize and restore
 *
 * Every mutating call validates everything before it writes, so a
 * call that throws has changed nothing.
 */

import { isAccountId, isAmountString, isAssetKind } from "@splitvault/types";
import type { AccountId, AssetKind, TransferableAsset } from "@splitvault/types";
import { assertNonNegative, formatAmount, parseAmount } from "./amount-math.js";
import type {
  AllowanceRecord,
  BalanceTokenConfig,
  TokenSnapshot,
} from "./types.js";
import { TokenError } from "./types.js";

export class BalanceToken implements TransferableAsset {
  readonly kind: AssetKind = "transferable";
  readonly symbol: string;

  protected readonly _balances: Map<AccountId, bigint> = new Map();
  private readonly _allowances: Map<AccountId, Map<AccountId, bigint>> = new Map();
  protected _totalSupply = 0n;

  constructor(config: BalanceTokenConfig) {
    if (config.symbol.trim() === "") {
      throw new TokenError("INVALID_CONFIG", "Token symbol must be a non-empty string");
    }
    this.symbol = config.symbol;

    for (const allocation of config.allocations ?? []) {
      this._assertAccount(allocation.account);
      assertNonNegative(allocation.amount, "allocation");
      this._credit(allocation.account, allocation.amount);
      this._totalSupply += allocation.amount;
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: AccountId): bigint {
    return this._balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this._totalSupply;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  /**
   * All accounts holding a non-zero balance.
   */
  holders(): readonly AccountId[] {
    return [...this._balances.keys()];
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  approve(owner: AccountId, spender: AccountId, amount: bigint): boolean {
    this._assertAccount(owner);
    this._assertAccount(spender);
    assertNonNegative(amount);

    this._setAllowance(owner, spender, amount);
    return true;
  }

  transfer(from: AccountId, to: AccountId, amount: bigint): boolean {
    this._assertAccount(from);
    this._assertAccount(to);
    assertNonNegative(amount);

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_BALANCE",
        `${this.symbol}: "${from}" holds ${balance.toString()}, cannot transfer ${amount.toString()}`,
      );
    }

    this._move(from, to, amount);
    return true;
  }

  transferFrom(
    spender: AccountId,
    owner: AccountId,
    to: AccountId,
    amount: bigint,
  ): boolean {
    this._assertAccount(spender);
    this._assertAccount(owner);
    this._assertAccount(to);
    assertNonNegative(amount);

    const allowed = this.allowance(owner, spender);
    const balance = this.balanceOf(owner);
    if (allowed < amount || balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_ALLOWANCE_OR_BALANCE",
        `${this.symbol}: "${spender}" cannot move ${amount.toString()} from "${owner}" (allowance ${allowed.toString()}, balance ${balance.toString()})`,
      );
    }

    this._setAllowance(owner, spender, allowed - amount);
    this._move(owner, to, amount);
    return true;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): TokenSnapshot {
    const balances: Record<AccountId, string> = Object.fromEntries(
      [...this._balances].map(([account, amount]): [AccountId, string] => [account, formatAmount(amount)]),
    );

    const allowances: AllowanceRecord[] = [];
    for (const [owner, spenders] of this._allowances) {
      for (const [spender, amount] of spenders) {
        allowances.push({ owner, spender, amount: formatAmount(amount) });
      }
    }

    return {
      version: 1,
      kind: this.kind,
      symbol: this.symbol,
      totalSupply: formatAmount(this._totalSupply),
      balances,
      allowances,
    };
  }

  static fromSnapshot(snapshot: TokenSnapshot): BalanceToken {
    if (snapshot.kind !== "transferable") {
      throw new TokenError(
        "INVALID_SNAPSHOT",
        `Expected a transferable token snapshot, got kind "${snapshot.kind}"`,
      );
    }
    const token = new BalanceToken({ symbol: snapshot.symbol });
    token._load(snapshot);
    return token;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Replace all state with the contents of a snapshot.
   * Validates the whole snapshot before writing anything.
   */
  protected _load(snapshot: TokenSnapshot): void {
    if (snapshot.version !== 1 || !isAssetKind(snapshot.kind)) {
      throw new TokenError("INVALID_SNAPSHOT", "Unsupported token snapshot version or kind");
    }
    if (!isAmountString(snapshot.totalSupply)) {
      throw new TokenError("INVALID_SNAPSHOT", `Invalid total supply: "${String(snapshot.totalSupply)}"`);
    }

    const balances = new Map<AccountId, bigint>();
    let sum = 0n;
    for (const [account, amount] of Object.entries(snapshot.balances)) {
      if (!isAccountId(account) || !isAmountString(amount)) {
        throw new TokenError("INVALID_SNAPSHOT", `Invalid balance entry for "${account}"`);
      }
      const value = parseAmount(amount);
      sum += value;
      if (value > 0n) {
        balances.set(account, value);
      }
    }

    const totalSupply = parseAmount(snapshot.totalSupply);
    if (sum !== totalSupply) {
      throw new TokenError(
        "INVALID_SNAPSHOT",
        `${snapshot.symbol}: balances sum to ${sum.toString()} but total supply is ${totalSupply.toString()}`,
      );
    }

    for (const record of snapshot.allowances) {
      if (!isAccountId(record.owner) || !isAccountId(record.spender) || !isAmountString(record.amount)) {
        throw new TokenError("INVALID_SNAPSHOT", "Invalid allowance entry");
      }
    }

    this._balances.clear();
    for (const [account, amount] of balances) {
      this._balances.set(account, amount);
    }
    this._allowances.clear();
    for (const record of snapshot.allowances) {
      this._setAllowance(record.owner, record.spender, parseAmount(record.amount));
    }
    this._totalSupply = totalSupply;
  }

  protected _assertAccount(account: AccountId): void {
    if (!isAccountId(account)) {
      throw new TokenError("INVALID_ACCOUNT", `Invalid account id: "${String(account)}"`);
    }
  }

  protected _credit(account: AccountId, amount: bigint): void {
    if (amount === 0n) return;
    this._balances.set(account, this.balanceOf(account) + amount);
  }

  /** Caller guarantees the balance covers `amount`. */
  protected _debit(account: AccountId, amount: bigint): void {
    const next = this.balanceOf(account) - amount;
    if (next === 0n) {
      this._balances.delete(account);
    } else {
      this._balances.set(account, next);
    }
  }

  private _move(from: AccountId, to: AccountId, amount: bigint): void {
    this._debit(from, amount);
    this._credit(to, amount);
  }

  private _setAllowance(owner: AccountId, spender: AccountId, amount: bigint): void {
    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    if (amount === 0n) {
      spenders.delete(spender);
      if (spenders.size === 0) {
        this._allowances.delete(owner);
      }
    } else {
      spenders.set(spender, amount);
    }
  }
}
