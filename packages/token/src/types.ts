/**
 * @splitvault/token — Types for the token service.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint in memory, strings in snapshots
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountId, AmountString, AssetKind } from "@splitvault/types";

// ─── Configuration ───────────────────────────────────────────────────────

/** An initial balance handed out when a token is created. */
export interface TokenAllocation {
  readonly account: AccountId;
  readonly amount: bigint;
}

export interface BalanceTokenConfig {
  readonly symbol: string;
  readonly allocations?: readonly TokenAllocation[] | undefined;
}

export interface ClaimTokenConfig {
  readonly symbol: string;
  /** The only account allowed to mint and burn. */
  readonly owner: AccountId;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface AllowanceRecord {
  readonly owner: AccountId;
  readonly spender: AccountId;
  readonly amount: AmountString;
}

/**
 * Serializable state of a single token.
 * Accounts with a zero balance are omitted.
 */
export interface TokenSnapshot {
  readonly version: 1;
  readonly kind: AssetKind;
  readonly symbol: string;
  readonly owner?: AccountId | undefined;
  readonly totalSupply: AmountString;
  readonly balances: Readonly<Record<AccountId, AmountString>>;
  readonly allowances: readonly AllowanceRecord[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type TokenErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_CONFIG"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE_OR_BALANCE"
  | "UNAUTHORIZED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the token service.
 * Always thrown, never returned.
 */
export class TokenError extends Error {
  public readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}
