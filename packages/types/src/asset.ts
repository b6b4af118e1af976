/**
 * Asset Capability Types
 *
 * The vault talks to every asset through one capability interface.
 * Claim tokens extend it with owner-restricted mint/burn.
 *
 * The variant is carried by the `kind` tag and chosen when the asset
 * is constructed. Consumers switch on `kind`; they never probe for
 * methods at runtime.
 *
 * Every mutating call names the acting account first, the same way
 * a contract call carries its sender.
 */

import type { AccountId } from "./account.js";

/** Capability tag for an asset service. */
export type AssetKind = "transferable" | "claim";

/**
 * A fungible balance ledger (base asset, governance asset).
 *
 * Mutating calls either complete fully or throw; a failed call
 * leaves balances and allowances untouched.
 */
export interface TransferableAsset {
  readonly kind: AssetKind;
  readonly symbol: string;

  balanceOf(account: AccountId): bigint;
  totalSupply(): bigint;
  allowance(owner: AccountId, spender: AccountId): bigint;

  /** Set the amount `spender` may pull from `owner`. */
  approve(owner: AccountId, spender: AccountId, amount: bigint): boolean;

  /** Move `amount` from `from` (the acting account) to `to`. */
  transfer(from: AccountId, to: AccountId, amount: bigint): boolean;

  /** `spender` moves `amount` from `owner` to `to`, consuming allowance. */
  transferFrom(
    spender: AccountId,
    owner: AccountId,
    to: AccountId,
    amount: bigint,
  ): boolean;
}

/**
 * A claim token whose supply is controlled by a single owner.
 */
export interface ClaimTokenService extends TransferableAsset {
  readonly kind: "claim";

  /** The only account allowed to mint and burn. */
  readonly owner: AccountId;

  mint(caller: AccountId, to: AccountId, amount: bigint): void;

  /** Throws when `from` holds less than `amount`. */
  burn(caller: AccountId, from: AccountId, amount: bigint): void;
}
