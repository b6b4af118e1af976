/**
 * @splitvault/token — Owner-controlled claim token.
 *
 * A BalanceToken whose supply only its owner can change. The vault
 * deploys two of these (cToken, iToken) and is their sole owner.
 */

import type { AccountId, ClaimTokenService } from "@splitvault/types";
import { assertNonNegative } from "./amount-math.js";
import { BalanceToken } from "./balance-token.js";
import type { ClaimTokenConfig, TokenSnapshot } from "./types.js";
import { TokenError } from "./types.js";

export class ClaimToken extends BalanceToken implements ClaimTokenService {
  override readonly kind = "claim" as const;
  readonly owner: AccountId;

  constructor(config: ClaimTokenConfig) {
    super({ symbol: config.symbol });
    this._assertAccount(config.owner);
    this.owner = config.owner;
  }

  mint(caller: AccountId, to: AccountId, amount: bigint): void {
    this._assertOwner(caller, "mint");
    this._assertAccount(to);
    assertNonNegative(amount);

    this._credit(to, amount);
    this._totalSupply += amount;
  }

  burn(caller: AccountId, from: AccountId, amount: bigint): void {
    this._assertOwner(caller, "burn");
    this._assertAccount(from);
    assertNonNegative(amount);

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_BALANCE",
        `${this.symbol}: "${from}" holds ${balance.toString()}, cannot burn ${amount.toString()}`,
      );
    }

    this._debit(from, amount);
    this._totalSupply -= amount;
  }

  override snapshot(): TokenSnapshot {
    return { ...super.snapshot(), owner: this.owner };
  }

  static override fromSnapshot(snapshot: TokenSnapshot): ClaimToken {
    if (snapshot.kind !== "claim" || snapshot.owner === undefined) {
      throw new TokenError(
        "INVALID_SNAPSHOT",
        `Expected a claim token snapshot with an owner, got kind "${snapshot.kind}"`,
      );
    }
    const token = new ClaimToken({ symbol: snapshot.symbol, owner: snapshot.owner });
    token._load(snapshot);
    return token;
  }

  private _assertOwner(caller: AccountId, action: "mint" | "burn"): void {
    if (caller !== this.owner) {
      throw new TokenError(
        "UNAUTHORIZED",
        `${this.symbol}: only "${this.owner}" may ${action}, called by "${caller}"`,
      );
    }
  }
}
