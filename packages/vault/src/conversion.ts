/**
 * Conversion — base asset ⇄ claim-token pair arithmetic.
 *
 * convert: fee = floor(amount / feeDenominator), both claim tokens are
 * minted for amount − fee.
 *
 * redeem: while locked a holder needs equal amounts of cToken and
 * iToken and burns both; once unlocked the iToken alone is enough.
 */

import type { ClaimTokenService, AccountId } from "@splitvault/types";
import type { ConversionResult } from "./types.js";
import { VaultError } from "./types.js";

export function quoteConversion(amount: bigint, feeDenominator: bigint): ConversionResult {
  const fee = amount / feeDenominator;
  return { fee, minted: amount - fee };
}

/** Amounts of each claim token a redemption burns. */
export interface BurnPlan {
  readonly cToken: bigint;
  readonly iToken: bigint;
}

export function planRedemption(amount: bigint, locked: boolean): BurnPlan {
  return { cToken: locked ? amount : 0n, iToken: amount };
}

/**
 * Check the holder can cover a burn plan before anything is burned.
 */
export function assertCanRedeem(
  account: AccountId,
  plan: BurnPlan,
  cToken: ClaimTokenService,
  iToken: ClaimTokenService,
): void {
  for (const [token, needed] of [[cToken, plan.cToken], [iToken, plan.iToken]] as const) {
    const held = token.balanceOf(account);
    if (held < needed) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `"${account}" holds ${held.toString()} ${token.symbol}, redemption needs ${needed.toString()}`,
      );
    }
  }
}
