/**
 * @splitvault/token — Deterministic integer amount arithmetic.
 *
 * Token amounts are whole base units. All arithmetic is bigint;
 * divisions floor.
 *
 * Rules:
 * - No floating-point operations
 * - Serialized amounts are canonical base-10 strings
 * - Zero runtime dependencies
 */

import { isAmountString } from "@splitvault/types";
import type { AmountString } from "@splitvault/types";
import { TokenError } from "./types.js";

/**
 * Parse a serialized amount.
 *
 * "990" → 990n
 * "0"   → 0n
 */
export function parseAmount(amount: string): bigint {
  if (!isAmountString(amount)) {
    throw new TokenError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }
  return BigInt(amount);
}

/**
 * Serialize an amount. Rejects negatives, which have no meaning as a balance.
 */
export function formatAmount(amount: bigint): AmountString {
  if (amount < 0n) {
    throw new TokenError("INVALID_AMOUNT", `Amount must not be negative, got ${amount.toString()}`);
  }
  return amount.toString();
}

/**
 * Assert an amount is zero or more.
 */
export function assertNonNegative(amount: bigint, label = "amount"): void {
  if (amount < 0n) {
    throw new TokenError(
      "INVALID_AMOUNT",
      `${label} must not be negative, got ${amount.toString()}`,
    );
  }
}

/**
 * floor(a * b / divisor) for non-negative operands.
 *
 * The product is formed before dividing, so no precision is lost
 * to an intermediate floor.
 */
export function mulDivFloor(a: bigint, b: bigint, divisor: bigint): bigint {
  if (divisor <= 0n) {
    throw new TokenError(
      "INVALID_AMOUNT",
      `Divisor must be positive, got ${divisor.toString()}`,
    );
  }
  assertNonNegative(a, "multiplicand");
  assertNonNegative(b, "multiplier");
  return (a * b) / divisor;
}

/**
 * Sum a list of amounts.
 */
export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}
