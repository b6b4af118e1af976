/**
 * @splitvault/token — In-process token service.
 *
 * Fungible balance ledgers for the vault's collaborators:
 * - BalanceToken: transferable asset (base asset, governance asset)
 * - ClaimToken: owner-restricted mint/burn (cToken, iToken)
 *
 * Design rules:
 * - All arithmetic uses bigint (no floating point)
 * - Fail-closed: a call that throws has changed nothing
 * - State is snapshot-able and restorable
 * - Zero runtime dependencies beyond @splitvault/types
 */

// Tokens
export { BalanceToken } from "./balance-token.js";
export { ClaimToken } from "./claim-token.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  assertNonNegative,
  mulDivFloor,
  sumAmounts,
} from "./amount-math.js";

// Types
export type {
  TokenAllocation,
  BalanceTokenConfig,
  ClaimTokenConfig,
  AllowanceRecord,
  TokenSnapshot,
  TokenErrorCode,
} from "./types.js";

export { TokenError } from "./types.js";
