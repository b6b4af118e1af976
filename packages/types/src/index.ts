/**
 * @splitvault/types — Shared domain types for the SplitVault stack.
 *
 * - Account identifiers and serialized amounts
 * - Asset capability interfaces (transferable, claim)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Account types
export type { AccountId, AmountString } from "./account.js";

// Asset capabilities
export type {
  AssetKind,
  TransferableAsset,
  ClaimTokenService,
} from "./asset.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isAmountString,
  isAssetKind,
  isRecord,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
