/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used where data crosses a boundary: restored snapshots,
 * configuration, deserialized events.
 */

import type { AccountId, AmountString } from "./account.js";
import type { AssetKind } from "./asset.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Account guards
// =============================================================================

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isAmountString(value: unknown): value is AmountString {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

// =============================================================================
// Asset guards
// =============================================================================

const ASSET_KINDS = new Set<string>(["transferable", "claim"]);

export function isAssetKind(value: unknown): value is AssetKind {
  return typeof value === "string" && ASSET_KINDS.has(value);
}

// =============================================================================
// Structural guards
// =============================================================================

/** A plain object (not null, not an array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES: ReadonlySet<unknown> = new Set<unknown>(["vault", "token", "host"]);
const REQUIRED_METADATA = ["eventId", "timestamp", "actor", "correlationId"] as const;

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  if (!REQUIRED_METADATA.every((key) => typeof value[key] === "string")) return false;
  if (value.causationId !== undefined && typeof value.causationId !== "string") return false;
  return EVENT_SOURCES.has(value.source);
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  return (
    isRecord(value) &&
    typeof value.type === "string" &&
    value.type.length > 0 &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
