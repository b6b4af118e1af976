/**
 * @splitvault/event-store — Core types.
 *
 * Rules:
 * - Stored events are never updated or deleted
 * - Stream versions run 1, 2, 3, ... without gaps
 * - Global positions run 1, 2, 3, ... across every stream
 * - Each event is linked to its predecessor (global order) by hash
 */

import type { DomainEvent } from "@splitvault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * Everything that goes into an event's hash: the event itself, where it
 * sits, and the hash of the event before it.
 */
export interface ChainLink {
  readonly event: DomainEvent;
  readonly streamId: string;
  /** Position within the stream (1-based) */
  readonly version: number;
  /** Position across all streams (1-based) */
  readonly position: number;
  /** Store-level time of the append (ISO 8601) */
  readonly appendedAt: string;
  /** Hash of the previous event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

export interface StoredEvent extends ChainLink {
  /** Hex SHA-256 of the canonical ChainLink */
  readonly hash: string;
}

// =============================================================================
// Append / Read
// =============================================================================

export interface AppendOptions {
  /** Stream version the caller last saw; 0 means the stream must not exist yet */
  readonly expectedVersion?: number | undefined;
}

export interface AppendResult {
  readonly streamId: string;
  /** Stream version after the append */
  readonly version: number;
  /** Global position of the last appended event */
  readonly position: number;
}

export interface ReadOptions {
  /** Only events with a greater stream version. Default: 0 */
  readonly afterVersion?: number | undefined;
  readonly limit?: number | undefined;
}

export type EventListener = (stored: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export type IntegrityReport =
  | { readonly valid: true; readonly checked: number }
  | {
      readonly valid: false;
      readonly checked: number;
      /** Global position of the first event that does not verify */
      readonly brokenAt: number;
      readonly reason: string;
    };

// =============================================================================
// Store
// =============================================================================

export interface EventStore {
  /**
   * Append events to one stream. Listeners on the stream are called
   * synchronously, in order, before append returns.
   *
   * @throws EventStoreError on an empty batch or a version conflict
   */
  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult;

  /** Events of one stream in version order (empty for an unknown stream). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Every event in global order, optionally after a position. */
  readAll(afterPosition?: number): readonly StoredEvent[];

  subscribe(streamId: string, listener: EventListener): Subscription;

  /** Current version of a stream, 0 if it has no events. */
  streamVersion(streamId: string): number;

  /** Recompute the hash chain over every stored event. */
  verifyIntegrity(): IntegrityReport;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "EMPTY_APPEND"
  | "INVALID_STREAM_ID"
  | "CONCURRENCY_CONFLICT"
  | "CORRUPT_LOG";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
