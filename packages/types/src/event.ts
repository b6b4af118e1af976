/**
 * Domain events — the record of every committed state change.
 *
 * Payload amounts are decimal strings; bigint does not survive JSON.
 */

export type EventSource = "vault" | "token" | "host";

export interface EventMetadata {
  readonly eventId: string;
  /** ISO 8601 */
  readonly timestamp: string;
  /** Account that called the operation */
  readonly actor: string;
  /** Groups events emitted for one operation */
  readonly correlationId: string;
  /** Event this one follows from, when there is one */
  readonly causationId?: string;
  readonly source: EventSource;
}

/** Discriminated by `type`, e.g. "vault.converted". */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
