/**
 * In-memory EventStore.
 *
 * One global log in append order plus, per stream, the indexes of that
 * stream's events in the log. `toLog()` / `fromLog()` move the whole log
 * in and out as plain JSON-safe data; a loaded log must verify.
 */

import { isDomainEvent } from "@splitvault/types";
import type { DomainEvent } from "@splitvault/types";
import type {
  AppendOptions,
  AppendResult,
  EventListener,
  EventStore,
  IntegrityReport,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, sealLink, verifyChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Default: wall clock */
  readonly now?: (() => Date) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly log: StoredEvent[] = [];
  private readonly streams = new Map<string, number[]>();
  private readonly listeners = new Map<string, Set<EventListener>>();
  private readonly now: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rebuild a store from a previously exported log.
   *
   * @throws EventStoreError CORRUPT_LOG if an entry is malformed or the chain does not verify
   */
  static fromLog(
    log: readonly StoredEvent[],
    options: InMemoryEventStoreOptions = {},
  ): InMemoryEventStore {
    for (const [index, stored] of log.entries()) {
      if (!isDomainEvent(stored.event)) {
        throw new EventStoreError("CORRUPT_LOG", `Entry ${index + 1} is not a domain event`);
      }
    }
    const report = verifyChain(log);
    if (!report.valid) {
      throw new EventStoreError("CORRUPT_LOG", report.reason);
    }

    const store = new InMemoryEventStore(options);
    for (const stored of log) {
      store.index(stored);
    }
    return store;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[], options: AppendOptions = {}): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const current = this.streamVersion(streamId);
    if (options.expectedVersion !== undefined && options.expectedVersion !== current) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${current}, expected ${options.expectedVersion}`,
        streamId,
      );
    }

    const appendedAt = this.now().toISOString();
    const appended = events.map((event, i) => {
      const stored = sealLink({
        event,
        streamId,
        version: current + i + 1,
        position: this.log.length + 1,
        appendedAt,
        previousHash: this.lastHash(),
      });
      this.index(stored);
      return stored;
    });

    const streamListeners = this.listeners.get(streamId);
    if (streamListeners !== undefined) {
      for (const listener of [...streamListeners]) {
        for (const stored of appended) {
          listener(stored);
        }
      }
    }

    return { streamId, version: current + events.length, position: this.log.length };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options: ReadOptions = {}): readonly StoredEvent[] {
    assertStreamId(streamId);
    const after = options.afterVersion ?? 0;
    const indexes = (this.streams.get(streamId) ?? []).slice(Math.max(after, 0));
    const limited = options.limit === undefined ? indexes : indexes.slice(0, options.limit);
    return limited.flatMap((i) => this.log.slice(i, i + 1));
  }

  readAll(afterPosition = 0): readonly StoredEvent[] {
    return this.log.slice(Math.max(afterPosition, 0));
  }

  streamVersion(streamId: string): number {
    return this.streams.get(streamId)?.length ?? 0;
  }

  /** A copy of the whole log, in global order. */
  toLog(): StoredEvent[] {
    return [...this.log];
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, listener: EventListener): Subscription {
    assertStreamId(streamId);
    const set = this.listeners.get(streamId) ?? new Set<EventListener>();
    set.add(listener);
    this.listeners.set(streamId, set);

    return {
      unsubscribe: () => {
        set.delete(listener);
        if (set.size === 0) this.listeners.delete(streamId);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): IntegrityReport {
    return verifyChain(this.log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private lastHash(): string {
    return this.log.at(-1)?.hash ?? GENESIS_HASH;
  }

  private index(stored: StoredEvent): void {
    const indexes = this.streams.get(stored.streamId) ?? [];
    indexes.push(this.log.length);
    this.streams.set(stored.streamId, indexes);
    this.log.push(stored);
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.trim() === "") {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}
