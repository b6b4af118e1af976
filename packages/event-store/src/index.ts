/**
 * @splitvault/event-store — Append-only, hash-chained event streams.
 *
 * @packageDocumentation
 */

export type {
  ChainLink,
  StoredEvent,
  AppendOptions,
  AppendResult,
  ReadOptions,
  EventListener,
  Subscription,
  IntegrityReport,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { GENESIS_HASH, hashLink, sealLink, verifyChain } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
