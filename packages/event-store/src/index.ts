/**
 * @mintgate/event-store — Append-only, hash-chained event log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore
 * - Hash chain computation and verification
 * - Launchpad domain event definitions
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";

export {
  LAUNCH_EVENTS,
  createLaunchEvent,
  requestStreamId,
  poolStreamId,
} from "./launch-events.js";
export type {
  LaunchEventType,
  RequestQueuedPayload,
  MemecoinCreatedPayload,
  SignaturePayload,
  PoolInitializedPayload,
  LiquidityChangedPayload,
  VestingTriggeredPayload,
} from "./launch-events.js";
