/**
 * @mintgate/types — Shared domain types for the Mintgate stack.
 *
 * Used across all Mintgate packages:
 * - Identities (checksummed EVM addresses)
 * - Token specifications
 * - Creation request records
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No methods that mutate state
 * - Runtime guards only at system boundaries
 */

export type { Identity } from "./identity.js";
export type { TokenSpec } from "./token.js";
export type {
  RequestId,
  RequestStatus,
  PendingCreationRequest,
} from "./request.js";
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

export {
  isIdentity,
  isTokenSpec,
  isRequestStatus,
  isPendingCreationRequest,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
