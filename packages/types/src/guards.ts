/**
 * Runtime Type Guards
 *
 * Narrowing functions for Mintgate domain types, used at system
 * boundaries (API inputs, deserialized events, collaborator results).
 */

import { isAddress } from "viem";
import type { Identity } from "./identity.js";
import type { TokenSpec } from "./token.js";
import type { RequestStatus, PendingCreationRequest } from "./request.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity
// =============================================================================

/**
 * True for any well-formed EVM address. Mixed-case input must carry a
 * valid EIP-55 checksum.
 */
export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && isAddress(value);
}

// =============================================================================
// Token & request guards
// =============================================================================

export function isTokenSpec(value: unknown): value is TokenSpec {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    typeof v.symbol === "string" &&
    typeof v.totalSupply === "bigint" &&
    typeof v.maxSupply === "bigint" &&
    typeof v.mintable === "boolean" &&
    typeof v.burnable === "boolean" &&
    typeof v.supplyCapped === "boolean"
  );
}

const REQUEST_STATUSES = new Set<string>(["pending", "executed"]);

export function isRequestStatus(value: unknown): value is RequestStatus {
  return typeof value === "string" && REQUEST_STATUSES.has(value);
}

export function isPendingCreationRequest(
  value: unknown,
): value is PendingCreationRequest {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "number" &&
    Number.isInteger(v.id) &&
    v.id > 0 &&
    isIdentity(v.requester) &&
    Array.isArray(v.signers) &&
    v.signers.every(isIdentity) &&
    isRequestStatus(v.status) &&
    isTokenSpec(v.tokenSpec) &&
    typeof v.submittedAt === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "factory", "coordinator", "liquidity", "attestation",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source) &&
    (v.causationId === undefined || typeof v.causationId === "string")
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}
