/**
 * @mintgate/event-store — Launchpad domain event definitions.
 *
 * Naming convention: `<component>.<entity>.<action>`
 *
 * Streams:
 * - `request:<id>` — everything about one creation request
 * - `pool:<poolId>` — liquidity events of one pool
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@mintgate/types";

// =============================================================================
// Event types
// =============================================================================

export const LAUNCH_EVENTS = {
  REQUEST_QUEUED: "factory.request.queued",
  MEMECOIN_CREATED: "factory.memecoin.created",
  SIGNATURE_ADDED: "coordinator.signature.added",
  SIGNATURE_REMOVED: "coordinator.signature.removed",
  QUORUM_REACHED: "coordinator.quorum.reached",
  POOL_INITIALIZED: "liquidity.pool.initialized",
  LIQUIDITY_ADDED: "liquidity.position.added",
  LIQUIDITY_REMOVED: "liquidity.position.removed",
  VESTING_TRIGGERED: "liquidity.vesting.triggered",
} as const;

export type LaunchEventType = (typeof LAUNCH_EVENTS)[keyof typeof LAUNCH_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export interface RequestQueuedPayload {
  readonly requestId: number;
  readonly requester: string;
  readonly signers: readonly string[];
  readonly name: string;
  readonly symbol: string;
  readonly totalSupply: string;
}

export interface MemecoinCreatedPayload {
  readonly requestId: number;
  readonly tokenAddress: string;
  readonly poolId: string;
  readonly approvals: readonly string[];
}

export interface SignaturePayload {
  readonly requestId: number;
  readonly signer: string;
  readonly collected: number;
  readonly required: number;
}

export interface PoolInitializedPayload {
  readonly poolId: string;
  readonly currency0: string;
  readonly currency1: string;
  readonly fee: number;
  readonly tickSpacing: number;
  readonly sqrtPriceX96: string;
}

export interface LiquidityChangedPayload {
  readonly poolId: string;
  readonly provider: string;
  readonly amount: string;
  readonly totalLiquidity: string;
}

export interface VestingTriggeredPayload {
  readonly poolId: string;
  readonly threshold: string;
  readonly beneficiaries: readonly string[];
}

// =============================================================================
// Stream ids
// =============================================================================

export function requestStreamId(requestId: number): string {
  return `request:${requestId}`;
}

export function poolStreamId(poolId: string): string {
  return `pool:${poolId}`;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a DomainEvent with fresh metadata.
 *
 * Callers pin the payload shape with `satisfies`, e.g.
 * `{ requestId, ... } satisfies RequestQueuedPayload`.
 */
export function createLaunchEvent(
  type: LaunchEventType,
  payload: Readonly<Record<string, unknown>>,
  context: {
    readonly actor: string;
    readonly source: EventSource;
    readonly correlationId: string;
    readonly causationId?: string;
  },
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      ...context,
    },
    payload,
  };
}
