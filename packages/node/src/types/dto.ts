/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Big integers travel as decimal strings in both directions.
 */

import { z } from "zod";
import type { Hex } from "viem";
import type { PendingCreationRequest } from "@mintgate/types";
import type { SignResult, UnsignResult } from "@mintgate/launchpad";
import type { PoolState } from "@mintgate/liquidity";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Non-negative integer as a decimal string */
export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string")
  .transform((v) => BigInt(v));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const RequestIdParamSchema = z.object({
  id: z.coerce.number().int(),
});

export const PoolIdParamSchema = z.object({
  poolId: z.custom<Hex>(
    (v) => typeof v === "string" && /^0x[0-9a-fA-F]{64}$/.test(v),
    "Expected a 32-byte hex pool id",
  ),
});

// =============================================================================
// Creation Request DTOs
// =============================================================================

export const TokenSpecSchema = z.object({
  name: z.string().max(64),
  symbol: z.string().max(16),
  totalSupply: UintStringSchema,
  maxSupply: UintStringSchema.default("0"),
  mintable: z.boolean().default(false),
  burnable: z.boolean().default(false),
  supplyCapped: z.boolean().default(false),
});

export const SubmitRequestSchema = z.object({
  signers: z.array(z.string()).max(32),
  tokenSpec: TokenSpecSchema,
});

export type SubmitRequestDto = z.infer<typeof SubmitRequestSchema>;

export const ListRequestsQuerySchema = PaginationQuerySchema.extend({
  status: z.enum(["pending", "executed"]).optional(),
});

export type ListRequestsQuery = z.infer<typeof ListRequestsQuerySchema>;

// =============================================================================
// Liquidity DTOs
// =============================================================================

export const LiquidityChangeSchema = z.object({
  amount: UintStringSchema,
});

export type LiquidityChangeDto = z.infer<typeof LiquidityChangeSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface TokenSpecView {
  readonly name: string;
  readonly symbol: string;
  readonly totalSupply: string;
  readonly maxSupply: string;
  readonly mintable: boolean;
  readonly burnable: boolean;
  readonly supplyCapped: boolean;
}

export interface RequestView {
  readonly id: number;
  readonly requester: string;
  readonly signers: readonly string[];
  readonly status: string;
  readonly tokenSpec: TokenSpecView;
  readonly submittedAt: string;
  readonly createdTokenAddress: string | null;
  readonly poolId: string | null;
  readonly approvals: readonly string[];
  readonly executedAt: string | null;
}

export interface SignResultView {
  readonly requestId: number;
  readonly signer: string;
  readonly executed: boolean;
  readonly collectedSignatures: readonly string[];
  readonly attestationId: string | null;
  readonly request: RequestView;
}

export interface UnsignResultView {
  readonly requestId: number;
  readonly signer: string;
  readonly collectedSignatures: readonly string[];
  readonly revokedAttestationId: string | null;
}

export interface PoolView {
  readonly id: string;
  readonly key: {
    readonly currency0: string;
    readonly currency1: string;
    readonly fee: number;
    readonly tickSpacing: number;
    readonly hooks: string;
  };
  readonly sqrtPriceX96: string;
  readonly liquidity: string;
  readonly positions: readonly { readonly provider: string; readonly liquidity: string }[];
  readonly vestingTriggered: boolean;
  readonly initializedAt: string;
}

export function toRequestView(request: PendingCreationRequest): RequestView {
  return {
    id: request.id,
    requester: request.requester,
    signers: request.signers,
    status: request.status,
    tokenSpec: {
      ...request.tokenSpec,
      totalSupply: request.tokenSpec.totalSupply.toString(),
      maxSupply: request.tokenSpec.maxSupply.toString(),
    },
    submittedAt: request.submittedAt,
    createdTokenAddress: request.createdTokenAddress ?? null,
    poolId: request.poolId ?? null,
    approvals: request.approvals ?? [],
    executedAt: request.executedAt ?? null,
  };
}


export function toSignResultView(result: SignResult): SignResultView {
  return {
    requestId: result.requestId,
    signer: result.signer,
    executed: result.executed,
    collectedSignatures: result.collectedSignatures,
    attestationId: result.attestationId ?? null,
    request: toRequestView(result.request),
  };
}

export function toUnsignResultView(result: UnsignResult): UnsignResultView {
  return {
    requestId: result.requestId,
    signer: result.signer,
    collectedSignatures: result.collectedSignatures,
    revokedAttestationId: result.revokedAttestationId ?? null,
  };
}

export function toPoolView(pool: PoolState): PoolView {
  return {
    id: pool.id,
    key: pool.key,
    sqrtPriceX96: pool.sqrtPriceX96.toString(),
    liquidity: pool.liquidity.toString(),
    positions: pool.positions.map((p) => ({
      provider: p.provider,
      liquidity: p.liquidity.toString(),
    })),
    vestingTriggered: pool.vestingTriggered,
    initializedAt: pool.initializedAt,
  };
}
