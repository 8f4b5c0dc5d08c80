/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Launchpad errors map by category; liquidity, attestation and event
 * store errors map by code.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { LaunchpadError } from "@mintgate/launchpad";
import type { LaunchpadErrorCategory } from "@mintgate/launchpad";
import { LiquidityError } from "@mintgate/liquidity";
import type { LiquidityErrorCode } from "@mintgate/liquidity";
import { AttestationError } from "@mintgate/attestation";
import type { AttestationErrorCode } from "@mintgate/attestation";
import { EventStoreError } from "@mintgate/event-store";
import type { EventStoreErrorCode } from "@mintgate/event-store";
import type { ApiErrorCode } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 502;

const CATEGORY_STATUS: Record<LaunchpadErrorCategory, ErrorStatus> = {
  validation: 400,
  authorization: 403,
  state_conflict: 409,
  integration: 502,
};

const LIQUIDITY_STATUS: Record<LiquidityErrorCode, ErrorStatus> = {
  POOL_NOT_INITIALIZED: 404,
  POOL_ALREADY_INITIALIZED: 409,
  IDENTICAL_CURRENCIES: 400,
  INVALID_POOL_PARAMETERS: 400,
  INVALID_LIQUIDITY_AMOUNT: 400,
  INSUFFICIENT_LIQUIDITY: 409,
  VESTING_ALREADY_STARTED: 409,
};

const ATTESTATION_STATUS: Record<AttestationErrorCode, ErrorStatus> = {
  ATTESTATION_NOT_FOUND: 404,
  ALREADY_REVOKED: 409,
};

const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ErrorStatus> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

function launchpadStatus(err: LaunchpadError): ErrorStatus {
  if (err.code === "NOT_FOUND") {
    return 404;
  }
  return CATEGORY_STATUS[err.category];
}

function httpErrorCode(status: number): ApiErrorCode {
  switch (status) {
    case 400:
      return "VALIDATION_ERROR";
    case 401:
      return "UNAUTHORIZED";
    case 403:
      return "FORBIDDEN";
    case 404:
      return "NOT_FOUND";
    default:
      return "HTTP_ERROR";
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return c.json(
      createErrorEnvelope(httpErrorCode(err.status), err.message),
      err.status,
    );
  }
  if (err instanceof LaunchpadError) {
    return c.json(createErrorEnvelope(err.code, err.message), launchpadStatus(err));
  }
  if (err instanceof LiquidityError) {
    return c.json(createErrorEnvelope(err.code, err.message), LIQUIDITY_STATUS[err.code]);
  }
  if (err instanceof AttestationError) {
    return c.json(createErrorEnvelope(err.code, err.message), ATTESTATION_STATUS[err.code]);
  }
  if (err instanceof EventStoreError) {
    return c.json(createErrorEnvelope(err.code, err.message), EVENT_STORE_STATUS[err.code]);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
