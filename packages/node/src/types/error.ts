/**
 * Error envelope returned by every failing route:
 *
 *   { "error": { "code": "NOT_A_SIGNER", "message": "...", "details": { ... } } }
 *
 * `code` is either one of the HTTP-level codes below or the code of the
 * launchpad, liquidity, attestation or event-log error that failed the
 * request, passed through unchanged.
 */

import type { AttestationErrorCode } from "@mintgate/attestation";
import type { EventStoreErrorCode } from "@mintgate/event-store";
import type { LaunchpadErrorCode } from "@mintgate/launchpad";
import type { LiquidityErrorCode } from "@mintgate/liquidity";

/** Raised by the HTTP layer itself (validation, auth, unknown failures). */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "HTTP_ERROR"
  | "INTERNAL_ERROR";

export type DomainErrorCode =
  | LaunchpadErrorCode
  | LiquidityErrorCode
  | AttestationErrorCode
  | EventStoreErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

/** One failed zod check, with its dotted path into the input. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export interface ErrorDetails {
  readonly issues?: readonly ValidationIssue[];
}

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: ErrorDetails;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: ErrorDetails,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
