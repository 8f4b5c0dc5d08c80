/**
 * Launchpad errors.
 *
 * Every failure carries a stable `code` and one of four categories.
 * The HTTP layer maps categories (and a few codes) to status codes.
 */

// =============================================================================
// Codes
// =============================================================================

export type ValidationErrorCode =
  | "INVALID_SIGNER_COUNT"
  | "INVALID_IDENTITY"
  | "DUPLICATE_SIGNER"
  | "EMPTY_NAME"
  | "EMPTY_SYMBOL"
  | "INVALID_SUPPLY";

export type AuthorizationErrorCode = "NOT_A_SIGNER" | "UNAUTHORIZED";

export type StateConflictErrorCode =
  | "ALREADY_SIGNED"
  | "NOT_SIGNED"
  | "TRANSACTION_ALREADY_EXECUTED"
  | "NOT_FOUND"
  | "REQUEST_LOCKED"
  | "COORDINATOR_NOT_SET"
  | "LIQUIDITY_BOOTSTRAP_NOT_SET";

export type IntegrationFailureCode =
  | "DEPLOYMENT_FAILED"
  | "POOL_ALREADY_INITIALIZED"
  | "POOL_NOT_INITIALIZED"
  | "POOL_INITIALIZATION_FAILED";

export type LaunchpadErrorCode =
  | ValidationErrorCode
  | AuthorizationErrorCode
  | StateConflictErrorCode
  | IntegrationFailureCode;

export type LaunchpadErrorCategory =
  | "validation"
  | "authorization"
  | "state_conflict"
  | "integration";

// =============================================================================
// Classes
// =============================================================================

export class LaunchpadError extends Error {
  public readonly code: LaunchpadErrorCode;
  public readonly category: LaunchpadErrorCategory;

  constructor(
    code: LaunchpadErrorCode,
    category: LaunchpadErrorCategory,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "LaunchpadError";
    this.code = code;
    this.category = category;
  }
}

export class ValidationError extends LaunchpadError {
  declare readonly code: ValidationErrorCode;
  constructor(code: ValidationErrorCode, message: string) {
    super(code, "validation", message);
    this.name = "ValidationError";
  }
}

export class AuthorizationError extends LaunchpadError {
  declare readonly code: AuthorizationErrorCode;
  constructor(code: AuthorizationErrorCode, message: string) {
    super(code, "authorization", message);
    this.name = "AuthorizationError";
  }
}

export class StateConflictError extends LaunchpadError {
  declare readonly code: StateConflictErrorCode;
  constructor(code: StateConflictErrorCode, message: string) {
    super(code, "state_conflict", message);
    this.name = "StateConflictError";
  }
}

/**
 * A downstream collaborator (deployer, liquidity bootstrap) failed.
 * The original error is kept as `cause`.
 */
export class IntegrationFailure extends LaunchpadError {
  declare readonly code: IntegrationFailureCode;
  constructor(code: IntegrationFailureCode, message: string, cause: unknown) {
    super(code, "integration", message, { cause });
    this.name = "IntegrationFailure";
  }
}
