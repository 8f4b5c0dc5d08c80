/**
 * Authentication middleware.
 *
 * Resolves the caller to an identity and a role:
 * 1. Secured mode: X-Api-Key header → looked up in the configured key registry
 * 2. Unsecured mode: X-Caller-Identity header → trusted as-is, admin role
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { toIdentity } from "@mintgate/launchpad";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_IDENTITY_HEADER = "X-Caller-Identity";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create API key authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", identity: record.identity, role: record.role });
    return next();
  };
}

/**
 * Development and test mode: the caller names itself.
 *
 * Anonymous requests pass through without an auth context and may only
 * read.
 */
export function callerIdentityMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(CALLER_IDENTITY_HEADER);
    if (header !== undefined) {
      const identity = toIdentity(header);
      if (identity === undefined) {
        return c.json(
          createErrorEnvelope(
            "VALIDATION_ERROR",
            `${CALLER_IDENTITY_HEADER} is not a valid address`,
          ),
          400,
        );
      }
      c.set("auth", { type: "header", identity, role: "admin" });
    }
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER the auth middleware. Returns 401 without a caller and
 * 403 if the caller's role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Caller identity required"),
        401,
      );
    }
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * The authenticated caller, for handlers behind `requirePermission`.
 */
export function requireCaller(c: Context<AppEnv>): AuthContext {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new HTTPException(401, { message: "Caller identity required" });
  }
  return auth;
}
