/**
 * @mintgate/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { getAddress, isAddress } from "viem";
import { toIdentity } from "@mintgate/launchpad";
import { isRole } from "./types/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

function address(fallback: string) {
  return z
    .string()
    .default(fallback)
    .refine((v) => isAddress(v, { strict: false }), "Expected a 20-byte hex address")
    .transform((v) => getAddress(v));
}

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Deployment addresses
  ADMIN_ADDRESS: address("0x1000000000000000000000000000000000000001"),
  FACTORY_ADDRESS: address("0x2000000000000000000000000000000000000002"),
  COORDINATOR_ADDRESS: address("0x3000000000000000000000000000000000000003"),
  HOOK_ADDRESS: address("0x4000000000000000000000000000000000000004"),

  // Launch policy
  QUORUM_MODE: z.enum(["all-but-one", "unanimous"]).default("all-but-one"),
  LIQUIDITY_THRESHOLD: z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer string")
    .default("1000000000000000000")
    .transform((v) => BigInt(v))
    .refine((v) => v > 0n, "Threshold must be positive"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:0xaddress1,key2:role2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, address] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    const identity = toIdentity(address);
    if (identity === undefined) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, role, identity });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
