/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { getAddress } from "viem";
import { parseApiKeys, loadConfig } from "../src/config.js";
import { A, B } from "./setup.js";

const MIXED = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys(`abc123:admin:${A}`)).toEqual([
      { key: "abc123", role: "admin", identity: A },
    ]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys(`k1:operator:${A},k2:viewer:${B}`);
    expect(keys).toEqual([
      { key: "k1", role: "operator", identity: A },
      { key: "k2", role: "viewer", identity: B },
    ]);
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys(`  k1:admin:${A} , k2:viewer:${B}  `);
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("checksums the identity", () => {
    const [record] = parseApiKeys(`k1:operator:${MIXED}`);
    expect(record?.identity).toBe(getAddress(MIXED));
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(`:admin:${A}`)).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys(`k1:superuser:${A}`)).toThrow("Invalid role");
  });

  it("throws on an address that does not parse", () => {
    expect(() => parseApiKeys("k1:admin:0x1234")).toThrow('Invalid address "0x1234"');
    expect(() => parseApiKeys("k1:admin:")).toThrow("Invalid address");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.API_KEYS).toBe("");
    expect(config.ADMIN_ADDRESS).toBe("0x1000000000000000000000000000000000000001");
    expect(config.HOOK_ADDRESS).toBe("0x4000000000000000000000000000000000000004");
    expect(config.QUORUM_MODE).toBe("all-but-one");
    expect(config.LIQUIDITY_THRESHOLD).toBe(1_000_000_000_000_000_000n);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      ADMIN_ADDRESS: MIXED,
      QUORUM_MODE: "unanimous",
      LIQUIDITY_THRESHOLD: "5000",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.ADMIN_ADDRESS).toBe(getAddress(MIXED));
    expect(config.QUORUM_MODE).toBe("unanimous");
    expect(config.LIQUIDITY_THRESHOLD).toBe(5000n);
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("throws on a malformed address", () => {
    expect(() => loadConfig({ FACTORY_ADDRESS: "0xnope" })).toThrow();
  });

  it("throws on a zero or non-integer threshold", () => {
    expect(() => loadConfig({ LIQUIDITY_THRESHOLD: "0" })).toThrow();
    expect(() => loadConfig({ LIQUIDITY_THRESHOLD: "1e18" })).toThrow();
  });

  it("throws on an unknown quorum mode", () => {
    expect(() => loadConfig({ QUORUM_MODE: "majority" })).toThrow();
  });
});
