/**
 * Tests for config.ts: parseApiKeys, parseIdentityList and loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseApiKeys, parseIdentityList, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated key:identity entries", () => {
    expect(parseApiKeys("k1:owner, k2:creator ")).toEqual([
      { key: "k1", identity: "owner" },
      { key: "k2", identity: "creator" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or identity", () => {
    expect(() => parseApiKeys(":owner")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow('Identity cannot be empty for API key "k1"');
  });
});

describe("parseIdentityList", () => {
  it("splits and trims, dropping blanks", () => {
    expect(parseIdentityList(" a, b,,c ")).toEqual(["a", "b", "c"]);
    expect(parseIdentityList("")).toEqual([]);
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.JWT_SECRET).toBeUndefined();
    expect(config.JWT_ISSUER).toBe("tranche");
    expect(config.OWNER_ID).toBe("owner");
    expect(config.TOKEN_SYMBOL).toBe("TRN");
    expect(config.TOKEN_DECIMALS).toBe(0);
    expect(config.CUSTODY_INITIAL_BALANCE).toBe(0n);
    expect(config.IDEMPOTENCY_TTL_MS).toBe(86400000);
  });

  it("coerces numbers and parses the custody balance as bigint", () => {
    const config = loadConfig({
      PORT: "8080",
      TOKEN_DECIMALS: "18",
      CUSTODY_INITIAL_BALANCE: "1000000000000000000000",
    });

    expect(config.PORT).toBe(8080);
    expect(config.TOKEN_DECIMALS).toBe(18);
    expect(config.CUSTODY_INITIAL_BALANCE).toBe(1_000_000_000_000_000_000_000n);
  });

  it("throws ZodError for invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
    expect(() => loadConfig({ CUSTODY_INITIAL_BALANCE: "-5" })).toThrow(ZodError);
    expect(() => loadConfig({ TOKEN_DECIMALS: "19" })).toThrow(ZodError);
  });
});
