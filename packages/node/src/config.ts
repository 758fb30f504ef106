/**
 * @tranche/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const digits = z.string().regex(/^\d+$/, "Expected a non-negative integer");

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
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("tranche"),

  // Authority
  OWNER_ID: z.string().min(1).default("owner"),
  AUTHORIZED_CREATORS: z.string().default(""),

  // Token
  TOKEN_ADDRESS: z.string().min(1).default("token"),
  TOKEN_SYMBOL: z.string().min(1).default("TRN"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(0),
  CUSTODY_INITIAL_BALANCE: digits.default("0").transform((v) => BigInt(v)),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly identity: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:identity1,key2:identity2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, identity, ...rest] = entry.trim().split(":");
    if (key === undefined || identity === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:identity`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (identity === "") {
      throw new Error(`Identity cannot be empty for API key "${key}"`);
    }

    keys.push({ key, identity });
  }

  return keys;
}

/**
 * Split a comma-separated identity list, dropping blanks.
 */
export function parseIdentityList(raw: string): readonly string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
