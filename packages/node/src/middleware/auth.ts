/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 UNAUTHENTICATED.
 */

import { createHmac } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord, JwtClaims } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

export const CALLER_HEADER = "X-Caller-Id";
export const ANONYMOUS_CALLER = "anonymous";

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(
          createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"),
          401,
        );
      }
      auth = { type: "api-key", identity: record.identity };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHENTICATED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHENTICATED", "Invalid or expired JWT"),
            401,
          );
        }
        auth = { type: "jwt", identity: claims.sub };
      }
    }

    if (auth === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", "Authentication required"),
        401,
      );
    }

    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode: the caller is whoever X-Caller-Id names.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const identity = c.req.header(CALLER_HEADER) ?? ANONYMOUS_CALLER;
    c.set("auth", { type: "header", identity });
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

const JwtHeaderSchema = z.object({ alg: z.literal("HS256") });

const JwtPayloadSchema = z.object({
  sub: z.string().min(1),
  iss: z.string().optional(),
  exp: z.number(),
  iat: z.number(),
});

function decodeSegment<T>(segment: string, schema: z.ZodType<T>): T | undefined {
  try {
    const parsed = schema.safeParse(
      JSON.parse(Buffer.from(segment, "base64url").toString("utf-8")),
    );
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Verify a JWT token using HMAC-SHA256. Only HS256 is accepted.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expectedSig = createHmac("sha256", secret)
    .update(`${headerB64}.${payloadB64}`)
    .digest("base64url");
  if (expectedSig !== signatureB64) {
    return undefined;
  }

  if (decodeSegment(headerB64, JwtHeaderSchema) === undefined) {
    return undefined;
  }

  const claims = decodeSegment(payloadB64, JwtPayloadSchema);
  if (claims === undefined) {
    return undefined;
  }
  if (claims.exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.iss !== expectedIssuer) {
    return undefined;
  }

  return claims;
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(
    JSON.stringify({ alg: "HS256", typ: "JWT" }),
  ).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  const signature = createHmac("sha256", secret)
    .update(`${header}.${payload}`)
    .digest("base64url");

  return `${header}.${payload}.${signature}`;
}
