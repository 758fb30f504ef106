/**
 * Authentication types.
 *
 * Two credential strategies, both resolving to a caller identity:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header, identity in `sub`
 *
 * Authorization (owner, creators, beneficiaries) is decided by the
 * vesting core against that identity, not here.
 */

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set on every mutating request.
 *
 * "header" is the unsecured development mode: the identity comes from
 * X-Caller-Id.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly identity: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly identity: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  readonly sub: string;
  readonly iss?: string | undefined;
  readonly exp: number;
  readonly iat: number;
}
