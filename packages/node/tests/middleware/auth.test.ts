/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired)
 * - Public reads and the unsecured caller header
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import { authMiddleware, signJwt, verifyJwt } from "../../src/middleware/auth.js";
import { createTestApp, jsonRequest, SCENARIO, OWNER } from "../setup.js";
import type { ErrorBody } from "../setup.js";

const JWT_SECRET = "test-secret";
const ISSUER = "tranche";

function keyMap(records: ApiKeyRecord[]): Map<string, ApiKeyRecord> {
  return new Map(records.map((r) => [r.key, r]));
}

function makeApp(apiKeys: ApiKeyRecord[] = []) {
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({ apiKeys: keyMap(apiKeys), jwtSecret: JWT_SECRET, jwtIssuer: ISSUER }),
  );
  app.get("/test", (c) => c.json({ auth: c.get("auth") }));
  return app;
}

function token(sub: string, expOffset = 3600, iss = ISSUER): string {
  return signJwt({ sub, iss, exp: Math.floor(Date.now() / 1000) + expOffset }, JWT_SECRET);
}

describe("API Key auth", () => {
  it("resolves a valid API key to its identity", async () => {
    const app = makeApp([{ key: "key-1", identity: "alice" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ type: "api-key", identity: "alice" });
  });

  it("returns 401 UNAUTHENTICATED for an invalid API key", async () => {
    const app = makeApp([{ key: "key-1", identity: "alice" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "invalid-key" } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHENTICATED", message: "Invalid API key" });
  });

  it("returns 401 when no credentials are provided", async () => {
    const res = await makeApp().request("/test");
    expect(res.status).toBe(401);
  });
});

describe("JWT Bearer auth", () => {
  it("uses the subject as the identity", async () => {
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token("bob")}` },
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ type: "jwt", identity: "bob" });
  });

  it("returns 401 for an expired JWT", async () => {
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token("bob", -100)}` },
    });
    expect(res.status).toBe(401);
  });

  it("returns 401 for a tampered JWT", async () => {
    const tampered = token("bob").slice(0, -5) + "XXXXX";
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${tampered}` },
    });
    expect(res.status).toBe(401);
  });
});

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const claims = verifyJwt(token("bob"), JWT_SECRET, ISSUER);
    expect(claims?.sub).toBe("bob");
    expect(claims?.iss).toBe(ISSUER);
  });

  it("returns undefined for a malformed token", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c.d", JWT_SECRET)).toBeUndefined();
  });

  it("returns undefined for the wrong issuer", () => {
    expect(verifyJwt(token("bob", 3600, "someone-else"), JWT_SECRET, ISSUER)).toBeUndefined();
  });

  it("returns undefined for the wrong secret", () => {
    expect(verifyJwt(token("bob"), "other-secret")).toBeUndefined();
  });

  it("rejects a token without a subject", () => {
    const noSub = signJwt({ sub: "", exp: Math.floor(Date.now() / 1000) + 60 }, JWT_SECRET);
    expect(verifyJwt(noSub, JWT_SECRET)).toBeUndefined();
  });
});

describe("app with auth configured", () => {
  function securedApp() {
    return createTestApp({
      auth: {
        apiKeys: keyMap([{ key: "test-owner-key", identity: OWNER }]),
        jwtSecret: JWT_SECRET,
        jwtIssuer: ISSUER,
      },
    });
  }

  it("serves reads without credentials", async () => {
    const { app } = securedApp();
    const res = await app.request("/api/v1/stats");
    expect(res.status).toBe(200);
  });

  it("requires credentials for mutations and ignores X-Caller-Id", async () => {
    const { app } = securedApp();
    const res = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, { "X-Caller-Id": OWNER }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNAUTHENTICATED");
  });

  it("acts as the API key's identity", async () => {
    const { app } = securedApp();
    const res = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, { "X-Api-Key": "test-owner-key" }),
    );
    expect(res.status).toBe(201);
  });

  it("acts as the JWT subject", async () => {
    const { app } = securedApp();

    const asOwner = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, { Authorization: `Bearer ${token(OWNER)}` }),
    );
    expect(asOwner.status).toBe(201);

    const asStranger = await app.request(
      jsonRequest("/api/v1/schedules", "POST", { ...SCENARIO, beneficiary: "bob" }, {
        Authorization: `Bearer ${token("stranger")}`,
      }),
    );
    expect(asStranger.status).toBe(403);
  });
});

describe("app without auth configured", () => {
  it("treats a missing caller header as anonymous", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/schedules", "POST", SCENARIO));

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe('"anonymous" is not allowed to create schedules');
  });
});
