/**
 * Tests for idempotency middleware.
 *
 * Verifies:
 * - POST with Idempotency-Key replays the cached response
 * - Keys are scoped to the caller and the request path
 * - Failed responses are not cached
 * - TTL expiry evicts cached entries
 */

import { describe, it, expect } from "vitest";
import { InMemoryIdempotencyStore } from "../../src/middleware/idempotency.js";
import { createTestApp, jsonRequest, asCaller, SCENARIO, OWNER } from "../setup.js";
import type { ErrorBody } from "../setup.js";

function withKey(caller: string, key: string): Record<string, string> {
  return { ...asCaller(caller), "Idempotency-Key": key };
}

describe("idempotency middleware", () => {
  it("replays a successful POST instead of running it again", async () => {
    const { app, service } = createTestApp();

    const res1 = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, withKey(OWNER, "key-123")),
    );
    expect(res1.status).toBe(201);
    expect(res1.headers.get("X-Idempotent-Replay")).toBeNull();

    const res2 = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, withKey(OWNER, "key-123")),
    );
    expect(res2.status).toBe(201);
    expect(res2.headers.get("X-Idempotent-Replay")).toBe("true");
    expect(await res2.json()).toEqual(await res1.json());

    expect(service.readAllEvents()).toHaveLength(1);
  });

  it("does not replay a key on a different path", async () => {
    const { app, clock } = createTestApp();
    await app.request(jsonRequest("/api/v1/schedules", "POST", SCENARIO, withKey(OWNER, "shared")));
    clock.advanceDays(60);

    const res = await app.request(
      jsonRequest("/api/v1/schedules/alice/release", "POST", undefined, withKey("alice", "shared")),
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
  });

  it("does not replay another caller's response for the same key", async () => {
    const { app, service } = createTestApp();
    const first = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, withKey(OWNER, "key-K")),
    );
    expect(first.status).toBe(201);

    const res = await app.request(
      jsonRequest("/api/v1/schedules", "POST", SCENARIO, withKey("mallory", "key-K")),
    );

    expect(res.status).toBe(403);
    expect(res.headers.get("X-Idempotent-Replay")).toBeNull();
    expect(((await res.json()) as ErrorBody).error.code).toBe("UNAUTHORIZED");
    expect(service.readAllEvents()).toHaveLength(1);
  });

  it("does not cache failures", async () => {
    const { app, clock } = createTestApp();
    await app.request(jsonRequest("/api/v1/schedules", "POST", SCENARIO, asCaller(OWNER)));

    const early = await app.request(
      jsonRequest("/api/v1/schedules/alice/release", "POST", undefined, withKey("alice", "rel-1")),
    );
    expect(early.status).toBe(422);

    clock.advanceDays(30);
    const later = await app.request(
      jsonRequest("/api/v1/schedules/alice/release", "POST", undefined, withKey("alice", "rel-1")),
    );
    expect(later.status).toBe(200);
    expect(await later.json()).toEqual({ data: { beneficiary: "alice", amount: "98" } });
  });

  it("does not cache POST without Idempotency-Key", async () => {
    const { app, idempotencyStore } = createTestApp();
    await app.request(jsonRequest("/api/v1/schedules", "POST", SCENARIO, asCaller(OWNER)));

    expect(idempotencyStore.size).toBe(0);
  });
});

describe("InMemoryIdempotencyStore", () => {
  it("evicts entries older than the TTL", () => {
    let now = 1_000_000;
    const store = new InMemoryIdempotencyStore(5_000, () => now);
    store.set("k", { status: 201, body: "{}", headers: {}, cachedAt: now });

    now += 5_000;
    expect(store.get("k")?.status).toBe(201);

    now += 1;
    expect(store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });
});
