/**
 * Tranche Client Tests
 *
 * Verifies request paths, bodies and query strings per namespace,
 * envelope unwrapping and error propagation.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { TrancheClient } from "../src/client.js";
import { TrancheError } from "../src/types.js";
import type { Schedule } from "../src/types.js";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

interface MockRoute {
  method: string;
  path: string;
  status: number;
  body: unknown;
}

interface RecordedCall {
  method: string;
  url: URL;
  body: unknown;
}

function createRoutedMockFetch(routes: MockRoute[]) {
  const calls: RecordedCall[] = [];

  const fetchFn = vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(String(input));
    const method = init?.method ?? "GET";
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ method, url, body });

    const route = routes.find((r) => r.method === method && r.path === url.pathname);
    if (route === undefined) {
      return new Response(
        JSON.stringify({ error: { code: "NOT_FOUND", message: `No route for ${method} ${url.pathname}` } }),
        { status: 404 },
      );
    }

    return new Response(JSON.stringify(route.body), {
      status: route.status,
      headers: { "content-type": "application/json" },
    });
  });

  return { fetchFn, calls };
}

// =============================================================================
// Fixtures
// =============================================================================

const SCHEDULE: Schedule = {
  beneficiary: "alice",
  totalAmount: "1200",
  startTime: 1_700_000_000,
  cliffDuration: 2_592_000,
  vestingDuration: 31_536_000,
  releasedAmount: "0",
  isActive: true,
};

const AUTHORITY = { owner: "owner", creators: ["creator"], tokenAddress: "token-1" };

const EMPTY_PAGE = { data: [], pagination: { cursor: null, hasMore: false } };

function newClient(routes: MockRoute[]) {
  const mock = createRoutedMockFetch(routes);
  const client = new TrancheClient({
    baseUrl: "http://vesting.test",
    callerId: "owner",
    fetchFn: mock.fetchFn,
    retries: 0,
  });
  return { client, calls: mock.calls };
}

// =============================================================================
// Schedules
// =============================================================================

describe("client.schedules", () => {
  it("creates a schedule, sending the amount as a string", async () => {
    const { client, calls } = newClient([
      { method: "POST", path: "/api/v1/schedules", status: 201, body: { data: SCHEDULE } },
    ]);

    const result = await client.schedules.create({
      beneficiary: "alice",
      totalAmount: 1200n,
      cliffDurationDays: 30,
      vestingDurationDays: 365,
    });

    expect(result.status).toBe(201);
    expect(result.data).toEqual(SCHEDULE);
    expect(calls[0]?.body).toEqual({
      beneficiary: "alice",
      totalAmount: "1200",
      cliffDurationDays: 30,
      vestingDurationDays: 365,
    });
  });

  it("gets a schedule", async () => {
    const { client } = newClient([
      { method: "GET", path: "/api/v1/schedules/alice", status: 200, body: { data: SCHEDULE } },
    ]);

    const result = await client.schedules.get("alice");

    expect(result.data.totalAmount).toBe("1200");
  });

  it("encodes the beneficiary into the path", async () => {
    const { client, calls } = newClient([
      { method: "GET", path: "/api/v1/schedules/a%2Fb", status: 200, body: { data: SCHEDULE } },
    ]);

    await client.schedules.get("a/b");

    expect(calls[0]?.url.pathname).toBe("/api/v1/schedules/a%2Fb");
  });

  it("asks for the releasable amount at a given time", async () => {
    const releasable = { beneficiary: "alice", vested: "328", releasable: "328", at: 1_708_640_000 };
    const { client, calls } = newClient([
      {
        method: "GET",
        path: "/api/v1/schedules/alice/releasable",
        status: 200,
        body: { data: releasable },
      },
    ]);

    const result = await client.schedules.releasable("alice", 1_708_640_000);

    expect(result.data).toEqual(releasable);
    expect(calls[0]?.url.search).toBe("?at=1708640000");
  });

  it("omits the time when none is given", async () => {
    const { client, calls } = newClient([
      {
        method: "GET",
        path: "/api/v1/schedules/alice/releasable",
        status: 200,
        body: { data: { beneficiary: "alice", vested: "0", releasable: "0", at: 0 } },
      },
    ]);

    await client.schedules.releasable("alice");

    expect(calls[0]?.url.search).toBe("");
  });

  it("releases and revokes", async () => {
    const { client, calls } = newClient([
      {
        method: "POST",
        path: "/api/v1/schedules/alice/release",
        status: 200,
        body: { data: { beneficiary: "alice", amount: "98" } },
      },
      {
        method: "POST",
        path: "/api/v1/schedules/alice/revoke",
        status: 200,
        body: {
          data: { beneficiary: "alice", settledAmount: "0", forfeitedAmount: "1102", revokedAt: 1 },
        },
      },
    ]);

    const released = await client.schedules.release("alice");
    const revoked = await client.schedules.revoke("alice");

    expect(released.data.amount).toBe("98");
    expect(revoked.data.forfeitedAmount).toBe("1102");
    expect(calls.map((c) => c.body)).toEqual([{}, {}]);
  });

  it("surfaces domain errors as TrancheError", async () => {
    const { client } = newClient([
      {
        method: "POST",
        path: "/api/v1/schedules/alice/release",
        status: 422,
        body: { error: { code: "NOTHING_TO_RELEASE", message: 'Nothing to release for "alice"' } },
      },
    ]);

    const promise = client.schedules.release("alice");

    await expect(promise).rejects.toBeInstanceOf(TrancheError);
    await expect(promise).rejects.toMatchObject({
      code: "NOTHING_TO_RELEASE",
      statusCode: 422,
    });
  });
});

// =============================================================================
// Registry, stats, custody
// =============================================================================

describe("client lists and aggregates", () => {
  it("pages through beneficiaries with a cursor", async () => {
    const { client, calls } = newClient([
      { method: "GET", path: "/api/v1/beneficiaries", status: 200, body: EMPTY_PAGE },
    ]);

    const result = await client.beneficiaries.list({ cursor: "abc", limit: 5 });

    expect(result.data).toEqual(EMPTY_PAGE);
    expect(calls[0]?.url.searchParams.get("cursor")).toBe("abc");
    expect(calls[0]?.url.searchParams.get("limit")).toBe("5");
  });

  it("reads stats and custody", async () => {
    const stats = {
      beneficiaryCount: 1,
      activeCount: 1,
      totalVesting: "1200",
      totalReleased: "0",
      totalForfeited: "0",
    };
    const custody = { currency: "TRN", decimals: 0, balance: "10000", balanced: true };
    const { client } = newClient([
      { method: "GET", path: "/api/v1/stats", status: 200, body: { data: stats } },
      { method: "GET", path: "/api/v1/custody", status: 200, body: { data: custody } },
    ]);

    expect((await client.stats()).data).toEqual(stats);
    expect((await client.custody()).data).toEqual(custody);
  });
});

// =============================================================================
// Authority
// =============================================================================

describe("client.authority", () => {
  let client: TrancheClient;
  let calls: RecordedCall[];

  beforeEach(() => {
    ({ client, calls } = newClient([
      { method: "GET", path: "/api/v1/authority", status: 200, body: { data: AUTHORITY } },
      { method: "POST", path: "/api/v1/authority/ownership", status: 200, body: { data: AUTHORITY } },
      { method: "POST", path: "/api/v1/authority/token", status: 200, body: { data: AUTHORITY } },
      {
        method: "POST",
        path: "/api/v1/authority/creators",
        status: 201,
        body: { data: { identity: "dave", granted: true } },
      },
      {
        method: "POST",
        path: "/api/v1/authority/creators/dave/revoke",
        status: 200,
        body: { data: { identity: "dave", revoked: true } },
      },
    ]));
  });

  it("reads the authority", async () => {
    expect((await client.authority.get()).data).toEqual(AUTHORITY);
  });

  it("sends each change to its route", async () => {
    await client.authority.transferOwnership("treasury");
    await client.authority.updateTokenAddress("token-2");
    const grant = await client.authority.grantCreator("dave");
    const revoke = await client.authority.revokeCreator("dave");

    expect(grant.status).toBe(201);
    expect(grant.data.granted).toBe(true);
    expect(revoke.data.revoked).toBe(true);
    expect(calls.map((c) => [c.url.pathname, c.body])).toEqual([
      ["/api/v1/authority/ownership", { newOwner: "treasury" }],
      ["/api/v1/authority/token", { tokenAddress: "token-2" }],
      ["/api/v1/authority/creators", { identity: "dave" }],
      ["/api/v1/authority/creators/dave/revoke", {}],
    ]);
  });
});

// =============================================================================
// Events
// =============================================================================

describe("client.events", () => {
  it("lists events after a position", async () => {
    const { client, calls } = newClient([
      { method: "GET", path: "/api/v1/events", status: 200, body: EMPTY_PAGE },
    ]);

    await client.events.list({ afterPosition: 3, limit: 10 });

    expect(calls[0]?.url.searchParams.get("afterPosition")).toBe("3");
    expect(calls[0]?.url.searchParams.get("limit")).toBe("10");
    expect(calls[0]?.url.searchParams.has("cursor")).toBe(false);
  });

  it("reads one stream, encoding its id", async () => {
    const { client, calls } = newClient([
      { method: "GET", path: "/api/v1/events/schedule%3Aalice", status: 200, body: EMPTY_PAGE },
    ]);

    const result = await client.events.stream("schedule:alice", { afterVersion: 1 });

    expect(result.data.pagination.hasMore).toBe(false);
    expect(calls[0]?.url.pathname).toBe("/api/v1/events/schedule%3Aalice");
    expect(calls[0]?.url.searchParams.get("afterVersion")).toBe("1");
  });

  it("reads a beneficiary's schedule history filtered by type", async () => {
    const { client, calls } = newClient([
      { method: "GET", path: "/api/v1/events/schedules/alice", status: 200, body: EMPTY_PAGE },
    ]);

    await client.events.schedule("alice", { type: "vesting.tokens.released" });

    expect(calls[0]?.url.search).toBe("?type=vesting.tokens.released");
  });
});
