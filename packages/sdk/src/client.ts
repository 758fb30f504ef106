/**
 * @tranche/sdk — Tranche Client.
 *
 * Namespace grouping over HttpClient: client.schedules, client.beneficiaries,
 * client.authority, client.events, plus stats() and custody().
 * Lists page through opaque cursor strings.
 */

import type {
  Authority,
  CreateScheduleParams,
  CreatorGrant,
  CreatorRevocation,
  Custody,
  ListEventsParams,
  ListStreamEventsParams,
  MutationOptions,
  PageParams,
  PaginatedList,
  RegistryEntry,
  Releasable,
  ReleaseResult,
  Revocation,
  Schedule,
  Stats,
  StoredEvent,
  TrancheClientConfig,
  TrancheResponse,
} from "./types.js";
import { HttpClient } from "./http-client.js";
import type { HttpResult } from "./http-client.js";

// =============================================================================
// Helpers
// =============================================================================

function unwrap<T>(result: HttpResult<{ data: T }>): TrancheResponse<T> {
  return { data: result.body.data, status: result.status, headers: result.headers };
}

function page<T>(result: HttpResult<PaginatedList<T>>): TrancheResponse<PaginatedList<T>> {
  return { data: result.body, status: result.status, headers: result.headers };
}

function withQuery(path: string, params: Record<string, string | number | undefined>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) query.set(key, String(value));
  }
  const qs = query.toString();
  return qs.length > 0 ? `${path}?${qs}` : path;
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

// =============================================================================
// Namespace Classes
// =============================================================================

export class SchedulesNamespace {
  constructor(private readonly http: HttpClient) {}

  async create(
    params: CreateScheduleParams,
    options?: MutationOptions,
  ): Promise<TrancheResponse<Schedule>> {
    const body = { ...params, totalAmount: params.totalAmount.toString() };
    return unwrap(await this.http.post<{ data: Schedule }>("/api/v1/schedules", body, options));
  }

  async get(beneficiary: string): Promise<TrancheResponse<Schedule>> {
    return unwrap(
      await this.http.get<{ data: Schedule }>(`/api/v1/schedules/${segment(beneficiary)}`),
    );
  }

  /**
   * Vested and releasable amounts, now or at `at` (Unix seconds).
   */
  async releasable(beneficiary: string, at?: number): Promise<TrancheResponse<Releasable>> {
    const path = withQuery(`/api/v1/schedules/${segment(beneficiary)}/releasable`, { at });
    return unwrap(await this.http.get<{ data: Releasable }>(path));
  }

  async release(
    beneficiary: string,
    options?: MutationOptions,
  ): Promise<TrancheResponse<ReleaseResult>> {
    return unwrap(
      await this.http.post<{ data: ReleaseResult }>(
        `/api/v1/schedules/${segment(beneficiary)}/release`,
        {},
        options,
      ),
    );
  }

  async revoke(
    beneficiary: string,
    options?: MutationOptions,
  ): Promise<TrancheResponse<Revocation>> {
    return unwrap(
      await this.http.post<{ data: Revocation }>(
        `/api/v1/schedules/${segment(beneficiary)}/revoke`,
        {},
        options,
      ),
    );
  }
}

export class BeneficiariesNamespace {
  constructor(private readonly http: HttpClient) {}

  /** Registry in creation order; a re-created schedule appears again. */
  async list(params?: PageParams): Promise<TrancheResponse<PaginatedList<RegistryEntry>>> {
    const path = withQuery("/api/v1/beneficiaries", {
      cursor: params?.cursor,
      limit: params?.limit,
    });
    return page(await this.http.get<PaginatedList<RegistryEntry>>(path));
  }
}

export class AuthorityNamespace {
  constructor(private readonly http: HttpClient) {}

  async get(): Promise<TrancheResponse<Authority>> {
    return unwrap(await this.http.get<{ data: Authority }>("/api/v1/authority"));
  }

  async transferOwnership(
    newOwner: string,
    options?: MutationOptions,
  ): Promise<TrancheResponse<Authority>> {
    return unwrap(
      await this.http.post<{ data: Authority }>("/api/v1/authority/ownership", { newOwner }, options),
    );
  }

  async updateTokenAddress(
    tokenAddress: string,
    options?: MutationOptions,
  ): Promise<TrancheResponse<Authority>> {
    return unwrap(
      await this.http.post<{ data: Authority }>("/api/v1/authority/token", { tokenAddress }, options),
    );
  }

  async grantCreator(
    identity: string,
    options?: MutationOptions,
  ): Promise<TrancheResponse<CreatorGrant>> {
    return unwrap(
      await this.http.post<{ data: CreatorGrant }>("/api/v1/authority/creators", { identity }, options),
    );
  }

  async revokeCreator(
    identity: string,
    options?: MutationOptions,
  ): Promise<TrancheResponse<CreatorRevocation>> {
    return unwrap(
      await this.http.post<{ data: CreatorRevocation }>(
        `/api/v1/authority/creators/${segment(identity)}/revoke`,
        {},
        options,
      ),
    );
  }
}

export class EventsNamespace {
  constructor(private readonly http: HttpClient) {}

  async list(params?: ListEventsParams): Promise<TrancheResponse<PaginatedList<StoredEvent>>> {
    const path = withQuery("/api/v1/events", {
      cursor: params?.cursor,
      limit: params?.limit,
      afterPosition: params?.afterPosition,
      type: params?.type,
    });
    return page(await this.http.get<PaginatedList<StoredEvent>>(path));
  }

  /**
   * Events of one stream: `schedule:<beneficiary>` or `authority`.
   */
  async stream(
    streamId: string,
    params?: ListStreamEventsParams,
  ): Promise<TrancheResponse<PaginatedList<StoredEvent>>> {
    const path = withQuery(`/api/v1/events/${segment(streamId)}`, {
      cursor: params?.cursor,
      limit: params?.limit,
      afterVersion: params?.afterVersion,
      type: params?.type,
    });
    return page(await this.http.get<PaginatedList<StoredEvent>>(path));
  }

  /** Every schedule event ever recorded for `beneficiary`. 404 if it never had one. */
  async schedule(
    beneficiary: string,
    params?: ListStreamEventsParams,
  ): Promise<TrancheResponse<PaginatedList<StoredEvent>>> {
    const path = withQuery(`/api/v1/events/schedules/${segment(beneficiary)}`, {
      cursor: params?.cursor,
      limit: params?.limit,
      afterVersion: params?.afterVersion,
      type: params?.type,
    });
    return page(await this.http.get<PaginatedList<StoredEvent>>(path));
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const client = new TrancheClient({
 *   baseUrl: "http://localhost:3000",
 *   apiKey: "test-key",
 * });
 *
 * await client.schedules.create({
 *   beneficiary: "alice",
 *   totalAmount: 1200n,
 *   cliffDurationDays: 30,
 *   vestingDurationDays: 365,
 * });
 * const { data } = await client.schedules.releasable("alice");
 * ```
 */
export class TrancheClient {
  readonly schedules: SchedulesNamespace;
  readonly beneficiaries: BeneficiariesNamespace;
  readonly authority: AuthorityNamespace;
  readonly events: EventsNamespace;

  private readonly http: HttpClient;

  constructor(config: TrancheClientConfig) {
    this.http = new HttpClient(config);
    this.schedules = new SchedulesNamespace(this.http);
    this.beneficiaries = new BeneficiariesNamespace(this.http);
    this.authority = new AuthorityNamespace(this.http);
    this.events = new EventsNamespace(this.http);
  }

  async stats(): Promise<TrancheResponse<Stats>> {
    return unwrap(await this.http.get<{ data: Stats }>("/api/v1/stats"));
  }

  async custody(): Promise<TrancheResponse<Custody>> {
    return unwrap(await this.http.get<{ data: Custody }>("/api/v1/custody"));
  }
}
