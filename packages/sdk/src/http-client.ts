/**
 * @tranche/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Credential headers (API key, bearer token or caller id)
 * - Request ID generation
 * - Timeout handling
 * - Retry with exponential backoff for 5xx and network errors
 * - Error normalization into TrancheError
 *
 * A POST is retried only when it carries an idempotency key.
 */

import type { TrancheClientConfig } from "./types.js";
import { TrancheError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "x-request-id",
    "x-idempotent-replay",
    "retry-after",
  ];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

interface ErrorFields {
  readonly code?: string | undefined;
  readonly message?: string | undefined;
  readonly details?: unknown;
}

/** Pull `{ error: { code, message, details } }` out of a failed response body. */
function readErrorFields(text: string): ErrorFields {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return {};
  }
  if (typeof body !== "object" || body === null || !("error" in body)) {
    return {};
  }
  const error = body.error;
  if (typeof error !== "object" || error === null) {
    return {};
  }
  const e = error as Record<string, unknown>;
  return {
    code: typeof e["code"] === "string" ? e["code"] : undefined,
    message: typeof e["message"] === "string" ? e["message"] : undefined,
    details: e["details"],
  };
}

// =============================================================================
// HTTP Client
// =============================================================================

export interface HttpResult<T> {
  readonly body: T;
  readonly status: number;
  readonly headers: Record<string, string>;
}

export interface RequestOptions {
  readonly idempotencyKey?: string | undefined;
}

/**
 * Low-level HTTP client for the Tranche API.
 *
 * Returns the parsed JSON body as is; callers unwrap envelopes.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly credentials: Record<string, string>;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: TrancheClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;

    const credentials: Record<string, string> = {};
    if (config.apiKey !== undefined) {
      credentials["X-Api-Key"] = config.apiKey;
    }
    if (config.bearerToken !== undefined) {
      credentials["Authorization"] = `Bearer ${config.bearerToken}`;
    }
    if (config.callerId !== undefined) {
      credentials["X-Caller-Id"] = config.callerId;
    }
    this.credentials = credentials;
  }

  async get<T>(path: string): Promise<HttpResult<T>> {
    return this.request<T>("GET", path, undefined, true);
  }

  async post<T>(path: string, body: unknown, options?: RequestOptions): Promise<HttpResult<T>> {
    const key = options?.idempotencyKey;
    const extra = key !== undefined ? { "Idempotency-Key": key } : undefined;
    return this.request<T>("POST", path, body ?? {}, key !== undefined, extra);
  }

  private async request<T>(
    method: string,
    path: string,
    body: unknown,
    retryable: boolean,
    extraHeaders?: Record<string, string>,
  ): Promise<HttpResult<T>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
      ...this.credentials,
      ...extraHeaders,
    };

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const attempts = retryable ? this.maxRetries + 1 : 1;

    for (let attempt = 0; ; attempt++) {
      const lastAttempt = attempt + 1 >= attempts;

      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (error instanceof TrancheError || lastAttempt) {
          throw error instanceof TrancheError
            ? error
            : new TrancheError(
                "NETWORK_ERROR",
                error instanceof Error ? error.message : "Network error",
                0,
              );
        }
        await this.backoff(attempt);
        continue;
      }

      const text = await response.text();

      if (response.ok) {
        const parsed: T = text.length > 0 ? JSON.parse(text) : {};
        return {
          body: parsed,
          status: response.status,
          headers: extractHeaders(response),
        };
      }

      if (response.status >= 500 && !lastAttempt) {
        await this.backoff(attempt);
        continue;
      }

      const fields = readErrorFields(text);
      const fallbackCode = response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR";
      throw new TrancheError(
        fields.code ?? fallbackCode,
        fields.message ?? `HTTP ${response.status}`,
        response.status,
        fields.details,
      );
    }
  }

  private backoff(attempt: number): Promise<void> {
    return sleep(Math.min(this.retryDelayMs * Math.pow(2, attempt), 10000));
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TrancheError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
