/**
 * @clusterhook/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - API key or bearer token injection
 * - Request ID generation
 * - Timeout handling
 * - Retry with exponential backoff for idempotent requests
 * - Error normalization
 *
 * POST is never retried: creating a receiver or firing a trigger twice
 * is not the same as doing it once.
 */

import type { ClusterhookClientConfig, ClusterhookResponse } from "./types.js";
import { ClusterhookError } from "./types.js";

type Method = "GET" | "POST" | "DELETE";

const IDEMPOTENT: ReadonlySet<Method> = new Set(["GET", "DELETE"]);

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON. Empty bodies (204) parse to undefined.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

interface ErrorFields {
  readonly code: string | undefined;
  readonly message: string | undefined;
  readonly details: unknown;
}

/**
 * Pull { error: { code, message, details } } out of a parsed body.
 */
function readErrorEnvelope(body: unknown): ErrorFields {
  if (typeof body !== "object" || body === null || !("error" in body)) {
    return { code: undefined, message: undefined, details: undefined };
  }
  const error: unknown = body.error;
  if (typeof error !== "object" || error === null) {
    return { code: undefined, message: undefined, details: undefined };
  }
  return {
    code: "code" in error && typeof error.code === "string" ? error.code : undefined,
    message: "message" in error && typeof error.message === "string" ? error.message : undefined,
    details: "details" in error ? error.details : undefined,
  };
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "x-request-id",
    "x-api-version",
    "location",
    "etag",
  ];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

// =============================================================================
// HTTP Client
// =============================================================================

export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly bearerToken: string | undefined;
  private readonly apiVersion: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: ClusterhookClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.bearerToken = config.bearerToken;
    this.apiVersion = config.apiVersion;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryBaseMs = config.retryBaseMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async get<T>(path: string): Promise<ClusterhookResponse<T>> {
    return this.request<T>("GET", path);
  }

  async post<T>(path: string, body?: unknown): Promise<ClusterhookResponse<T>> {
    return this.request<T>("POST", path, body);
  }

  async delete(path: string): Promise<ClusterhookResponse<undefined>> {
    const result = await this.request<unknown>("DELETE", path);
    return { data: undefined, status: result.status, headers: result.headers };
  }

  private async request<T>(
    method: Method,
    path: string,
    body?: unknown,
  ): Promise<ClusterhookResponse<T>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    } else if (this.bearerToken !== undefined) {
      headers["Authorization"] = `Bearer ${this.bearerToken}`;
    }
    if (this.apiVersion !== undefined) {
      headers["X-Api-Version"] = this.apiVersion;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const retries = IDEMPOTENT.has(method) ? this.maxRetries : 0;

    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (error instanceof ClusterhookError) {
          throw error;
        }
        if (attempt < retries) {
          await this.backoff(attempt);
          continue;
        }
        throw new ClusterhookError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : "Network error",
          0,
        );
      }

      const responseBody = await parseResponseBody(response);

      if (response.ok || response.status === 304) {
        return {
          data: responseBody as T,
          status: response.status,
          headers: extractHeaders(response),
        };
      }

      if (response.status >= 500 && attempt < retries) {
        await this.backoff(attempt);
        continue;
      }

      const envelope = readErrorEnvelope(responseBody);
      throw new ClusterhookError(
        envelope.code ?? (response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR"),
        envelope.message ?? `HTTP ${response.status} after ${attempt + 1} attempts`,
        response.status,
        envelope.details,
      );
    }
  }

  private async backoff(attempt: number): Promise<void> {
    await sleep(Math.min(this.retryBaseMs * Math.pow(2, attempt), 10000));
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
        throw new ClusterhookError(
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
