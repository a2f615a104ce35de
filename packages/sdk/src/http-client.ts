/**
 * @allotment/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Identity header injection
 * - Request ID generation
 * - Idempotency keys on POST, stable across retries
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization
 * - Response validation with zod
 */

import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type {
  AllotmentClientConfig,
  AllotmentResponse,
  FetchFn,
  RequestOptions,
} from "./types.js";
import { AllotmentError, ErrorEnvelopeSchema } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

const MAX_BACKOFF_MS = 10_000;

/** Generate a simple request ID */
function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Sleep for the given number of milliseconds */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "etag",
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

/**
 * Normalize an error response body into an AllotmentError.
 */
function toApiError(body: unknown, status: number, fallbackCode: string, fallbackMessage: string): AllotmentError {
  const parsed = ErrorEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    return new AllotmentError(fallbackCode, fallbackMessage, status);
  }
  const { code, message, details } = parsed.data.error;
  return new AllotmentError(code, message, status, details);
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the Allotment API.
 *
 * Provides typed get/post/put methods with automatic retries,
 * timeout handling, and error normalization. Every response body is
 * checked against the caller's schema.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly identity: string;
  private readonly identityHeader: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchFn;

  constructor(config: AllotmentClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.identity = config.identity;
    this.identityHeader = config.identityHeader ?? "X-Identity-Id";
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Perform a GET request.
   */
  async get<T>(path: string, schema: z.ZodType<T>): Promise<AllotmentResponse<T>> {
    return this.request("GET", path, schema);
  }

  /**
   * Perform a POST request with a JSON body. The idempotency key is
   * fixed before the first attempt, so retries cannot apply it twice.
   */
  async post<T>(
    path: string,
    body: unknown,
    schema: z.ZodType<T>,
    options: RequestOptions = {},
  ): Promise<AllotmentResponse<T>> {
    return this.request("POST", path, schema, body, {
      ...options,
      idempotencyKey: options.idempotencyKey ?? randomUUID(),
    });
  }

  /**
   * Perform a PUT request with a JSON body.
   */
  async put<T>(
    path: string,
    body: unknown,
    schema: z.ZodType<T>,
    options: RequestOptions = {},
  ): Promise<AllotmentResponse<T>> {
    return this.request("PUT", path, schema, body, options);
  }

  /**
   * Core request method with retry logic.
   */
  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T>,
    body?: unknown,
    options: RequestOptions = {},
  ): Promise<AllotmentResponse<T>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
      [this.identityHeader]: this.identity,
    };

    if (options.idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = options.idempotencyKey;
    }
    if (options.ifMatch !== undefined) {
      headers["If-Match"] = options.ifMatch;
    }

    const init: RequestInit = {
      method,
      headers,
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        if (error instanceof AllotmentError) {
          throw error;
        }

        // Network errors → retry
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxRetries) {
          await sleep(this.backoff(attempt));
          continue;
        }
        throw new AllotmentError("NETWORK_ERROR", lastError.message, 0);
      }

      const responseBody = await parseResponseBody(response);
      const responseHeaders = extractHeaders(response);

      // 2xx → success
      if (response.ok) {
        const parsed = schema.safeParse(responseBody);
        if (!parsed.success) {
          throw new AllotmentError(
            "INVALID_RESPONSE",
            `Unexpected response body from ${method} ${path}`,
            response.status,
            parsed.error.issues,
          );
        }
        return { data: parsed.data, status: response.status, headers: responseHeaders };
      }

      // 4xx → don't retry (client errors)
      if (response.status < 500) {
        throw toApiError(responseBody, response.status, "CLIENT_ERROR", `HTTP ${response.status}`);
      }

      // 5xx → retry with backoff
      if (attempt < this.maxRetries) {
        await sleep(this.backoff(attempt));
        continue;
      }

      throw toApiError(
        responseBody,
        response.status,
        "SERVER_ERROR",
        `HTTP ${response.status} after ${attempt + 1} attempts`,
      );
    }

    // Unreachable: the last attempt always returns or throws
    throw new AllotmentError("NETWORK_ERROR", lastError?.message ?? "Request failed after all retries", 0);
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), MAX_BACKOFF_MS);
  }

  /**
   * Fetch with a timeout using AbortController.
   */
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
        throw new AllotmentError(
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
