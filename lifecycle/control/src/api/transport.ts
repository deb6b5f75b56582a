// api/transport.ts - HTTP transport: auth header, timeout, retry, status mapping

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  TIMING,
  ApiError,
  NotFoundError,
  SchemaError,
  TransportError,
  calculateBackoff,
  formatDuration,
} from "@riftctl/contracts";
import { withRetry } from "./retry";
import { systemClock, type Clock } from "../lib/clock";

// =============================================================================
// Types
// =============================================================================

export type HttpMethod = "GET" | "POST" | "DELETE";

export interface TransportRequest {
  method: HttpMethod;
  /** Relative to the base URL, without a leading slash */
  path: string;
  body?: unknown;
  /** Short operation name used in logs and schema errors */
  operation: string;
}

export type ResponseParser<T> = (body: unknown) => T;

export interface HttpTransportOptions {
  /** Must end with "/" */
  baseUrl: string;
  token: string;
  retries: number;
  requestTimeoutMs?: number;
  retryBaseDelayMs?: number;
  clock?: Clock;
  _fetchImpl?: typeof fetch;
}

// =============================================================================
// Parsing
// =============================================================================

const MAX_REPORTED_SCHEMA_ERRORS = 3;

/** Validate a decoded body against a TypeBox schema, or raise SchemaError. */
export function parseWith<T extends TSchema>(schema: T, operation: string): ResponseParser<Static<T>> {
  return (body) => {
    if (Value.Check(schema, body)) return body;
    const problems = [...Value.Errors(schema, body)]
      .slice(0, MAX_REPORTED_SCHEMA_ERRORS)
      .map((e) => `${e.path || "/"}: ${e.message}`);
    throw new SchemaError(operation, `unexpected response body (${problems.join("; ")})`, {
      details: { problems },
    });
  };
}

/** For endpoints whose success body carries nothing the caller needs */
export const ignoreBody: ResponseParser<void> = () => undefined;

// =============================================================================
// Transport
// =============================================================================

export class HttpTransport {
  readonly baseUrl: string;
  private readonly token: string;
  private readonly retries: number;
  private readonly requestTimeoutMs: number;
  private readonly retryBaseDelayMs: number;
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl;
    this.token = options.token;
    this.retries = options.retries;
    this.requestTimeoutMs = options.requestTimeoutMs ?? TIMING.REQUEST_TIMEOUT_MS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? TIMING.RETRY_BASE_DELAY_MS;
    this.clock = options.clock ?? systemClock;
    this.fetchImpl = options._fetchImpl ?? globalThis.fetch;
  }

  /**
   * Send one logical request. Only network-level failures (fetch rejecting,
   * including the per-request timeout) are retried; any HTTP status is final.
   */
  async execute<T>(request: TransportRequest, parse: ResponseParser<T>): Promise<T> {
    const url = this.baseUrl + request.path;
    const headers: Record<string, string> = {
      "X-API-KEY": this.token,
      "Accept": "application/json",
    };
    if (request.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    const payload = request.body !== undefined ? JSON.stringify(request.body) : undefined;

    const response = await withRetry(
      () =>
        this.fetchImpl(url, {
          method: request.method,
          headers,
          body: payload,
          signal: AbortSignal.timeout(this.requestTimeoutMs),
        }),
      {
        retries: this.retries,
        backoff: (attempt) => calculateBackoff(attempt, this.retryBaseDelayMs),
        sleep: (ms) => this.clock.sleep(ms),
        onRetry: (err, attempt, delayMs) => {
          console.warn(
            `[transport] ${request.operation} attempt ${attempt + 1} failed (${describeFailure(err)}), retrying in ${formatDuration(delayMs)}`,
          );
        },
        onExhausted: (err, retries) => new TransportError(url, retries, { cause: err }),
      },
    );

    const text = await this.readBody(response, url);

    if (response.status === 404) {
      throw new NotFoundError("resource", url);
    }
    if (!response.ok) {
      const unauthorized = response.status === 401 || response.status === 403;
      throw new ApiError(url, response.status, text, unauthorized ? { code: "UNAUTHORIZED" } : undefined);
    }

    return parse(this.decode(text, request.operation));
  }

  private async readBody(response: Response, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      throw new TransportError(url, 0, { cause: err });
    }
  }

  private decode(text: string, operation: string): unknown {
    if (text.trim() === "") return null;
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new SchemaError(operation, `response is not valid JSON: ${describeFailure(err)}`, { cause: err });
    }
  }
}

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
