import type { RequestParameters } from "@octokit/types";

import { RateLimitExceededError, RequestFailedError } from "./errors";

export type Protocol = "rest" | "graphql" | "scrape";

export interface RequestSpec {
  protocol: Protocol;
  /** REST/scrape route ("GET /repos/{owner}/{repo}") or a GraphQL document. */
  endpoint: string;
  params?: RequestParameters;
}

export type ResponseHeaders = Record<string, string | number | undefined>;

export type ErrorClass = "transient" | "rate-limit" | "not-found" | "other";

export type RequestResult<T> =
  | { ok: true; status: number; body: T }
  | { ok: false; status: number | null; errorClass: "transient" | "not-found" };

export interface RequestClient {
  request<T>(spec: RequestSpec): Promise<RequestResult<T>>;
}

export interface TransportResponse<T> {
  status: number;
  body: T;
}

export interface Transport {
  send<T>(spec: RequestSpec, signal: AbortSignal): Promise<TransportResponse<T>>;
}

/**
 * Transport-neutral description of a failed call. Transports translate their
 * own error types into this so classification does not depend on them.
 */
export class TransportFailure extends Error {
  readonly status: number | null;
  readonly headers: ResponseHeaders;
  readonly graphqlErrorTypes: string[];

  constructor(
    message: string,
    details: {
      status?: number | null;
      headers?: ResponseHeaders;
      graphqlErrorTypes?: string[];
    } = {}
  ) {
    super(message);
    this.name = "TransportFailure";
    this.status = details.status ?? null;
    this.headers = details.headers ?? {};
    this.graphqlErrorTypes = details.graphqlErrorTypes ?? [];
  }
}

export interface ClassifiedFailure {
  errorClass: ErrorClass;
  status: number | null;
  message: string;
  resetAt: Date | null;
}

export const RETRY_DELAYS_MS: readonly number[] = [1_000, 2_000, 4_000];
export const DEFAULT_TIMEOUT_MS = 30_000;

const NOT_FOUND_STATUSES = new Set([403, 404, 410, 422, 451]);
const NOT_FOUND_GRAPHQL_TYPES = new Set(["NOT_FOUND", "FORBIDDEN"]);

function headerValue(headers: ResponseHeaders, name: string): string | null {
  const value = headers[name];
  if (typeof value === "number") {
    return String(value);
  }
  return typeof value === "string" ? value : null;
}

function headerInteger(headers: ResponseHeaders, name: string): number | null {
  const raw = headerValue(headers, name);
  if (!raw) {
    return null;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

export function parseRemainingHeader(headers: ResponseHeaders): number | null {
  return headerInteger(headers, "x-ratelimit-remaining");
}

export function parseResetHeader(headers: ResponseHeaders): Date | null {
  const seconds = headerInteger(headers, "x-ratelimit-reset");
  return seconds === null ? null : new Date(seconds * 1000);
}

export function classifyFailure(error: unknown): ClassifiedFailure {
  if (!(error instanceof TransportFailure)) {
    const message = error instanceof Error ? error.message : String(error);
    const timedOut = error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
    return { errorClass: timedOut ? "transient" : "other", status: null, message, resetAt: null };
  }

  const { status, headers, graphqlErrorTypes, message } = error;
  const resetAt = parseResetHeader(headers);
  const base = { status, message, resetAt };

  if (graphqlErrorTypes.includes("RATE_LIMITED")) {
    return { ...base, errorClass: "rate-limit" };
  }

  if (status === 403 || status === 429) {
    if (/secondary rate limit|abuse detection/i.test(message)) {
      return { ...base, errorClass: "transient" };
    }
    if (headerValue(headers, "x-ratelimit-remaining") === "0" || /rate limit/i.test(message)) {
      return { ...base, errorClass: "rate-limit" };
    }
    return { ...base, errorClass: status === 429 ? "transient" : "not-found" };
  }

  if (graphqlErrorTypes.length > 0) {
    const allNotFound = graphqlErrorTypes.every((type) => NOT_FOUND_GRAPHQL_TYPES.has(type));
    return { ...base, errorClass: allNotFound ? "not-found" : "other" };
  }

  if (status === null || status === 408 || status >= 500) {
    return { ...base, errorClass: "transient" };
  }

  if (NOT_FOUND_STATUSES.has(status)) {
    return { ...base, errorClass: "not-found" };
  }

  return { ...base, errorClass: "other" };
}

export interface RetryingRequestClientOptions {
  timeoutMs?: number;
  retryDelaysMs?: readonly number[];
  sleep?: (ms: number) => Promise<void>;
  debug?: boolean;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function describeSpec(spec: RequestSpec): string {
  if (spec.protocol === "graphql") {
    const match = /^\s*(query|mutation)?\s*(\w+)?/.exec(spec.endpoint);
    return `graphql ${match?.[2] ?? "query"}`;
  }
  return spec.endpoint;
}

export class RetryingRequestClient implements RequestClient {
  private readonly timeoutMs: number;
  private readonly retryDelaysMs: readonly number[];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly debug: boolean;

  constructor(private readonly transport: Transport, options: RetryingRequestClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryDelaysMs = options.retryDelaysMs ?? RETRY_DELAYS_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.debug = options.debug ?? false;
  }

  async request<T>(spec: RequestSpec): Promise<RequestResult<T>> {
    const label = describeSpec(spec);

    for (let attempt = 0; ; attempt += 1) {
      try {
        const response = await this.transport.send<T>(spec, AbortSignal.timeout(this.timeoutMs));
        return { ok: true, status: response.status, body: response.body };
      } catch (error) {
        const failure = classifyFailure(error);

        if (failure.errorClass === "rate-limit") {
          throw new RateLimitExceededError(`API rate limit exceeded (${label})`, failure.resetAt);
        }

        if (failure.errorClass === "not-found") {
          if (this.debug) {
            console.log(`[request] ${label} → empty (${failure.status ?? "no status"})`);
          }
          return { ok: false, status: failure.status, errorClass: "not-found" };
        }

        if (failure.errorClass === "transient") {
          const delay = this.retryDelaysMs[attempt];
          if (delay !== undefined) {
            if (this.debug) {
              console.log(
                `[request] ${label} transient failure (${failure.message}); retry ${attempt + 1}/${this.retryDelaysMs.length} in ${delay}ms`
              );
            }
            await this.sleep(delay);
            continue;
          }
          if (this.debug) {
            console.warn(`⚠️  ${label} gave up after ${attempt + 1} attempts: ${failure.message}`);
          }
          return { ok: false, status: failure.status, errorClass: "transient" };
        }

        throw new RequestFailedError(label, failure.status, failure.message);
      }
    }
  }
}
