export class RateLimitExceededError extends Error {
  readonly resetAt: Date | null;

  constructor(message: string, resetAt: Date | null) {
    super(message);
    this.name = "RateLimitExceededError";
    this.resetAt = resetAt;
  }

  describeReset(): string {
    if (!this.resetAt) {
      return "Rate limit resets at an unknown time; try again in about an hour.";
    }
    return `Rate limit resets at ${formatResetTime(this.resetAt)}.`;
  }
}

export class RequestFailedError extends Error {
  readonly status: number | null;
  readonly endpoint: string;

  constructor(endpoint: string, status: number | null, message: string) {
    super(`${endpoint} failed${status !== null ? ` (HTTP ${status})` : ""}: ${message}`);
    this.name = "RequestFailedError";
    this.endpoint = endpoint;
    this.status = status;
  }
}

/** Thrown by a source when a response body lacks a field it depends on. */
export class MalformedResponseError extends Error {
  readonly endpoint: string;

  constructor(endpoint: string, detail: string) {
    super(`Malformed response from ${endpoint}: ${detail}`);
    this.name = "MalformedResponseError";
    this.endpoint = endpoint;
  }
}

export function formatResetTime(resetAt: Date, now: Date = new Date()): string {
  const minutes = Math.max(0, Math.ceil((resetAt.getTime() - now.getTime()) / 60_000));
  const clock = resetAt.toLocaleTimeString("en-US", { hour: "2-digit", minute: "2-digit", hour12: false });
  return `${clock} (in ${minutes} minute${minutes === 1 ? "" : "s"})`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
