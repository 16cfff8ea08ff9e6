import { formatResetTime } from "./errors";
import { parseRemainingHeader, parseResetHeader, type RequestClient, type ResponseHeaders } from "./request-client";

export const GITHUB_RATE_LIMIT_TOTAL = 5000;
export const WARN_THRESHOLD_ABSOLUTE = 0.5;
export const WARN_THRESHOLD_REMAINING = 0.8;
export const ABORT_FLOOR = 50;

// Calibrated against observed runs; see DESIGN.md.
export const SUMMARY_BATCH_SIZE = 10;
export const CALLS_PER_MEMBER_WEEK = 2.4;
export const TIME_SCALING_EXPONENT = 0.4;

export type RateLimitPool = "graphql" | "core" | "search";

interface RateLimitResource {
  limit: number;
  remaining: number;
  reset: number;
}

interface RateLimitResponse {
  resources: Partial<Record<string, RateLimitResource>>;
}

export interface EstimateOptions {
  /** Members already known to be active skip the phase-1 scan. */
  knownActive?: boolean;
}

export class RateLimitBudget {
  private limit = GITHUB_RATE_LIMIT_TOTAL;
  private remainingCalls: number | null = null;
  private resetAt: Date | null = null;

  constructor(readonly pool: RateLimitPool = "graphql") {}

  get remaining(): number | null {
    return this.remainingCalls;
  }

  get total(): number {
    return this.limit;
  }

  get resetTime(): Date | null {
    return this.resetAt;
  }

  async refresh(client: RequestClient): Promise<void> {
    const result = await client.request<RateLimitResponse>({ protocol: "rest", endpoint: "GET /rate_limit" });
    if (!result.ok) {
      throw new Error(`Unable to read rate limit status (${result.errorClass})`);
    }
    const resource = result.body.resources[this.pool];
    if (!resource) {
      throw new Error(`Rate limit status has no '${this.pool}' pool`);
    }
    this.limit = resource.limit;
    this.remainingCalls = resource.remaining;
    this.resetAt = new Date(resource.reset * 1000);
  }

  /** Tracks quota headers of responses from this budget's pool; others are ignored. */
  updateFromHeaders(headers: ResponseHeaders) {
    const resource = headers["x-ratelimit-resource"];
    if (typeof resource === "string" && resource !== this.pool) {
      return;
    }
    this.remainingCalls = parseRemainingHeader(headers) ?? this.remainingCalls;
    this.resetAt = parseResetHeader(headers) ?? this.resetAt;
  }

  /**
   * Projected API calls for an organization run. Phase 1 is the batched
   * summary fallback; phase 2 grows with the window as (days/7)^0.4 because
   * longer windows mostly revisit the same repositories and pull requests.
   */
  estimate(memberCount: number, days: number, options: EstimateOptions = {}): number {
    if (memberCount <= 0) {
      return 0;
    }
    const phase1 = options.knownActive ? 0 : Math.ceil(memberCount / SUMMARY_BATCH_SIZE);
    const weeks = Math.max(days, 1) / 7;
    const phase2 = memberCount * CALLS_PER_MEMBER_WEEK * weeks ** TIME_SCALING_EXPONENT;
    return Math.round(phase1 + phase2);
  }

  shouldWarn(estimate: number, remaining: number | null = this.remainingCalls): boolean {
    if (estimate > this.limit * WARN_THRESHOLD_ABSOLUTE) {
      return true;
    }
    return remaining !== null && estimate > remaining * WARN_THRESHOLD_REMAINING;
  }

  shouldAbort(remaining: number | null = this.remainingCalls): boolean {
    return remaining !== null && remaining < ABORT_FLOOR;
  }

  describeWarning(estimate: number, remaining: number | null = this.remainingCalls): string {
    const budgetShare = Math.round((estimate / this.limit) * 100);
    const lines = [
      `This run needs an estimated ${estimate.toLocaleString("en-US")} GraphQL calls (${budgetShare}% of the hourly budget of ${this.limit.toLocaleString("en-US")}).`,
    ];
    if (remaining !== null) {
      const remainingShare = remaining > 0 ? Math.round((estimate / remaining) * 100) : 100;
      lines.push(`That is ${remainingShare}% of the ${remaining.toLocaleString("en-US")} calls remaining.`);
    }
    return lines.join("\n");
  }

  describeReset(now: Date = new Date()): string {
    return this.resetAt ? `Rate limit resets at ${formatResetTime(this.resetAt, now)}.` : "Rate limit reset time unknown.";
  }
}
