import { describe, expect, it, vi } from "vitest";

import { RateLimitBudget } from "./rate-budget";
import type { RequestClient } from "./request-client";

function clientReturning(body: unknown): RequestClient {
  return { request: vi.fn().mockResolvedValue({ ok: true, status: 200, body }) };
}

describe("RateLimitBudget.estimate", () => {
  const budget = new RateLimitBudget();

  it("projects a week for a large organization", () => {
    const estimate = budget.estimate(524, 7);
    expect(estimate).toBe(1311);
    expect(Math.abs(estimate - 1310) / 1310).toBeLessThan(0.05);
  });

  it("scales sub-linearly with the window", () => {
    const week = budget.estimate(524, 7);
    const month = budget.estimate(524, 30);
    expect(Math.abs(month - 2300) / 2300).toBeLessThan(0.05);
    expect(month).toBeLessThan(week * (30 / 7));
  });

  it("drops the scan phase when members are known active", () => {
    expect(budget.estimate(10, 7)).toBe(25);
    expect(budget.estimate(10, 7, { knownActive: true })).toBe(24);
  });

  it("is zero for an empty member list", () => {
    expect(budget.estimate(0, 30)).toBe(0);
  });
});

describe("RateLimitBudget gating", () => {
  const budget = new RateLimitBudget();

  it("warns above half of the total budget", () => {
    expect(budget.shouldWarn(2501, 5000)).toBe(true);
    expect(budget.shouldWarn(2500, 5000)).toBe(false);
  });

  it("warns above 80% of what remains", () => {
    expect(budget.shouldWarn(900, 1000)).toBe(true);
    expect(budget.shouldWarn(800, 1000)).toBe(false);
  });

  it("applies only the absolute test when remaining is unknown", () => {
    expect(budget.shouldWarn(2000, null)).toBe(false);
    expect(budget.shouldWarn(3000, null)).toBe(true);
  });

  it("aborts below the floor whatever the estimate", () => {
    expect(budget.shouldAbort(49)).toBe(true);
    expect(budget.shouldAbort(50)).toBe(false);
    expect(budget.shouldAbort(null)).toBe(false);
  });

  it("formats the warning with separators and shares", () => {
    expect(budget.describeWarning(3000, 4000)).toBe(
      "This run needs an estimated 3,000 GraphQL calls (60% of the hourly budget of 5,000).\n" +
        "That is 75% of the 4,000 calls remaining."
    );
  });
});

describe("RateLimitBudget.refresh", () => {
  it("reads the graphql pool rather than core", async () => {
    const budget = new RateLimitBudget();
    await budget.refresh(
      clientReturning({
        resources: {
          core: { limit: 5000, remaining: 4999, reset: 1_700_000_000 },
          graphql: { limit: 5000, remaining: 120, reset: 1_700_000_600 },
        },
      })
    );

    expect(budget.remaining).toBe(120);
    expect(budget.resetTime?.getTime()).toBe(1_700_000_600_000);
  });

  it("throws when the quota lookup fails", async () => {
    const budget = new RateLimitBudget();
    const client: RequestClient = {
      request: vi.fn().mockResolvedValue({ ok: false, status: 404, errorClass: "not-found" }),
    };

    await expect(budget.refresh(client)).rejects.toThrow("Unable to read rate limit status (not-found)");
  });
});

describe("RateLimitBudget.updateFromHeaders", () => {
  it("tracks headers from its own pool only", () => {
    const budget = new RateLimitBudget("graphql");

    budget.updateFromHeaders({
      "x-ratelimit-resource": "core",
      "x-ratelimit-remaining": "4000",
      "x-ratelimit-reset": "1700000000",
    });
    expect(budget.remaining).toBeNull();

    budget.updateFromHeaders({
      "x-ratelimit-resource": "graphql",
      "x-ratelimit-remaining": "42",
      "x-ratelimit-reset": "1700000000",
    });
    expect(budget.remaining).toBe(42);
    expect(budget.resetTime?.getTime()).toBe(1_700_000_000_000);
    expect(budget.shouldAbort()).toBe(true);
  });

  it("keeps what it knows when a header is missing or unreadable", () => {
    const budget = new RateLimitBudget("graphql");

    budget.updateFromHeaders({ "x-ratelimit-remaining": 300, "x-ratelimit-reset": 1_700_000_000 });
    budget.updateFromHeaders({ "x-ratelimit-remaining": "soon" });

    expect(budget.remaining).toBe(300);
    expect(budget.resetTime?.getTime()).toBe(1_700_000_000_000);
  });
});
