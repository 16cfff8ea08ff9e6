import { beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { CategoryClassifier } from "./categories";
import { loadCategoryTable, loadNoiseTable, type CategoryTable, type NoiseTable } from "./config";
import { RateLimitExceededError } from "./errors";
import type { GatherContext } from "./member-activity";
import { RunCancelledError, gatherOrganizationActivity } from "./organization";
import { RateLimitBudget } from "./rate-budget";
import type { RequestSpec } from "./request-client";
import { RepoCatalog } from "./sources/repo-info";
import { POOL_SIZES } from "./worker-pool";
import { describeCall, fakeClient, notFound, ok, type FakeResponse } from "./testing/fake-client";

const window = { since: "2024-03-01", until: "2024-03-07" };
const reset = 1_709_900_000;

const rateLimit = (limit: number, remaining: number) =>
  ok({ resources: { graphql: { limit, remaining, reset } } });

const calendar = (level: number) =>
  ok(`<td class="ContributionCalendar-day" data-date="2024-03-04" data-level="${level}"></td>`);

const emptySummary = (login: string) =>
  ok({
    user: {
      login,
      name: null,
      company: "Acme",
      contributionsCollection: {
        totalCommitContributions: 0,
        totalIssueContributions: 1,
        totalPullRequestContributions: 0,
        totalPullRequestReviewContributions: 0,
        restrictedContributionsCount: 0,
        commitContributionsByRepository: [],
      },
    },
  });

const noPullRequests = ok({ search: { issueCount: 0, nodes: [], pageInfo: { hasNextPage: false, endCursor: null } } });
const noReviews = ok({
  user: {
    contributionsCollection: {
      pullRequestReviewContributions: { nodes: [], pageInfo: { hasNextPage: false, endCursor: null } },
    },
  },
});

type Handler = (spec: RequestSpec, call: string) => FakeResponse;

/** alice and bob are active on the calendar, carol is not; bob's profile cannot be read. */
function organization(remaining: number, limit = 5000, overrides: Partial<Record<string, Handler>> = {}): Handler {
  return (spec, call) => {
    const override = overrides[call];
    if (override) {
      return override(spec, call);
    }
    const login = String(spec.params?.login);
    switch (call) {
      case "GET /rate_limit":
        return rateLimit(limit, remaining);
      case "GET /orgs/{org}/public_members":
        return ok([{ login: "alice" }, { login: "bob" }, { login: "carol" }, { login: "ci-bot" }]);
      case "GET /users/{login}/contributions":
        return calendar(login === "carol" ? 0 : 2);
      case "ContributionSummary":
        return login === "bob" ? ok({ user: null }) : emptySummary(login);
      case "PullRequestSearch":
        return noPullRequests;
      case "ReviewContributions":
        return noReviews;
      default:
        return notFound;
    }
  };
}

describe("gatherOrganizationActivity", () => {
  let categories: CategoryTable;
  let noise: NoiseTable;

  beforeAll(async () => {
    [categories, noise] = await Promise.all([loadCategoryTable(), loadNoiseTable()]);
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    return () => vi.restoreAllMocks();
  });

  function setup(handler: (spec: RequestSpec, call: string) => FakeResponse | Promise<FakeResponse>) {
    const client = fakeClient(handler);
    const catalog = new RepoCatalog(client);
    const context: GatherContext = {
      client,
      catalog,
      classifier: new CategoryClassifier(categories, { fetchTopics: (repo) => catalog.topics(repo) }),
      noise,
    };
    const calls = () => client.request.mock.calls.map(([spec]) => describeCall(spec));
    return { context, calls, budget: new RateLimitBudget() };
  }

  it("gathers active members and degrades the ones that fail", async () => {
    const { context, budget } = setup(organization(4000));

    const result = await gatherOrganizationActivity({ org: "acme", window, mode: "light", context, budget });

    expect(result.candidates).toBe(3);
    expect(result.scan).toEqual({ active: ["alice", "bob"], inactive: ["carol"], undetermined: [] });
    expect(result.memberResults.map((member) => [member.login, member.complete])).toEqual([
      ["alice", true],
      ["bob", false],
    ]);
    expect(result.memberResults[1].failure).toBe("User 'bob' was not found or their profile is not readable");
    expect(result.memberResults[1].light).toBe(true);
    expect(result.aggregate.failedMembers).toEqual(["bob"]);
    expect(result.aggregate.totals.issues).toBe(1);
    expect(result.aggregate.companyGroups).toEqual({ Acme: ["alice"], Unaffiliated: ["bob"] });
  });

  it("lists only owners in owners-only mode", async () => {
    const { context, budget, calls } = setup(
      organization(4000, 5000, {
        "GET /orgs/{org}/members": (spec) => (spec.params?.role === "admin" ? ok([{ login: "alice" }]) : notFound),
      })
    );

    const result = await gatherOrganizationActivity({ org: "acme", ownersOnly: true, window, mode: "light", context, budget });

    expect(result.ownersOnly).toBe(true);
    expect(result.candidates).toBe(1);
    expect(result.memberResults.map((member) => member.login)).toEqual(["alice"]);
    expect(calls()).not.toContain("GET /orgs/{org}/public_members");
  });

  it("rejects owners-only mode limited to a team", async () => {
    const { context, budget } = setup(organization(4000));

    await expect(
      gatherOrganizationActivity({ org: "acme", team: "core", ownersOnly: true, window, mode: "light", context, budget })
    ).rejects.toThrow("Owners-only listing cannot be limited to a team");
  });

  it("refuses to start below the abort floor", async () => {
    const { context, budget, calls } = setup(organization(10));

    const run = gatherOrganizationActivity({ org: "acme", window, mode: "light", context, budget });

    await expect(run).rejects.toBeInstanceOf(RateLimitExceededError);
    await expect(run).rejects.toMatchObject({ resetAt: new Date(reset * 1000) });
    expect(calls()).toEqual(["GET /rate_limit"]);
  });

  it("stops when the expensive run is declined", async () => {
    // Two members over this window cost five calls, over half of a limit of eight.
    const { context, budget, calls } = setup(organization(60, 8));
    const confirm = vi.fn(async () => false);

    await expect(
      gatherOrganizationActivity({ org: "acme", window, mode: "light", context, budget, confirm })
    ).rejects.toBeInstanceOf(RunCancelledError);

    expect(confirm).toHaveBeenCalledWith(
      "This run needs an estimated 5 GraphQL calls (63% of the hourly budget of 8).\nThat is 8% of the 60 calls remaining."
    );
    expect(calls()).not.toContain("ContributionSummary");
  });

  it("goes ahead when the expensive run is confirmed", async () => {
    const { context, budget } = setup(organization(60, 8));
    const confirm = vi.fn(async () => true);

    const result = await gatherOrganizationActivity({ org: "acme", window, mode: "light", context, budget, confirm });

    expect(confirm).toHaveBeenCalledTimes(1);
    expect(result.memberResults).toHaveLength(2);
  });

  it("fails the run when the budget runs out mid-way", async () => {
    const exhausted = new RateLimitExceededError("API rate limit exceeded (graphql ContributionSummary)", null);
    const { context, budget } = setup(organization(4000, 5000, { ContributionSummary: () => exhausted }));

    await expect(
      gatherOrganizationActivity({ org: "acme", window, mode: "light", context, budget })
    ).rejects.toBe(exhausted);
  });

  it("bounds stat fetches across every member of the run", async () => {
    let inFlight = 0;
    let peak = 0;
    let fetched = 0;
    const members = organization(4000, 5000, {
      "GET /orgs/{org}/public_members": () => ok([{ login: "m1" }, { login: "m2" }, { login: "m3" }, { login: "m4" }]),
      UserForks: () => ok({ user: { repositories: { nodes: [], pageInfo: { hasNextPage: false, endCursor: null } } } }),
      RepoBatch: () => ok({}),
      "GET /search/commits": (spec) => {
        const login = /author:(\S+)/.exec(String(spec.params?.q))?.[1] ?? "unknown";
        const items = Array.from({ length: 30 }, (_, index) => ({
          sha: `${login}-${index}`,
          author: { login },
          commit: { committer: { date: "2024-03-03T10:00:00Z" } },
          repository: { full_name: `${login}/project`, description: null, fork: false, private: false },
        }));
        return ok({ total_count: items.length, items });
      },
    });
    const { context } = setup(async (spec, call) => {
      if (call !== "GET /repos/{owner}/{repo}/commits/{ref}") {
        return members(spec, call);
      }
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      fetched += 1;
      return ok({ sha: spec.params?.ref, stats: { additions: 1, deletions: 0, total: 1 } });
    });

    const result = await gatherOrganizationActivity({ org: "acme", window, mode: "full", context, budget: new RateLimitBudget() });

    expect(result.memberResults.map((member) => [member.login, member.totals.commitsAllBranches])).toEqual([
      ["m1", 30],
      ["m2", 30],
      ["m3", 30],
      ["m4", 30],
    ]);
    expect(fetched).toBe(120);
    expect(peak).toBe(POOL_SIZES.stats);
  });
});
