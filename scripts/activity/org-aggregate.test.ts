import { describe, expect, it } from "vitest";

import { aggregateOrganization, emptyMemberActivity, languageBreakdown } from "./org-aggregate";
import type { MemberActivity, PullRequestRecord, RepoActivity } from "./types";

const window = { since: "2024-03-01", until: "2024-03-07" };

const repo = (name: string, commits: number, overrides: Partial<RepoActivity> = {}): RepoActivity => ({
  name,
  commits,
  additions: commits * 10,
  deletions: commits,
  pullRequests: 0,
  category: "Other",
  language: "TypeScript",
  description: null,
  isFork: false,
  parent: null,
  ...overrides,
});

const pullRequest = (url: string, repoName: string): PullRequestRecord => ({
  url,
  title: "Change",
  repo: repoName,
  authorLogin: "someone",
  additions: 1,
  deletions: 1,
  reviewCount: 1,
  state: "OPEN",
  createdAt: "2024-03-02T00:00:00Z",
});

function member(login: string, company: string | null, repos: RepoActivity[], pullRequests: PullRequestRecord[] = []): MemberActivity {
  const commits = repos.reduce((sum, entry) => sum + entry.commits, 0);
  return {
    ...emptyMemberActivity(login, window),
    realName: login.toUpperCase(),
    company,
    repos,
    totals: {
      commitsDefaultBranch: commits,
      commitsAllBranches: commits,
      pullRequestsCreated: pullRequests.length,
      pullRequestsReviewed: 0,
      reviewsReceived: pullRequests.reduce((sum, pullRequest) => sum + pullRequest.reviewCount, 0),
      issues: 1,
      additions: commits * 10,
      deletions: commits,
      reposContributed: repos.length,
    },
    pullRequestsCreated: pullRequests,
  };
}

describe("aggregateOrganization", () => {
  const shared = "https://github.com/whatwg/html/pull/1";
  const alice = member(
    "alice",
    "@w3c",
    [repo("whatwg/html", 4, { language: null }), repo("alice/tool", 1)],
    [pullRequest(shared, "whatwg/html")]
  );
  const bob = member("bob", "W3C", [repo("whatwg/html", 2, { language: "HTML" })], [pullRequest(shared, "whatwg/html")]);
  const carol = emptyMemberActivity("carol", window, "Request failed: GraphQL (502)");

  const result = aggregateOrganization([alice, bob, carol]);

  it("sums member totals and counts distinct repositories", () => {
    expect(result.totals).toEqual({
      commitsDefaultBranch: 7,
      commitsAllBranches: 7,
      pullRequestsCreated: 2,
      pullRequestsReviewed: 0,
      reviewsReceived: 2,
      issues: 2,
      additions: 70,
      deletions: 7,
      reposContributed: 2,
    });
  });

  it("merges repositories and keeps the first known language", () => {
    expect(result.repos.map((entry) => [entry.name, entry.commits, entry.language])).toEqual([
      ["whatwg/html", 6, "HTML"],
      ["alice/tool", 1, "TypeScript"],
    ]);
  });

  it("records who committed where", () => {
    expect(result.repoMemberCommits).toEqual({
      "whatwg/html": { alice: 4, bob: 2 },
      "alice/tool": { alice: 1 },
    });
    expect(result.languageMemberCommits).toEqual({ HTML: { bob: 2 }, TypeScript: { alice: 1 } });
  });

  it("deduplicates pull requests by URL", () => {
    expect(result.pullRequestsCreated.map((entry) => entry.url)).toEqual([shared]);
  });

  it("groups companies and flags failed members", () => {
    expect(result.companyGroups).toEqual({ "@w3c": ["alice", "bob"], Unaffiliated: ["carol"] });
    expect(result.members.bob).toEqual({ realName: "BOB", company: "@w3c" });
    expect(result.members.carol).toEqual({ realName: null, company: "Unaffiliated" });
    expect(result.failedMembers).toEqual(["carol"]);
    expect(result.light).toBe(false);
  });
});

describe("emptyMemberActivity", () => {
  it("is complete only without a failure", () => {
    expect(emptyMemberActivity("dave", window).complete).toBe(true);
    expect(emptyMemberActivity("dave", window, "timed out", { light: true })).toMatchObject({
      complete: false,
      failure: "timed out",
      light: true,
    });
  });
});

describe("languageBreakdown", () => {
  it("weights languages by commits and skips unknown ones", () => {
    expect(
      languageBreakdown([repo("a/one", 2, { language: "Rust" }), repo("a/two", 5, { language: null }), repo("a/three", 3)])
    ).toEqual([
      { language: "TypeScript", commits: 3, additions: 30, deletions: 3, repos: 1 },
      { language: "Rust", commits: 2, additions: 20, deletions: 2, repos: 1 },
    ]);
  });
});
