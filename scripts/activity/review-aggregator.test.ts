import { describe, expect, it } from "vitest";

import { aggregateReviews, mergePullRequests, pullRequestsByRepo } from "./review-aggregator";
import type { PullRequestNode } from "./sources/pull-requests";
import type { PullRequestRecord } from "./types";

const pullRequest = (url: string, author: string | null, repo = "w3c/csswg-drafts"): PullRequestNode => ({
  url,
  title: `Change ${url.split("/").pop()}`,
  additions: 10,
  deletions: 2,
  state: "MERGED",
  createdAt: "2024-03-02T09:00:00Z",
  author: author ? { login: author } : null,
  repository: { nameWithOwner: repo },
});

const review = (node: PullRequestNode) => ({ occurredAt: "2024-03-04T12:00:00Z", pullRequest: node });

describe("aggregateReviews", () => {
  it("counts several reviews on one pull request once", () => {
    const pr = pullRequest("https://github.com/w3c/csswg-drafts/pull/12", "bob");
    const reviewed = aggregateReviews([review(pr), review(pr), review(pr)]);

    expect(reviewed).toHaveLength(1);
    expect(reviewed[0]).toMatchObject({ url: pr.url, reviewCount: 3, authorLogin: "bob", repo: "w3c/csswg-drafts" });
  });

  it("drops pull requests opened by bots", () => {
    const reviewed = aggregateReviews([
      review(pullRequest("https://github.com/w3c/csswg-drafts/pull/1", "dependabot[bot]")),
      review(pullRequest("https://github.com/w3c/csswg-drafts/pull/2", "wpt-pr-bot")),
      review(pullRequest("https://github.com/w3c/csswg-drafts/pull/3", null)),
    ]);

    expect(reviewed.map((record) => record.url)).toEqual(["https://github.com/w3c/csswg-drafts/pull/3"]);
  });
});

describe("mergePullRequests", () => {
  const record = (url: string, title: string): PullRequestRecord => ({
    url,
    title,
    repo: "whatwg/html",
    authorLogin: "alice",
    additions: 1,
    deletions: 1,
    reviewCount: 0,
    state: "OPEN",
    createdAt: null,
  });

  it("deduplicates by URL keeping the first record", () => {
    const merged = mergePullRequests(
      [record("https://github.com/whatwg/html/pull/2", "first")],
      [record("https://github.com/whatwg/html/pull/2", "second"), record("https://github.com/whatwg/html/pull/1", "other")]
    );

    expect(merged.map((entry) => [entry.url, entry.title])).toEqual([
      ["https://github.com/whatwg/html/pull/1", "other"],
      ["https://github.com/whatwg/html/pull/2", "first"],
    ]);
  });

  it("counts pull requests per repository", () => {
    const counts = pullRequestsByRepo([
      record("https://github.com/whatwg/html/pull/1", "a"),
      { ...record("https://github.com/whatwg/dom/pull/9", "b"), repo: "whatwg/dom" },
      record("https://github.com/whatwg/html/pull/3", "c"),
    ]);

    expect(Object.fromEntries(counts)).toEqual({ "whatwg/html": 2, "whatwg/dom": 1 });
  });
});
