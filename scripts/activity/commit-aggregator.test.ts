import { beforeAll, describe, expect, it } from "vitest";

import { CommitAggregator, aggregateContributionCounts, attributeRepo } from "./commit-aggregator";
import { loadNoiseTable, type NoiseTable } from "./config";
import type { DiscoveredCommit, RepoInfo } from "./types";

const repo = (nameWithOwner: string, overrides: Partial<RepoInfo> = {}): RepoInfo => ({
  nameWithOwner,
  description: null,
  isFork: false,
  isPrivate: false,
  parent: null,
  primaryLanguage: null,
  ...overrides,
});

const commit = (sha: string, repoName: string, overrides: Partial<DiscoveredCommit> = {}): DiscoveredCommit => ({
  sha,
  repo: repoName,
  authorLogin: "alice",
  committedAt: "2024-03-03T10:00:00Z",
  branch: null,
  source: "search",
  ...overrides,
});

const fixtureRepos = new Map<string, RepoInfo | null>([
  ["alice/ladybird", repo("alice/ladybird", { isFork: true, parent: "LadybirdBrowser/ladybird", primaryLanguage: "C++" })],
  ["mirrorer/gecko-dev", repo("mirrorer/gecko-dev", { description: "Read-only Git mirror" })],
  ["alice/tool", repo("alice/tool", { primaryLanguage: "TypeScript" })],
  ["LadybirdBrowser/ladybird", repo("LadybirdBrowser/ladybird", { primaryLanguage: "C++" })],
]);

const fixtureCommits: DiscoveredCommit[] = [
  commit("a1", "alice/ladybird"),
  commit("a1", "alice/ladybird", { source: "fork-branch", branch: "alice/fix-layout" }),
  commit("a2", "alice/ladybird", { source: "fork-branch", branch: "eng/fonts" }),
  commit("a3", "alice/ladybird", { source: "repo-history" }),
  commit("g1", "mirrorer/gecko-dev"),
  commit("g2", "mirrorer/gecko-dev"),
  commit("g3", "mirrorer/gecko-dev"),
  commit("t1", "alice/tool"),
  commit("t2", "alice/tool"),
  commit("t2", "alice/tool", { source: "repo-history" }),
];

describe("CommitAggregator", () => {
  let noise: NoiseTable;

  beforeAll(async () => {
    noise = await loadNoiseTable();
  });

  const aggregatorFor = () => new CommitAggregator({ subject: "alice", noise, repoInfo: fixtureRepos });

  it("drops the mirror, credits the fork to its parent and counts distinct SHAs", () => {
    const aggregator = aggregatorFor();
    const kept = aggregator.addAll(fixtureCommits);

    expect(kept).toBe(7);
    expect(aggregator.skipped).toEqual(["mirrorer/gecko-dev"]);
    expect(aggregator.repoTotals()).toEqual([
      { repo: "LadybirdBrowser/ladybird", commits: 3, additions: 0, deletions: 0 },
      { repo: "alice/tool", commits: 2, additions: 0, deletions: 0 },
    ]);
    expect(aggregator.size).toBe(5);
    expect(aggregator.defaultBranchCount()).toBe(4);
  });

  it("keeps the fork as the origin for stat lookups", () => {
    const aggregator = aggregatorFor();
    aggregator.addAll(fixtureCommits);

    const forkCommit = aggregator.commits().find((record) => record.sha === "a2");
    expect(forkCommit).toMatchObject({ repo: "LadybirdBrowser/ladybird", originRepo: "alice/ladybird", branch: "eng/fonts" });
  });

  it("merges the same SHA identically whatever the discovery order", () => {
    const forward = aggregatorFor();
    forward.addAll(fixtureCommits);
    const backward = aggregatorFor();
    backward.addAll([...fixtureCommits].reverse());

    expect(backward.commits()).toEqual(forward.commits());
    expect(forward.commits().find((record) => record.sha === "a1")?.branch).toBeNull();
  });

  it("prefers the smaller branch name when neither record is on the default branch", () => {
    const aggregator = aggregatorFor();
    aggregator.add(commit("b1", "alice/ladybird", { branch: "wip/zoom", source: "fork-branch" }));
    aggregator.add(commit("b1", "alice/ladybird", { branch: "fix/zoom", source: "fork-branch" }));

    expect(aggregator.commits()[0].branch).toBe("fix/zoom");
  });

  it("adds stats and counts missing ones as zero", () => {
    const aggregator = aggregatorFor();
    aggregator.addAll(fixtureCommits);
    aggregator.applyStats("t1", { additions: 12, deletions: 3 });
    aggregator.applyStats("t2", null);
    aggregator.applyStats("a1", { additions: 40, deletions: 8 });

    expect(aggregator.repoTotals()).toEqual([
      { repo: "LadybirdBrowser/ladybird", commits: 3, additions: 40, deletions: 8 },
      { repo: "alice/tool", commits: 2, additions: 12, deletions: 3 },
    ]);
    expect(aggregator.commits().find((record) => record.sha === "t2")).toMatchObject({ additions: null, deletions: null });
  });

  it("skips a fork whose parent is itself noise", () => {
    const repos = new Map<string, RepoInfo | null>([
      ["alice/mirror-copy", repo("alice/mirror-copy", { isFork: true, parent: "mozilla/gecko-dev" })],
    ]);
    expect(attributeRepo("alice/mirror-copy", { subject: "alice", noise, repoInfo: repos })).toEqual({ skip: true });
  });
});

describe("aggregateContributionCounts", () => {
  let noise: NoiseTable;

  beforeAll(async () => {
    noise = await loadNoiseTable();
  });

  it("sums summary counts on the parent and filters noise", () => {
    const totals = aggregateContributionCounts(
      [
        { info: repo("alice/ladybird", { isFork: true, parent: "LadybirdBrowser/ladybird" }), commits: 4 },
        { info: repo("LadybirdBrowser/ladybird"), commits: 6 },
        { info: repo("mirrorer/gecko-dev"), commits: 30 },
        { info: repo("alice/tool"), commits: 2 },
        { info: repo("alice/alice"), commits: 9 },
      ],
      { subject: "alice", noise }
    );

    expect(totals).toEqual([
      { repo: "LadybirdBrowser/ladybird", commits: 10, additions: 0, deletions: 0 },
      { repo: "alice/tool", commits: 2, additions: 0, deletions: 0 },
    ]);
  });
});
