import { isBotLogin } from "./bots";
import type { ReviewContribution } from "./sources/reviews";
import { toPullRequestRecord } from "./sources/pull-requests";
import type { PullRequestRecord } from "./types";

function byUrl(a: PullRequestRecord, b: PullRequestRecord): number {
  return a.url.localeCompare(b.url);
}

/**
 * One record per reviewed pull request, keyed by URL, with the number of
 * reviews the subject left on it. Pull requests opened by bots are dropped.
 */
export function aggregateReviews(contributions: readonly ReviewContribution[]): PullRequestRecord[] {
  const reviewed = new Map<string, PullRequestRecord>();
  for (const contribution of contributions) {
    const pullRequest = contribution.pullRequest;
    if (isBotLogin(pullRequest.author?.login)) {
      continue;
    }
    const existing = reviewed.get(pullRequest.url);
    if (existing) {
      existing.reviewCount += 1;
    } else {
      reviewed.set(pullRequest.url, toPullRequestRecord(pullRequest, 1));
    }
  }
  return Array.from(reviewed.values()).sort(byUrl);
}

/** Union of pull request pools by URL; the first record seen for a URL is kept. */
export function mergePullRequests(...pools: ReadonlyArray<readonly PullRequestRecord[]>): PullRequestRecord[] {
  const merged = new Map<string, PullRequestRecord>();
  for (const pool of pools) {
    for (const pullRequest of pool) {
      if (!merged.has(pullRequest.url)) {
        merged.set(pullRequest.url, pullRequest);
      }
    }
  }
  return Array.from(merged.values()).sort(byUrl);
}

export function pullRequestsByRepo(pullRequests: readonly PullRequestRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const pullRequest of pullRequests) {
    counts.set(pullRequest.repo, (counts.get(pullRequest.repo) ?? 0) + 1);
  }
  return counts;
}
