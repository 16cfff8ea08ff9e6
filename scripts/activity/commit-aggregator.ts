import type { NoiseTable } from "./config";
import { shouldSkipRepo } from "./noise-filter";
import type { RepoContributionCount } from "./sources/contributions";
import type { CommitRecord, CommitStats, DiscoveredCommit, RepoInfo } from "./types";

export interface AttributionContext {
  subject: string;
  noise: NoiseTable;
  includePrivate?: boolean;
  /** Metadata of discovering repositories; a missing entry means unknown. */
  repoInfo: ReadonlyMap<string, RepoInfo | null>;
}

export interface RepoCommitTotals {
  repo: string;
  commits: number;
  additions: number;
  deletions: number;
}

export type Attribution = { skip: true } | { skip: false; repo: string; info: RepoInfo | null };

function infoFor(context: AttributionContext, repo: string): RepoInfo | null {
  return context.repoInfo.get(repo) ?? context.repoInfo.get(repo.toLowerCase()) ?? null;
}

/** Applies the noise filter to a discovering repository and credits forks to their parent. */
export function attributeRepo(repo: string, context: AttributionContext): Attribution {
  const info = infoFor(context, repo);
  const options = { subject: context.subject, includePrivate: context.includePrivate };
  if (shouldSkipRepo(repo, context.noise, { ...options, info })) {
    return { skip: true };
  }
  if (!info?.isFork || !info.parent) {
    return { skip: false, repo, info };
  }
  const parentInfo = infoFor(context, info.parent);
  if (shouldSkipRepo(info.parent, context.noise, { ...options, info: parentInfo })) {
    return { skip: true };
  }
  return { skip: false, repo: info.parent, info: parentInfo };
}

/** Default-branch records win, then the smaller branch name, so merge order does not matter. */
function prefer(current: CommitRecord, candidate: CommitRecord): CommitRecord {
  if (current.branch === null) {
    return current;
  }
  if (candidate.branch === null) {
    return candidate;
  }
  return candidate.branch < current.branch ? candidate : current;
}

/**
 * Collects commits from every discovery path for one subject. Records are
 * keyed by SHA; the credited repository is the fork's parent when the commit
 * was found in a fork, while `originRepo` keeps the fork for stat lookups.
 */
export class CommitAggregator {
  private readonly records = new Map<string, CommitRecord>();
  private readonly skippedRepos = new Set<string>();

  constructor(private readonly context: AttributionContext) {}

  add(commit: DiscoveredCommit): boolean {
    const attribution = attributeRepo(commit.repo, this.context);
    if (attribution.skip) {
      this.skippedRepos.add(commit.repo);
      return false;
    }

    const record: CommitRecord = {
      sha: commit.sha,
      repo: attribution.repo,
      originRepo: commit.repo,
      authorLogin: commit.authorLogin,
      committedAt: commit.committedAt,
      additions: null,
      deletions: null,
      branch: commit.branch,
      source: commit.source,
    };
    const existing = this.records.get(commit.sha);
    this.records.set(commit.sha, existing ? prefer(existing, record) : record);
    return true;
  }

  addAll(commits: Iterable<DiscoveredCommit>): number {
    let kept = 0;
    for (const commit of commits) {
      if (this.add(commit)) {
        kept += 1;
      }
    }
    return kept;
  }

  applyStats(sha: string, stats: CommitStats | null): void {
    const record = this.records.get(sha);
    if (!record || !stats) {
      return;
    }
    this.records.set(sha, { ...record, additions: stats.additions, deletions: stats.deletions });
  }

  get size(): number {
    return this.records.size;
  }

  get skipped(): string[] {
    return Array.from(this.skippedRepos).sort();
  }

  commits(): CommitRecord[] {
    return Array.from(this.records.values()).sort((a, b) => a.sha.localeCompare(b.sha));
  }

  defaultBranchCount(): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.branch === null) {
        count += 1;
      }
    }
    return count;
  }

  /** Per credited repository, sorted by commit count then name. Missing stats count as zero. */
  repoTotals(): RepoCommitTotals[] {
    const totals = new Map<string, RepoCommitTotals>();
    for (const record of this.records.values()) {
      const entry = totals.get(record.repo) ?? { repo: record.repo, commits: 0, additions: 0, deletions: 0 };
      entry.commits += 1;
      entry.additions += record.additions ?? 0;
      entry.deletions += record.deletions ?? 0;
      totals.set(record.repo, entry);
    }
    return sortTotals(totals.values());
  }
}

function sortTotals(totals: Iterable<RepoCommitTotals>): RepoCommitTotals[] {
  return Array.from(totals).sort((a, b) => b.commits - a.commits || a.repo.localeCompare(b.repo));
}

/**
 * Light-mode counterpart of the aggregator: per-repository counts from the
 * contribution summary, filtered and attributed the same way.
 */
export function aggregateContributionCounts(
  entries: readonly RepoContributionCount[],
  context: Omit<AttributionContext, "repoInfo"> & { repoInfo?: ReadonlyMap<string, RepoInfo | null> }
): RepoCommitTotals[] {
  const repoInfo = new Map<string, RepoInfo | null>(context.repoInfo ?? []);
  for (const entry of entries) {
    if (!repoInfo.has(entry.info.nameWithOwner)) {
      repoInfo.set(entry.info.nameWithOwner, entry.info);
    }
  }
  const attributionContext: AttributionContext = { ...context, repoInfo };

  const totals = new Map<string, RepoCommitTotals>();
  for (const entry of entries) {
    if (entry.commits <= 0) {
      continue;
    }
    const attribution = attributeRepo(entry.info.nameWithOwner, attributionContext);
    if (attribution.skip) {
      continue;
    }
    const total = totals.get(attribution.repo) ?? { repo: attribution.repo, commits: 0, additions: 0, deletions: 0 };
    total.commits += entry.commits;
    totals.set(attribution.repo, total);
  }
  return sortTotals(totals.values());
}
