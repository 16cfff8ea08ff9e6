import { OTHER_CATEGORY, type CategoryClassifier } from "./categories";
import { CommitAggregator, aggregateContributionCounts, type RepoCommitTotals } from "./commit-aggregator";
import { clampToYear, type NoiseTable } from "./config";
import { describeError } from "./errors";
import { languageBreakdown, sortRepos } from "./org-aggregate";
import type { RequestClient } from "./request-client";
import { aggregateReviews, pullRequestsByRepo } from "./review-aggregator";
import { searchCommits } from "./sources/commit-search";
import { fetchCommitStats } from "./sources/commit-stats";
import { fetchContributionSummary, type ContributionSummary } from "./sources/contributions";
import { listBranches, listUserForks, selectUserBranches } from "./sources/fork-branches";
import { searchPullRequests } from "./sources/pull-requests";
import { listRepoCommits } from "./sources/repo-commits";
import type { RepoCatalog } from "./sources/repo-info";
import { fetchReviewContributions } from "./sources/reviews";
import type {
  DateWindow,
  DiscoveredCommit,
  GatheringMode,
  MemberActivity,
  PullRequestRecord,
  RepoActivity,
  RepoInfo,
} from "./types";
import { ConcurrencyLimiter, POOL_SIZES, collectPool } from "./worker-pool";

export interface GatherContext {
  client: RequestClient;
  catalog: RepoCatalog;
  classifier: CategoryClassifier;
  noise: NoiseTable;
  includePrivate?: boolean;
  /** Bounds per-commit and per-repository REST reads; share one across members of a run. */
  restLimiter?: ConcurrencyLimiter;
  debug?: boolean;
}

export type LimitedContext = GatherContext & { restLimiter: ConcurrencyLimiter };

/** Context whose REST limiter is set, falling back to one private to the caller. */
export function withRestLimiter(context: GatherContext): LimitedContext {
  return { ...context, restLimiter: context.restLimiter ?? new ConcurrencyLimiter(POOL_SIZES.stats) };
}

/** `collectPool` over the stats tier, each task holding a slot of the shared limiter. */
function collectLimited<TItem, TResult>(
  items: readonly TItem[],
  context: LimitedContext,
  task: (item: TItem) => Promise<TResult>
) {
  const limiter = context.restLimiter;
  return collectPool(items, limiter.limit, (item) => limiter.run(() => task(item)));
}

export interface GatherMemberParams {
  login: string;
  window: DateWindow;
  mode: GatheringMode;
  context: GatherContext;
}

export class MemberNotFoundError extends Error {
  constructor(readonly login: string) {
    super(`User '${login}' was not found or their profile is not readable`);
    this.name = "MemberNotFoundError";
  }
}

type Settled<T> = { status: "fulfilled"; value: T } | { status: "rejected"; error: unknown };

/** Values of the fulfilled tasks; failed ones are reported under debug and left out. */
function settledValues<T>(completions: ReadonlyArray<Settled<T[]>>, label: string, debug?: boolean): T[] {
  return completions.flatMap((completion) => {
    if (completion.status === "fulfilled") {
      return completion.value;
    }
    if (debug) {
      console.log(`[${label}] ${describeError(completion.error)}`);
    }
    return [];
  });
}

interface ForkBranch {
  fork: RepoInfo;
  branch: string;
}

/** Commits on user-looking branches of forks whose upstream the classifier knows. */
async function discoverForkBranchCommits(
  login: string,
  window: DateWindow,
  context: LimitedContext
): Promise<{ forks: RepoInfo[]; commits: DiscoveredCommit[] }> {
  const { client, classifier, debug } = context;
  const forks = await listUserForks({ client, login });
  const interesting = forks.filter((fork) => fork.parent !== null && classifier.classifyByRules(fork.parent) !== null);
  if (debug) {
    console.log(`[${login}] ${interesting.length}/${forks.length} forks have a known upstream`);
  }

  const branchLists = await collectLimited(interesting, context, async (fork) => {
    const branches = await listBranches({ client, repo: fork.nameWithOwner });
    return selectUserBranches(branches, login).map((branch): ForkBranch => ({ fork, branch }));
  });
  const targets = settledValues(branchLists, `${login} branches`, debug);

  const commitLists = await collectLimited(targets, context, ({ fork, branch }) =>
    listRepoCommits({
      client,
      repo: fork.nameWithOwner,
      author: login,
      window,
      branch,
      defaultBranch: fork.defaultBranch,
      source: "fork-branch",
    })
  );
  return { forks, commits: settledValues(commitLists, `${login} fork commits`, debug) };
}

/** The search index skips forks, so forks the summary lists are read directly. */
async function discoverForkHistory(
  login: string,
  window: DateWindow,
  summary: ContributionSummary,
  context: LimitedContext
): Promise<DiscoveredCommit[]> {
  const forks = summary.repositories.filter((entry) => entry.info.isFork).map((entry) => entry.info.nameWithOwner);
  const lists = await collectLimited(forks, context, (repo) =>
    listRepoCommits({ client: context.client, repo, author: login, window, source: "repo-history" })
  );
  return settledValues(lists, `${login} fork history`, context.debug);
}

interface RepoSeed extends RepoCommitTotals {
  pullRequests: number;
}

async function buildRepoActivities(
  seeds: readonly RepoSeed[],
  mode: GatheringMode,
  context: LimitedContext
): Promise<RepoActivity[]> {
  const infos = await context.catalog.lookup(seeds.map((seed) => seed.repo));
  const results = await collectLimited(seeds, context, async (seed) => {
    const info = infos.get(seed.repo) ?? null;
    const [category, language] = await Promise.all([
      context.classifier.classify(seed.repo),
      mode === "full" ? context.catalog.language(seed.repo) : Promise.resolve(info?.primaryLanguage ?? null),
    ]);
    const activity: RepoActivity = {
      name: seed.repo,
      commits: seed.commits,
      additions: seed.additions,
      deletions: seed.deletions,
      pullRequests: seed.pullRequests,
      category,
      language,
      description: info?.description ?? null,
      isFork: info?.isFork ?? false,
      parent: info?.parent ?? null,
    };
    return activity;
  });

  return sortRepos(
    results.map((result, index): RepoActivity => {
      if (result.status === "fulfilled") {
        return result.value;
      }
      const seed = seeds[index];
      if (context.debug) {
        console.log(`[${seed.repo}] metadata lookup failed: ${describeError(result.error)}`);
      }
      return {
        name: seed.repo,
        commits: seed.commits,
        additions: seed.additions,
        deletions: seed.deletions,
        pullRequests: seed.pullRequests,
        category: OTHER_CATEGORY,
        language: null,
        description: null,
        isFork: false,
        parent: null,
      };
    })
  );
}

function seedRepos(commitTotals: readonly RepoCommitTotals[], created: readonly PullRequestRecord[]): RepoSeed[] {
  const pullRequests = pullRequestsByRepo(created);
  const seeds = new Map<string, RepoSeed>();
  for (const total of commitTotals) {
    seeds.set(total.repo, { ...total, pullRequests: pullRequests.get(total.repo) ?? 0 });
  }
  for (const [repo, count] of pullRequests) {
    if (!seeds.has(repo)) {
      seeds.set(repo, { repo, commits: 0, additions: 0, deletions: 0, pullRequests: count });
    }
  }
  return Array.from(seeds.values());
}

async function gatherCommitsFull(
  login: string,
  window: DateWindow,
  summary: ContributionSummary,
  context: LimitedContext
): Promise<CommitAggregator> {
  const { client, catalog, debug } = context;
  const [search, forkBranches, history] = await Promise.all([
    searchCommits({ client, login, window, debug }),
    discoverForkBranchCommits(login, window, context),
    discoverForkHistory(login, window, summary, context),
  ]);
  await Promise.all(forkBranches.forks.map((fork) => catalog.remember(fork)));

  const discovered = [...search.commits, ...forkBranches.commits, ...history];
  const discoveringRepos = Array.from(new Set(discovered.map((commit) => commit.repo)));
  const repoInfo = await catalog.lookup(discoveringRepos);
  const parents = Array.from(repoInfo.values()).flatMap((info) => (info?.parent ? [info.parent] : []));
  for (const [repo, info] of await catalog.lookup(parents)) {
    repoInfo.set(repo, info);
  }
  for (const [repo, hint] of search.repos) {
    // Repositories the metadata batch could not read still carry what search reported.
    if (!repoInfo.get(repo)) {
      repoInfo.set(repo, hint);
    }
  }

  const aggregator = new CommitAggregator({
    subject: login,
    noise: context.noise,
    includePrivate: context.includePrivate,
    repoInfo,
  });
  aggregator.addAll(discovered);
  if (debug && aggregator.skipped.length > 0) {
    console.log(`[${login}] skipped commits from ${aggregator.skipped.join(", ")}`);
  }

  const stats = await collectLimited(aggregator.commits(), context, (record) =>
    fetchCommitStats({ client, repo: record.originRepo, sha: record.sha })
  );
  for (const result of stats) {
    if (result.status === "fulfilled") {
      aggregator.applyStats(result.item.sha, result.value);
    } else if (debug) {
      console.log(`[${result.item.originRepo}] stats for ${result.item.sha} failed: ${describeError(result.error)}`);
    }
  }
  return aggregator;
}

/**
 * Gathers one subject's activity. Full mode discovers individual commits
 * from search, fork branches and fork history and reads their line counts;
 * light mode takes per-repository commit counts from the contribution
 * summary instead.
 */
export async function gatherMemberActivity(params: GatherMemberParams): Promise<MemberActivity> {
  const { login, window, mode } = params;
  const context = withRestLimiter(params.context);
  const { client, catalog } = context;
  const summaryWindow = clampToYear(window);

  const summary = await fetchContributionSummary({ client, login, window: summaryWindow });
  if (!summary) {
    throw new MemberNotFoundError(login);
  }
  await Promise.all(summary.repositories.map((entry) => catalog.remember(entry.info)));

  const [created, reviewContributions] = await Promise.all([
    searchPullRequests({ client, login, window }),
    fetchReviewContributions({ client, login, window: summaryWindow }),
  ]);
  const reviewed = aggregateReviews(reviewContributions);

  let commitTotals: RepoCommitTotals[];
  let commitsAllBranches: number;
  let commitsDefaultBranch: number;

  if (mode === "full") {
    const aggregator = await gatherCommitsFull(login, window, summary, context);
    commitTotals = aggregator.repoTotals();
    commitsAllBranches = aggregator.size;
    commitsDefaultBranch = aggregator.defaultBranchCount();
  } else {
    const parents = summary.repositories.flatMap((entry) => (entry.info.parent ? [entry.info.parent] : []));
    commitTotals = aggregateContributionCounts(summary.repositories, {
      subject: login,
      noise: context.noise,
      includePrivate: context.includePrivate,
      repoInfo: await catalog.lookup(parents),
    });
    commitsAllBranches = commitTotals.reduce((sum, total) => sum + total.commits, 0);
    commitsDefaultBranch = commitsAllBranches;
  }

  const repos = await buildRepoActivities(seedRepos(commitTotals, created), mode, context);
  const additions = repos.reduce((sum, repo) => sum + repo.additions, 0);
  const deletions = repos.reduce((sum, repo) => sum + repo.deletions, 0);

  return Object.freeze({
    login: summary.login,
    realName: summary.realName,
    company: summary.company,
    window,
    totals: {
      commitsDefaultBranch,
      commitsAllBranches,
      pullRequestsCreated: created.length,
      pullRequestsReviewed: reviewed.length,
      reviewsReceived: created.reduce((sum, pullRequest) => sum + pullRequest.reviewCount, 0),
      issues: summary.issues,
      additions,
      deletions,
      reposContributed: repos.length,
    },
    repos,
    languages: languageBreakdown(repos),
    pullRequestsCreated: created,
    pullRequestsReviewed: reviewed,
    light: mode === "light",
    complete: true,
  });
}
