import { UNAFFILIATED, normalizeCompanies } from "./companies";
import { mergePullRequests } from "./review-aggregator";
import type {
  ActivityTotals,
  DateWindow,
  LanguageStat,
  MemberActivity,
  MemberDisplay,
  OrgAggregateResult,
  RepoActivity,
} from "./types";

export function emptyTotals(): ActivityTotals {
  return {
    commitsDefaultBranch: 0,
    commitsAllBranches: 0,
    pullRequestsCreated: 0,
    pullRequestsReviewed: 0,
    reviewsReceived: 0,
    issues: 0,
    additions: 0,
    deletions: 0,
    reposContributed: 0,
  };
}

/** What a member contributes when gathering failed: nothing, flagged incomplete. */
export function emptyMemberActivity(
  login: string,
  window: DateWindow,
  failure?: string,
  options: { light?: boolean } = {}
): MemberActivity {
  return Object.freeze({
    login,
    realName: null,
    company: null,
    window,
    totals: emptyTotals(),
    repos: [],
    languages: [],
    pullRequestsCreated: [],
    pullRequestsReviewed: [],
    light: options.light ?? false,
    complete: failure === undefined,
    ...(failure !== undefined ? { failure } : {}),
  });
}

function addCount(map: Record<string, Record<string, number>>, key: string, login: string, count: number) {
  if (count <= 0) {
    return;
  }
  const row = (map[key] ??= {});
  row[login] = (row[login] ?? 0) + count;
}

export function sortRepos(repos: Iterable<RepoActivity>): RepoActivity[] {
  return Array.from(repos).sort(
    (a, b) => b.commits - a.commits || b.pullRequests - a.pullRequests || a.name.localeCompare(b.name)
  );
}

/** Commit-weighted language totals, largest first. Repositories without a language are left out. */
export function languageBreakdown(repos: Iterable<RepoActivity>): LanguageStat[] {
  const stats = new Map<string, LanguageStat>();
  for (const repo of repos) {
    if (!repo.language || repo.commits === 0) {
      continue;
    }
    const stat = stats.get(repo.language) ?? { language: repo.language, commits: 0, additions: 0, deletions: 0, repos: 0 };
    stat.commits += repo.commits;
    stat.additions += repo.additions;
    stat.deletions += repo.deletions;
    stat.repos += 1;
    stats.set(repo.language, stat);
  }
  return Array.from(stats.values()).sort((a, b) => b.commits - a.commits || a.language.localeCompare(b.language));
}

/**
 * Folds finished member results into the organization view. Call only once
 * every member task has settled.
 */
export function aggregateOrganization(members: readonly MemberActivity[]): OrgAggregateResult {
  const totals = emptyTotals();
  const repos = new Map<string, RepoActivity>();
  const repoMemberCommits: Record<string, Record<string, number>> = {};
  const languageMemberCommits: Record<string, Record<string, number>> = {};
  const failedMembers: string[] = [];

  for (const member of members) {
    if (member.failure !== undefined) {
      failedMembers.push(member.login);
    }

    totals.commitsDefaultBranch += member.totals.commitsDefaultBranch;
    totals.commitsAllBranches += member.totals.commitsAllBranches;
    totals.pullRequestsCreated += member.totals.pullRequestsCreated;
    totals.pullRequestsReviewed += member.totals.pullRequestsReviewed;
    totals.reviewsReceived += member.totals.reviewsReceived;
    totals.issues += member.totals.issues;
    totals.additions += member.totals.additions;
    totals.deletions += member.totals.deletions;

    for (const repo of member.repos) {
      const existing = repos.get(repo.name);
      if (existing) {
        existing.commits += repo.commits;
        existing.additions += repo.additions;
        existing.deletions += repo.deletions;
        existing.pullRequests += repo.pullRequests;
        existing.language ??= repo.language;
        existing.description ??= repo.description;
      } else {
        repos.set(repo.name, { ...repo });
      }

      addCount(repoMemberCommits, repo.name, member.login, repo.commits);
      if (repo.language) {
        addCount(languageMemberCommits, repo.language, member.login, repo.commits);
      }
    }
  }

  const pullRequestsCreated = mergePullRequests(...members.map((member) => member.pullRequestsCreated));
  const pullRequestsReviewed = mergePullRequests(...members.map((member) => member.pullRequestsReviewed));
  totals.reposContributed = repos.size;

  const { groups, memberGroups } = normalizeCompanies(members.map(({ login, company }) => ({ login, company })));
  const display: Record<string, MemberDisplay> = {};
  for (const member of members) {
    display[member.login] = {
      realName: member.realName,
      company: (memberGroups.get(member.login) ?? [UNAFFILIATED]).join(", "),
    };
  }

  return {
    totals,
    repos: sortRepos(repos.values()),
    languages: languageBreakdown(repos.values()),
    pullRequestsCreated,
    pullRequestsReviewed,
    repoMemberCommits,
    languageMemberCommits,
    companyGroups: groups,
    members: display,
    failedMembers,
    light: members.some((member) => member.light),
  };
}
