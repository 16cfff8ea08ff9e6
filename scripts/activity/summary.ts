import Table from "cli-table3";

import type { CategoryClassifier } from "./categories";
import type { ActivityTotals, MemberActivity, OrganizationActivity, RepoActivity } from "./types";

export const SUMMARY_REPO_LIMIT = 15;

const plain = { head: [], border: [] };

export interface CategoryTotal {
  category: string;
  repos: number;
  commits: number;
  pullRequests: number;
}

/** Per-category sums in display order. */
export function categoryTotals(repos: readonly RepoActivity[], classifier: CategoryClassifier): CategoryTotal[] {
  const totals = new Map<string, CategoryTotal>();
  for (const repo of repos) {
    const entry = totals.get(repo.category) ?? { category: repo.category, repos: 0, commits: 0, pullRequests: 0 };
    entry.repos += 1;
    entry.commits += repo.commits;
    entry.pullRequests += repo.pullRequests;
    totals.set(repo.category, entry);
  }
  return classifier.orderCategories(totals.keys()).flatMap((category) => {
    const entry = totals.get(category);
    return entry ? [entry] : [];
  });
}

export function totalsRows(totals: ActivityTotals, light: boolean): string[][] {
  const commits = light
    ? [["Commits (contribution summary)", String(totals.commitsAllBranches)]]
    : [
        ["Commits (default branch)", String(totals.commitsDefaultBranch)],
        ["Commits (all branches)", String(totals.commitsAllBranches)],
        ["Lines", `+${totals.additions} / -${totals.deletions}`],
      ];
  return [
    ...commits,
    ["Pull requests opened", String(totals.pullRequestsCreated)],
    ["Pull requests reviewed", String(totals.pullRequestsReviewed)],
    ["Reviews received", String(totals.reviewsReceived)],
    ["Issues", String(totals.issues)],
    ["Repositories", String(totals.reposContributed)],
  ];
}

export function repoRows(repos: readonly RepoActivity[], limit = SUMMARY_REPO_LIMIT): string[][] {
  return repos
    .slice(0, limit)
    .map((repo) => [
      repo.name,
      repo.category,
      repo.language ?? "-",
      String(repo.commits),
      String(repo.pullRequests),
      `+${repo.additions} / -${repo.deletions}`,
    ]);
}

function renderTables(totals: ActivityTotals, repos: readonly RepoActivity[], light: boolean, classifier: CategoryClassifier) {
  const totalsTable = new Table({ style: plain });
  totalsTable.push(...totalsRows(totals, light));

  const categoryTable = new Table({ head: ["Category", "Repos", "Commits", "PRs"], style: plain });
  for (const entry of categoryTotals(repos, classifier)) {
    categoryTable.push([entry.category, entry.repos, entry.commits, entry.pullRequests]);
  }

  const repoTable = new Table({ head: ["Repository", "Category", "Language", "Commits", "PRs", "Lines"], style: plain });
  repoTable.push(...repoRows(repos));

  const sections = [totalsTable.toString(), categoryTable.toString(), repoTable.toString()];
  if (repos.length > SUMMARY_REPO_LIMIT) {
    sections.push(`… and ${repos.length - SUMMARY_REPO_LIMIT} more repositories in the output file`);
  }
  return sections.join("\n");
}

export function renderMemberSummary(activity: MemberActivity, classifier: CategoryClassifier): string {
  const heading = `${activity.login}${activity.realName ? ` (${activity.realName})` : ""}, ${activity.window.since} to ${activity.window.until}`;
  return `${heading}\n${renderTables(activity.totals, activity.repos, activity.light, classifier)}`;
}

export function renderOrganizationSummary(result: OrganizationActivity, classifier: CategoryClassifier): string {
  const { aggregate, scan } = result;
  const scope = result.team ? `${result.org}/${result.team}` : result.ownersOnly ? `${result.org} owners` : result.org;
  const lines = [
    `${scope}, ${result.window.since} to ${result.window.until}: ${result.memberResults.length} of ${result.candidates} members gathered (${scan.inactive.length} inactive)`,
    renderTables(aggregate.totals, aggregate.repos, aggregate.light, classifier),
  ];

  const companies = new Table({ head: ["Company", "Members"], style: plain });
  for (const [company, logins] of Object.entries(aggregate.companyGroups)) {
    companies.push([company, logins.length]);
  }
  lines.push(companies.toString());

  if (aggregate.failedMembers.length > 0) {
    lines.push(`⚠️  Incomplete data for ${aggregate.failedMembers.join(", ")}`);
  }
  return lines.join("\n");
}
