import type { RequestClient } from "../request-client";
import type { DateWindow, RepoInfo } from "../types";
import { REPO_FIELDS, toRepoInfo, windowTimestamps, type RepoNode } from "./shared";

export const USER_SUMMARY_BATCH_SIZE = 10;

export interface RepoContributionCount {
  info: RepoInfo;
  commits: number;
}

export interface ContributionSummary {
  login: string;
  realName: string | null;
  company: string | null;
  totalCommits: number;
  restrictedContributions: number;
  issues: number;
  pullRequests: number;
  reviews: number;
  repositories: RepoContributionCount[];
}

interface ContributionCollectionTotals {
  totalCommitContributions: number;
  totalIssueContributions: number;
  totalPullRequestContributions: number;
  totalPullRequestReviewContributions: number;
  restrictedContributionsCount: number;
}

interface ContributionSummaryResponse {
  user: {
    login: string;
    name: string | null;
    company: string | null;
    contributionsCollection: ContributionCollectionTotals & {
      commitContributionsByRepository: Array<{
        repository: RepoNode;
        contributions: { totalCount: number };
      }>;
    };
  } | null;
}

const CONTRIBUTION_SUMMARY_QUERY = /* GraphQL */ `
  query ContributionSummary($login: String!, $from: DateTime!, $to: DateTime!) {
    user(login: $login) {
      login
      name
      company
      contributionsCollection(from: $from, to: $to) {
        totalCommitContributions
        totalIssueContributions
        totalPullRequestContributions
        totalPullRequestReviewContributions
        restrictedContributionsCount
        commitContributionsByRepository(maxRepositories: 100) {
          repository {
            ${REPO_FIELDS}
          }
          contributions {
            totalCount
          }
        }
      }
    }
  }
`;

interface FetchContributionSummaryParams {
  client: RequestClient;
  login: string;
  /** Must span at most one year. */
  window: DateWindow;
}

/** Profile and contribution totals for one user; null when the user cannot be read. */
export async function fetchContributionSummary({
  client,
  login,
  window,
}: FetchContributionSummaryParams): Promise<ContributionSummary | null> {
  const result = await client.request<ContributionSummaryResponse>({
    protocol: "graphql",
    endpoint: CONTRIBUTION_SUMMARY_QUERY,
    params: { login, ...windowTimestamps(window) },
  });
  if (!result.ok || !result.body.user) {
    return null;
  }

  const { user } = result.body;
  const collection = user.contributionsCollection;
  return {
    login: user.login,
    realName: user.name,
    company: user.company,
    totalCommits: collection.totalCommitContributions,
    restrictedContributions: collection.restrictedContributionsCount,
    issues: collection.totalIssueContributions,
    pullRequests: collection.totalPullRequestContributions,
    reviews: collection.totalPullRequestReviewContributions,
    repositories: collection.commitContributionsByRepository.map((entry) => ({
      info: toRepoInfo(entry.repository),
      commits: entry.contributions.totalCount,
    })),
  };
}

type UserSummariesResponse = Record<
  string,
  { login: string; contributionsCollection: ContributionCollectionTotals } | null
>;

export function buildUserSummariesQuery(count: number): string {
  const variables = Array.from({ length: count }, (_, index) => `$login${index}: String!`).join(", ");
  const fields = Array.from(
    { length: count },
    (_, index) => `
    user${index}: user(login: $login${index}) {
      login
      contributionsCollection(from: $from, to: $to) {
        totalCommitContributions
        totalIssueContributions
        totalPullRequestContributions
        totalPullRequestReviewContributions
        restrictedContributionsCount
      }
    }`
  ).join("");
  return `query UserSummaries($from: DateTime!, $to: DateTime!, ${variables}) {${fields}\n}`;
}

interface FetchUserSummariesParams {
  client: RequestClient;
  logins: string[];
  window: DateWindow;
}

/**
 * Total contributions per login for up to ten users in one query. A login
 * mapped to null does not resolve to a user. Returns null when the batch
 * itself failed.
 */
export async function fetchUserContributionTotals({
  client,
  logins,
  window,
}: FetchUserSummariesParams): Promise<Map<string, number | null> | null> {
  if (logins.length === 0) {
    return new Map();
  }
  if (logins.length > USER_SUMMARY_BATCH_SIZE) {
    throw new Error(`At most ${USER_SUMMARY_BATCH_SIZE} logins per summary batch, got ${logins.length}`);
  }

  const params: Record<string, string> = { ...windowTimestamps(window) };
  logins.forEach((login, index) => {
    params[`login${index}`] = login;
  });

  const result = await client.request<UserSummariesResponse>({
    protocol: "graphql",
    endpoint: buildUserSummariesQuery(logins.length),
    params,
  });
  if (!result.ok) {
    return null;
  }

  const totals = new Map<string, number | null>();
  logins.forEach((login, index) => {
    const user = result.body[`user${index}`];
    if (!user) {
      totals.set(login, null);
      return;
    }
    const collection = user.contributionsCollection;
    totals.set(
      login,
      collection.totalCommitContributions +
        collection.totalIssueContributions +
        collection.totalPullRequestContributions +
        collection.totalPullRequestReviewContributions +
        collection.restrictedContributionsCount
    );
  });
  return totals;
}
