import type { Endpoints } from "@octokit/types";

import type { RequestClient } from "../request-client";
import type { RepoInfo } from "../types";
import { PAGE_SIZE, REPO_FIELDS, requireArray, splitRepo, toRepoInfo, type PageInfo, type RepoNode } from "./shared";

export const MAX_FORK_PAGES = 3;
export const MAX_BRANCH_PAGES = 3;
/** Below this many branches every non-upstream branch is scanned. */
export const SMALL_FORK_BRANCH_LIMIT = 20;

const UPSTREAM_BRANCH_PREFIXES = ["release", "dependabot/", "renovate/", "gh-pages", "gh-readonly-queue/"];
const DEFAULT_BRANCH_NAMES = ["main", "master"];
const USER_BRANCH_PREFIXES = ["eng/", "fix/", "feat/", "feature/", "bugfix/", "hotfix/", "patch-", "wip/", "dev/", "topic/"];

/**
 * Picks the branches of a fork likely to hold the user's own work. Prefix
 * matching only: it can miss renamed branches and include upstream ones.
 */
export function selectUserBranches(branches: readonly string[], login: string): string[] {
  const own = branches.filter((branch) => {
    const lower = branch.toLowerCase();
    return !UPSTREAM_BRANCH_PREFIXES.some((prefix) => lower.startsWith(prefix));
  });
  if (branches.length <= SMALL_FORK_BRANCH_LIMIT) {
    return own;
  }

  const user = login.toLowerCase();
  return own.filter((branch) => {
    const lower = branch.toLowerCase();
    return (
      DEFAULT_BRANCH_NAMES.includes(lower) ||
      USER_BRANCH_PREFIXES.some((prefix) => lower.startsWith(prefix)) ||
      lower.startsWith(`${user}/`) ||
      lower.startsWith(`${user}-`)
    );
  });
}

interface UserForksResponse {
  user: {
    repositories: {
      nodes: RepoNode[];
      pageInfo: PageInfo;
    };
  } | null;
}

const USER_FORKS_QUERY = /* GraphQL */ `
  query UserForks($login: String!, $cursor: String) {
    user(login: $login) {
      repositories(first: 100, after: $cursor, isFork: true, ownerAffiliations: OWNER, orderBy: { field: PUSHED_AT, direction: DESC }) {
        nodes {
          ${REPO_FIELDS}
        }
        pageInfo {
          hasNextPage
          endCursor
        }
      }
    }
  }
`;

interface ListUserForksParams {
  client: RequestClient;
  login: string;
  maxPages?: number;
}

export async function listUserForks({ client, login, maxPages = MAX_FORK_PAGES }: ListUserForksParams): Promise<RepoInfo[]> {
  const forks: RepoInfo[] = [];
  let cursor: string | null = null;

  for (let page = 0; page < maxPages; page += 1) {
    const result = await client.request<UserForksResponse>({
      protocol: "graphql",
      endpoint: USER_FORKS_QUERY,
      params: { login, cursor },
    });
    if (!result.ok || !result.body.user) {
      break;
    }

    const connection: NonNullable<UserForksResponse["user"]>["repositories"] = result.body.user.repositories;
    forks.push(...connection.nodes.map(toRepoInfo));
    if (!connection.pageInfo.hasNextPage) {
      break;
    }
    cursor = connection.pageInfo.endCursor;
  }

  return forks;
}

type BranchListData = Endpoints["GET /repos/{owner}/{repo}/branches"]["response"]["data"];

interface ListBranchesParams {
  client: RequestClient;
  repo: string;
  maxPages?: number;
}

export async function listBranches({ client, repo, maxPages = MAX_BRANCH_PAGES }: ListBranchesParams): Promise<string[]> {
  const branches: string[] = [];
  const { owner, repo: name } = splitRepo(repo);

  for (let page = 1; page <= maxPages; page += 1) {
    const result = await client.request<BranchListData>({
      protocol: "rest",
      endpoint: "GET /repos/{owner}/{repo}/branches",
      params: { owner, repo: name, per_page: PAGE_SIZE, page },
    });
    if (!result.ok) {
      break;
    }
    const items = requireArray(result.body, "GET /repos/{owner}/{repo}/branches", "branches");
    branches.push(...items.map((branch) => branch.name));
    if (items.length < PAGE_SIZE) {
      break;
    }
  }

  return branches;
}
