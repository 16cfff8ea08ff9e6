import type { Endpoints } from "@octokit/types";

import type { RequestClient } from "../request-client";
import type { DateWindow, DiscoveredCommit, RepoInfo } from "../types";
import { PAGE_SIZE, loginOf, requireArray } from "./shared";

/** The search index serves at most 1,000 results. */
export const MAX_SEARCH_PAGES = 10;

type SearchCommitsData = Endpoints["GET /search/commits"]["response"]["data"];

export interface CommitSearchResult {
  commits: DiscoveredCommit[];
  /** What the search index says about the repositories it returned; parents are unknown here. */
  repos: Map<string, RepoInfo>;
  totalCount: number;
}

interface SearchCommitsParams {
  client: RequestClient;
  login: string;
  window: DateWindow;
  maxPages?: number;
  debug?: boolean;
}

export async function searchCommits({
  client,
  login,
  window,
  maxPages = MAX_SEARCH_PAGES,
  debug,
}: SearchCommitsParams): Promise<CommitSearchResult> {
  const q = `author:${login} committer-date:${window.since}..${window.until}`;
  const commits: DiscoveredCommit[] = [];
  const repos = new Map<string, RepoInfo>();
  let totalCount = 0;

  for (let page = 1; page <= maxPages; page += 1) {
    const result = await client.request<SearchCommitsData>({
      protocol: "rest",
      endpoint: "GET /search/commits",
      params: { q, per_page: PAGE_SIZE, page },
    });
    if (!result.ok) {
      if (debug) {
        console.log(`[${login}] commit search stopped at page ${page} (${result.errorClass})`);
      }
      break;
    }

    const items = requireArray(result.body.items, "GET /search/commits", "items");
    totalCount = result.body.total_count;

    for (const item of items) {
      const repository = item.repository;
      commits.push({
        sha: item.sha,
        repo: repository.full_name,
        authorLogin: loginOf(item.author),
        committedAt: item.commit.committer?.date ?? null,
        branch: null,
        source: "search",
      });
      if (!repos.has(repository.full_name)) {
        repos.set(repository.full_name, {
          nameWithOwner: repository.full_name,
          description: repository.description,
          isFork: repository.fork,
          isPrivate: repository.private,
          parent: null,
          primaryLanguage: null,
        });
      }
    }

    if (items.length < PAGE_SIZE || page * PAGE_SIZE >= totalCount) {
      break;
    }
  }

  if (debug) {
    console.log(`[${login}] commit search: ${commits.length}/${totalCount} commits in ${repos.size} repos`);
  }
  return { commits, repos, totalCount };
}
