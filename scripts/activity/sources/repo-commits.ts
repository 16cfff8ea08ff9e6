import type { Endpoints } from "@octokit/types";

import type { RequestClient } from "../request-client";
import type { CommitSource, DateWindow, DiscoveredCommit } from "../types";
import { PAGE_SIZE, loginOf, requireArray, splitRepo, windowTimestamps } from "./shared";

export const MAX_COMMIT_PAGES = 3;

type CommitListData = Endpoints["GET /repos/{owner}/{repo}/commits"]["response"]["data"];

interface ListRepoCommitsParams {
  client: RequestClient;
  repo: string;
  author: string;
  window: DateWindow;
  /** Branch to list; omitted lists the default branch. */
  branch?: string | null;
  defaultBranch?: string | null;
  source: Exclude<CommitSource, "search">;
  maxPages?: number;
}

/** Commits by `author` in one repository, optionally on one branch. */
export async function listRepoCommits({
  client,
  repo,
  author,
  window,
  branch,
  defaultBranch,
  source,
  maxPages = MAX_COMMIT_PAGES,
}: ListRepoCommitsParams): Promise<DiscoveredCommit[]> {
  const { owner, repo: name } = splitRepo(repo);
  const { from, to } = windowTimestamps(window);
  const branchTag = branch && branch !== defaultBranch ? branch : null;
  const commits: DiscoveredCommit[] = [];

  for (let page = 1; page <= maxPages; page += 1) {
    const result = await client.request<CommitListData>({
      protocol: "rest",
      endpoint: "GET /repos/{owner}/{repo}/commits",
      params: {
        owner,
        repo: name,
        author,
        since: from,
        until: to,
        per_page: PAGE_SIZE,
        page,
        ...(branch ? { sha: branch } : {}),
      },
    });
    if (!result.ok) {
      break;
    }

    const items = requireArray(result.body, "GET /repos/{owner}/{repo}/commits", "commits");
    for (const item of items) {
      commits.push({
        sha: item.sha,
        repo,
        authorLogin: loginOf(item.author),
        committedAt: item.commit.committer?.date ?? null,
        branch: branchTag,
        source,
      });
    }
    if (items.length < PAGE_SIZE) {
      break;
    }
  }

  return commits;
}
