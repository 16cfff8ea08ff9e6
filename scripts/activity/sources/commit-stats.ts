import type { Endpoints } from "@octokit/types";

import type { RequestClient } from "../request-client";
import type { CommitStats } from "../types";
import { splitRepo } from "./shared";

type CommitData = Endpoints["GET /repos/{owner}/{repo}/commits/{ref}"]["response"]["data"];

interface FetchCommitStatsParams {
  client: RequestClient;
  /** Repository the commit lives in, which may be a fork. */
  repo: string;
  sha: string;
}

/** Line counts for one commit; null when they could not be read. */
export async function fetchCommitStats({ client, repo, sha }: FetchCommitStatsParams): Promise<CommitStats | null> {
  const { owner, repo: name } = splitRepo(repo);
  const result = await client.request<CommitData>({
    protocol: "rest",
    endpoint: "GET /repos/{owner}/{repo}/commits/{ref}",
    params: { owner, repo: name, ref: sha },
  });
  if (!result.ok || !result.body.stats) {
    return null;
  }
  return {
    additions: result.body.stats.additions ?? 0,
    deletions: result.body.stats.deletions ?? 0,
  };
}
