import type { Endpoints } from "@octokit/types";

import { MemoCache } from "../memo-cache";
import type { RequestClient } from "../request-client";
import type { RepoInfo } from "../types";
import { REPO_FIELDS, splitRepo, toRepoInfo, type RepoNode } from "./shared";

export const REPO_BATCH_SIZE = 50;
export const CATALOG_CAPACITY = 20_000;
/** C++ is reported when it makes up at least this share of a repository's bytes. */
export const CPP_LANGUAGE_SHARE = 0.1;

type LanguagesData = Endpoints["GET /repos/{owner}/{repo}/languages"]["response"]["data"];
type TopicsData = Endpoints["GET /repos/{owner}/{repo}/topics"]["response"]["data"];

export function buildRepoBatchQuery(count: number): string {
  const variables = Array.from({ length: count }, (_, index) => `$o${index}: String!, $n${index}: String!`).join(", ");
  const fields = Array.from(
    { length: count },
    (_, index) => `
    r${index}: repository(owner: $o${index}, name: $n${index}) {
      ${REPO_FIELDS}
    }`
  ).join("");
  return `query RepoBatch(${variables}) {${fields}\n}`;
}

/** A batch the API could not serve right now; its keys stay uncached so a later lookup retries. */
class BatchUnavailableError extends Error {
  constructor(readonly status: number | null) {
    super(`Repository batch unavailable${status !== null ? ` (HTTP ${status})` : ""}`);
    this.name = "BatchUnavailableError";
  }
}

/** The language credited to a repository from its byte counts. */
export function effectiveLanguage(bytes: Record<string, number>): string | null {
  const entries = Object.entries(bytes);
  const total = entries.reduce((sum, [, count]) => sum + count, 0);
  if (total === 0) {
    return null;
  }
  const cpp = bytes["C++"] ?? 0;
  if (cpp / total >= CPP_LANGUAGE_SHARE) {
    return "C++";
  }
  return entries.reduce((top, entry) => (entry[1] > top[1] ? entry : top))[0];
}

/**
 * Run-wide repository metadata. Lookups share in-flight requests, so a
 * repository is fetched at most once however many members touch it.
 * Missing repositories are batched up to fifty per GraphQL query.
 */
export class RepoCatalog {
  private readonly infos: MemoCache<string, RepoInfo | null>;
  private readonly languages: MemoCache<string, string | null>;

  constructor(
    private readonly client: RequestClient,
    private readonly batchSize: number = REPO_BATCH_SIZE,
    capacity: number = CATALOG_CAPACITY
  ) {
    this.infos = new MemoCache(capacity);
    this.languages = new MemoCache(capacity);
  }

  /** Seeds the catalog with metadata another query already returned. */
  remember(info: RepoInfo): Promise<RepoInfo | null> {
    return this.infos.getOrCompute(info.nameWithOwner.toLowerCase(), async () => info);
  }

  async lookup(repos: readonly string[]): Promise<Map<string, RepoInfo | null>> {
    const keys = Array.from(new Set(repos.map((repo) => repo.toLowerCase())));
    const missing = keys.filter((key) => !this.infos.has(key));

    const planned = new Map<string, Promise<RepoInfo | null>>();
    for (let offset = 0; offset < missing.length; offset += this.batchSize) {
      const chunk = missing.slice(offset, offset + this.batchSize);
      const batch = this.fetchBatch(chunk);
      chunk.forEach((key, index) => planned.set(key, batch.then((infos) => infos[index])));
    }

    const infos = await Promise.all(
      keys.map((key) =>
        this.infos
          .getOrCompute(key, () => planned.get(key) ?? this.fetchBatch([key]).then(([info]) => info))
          .catch((error: unknown) => {
            if (error instanceof BatchUnavailableError) {
              return null;
            }
            throw error;
          })
      )
    );
    const byKey = new Map(keys.map((key, index): [string, RepoInfo | null] => [key, infos[index]]));

    const resolved = new Map<string, RepoInfo | null>();
    for (const repo of repos) {
      resolved.set(repo, byKey.get(repo.toLowerCase()) ?? null);
    }
    return resolved;
  }

  async get(repo: string): Promise<RepoInfo | null> {
    const infos = await this.lookup([repo]);
    return infos.get(repo) ?? null;
  }

  private async fetchBatch(keys: string[]): Promise<Array<RepoInfo | null>> {
    const params: Record<string, string> = {};
    keys.forEach((key, index) => {
      const { owner, repo } = splitRepo(key);
      params[`o${index}`] = owner;
      params[`n${index}`] = repo;
    });

    const result = await this.client.request<Record<string, RepoNode | null>>({
      protocol: "graphql",
      endpoint: buildRepoBatchQuery(keys.length),
      params,
    });
    if (!result.ok) {
      if (result.errorClass === "transient") {
        throw new BatchUnavailableError(result.status);
      }
      return keys.map(() => null);
    }
    const body = result.body;
    return keys.map((_, index) => {
      const node = body[`r${index}`];
      return node ? toRepoInfo(node) : null;
    });
  }

  language(repo: string): Promise<string | null> {
    return this.languages.getOrCompute(repo.toLowerCase(), () => this.fetchLanguage(repo));
  }

  private async fetchLanguage(repo: string): Promise<string | null> {
    const { owner, repo: name } = splitRepo(repo);
    const result = await this.client.request<LanguagesData>({
      protocol: "rest",
      endpoint: "GET /repos/{owner}/{repo}/languages",
      params: { owner, repo: name },
    });
    if (result.ok) {
      const language = effectiveLanguage(result.body);
      if (language) {
        return language;
      }
    }
    const info = await this.get(repo);
    return info?.primaryLanguage ?? null;
  }

  async topics(repo: string): Promise<string[]> {
    const { owner, repo: name } = splitRepo(repo);
    const result = await this.client.request<TopicsData>({
      protocol: "rest",
      endpoint: "GET /repos/{owner}/{repo}/topics",
      params: { owner, repo: name },
    });
    return result.ok ? result.body.names : [];
  }
}
