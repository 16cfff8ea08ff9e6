import { MalformedResponseError } from "../errors";
import type { DateWindow, RepoInfo } from "../types";

export const PAGE_SIZE = 100;

export interface RepoNode {
  nameWithOwner: string;
  description: string | null;
  isFork: boolean;
  isPrivate: boolean;
  parent: { nameWithOwner: string } | null;
  primaryLanguage: { name: string } | null;
  defaultBranchRef?: { name: string } | null;
}

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export const REPO_FIELDS = /* GraphQL */ `
  nameWithOwner
  description
  isFork
  isPrivate
  parent {
    nameWithOwner
  }
  primaryLanguage {
    name
  }
  defaultBranchRef {
    name
  }
`;

export function toRepoInfo(node: RepoNode): RepoInfo {
  return {
    nameWithOwner: node.nameWithOwner,
    description: node.description,
    isFork: node.isFork,
    isPrivate: node.isPrivate,
    parent: node.parent?.nameWithOwner ?? null,
    primaryLanguage: node.primaryLanguage?.name ?? null,
    defaultBranch: node.defaultBranchRef?.name ?? null,
  };
}

export function splitRepo(nameWithOwner: string): { owner: string; repo: string } {
  const [owner, repo] = nameWithOwner.split("/");
  if (!owner || !repo) {
    throw new Error(`Invalid repository name: ${nameWithOwner}`);
  }
  return { owner, repo };
}

/** GraphQL DateTime bounds covering whole days. */
export function windowTimestamps(window: DateWindow): { from: string; to: string } {
  return { from: `${window.since}T00:00:00Z`, to: `${window.until}T23:59:59Z` };
}

export function requireField<T>(value: T | null | undefined, endpoint: string, field: string): T {
  if (value === null || value === undefined) {
    throw new MalformedResponseError(endpoint, `missing '${field}'`);
  }
  return value;
}

export function requireArray<T>(value: T[] | null | undefined, endpoint: string, field: string): T[] {
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(endpoint, `'${field}' is not a list`);
  }
  return value;
}

/** Login of a REST actor field, which may be null or an empty object. */
export function loginOf(actor: object | null | undefined): string | null {
  return actor && "login" in actor && typeof actor.login === "string" ? actor.login : null;
}
