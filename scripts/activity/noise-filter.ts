import type { FlagshipRule, NoiseTable } from "./config";
import type { RepoInfo } from "./types";

export interface SkipContext {
  /** Login whose activity is gathered; their own repositories are never noise. */
  subject?: string | null;
  info?: Pick<RepoInfo, "description" | "isPrivate" | "parent"> | null;
  includePrivate?: boolean;
}

function splitName(repo: string): { owner: string; name: string } {
  const slash = repo.indexOf("/");
  return slash === -1 ? { owner: "", name: repo } : { owner: repo.slice(0, slash), name: repo.slice(slash + 1) };
}

function looksLikeCopy(flagship: FlagshipRule, name: string, parent: string | null, description: string | null): boolean {
  if (flagship.substrings.some((fragment) => name.includes(fragment))) {
    return true;
  }
  if (parent && flagship.canonical.includes(parent)) {
    return true;
  }
  if (description) {
    const normalized = description.trim().toLowerCase();
    if (flagship.descriptions.includes(normalized)) {
      return true;
    }
    if (flagship.descriptionKeywords.some((keyword) => normalized.includes(keyword))) {
      return true;
    }
  }
  return false;
}

/**
 * Whether commits found in `repo` should be ignored: profile repositories,
 * private repositories unless asked for, and mirrors or renamed copies of
 * large projects whose history floods commit search.
 */
export function shouldSkipRepo(repo: string | null | undefined, table: NoiseTable, context: SkipContext = {}): boolean {
  if (!repo) {
    return true;
  }

  const key = repo.toLowerCase();
  const { owner, name } = splitName(key);
  const subject = context.subject?.toLowerCase() ?? null;

  if (context.info?.isPrivate && !context.includePrivate) {
    return true;
  }
  if (subject !== null && owner === subject && name === subject) {
    return true;
  }
  if (table.blocklist.includes(key)) {
    return true;
  }
  if (table.flagships.some((flagship) => flagship.canonical.includes(key))) {
    return false;
  }
  if (subject !== null && owner === subject) {
    return false;
  }

  const parent = context.info?.parent?.toLowerCase() ?? null;
  const description = context.info?.description ?? null;
  return table.flagships.some((flagship) => looksLikeCopy(flagship, name, parent, description));
}
