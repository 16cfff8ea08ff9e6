import type { CategoryTable, NamePatterns } from "./config";
import { RateLimitExceededError, describeError } from "./errors";
import { MemoCache } from "./memo-cache";

export const OTHER_CATEGORY = "Other";

export interface RepoName {
  /** Lowercased `owner/name`, or the bare name when there is no owner. */
  full: string;
  owner: string;
  base: string;
}

export interface CategoryRule {
  name: string;
  label: string;
  test: (repo: RepoName) => boolean;
}

export function parseRepoName(repo: string): RepoName {
  const full = repo.trim().toLowerCase();
  const slash = full.indexOf("/");
  if (slash === -1) {
    return { full, owner: "", base: full };
  }
  return { full, owner: full.slice(0, slash), base: full.slice(slash + 1) };
}

export function matchesPatterns(name: string, patterns: NamePatterns): boolean {
  const value = name.toLowerCase();

  if (patterns.excludePrefix?.some((prefix) => value.startsWith(prefix))) {
    return false;
  }
  if (patterns.excludeContains?.some((fragment) => value.includes(fragment))) {
    return false;
  }

  return (
    (patterns.exact?.includes(value) ?? false) ||
    (patterns.prefix?.some((prefix) => value.startsWith(prefix)) ?? false) ||
    (patterns.suffix?.some((suffix) => value.endsWith(suffix)) ?? false) ||
    (patterns.contains?.some((fragment) => value.includes(fragment)) ?? false)
  );
}

/**
 * Compiles the category table into the ordered rule list. First match wins:
 * explicit repositories, explicit base names, standards organizations (their
 * scoped patterns before their default), other organizations, then general
 * name patterns.
 */
export function buildCategoryRules(table: CategoryTable): CategoryRule[] {
  const rules: CategoryRule[] = [];
  const explicit = Object.entries(table.explicit);

  for (const [key, label] of explicit) {
    rules.push({ name: `explicit:${key}`, label, test: (repo) => repo.full === key });
  }
  for (const [key, label] of explicit) {
    const base = parseRepoName(key).base;
    rules.push({ name: `explicit-base:${base}`, label, test: (repo) => repo.base === base });
  }

  for (const [org, rule] of Object.entries(table.standardsOrgs)) {
    rule.patterns.forEach((pattern, index) => {
      rules.push({
        name: `standards:${org}:${index}`,
        label: pattern.label,
        test: (repo) => repo.owner === org && matchesPatterns(repo.base, pattern),
      });
    });
    rules.push({ name: `standards:${org}`, label: rule.label, test: (repo) => repo.owner === org });
  }

  for (const [org, label] of Object.entries(table.orgs)) {
    rules.push({ name: `org:${org}`, label, test: (repo) => repo.owner === org });
  }

  table.patterns.forEach((pattern, index) => {
    rules.push({ name: `pattern:${index}`, label: pattern.label, test: (repo) => matchesPatterns(repo.base, pattern) });
  });

  return rules;
}

export interface CategoryClassifierOptions {
  /** Topic lookup for repositories no rule matches; omitted means no topic fallback. */
  fetchTopics?: (repo: string) => Promise<string[]>;
  cacheSize?: number;
  debug?: boolean;
}

export class CategoryClassifier {
  private readonly rules: CategoryRule[];
  private readonly topicCache: MemoCache<string, string[]>;

  constructor(private readonly table: CategoryTable, private readonly options: CategoryClassifierOptions = {}) {
    this.rules = buildCategoryRules(table);
    this.topicCache = new MemoCache(options.cacheSize);
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  classifyByRules(repo: string): string | null {
    const name = parseRepoName(repo);
    if (name.full.length === 0) {
      return null;
    }
    return this.rules.find((rule) => rule.test(name))?.label ?? null;
  }

  categoryFromTopics(topics: readonly string[] | null | undefined): string | null {
    for (const topic of topics ?? []) {
      const label = this.table.topics[topic.toLowerCase()];
      if (label) {
        return label;
      }
    }
    return null;
  }

  async classify(repo: string): Promise<string> {
    const byRule = this.classifyByRules(repo);
    if (byRule) {
      return byRule;
    }

    const { fetchTopics } = this.options;
    const name = parseRepoName(repo);
    if (!fetchTopics || name.owner.length === 0) {
      return OTHER_CATEGORY;
    }

    try {
      const topics = await this.topicCache.getOrCompute(name.full, () => fetchTopics(repo));
      return this.categoryFromTopics(topics) ?? OTHER_CATEGORY;
    } catch (error) {
      if (error instanceof RateLimitExceededError) {
        throw error;
      }
      if (this.options.debug) {
        console.warn(`⚠️  Topic lookup failed for ${repo}: ${describeError(error)}`);
      }
      return OTHER_CATEGORY;
    }
  }

  /** Priority labels in table order, then the rest alphabetically, `Other` last. */
  orderCategories(labels: Iterable<string>): string[] {
    const present = new Set(labels);
    const ordered = this.table.priority.filter((label) => present.has(label));
    const prioritized = new Set(ordered);
    const rest = Array.from(present)
      .filter((label) => !prioritized.has(label) && label !== OTHER_CATEGORY)
      .sort((a, b) => a.localeCompare(b));
    ordered.push(...rest);
    if (present.has(OTHER_CATEGORY)) {
      ordered.push(OTHER_CATEGORY);
    }
    return ordered;
  }
}
