export const UNAFFILIATED = "Unaffiliated";

const MENTION = /@([A-Za-z0-9][\w.-]*)/g;
const EDGE_PUNCTUATION = /^[\s,;&|/·-]+|[\s,;&|/·-]+$/g;

export interface CompanyInput {
  login: string;
  company: string | null;
}

export interface CompanyGroups {
  /** Group key → member logins, in input order. */
  groups: Record<string, string[]>;
  /** Member login → the groups they belong to. */
  memberGroups: Map<string, string[]>;
}

export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) => before + letter.toUpperCase());
}

interface ParsedCompany {
  handles: string[];
  plain: string;
}

function parseCompany(company: string | null): ParsedCompany {
  if (!company) {
    return { handles: [], plain: "" };
  }
  const handles = Array.from(company.matchAll(MENTION), (match) => match[1].replace(/[.-]+$/, "").toLowerCase());
  const plain = company.replace(MENTION, " ").replace(/\s+/g, " ").replace(EDGE_PUNCTUATION, "");
  return { handles, plain };
}

/**
 * Groups members by employer. `@org` mentions are the canonical form: plain
 * text that case-folds to a handle someone mentioned joins that handle's
 * group; other plain text forms its own title-cased group.
 */
export function normalizeCompanies(members: readonly CompanyInput[]): CompanyGroups {
  const parsed = members.map((member) => ({ login: member.login, ...parseCompany(member.company) }));
  const knownHandles = new Set(parsed.flatMap((entry) => entry.handles));

  const groups: Record<string, string[]> = {};
  const memberGroups = new Map<string, string[]>();

  for (const entry of parsed) {
    const keys = new Set(entry.handles.map((handle) => `@${handle}`));
    if (entry.plain.length > 0) {
      const folded = entry.plain.toLowerCase();
      keys.add(knownHandles.has(folded) ? `@${folded}` : titleCase(entry.plain));
    }
    if (keys.size === 0) {
      keys.add(UNAFFILIATED);
    }

    memberGroups.set(entry.login, Array.from(keys));
    for (const key of keys) {
      const logins = (groups[key] ??= []);
      if (!logins.includes(entry.login)) {
        logins.push(entry.login);
      }
    }
  }

  return { groups: sortGroups(groups), memberGroups };
}

/** Largest groups first, ties by name, `Unaffiliated` last. */
function sortGroups(groups: Record<string, string[]>): Record<string, string[]> {
  const keys = Object.keys(groups).sort((a, b) => {
    if (a === UNAFFILIATED || b === UNAFFILIATED) {
      return a === UNAFFILIATED ? 1 : -1;
    }
    return groups[b].length - groups[a].length || a.localeCompare(b);
  });
  return Object.fromEntries(keys.map((key) => [key, groups[key]]));
}
