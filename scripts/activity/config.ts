import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { DateWindow } from "./types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const PROJECT_ROOT = path.resolve(__dirname, "..", "..");
export const DEFAULT_CATEGORIES_PATH = path.join(PROJECT_ROOT, "config", "categories.json");
export const DEFAULT_NOISE_PATH = path.join(PROJECT_ROOT, "config", "noise.json");
export const DEFAULT_DAYS = 7;
export const MAX_SUMMARY_DAYS = 365;

export interface NamePatterns {
  exact?: string[];
  prefix?: string[];
  suffix?: string[];
  contains?: string[];
  excludePrefix?: string[];
  excludeContains?: string[];
}

export interface PatternRule extends NamePatterns {
  label: string;
}

export interface StandardsOrgRule {
  label: string;
  patterns: PatternRule[];
}

export interface CategoryTable {
  /** Labels listed first when categories are ordered for display. */
  priority: string[];
  explicit: Record<string, string>;
  standardsOrgs: Record<string, StandardsOrgRule>;
  orgs: Record<string, string>;
  patterns: PatternRule[];
  topics: Record<string, string>;
}

export interface FlagshipRule {
  name: string;
  /** Real homes of the project; never treated as noise. */
  canonical: string[];
  substrings: string[];
  descriptions: string[];
  descriptionKeywords: string[];
}

export interface NoiseTable {
  blocklist: string[];
  flagships: FlagshipRule[];
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown, field: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`'${field}' must be an array of strings`);
  }
  return value;
}

function stringRecord(value: unknown, field: string): Record<string, string> {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw new Error(`'${field}' must be an object of strings`);
  }
  const record: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new Error(`'${field}.${key}' must be a string`);
    }
    record[key] = entry;
  }
  return record;
}

function requiredString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`'${field}' must be a non-empty string`);
  }
  return value;
}

function lowered(values: string[]): string[] {
  return values.map((value) => value.toLowerCase());
}

function parsePatternRule(value: unknown, field: string): PatternRule {
  if (!isObject(value)) {
    throw new Error(`'${field}' must be an object`);
  }
  return {
    label: requiredString(value.label, `${field}.label`),
    exact: lowered(stringArray(value.exact, `${field}.exact`)),
    prefix: lowered(stringArray(value.prefix, `${field}.prefix`)),
    suffix: lowered(stringArray(value.suffix, `${field}.suffix`)),
    contains: lowered(stringArray(value.contains, `${field}.contains`)),
    excludePrefix: lowered(stringArray(value.excludePrefix, `${field}.excludePrefix`)),
    excludeContains: lowered(stringArray(value.excludeContains, `${field}.excludeContains`)),
  };
}

function parsePatternRules(value: unknown, field: string): PatternRule[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error(`'${field}' must be an array`);
  }
  return value.map((entry, index) => parsePatternRule(entry, `${field}[${index}]`));
}

export function parseCategoryTable(raw: unknown): CategoryTable {
  if (!isObject(raw)) {
    throw new Error("category table must be a JSON object");
  }

  const standardsOrgs: Record<string, StandardsOrgRule> = {};
  const rawStandards = raw.standardsOrgs ?? {};
  if (!isObject(rawStandards)) {
    throw new Error("'standardsOrgs' must be an object");
  }
  for (const [org, entry] of Object.entries(rawStandards)) {
    if (!isObject(entry)) {
      throw new Error(`'standardsOrgs.${org}' must be an object`);
    }
    standardsOrgs[org.toLowerCase()] = {
      label: requiredString(entry.label, `standardsOrgs.${org}.label`),
      patterns: parsePatternRules(entry.patterns, `standardsOrgs.${org}.patterns`),
    };
  }

  const lowerKeys = (record: Record<string, string>) =>
    Object.fromEntries(Object.entries(record).map(([key, label]) => [key.toLowerCase(), label]));

  return {
    priority: stringArray(raw.priority, "priority"),
    explicit: lowerKeys(stringRecord(raw.explicit, "explicit")),
    standardsOrgs,
    orgs: lowerKeys(stringRecord(raw.orgs, "orgs")),
    patterns: parsePatternRules(raw.patterns, "patterns"),
    topics: lowerKeys(stringRecord(raw.topics, "topics")),
  };
}

export function parseNoiseTable(raw: unknown): NoiseTable {
  if (!isObject(raw)) {
    throw new Error("noise table must be a JSON object");
  }
  const rawFlagships = raw.flagships ?? [];
  if (!Array.isArray(rawFlagships)) {
    throw new Error("'flagships' must be an array");
  }

  return {
    blocklist: lowered(stringArray(raw.blocklist, "blocklist")),
    flagships: rawFlagships.map((entry: unknown, index) => {
      const field = `flagships[${index}]`;
      if (!isObject(entry)) {
        throw new Error(`'${field}' must be an object`);
      }
      return {
        name: requiredString(entry.name, `${field}.name`),
        canonical: lowered(stringArray(entry.canonical, `${field}.canonical`)),
        substrings: lowered(stringArray(entry.substrings, `${field}.substrings`)),
        descriptions: lowered(stringArray(entry.descriptions, `${field}.descriptions`)).map((text) => text.trim()),
        descriptionKeywords: lowered(stringArray(entry.descriptionKeywords, `${field}.descriptionKeywords`)),
      };
    }),
  };
}

async function readTable<T>(filePath: string, parse: (raw: unknown) => T): Promise<T> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Rule table not found: ${resolved}`);
  }
  const raw: unknown = await fs.readJson(resolved);
  try {
    return parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid rule table ${resolved}: ${reason}`);
  }
}

export function loadCategoryTable(filePath: string = DEFAULT_CATEGORIES_PATH): Promise<CategoryTable> {
  return readTable(filePath, parseCategoryTable);
}

export function loadNoiseTable(filePath: string = DEFAULT_NOISE_PATH): Promise<NoiseTable> {
  return readTable(filePath, parseNoiseTable);
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function parseIsoDate(value: string, field: string): Date {
  const parsed = new Date(`${value}T00:00:00Z`);
  if (!ISO_DATE.test(value) || Number.isNaN(parsed.getTime()) || toIsoDate(parsed) !== value) {
    throw new Error(`--${field} must be a date in YYYY-MM-DD form, got '${value}'`);
  }
  return parsed;
}

export function shiftDate(value: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(value, "date").getTime() + days * DAY_MS));
}

export function windowDays(window: DateWindow): number {
  return Math.round((parseIsoDate(window.until, "until").getTime() - parseIsoDate(window.since, "since").getTime()) / DAY_MS);
}

export interface WindowOptions {
  since?: string;
  until?: string;
  days?: number;
}

/** `--since/--until` win over `--days`; `until` defaults to today (UTC). */
export function resolveWindow(options: WindowOptions, today: Date = new Date()): DateWindow {
  const until = options.until ?? toIsoDate(today);
  parseIsoDate(until, "until");

  let since: string;
  if (options.since) {
    since = options.since;
    parseIsoDate(since, "since");
  } else {
    const days = options.days ?? DEFAULT_DAYS;
    if (!Number.isInteger(days) || days < 1) {
      throw new Error(`--days must be a positive integer, got '${days}'`);
    }
    since = shiftDate(until, -days);
  }

  if (since > until) {
    throw new Error(`--since (${since}) is after --until (${until})`);
  }
  return { since, until };
}

/**
 * Contribution summaries reject spans longer than a year. Both ends are whole
 * days, so the window keeps at most `MAX_SUMMARY_DAYS` calendar days.
 */
export function clampToYear(window: DateWindow): DateWindow {
  if (windowDays(window) < MAX_SUMMARY_DAYS) {
    return window;
  }
  return { since: shiftDate(window.until, 1 - MAX_SUMMARY_DAYS), until: window.until };
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.ACTIVITY_DEBUG?.toLowerCase();
  return value === "1" || value === "true";
}

export function requireToken(env: NodeJS.ProcessEnv = process.env): string {
  const token = env.GITHUB_TOKEN;
  if (!token) {
    throw new Error("GITHUB_TOKEN is required (set it in the environment or in .env)");
  }
  return token;
}
