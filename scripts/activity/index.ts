#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import fs from "fs-extra";
import path from "node:path";
import readline from "node:readline/promises";
import { Octokit } from "@octokit/rest";

import { CategoryClassifier } from "./categories";
import { validateScope, type ScopeOptions } from "./cli-options";
import {
  DEFAULT_CATEGORIES_PATH,
  DEFAULT_DAYS,
  DEFAULT_NOISE_PATH,
  PROJECT_ROOT,
  isDebugEnabled,
  loadCategoryTable,
  loadNoiseTable,
  requireToken,
  resolveWindow,
} from "./config";
import { RateLimitExceededError } from "./errors";
import { gatherMemberActivity, type GatherContext } from "./member-activity";
import { OctokitTransport, SCRAPE_BASE_URL } from "./octokit-transport";
import { RunCancelledError, gatherOrganizationActivity } from "./organization";
import { RateLimitBudget } from "./rate-budget";
import { DEFAULT_TIMEOUT_MS, RetryingRequestClient } from "./request-client";
import { RepoCatalog } from "./sources/repo-info";
import { renderMemberSummary, renderOrganizationSummary } from "./summary";
import type { DateWindow } from "./types";

const DEFAULT_OUTPUT_DIR = path.join(PROJECT_ROOT, "data", "activity");

interface CliOptions extends ScopeOptions {
  since?: string;
  until?: string;
  days: number;
  full?: boolean;
  includePrivate?: boolean;
  yes?: boolean;
  output?: string;
  categories: string;
  noise: string;
  timeout: number;
  debug?: boolean;
}

function positiveInteger(flag: string) {
  return (value: string) => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`${flag} must be a positive integer`);
    }
    return parsed;
  };
}

const program = new Command();

program
  .description("Aggregate GitHub commits, pull requests and reviews for a user or an organization")
  .option("-u, --user <login>", "User whose activity to gather")
  .option("--org <org>", "Organization whose members' activity to aggregate")
  .option("--team <slug>", "Limit --org to one team")
  .option("--private-members", "List concealed org members too (needs org read access)", false)
  .option("--owners", "Limit --org to the organization's owners", false)
  .option("--since <date>", "First day of the window (YYYY-MM-DD)")
  .option("--until <date>", "Last day of the window (YYYY-MM-DD, default today)")
  .option("-d, --days <number>", "Window length when --since is not given", positiveInteger("--days"), DEFAULT_DAYS)
  .option("--full", "Gather every org member in full mode instead of light mode", false)
  .option("--include-private", "Count commits in private repositories", false)
  .option("-y, --yes", "Skip the confirmation prompt for expensive runs", false)
  .option("-o, --output <path>", "JSON file to write (default under data/activity)")
  .option("--categories <path>", "Category rule table", DEFAULT_CATEGORIES_PATH)
  .option("--noise <path>", "Noise filter rule table", DEFAULT_NOISE_PATH)
  .option("--timeout <ms>", "Per-request timeout", positiveInteger("--timeout"), DEFAULT_TIMEOUT_MS)
  .option("--debug", "Log skipped repositories, retries and failed lookups")
  .parse(process.argv);

function outputPath(options: CliOptions, subject: string, window: DateWindow): string {
  if (options.output) {
    return path.isAbsolute(options.output) ? options.output : path.join(process.cwd(), options.output);
  }
  const safeName = subject.replace(/[^a-z0-9_\-]/gi, "_");
  return path.join(DEFAULT_OUTPUT_DIR, `${safeName}__${window.since}__${window.until}.json`);
}

async function askToContinue(): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.warn("⚠️  Not an interactive terminal; pass --yes to run anyway");
    return false;
  }
  const prompt = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await prompt.question("Continue? [y/N] ");
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    prompt.close();
  }
}

async function run() {
  const options = program.opts<CliOptions>();
  const debug = Boolean(options.debug) || isDebugEnabled();

  if (debug) {
    console.log("ℹ️  Debug mode enabled");
  }
  validateScope(options);

  const token = requireToken();
  const window = resolveWindow({ since: options.since, until: options.until, days: options.days });
  const [categoryTable, noise] = await Promise.all([loadCategoryTable(options.categories), loadNoiseTable(options.noise)]);

  const budget = new RateLimitBudget();
  const octokit = new Octokit({ auth: token });
  octokit.hook.after("request", (response) => {
    budget.updateFromHeaders(response.headers);
  });
  const scraper = new Octokit({ baseUrl: SCRAPE_BASE_URL });

  const client = new RetryingRequestClient(new OctokitTransport(octokit, scraper), {
    timeoutMs: options.timeout,
    debug,
  });
  const catalog = new RepoCatalog(client);
  const classifier = new CategoryClassifier(categoryTable, { fetchTopics: (repo) => catalog.topics(repo), debug });
  const context: GatherContext = {
    client,
    catalog,
    classifier,
    noise,
    includePrivate: Boolean(options.includePrivate),
    debug,
  };

  console.log(`ℹ️  Window: ${window.since} to ${window.until} (${classifier.ruleCount} category rules)`);

  if (options.user) {
    console.log(`⏳ Gathering activity for ${options.user}…`);
    const activity = await gatherMemberActivity({ login: options.user, window, mode: "full", context });
    const file = outputPath(options, activity.login, window);
    await fs.outputJson(file, activity, { spaces: 2 });
    console.log(`\n${renderMemberSummary(activity, classifier)}`);
    console.log(`\n✅ Wrote ${path.relative(process.cwd(), file)}`);
    return;
  }

  const { org } = options;
  if (!org) {
    throw new Error("Pass --user <login> or --org <org>");
  }
  const result = await gatherOrganizationActivity({
    org,
    team: options.team ?? null,
    publicMembersOnly: !options.privateMembers,
    ownersOnly: Boolean(options.owners),
    window,
    mode: options.full ? "full" : "light",
    context,
    budget,
    confirm: options.yes ? undefined : askToContinue,
  });
  const subject = options.team ? `${org}_${options.team}` : options.owners ? `${org}_owners` : org;
  const file = outputPath(options, subject, window);
  await fs.outputJson(file, result, { spaces: 2 });
  console.log(`\n${renderOrganizationSummary(result, classifier)}`);
  console.log(`\n✅ Wrote ${path.relative(process.cwd(), file)}`);
  if (debug) {
    console.log(`ℹ️  ${budget.remaining ?? "unknown"} GraphQL calls left. ${budget.describeReset()}`);
  }
}

run().catch((error) => {
  if (error instanceof RunCancelledError) {
    console.log(`\nℹ️  ${error.message}`);
    process.exit(1);
  }
  console.error("\n❌ Activity run failed:", error instanceof Error ? error.message : error);
  if (error instanceof RateLimitExceededError) {
    console.error(`   ${error.describeReset()}`);
  }
  process.exit(1);
});
