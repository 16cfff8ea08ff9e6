import { membersToGather, scanActivity } from "./activity-scanner";
import { windowDays } from "./config";
import { RateLimitExceededError, describeError } from "./errors";
import { gatherMemberActivity, withRestLimiter, type GatherContext } from "./member-activity";
import { aggregateOrganization, emptyMemberActivity } from "./org-aggregate";
import type { RateLimitBudget } from "./rate-budget";
import { listMembers } from "./sources/members";
import type { DateWindow, GatheringMode, MemberActivity, OrganizationActivity } from "./types";
import { POOL_SIZES, collectPool } from "./worker-pool";

/** Resolves true to go ahead with a run the budget flagged as expensive. */
export type ConfirmRun = (warning: string) => Promise<boolean>;

export class RunCancelledError extends Error {
  constructor() {
    super("Run cancelled before gathering member activity");
    this.name = "RunCancelledError";
  }
}

export interface GatherOrganizationParams {
  org: string;
  team?: string | null;
  /** Lists public members only; the full list needs org read access. */
  publicMembersOnly?: boolean;
  /** Gathers the organization's owners only. */
  ownersOnly?: boolean;
  window: DateWindow;
  mode: GatheringMode;
  context: GatherContext;
  budget: RateLimitBudget;
  /** Omitted means expensive runs proceed without asking. */
  confirm?: ConfirmRun;
  memberConcurrency?: number;
}

/**
 * Organization run: checks the GraphQL budget, lists members, filters out
 * inactive ones cheaply, then gathers the rest through the member pool and
 * folds their results. A member whose gathering fails contributes an empty,
 * incomplete result; running out of budget stops the run.
 */
export async function gatherOrganizationActivity({
  org,
  team = null,
  publicMembersOnly = true,
  ownersOnly = false,
  window,
  mode,
  context,
  budget,
  confirm,
  memberConcurrency = POOL_SIZES.members,
}: GatherOrganizationParams): Promise<OrganizationActivity> {
  const { client, debug } = context;
  const scope = team ? `${org}/${team}` : ownersOnly ? `${org} owners` : org;

  await budget.refresh(client);
  if (budget.shouldAbort()) {
    throw new RateLimitExceededError(
      `Only ${budget.remaining ?? 0} GraphQL calls remain; not starting a run for ${scope}`,
      budget.resetTime
    );
  }

  console.log(`⏳ Listing members of ${scope}…`);
  const candidates = await listMembers({ client, org, team, publicOnly: publicMembersOnly, ownersOnly, debug });
  console.log(`ℹ️  ${candidates.length} candidate member(s)`);

  console.log(`⏳ Checking activity between ${window.since} and ${window.until}…`);
  const scan = await scanActivity({ client, logins: candidates, window, debug });
  const logins = membersToGather(scan, candidates);
  console.log(
    `ℹ️  ${scan.active.length} active, ${scan.inactive.length} inactive, ${scan.undetermined.length} undetermined`
  );

  if (logins.length > 0) {
    const estimate = budget.estimate(logins.length, windowDays(window), { knownActive: true });
    if (budget.shouldWarn(estimate)) {
      const warning = budget.describeWarning(estimate);
      console.warn(`⚠️  ${warning.replace(/\n/g, "\n   ")}`);
      if (confirm && !(await confirm(warning))) {
        throw new RunCancelledError();
      }
    }
  }

  // One limiter for every member, so the stats bound holds run-wide.
  const shared = withRestLimiter(context);
  const completions = await collectPool(
    logins,
    memberConcurrency,
    (login) => gatherMemberActivity({ login, window, mode, context: shared }),
    {
      onSettled: (completion, done, total) => {
        if (completion.status === "fulfilled") {
          console.log(`✓ [${done}/${total}] ${completion.item}`);
        } else {
          console.warn(`⚠️  [${done}/${total}] ${completion.item}: ${describeError(completion.error)}`);
        }
      },
    }
  );

  const memberResults = completions.map(
    (completion): MemberActivity =>
      completion.status === "fulfilled"
        ? completion.value
        : emptyMemberActivity(completion.item, window, describeError(completion.error), { light: mode === "light" })
  );

  return {
    org,
    team,
    ownersOnly,
    window,
    candidates: candidates.length,
    scan,
    aggregate: aggregateOrganization(memberResults),
    memberResults,
  };
}
