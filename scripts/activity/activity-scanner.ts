import { clampToYear } from "./config";
import { describeError } from "./errors";
import type { RequestClient } from "./request-client";
import { USER_SUMMARY_BATCH_SIZE, fetchUserContributionTotals } from "./sources/contributions";
import { probeContributionCalendar, type CalendarActivity } from "./sources/contribution-calendar";
import type { DateWindow, ScanResult } from "./types";
import { POOL_SIZES, collectPool } from "./worker-pool";

export interface ScanActivityParams {
  client: RequestClient;
  logins: readonly string[];
  window: DateWindow;
  probeConcurrency?: number;
  batchConcurrency?: number;
  debug?: boolean;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let offset = 0; offset < items.length; offset += size) {
    chunks.push(items.slice(offset, offset + size));
  }
  return chunks;
}

/**
 * Splits candidates into active and inactive before the expensive per-member
 * gathering. The public contribution calendar is tried first; logins it
 * cannot settle go through batched contribution totals, and whatever is
 * still unknown after that stays undetermined and is gathered anyway.
 */
export async function scanActivity({
  client,
  logins,
  window,
  probeConcurrency = POOL_SIZES.probe,
  batchConcurrency = POOL_SIZES.batch,
  debug = false,
}: ScanActivityParams): Promise<ScanResult> {
  const status = new Map<string, CalendarActivity>();

  const probes = await collectPool(logins, probeConcurrency, (login) =>
    probeContributionCalendar({ client, login, window })
  );
  for (const probe of probes) {
    if (probe.status === "fulfilled") {
      status.set(probe.item, probe.value);
    } else {
      status.set(probe.item, "unknown");
      if (debug) {
        console.log(`[${probe.item}] calendar probe failed: ${describeError(probe.error)}`);
      }
    }
  }

  const unknown = logins.filter((login) => status.get(login) === "unknown");
  if (unknown.length > 0) {
    console.log(`ℹ️  ${unknown.length} member(s) not settled by the calendar; checking contribution totals`);
    const summaryWindow = clampToYear(window);
    const batches = await collectPool(chunk(unknown, USER_SUMMARY_BATCH_SIZE), batchConcurrency, (batch) =>
      fetchUserContributionTotals({ client, logins: batch, window: summaryWindow })
    );

    for (const batch of batches) {
      if (batch.status === "rejected") {
        if (debug) {
          console.log(`[scan] summary batch failed: ${describeError(batch.error)}`);
        }
        continue;
      }
      if (!batch.value) {
        continue;
      }
      for (const [login, total] of batch.value) {
        status.set(login, total !== null && total > 0 ? "active" : "inactive");
      }
    }
  }

  const result: ScanResult = { active: [], inactive: [], undetermined: [] };
  for (const login of logins) {
    const activity = status.get(login) ?? "unknown";
    if (activity === "active") {
      result.active.push(login);
    } else if (activity === "inactive") {
      result.inactive.push(login);
    } else {
      result.undetermined.push(login);
    }
  }
  return result;
}

/** Members that go on to full or light gathering: the active ones and those that could not be ruled out. */
export function membersToGather(scan: ScanResult, logins: readonly string[]): string[] {
  const included = new Set([...scan.active, ...scan.undetermined]);
  return logins.filter((login) => included.has(login));
}
