import type { RequestClient } from "../request-client";
import type { DateWindow } from "../types";

export interface CalendarCell {
  date: string;
  level: number;
}

const CELL_TAG = /<td\b[^>]*>/gi;
const DATE_ATTRIBUTE = /\bdata-date="(\d{4}-\d{2}-\d{2})"/i;
const LEVEL_ATTRIBUTE = /\bdata-level="(\d+)"/i;

export function parseContributionCalendar(html: string): CalendarCell[] {
  const cells: CalendarCell[] = [];
  for (const match of html.matchAll(CELL_TAG)) {
    const tag = match[0];
    const date = DATE_ATTRIBUTE.exec(tag)?.[1];
    const level = LEVEL_ATTRIBUTE.exec(tag)?.[1];
    if (date && level) {
      cells.push({ date, level: Number.parseInt(level, 10) });
    }
  }
  return cells;
}

export type CalendarActivity = "active" | "inactive" | "unknown";

/** Cells outside the window are ignored; a calendar without cells in range tells nothing. */
export function calendarActivity(cells: readonly CalendarCell[], window: DateWindow): CalendarActivity {
  const inRange = cells.filter((cell) => cell.date >= window.since && cell.date <= window.until);
  if (inRange.length === 0) {
    return "unknown";
  }
  return inRange.some((cell) => cell.level > 0) ? "active" : "inactive";
}

interface ProbeCalendarParams {
  client: RequestClient;
  login: string;
  window: DateWindow;
}

/** Reads the public contribution calendar page for `login`. */
export async function probeContributionCalendar({ client, login, window }: ProbeCalendarParams): Promise<CalendarActivity> {
  const result = await client.request<unknown>({
    protocol: "scrape",
    endpoint: "GET /users/{login}/contributions",
    params: { login, from: window.since, to: window.until, headers: { accept: "text/html" } },
  });
  if (!result.ok || typeof result.body !== "string") {
    return "unknown";
  }
  return calendarActivity(parseContributionCalendar(result.body), window);
}
