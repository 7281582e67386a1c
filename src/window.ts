/**
 * Export date windows. All arithmetic is done in UTC; bounds are half-open
 * [start, end).
 */

import { WindowComputationError } from "./errors";

export type WindowMode = "last30" | "lastmonth";

export interface DateWindow {
  start: Date;
  end: Date;
  /** Used in file names and log lines, e.g. "last_30_days" or "september_2026". */
  label: string;
  description: string;
}

const DAY_MS = 86_400_000;

const MONTH_NAMES = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

/**
 * Map a CLI mode string to a window mode. "default" is an alias for "last30".
 */
export function parseWindowMode(mode: string | undefined): WindowMode {
  if (mode === undefined || mode === "default" || mode === "last30") return "last30";
  if (mode === "lastmonth") return "lastmonth";
  throw new WindowComputationError(`Unknown mode "${mode}" (expected default, last30 or lastmonth)`);
}

export function last30DaysWindow(now: Date): DateWindow {
  assertValidDate(now);
  return {
    start: new Date(now.getTime() - 30 * DAY_MS),
    end: new Date(now.getTime()),
    label: "last_30_days",
    description: "last 30 days",
  };
}

/**
 * First instant of the previous calendar month up to (not including) the
 * first instant of the current one. Date.UTC rolls month -1 over to December
 * of the prior year.
 */
export function previousMonthWindow(now: Date): DateWindow {
  assertValidDate(now);
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();

  const start = new Date(Date.UTC(year, month - 1, 1));
  const end = new Date(Date.UTC(year, month, 1));
  if (end.getTime() <= start.getTime()) {
    throw new WindowComputationError(`Empty window for ${now.toISOString()}`);
  }

  const monthName = MONTH_NAMES[start.getUTCMonth()] ?? String(start.getUTCMonth() + 1);
  const startYear = start.getUTCFullYear();
  return {
    start,
    end,
    label: `${monthName}_${startYear}`,
    description: `${monthName[0]?.toUpperCase() ?? ""}${monthName.slice(1)} ${startYear}`,
  };
}

export function computeWindow(mode: WindowMode, now: Date = new Date()): DateWindow {
  switch (mode) {
    case "last30":
      return last30DaysWindow(now);
    case "lastmonth":
      return previousMonthWindow(now);
  }
}

export function isWithinWindow(window: DateWindow, createdAt: string): boolean {
  const t = Date.parse(createdAt);
  if (Number.isNaN(t)) return false;
  return t >= window.start.getTime() && t < window.end.getTime();
}

function assertValidDate(now: Date): void {
  if (Number.isNaN(now.getTime())) {
    throw new WindowComputationError("Cannot compute an export window from an invalid date");
  }
}
