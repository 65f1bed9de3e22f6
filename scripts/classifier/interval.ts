import type { IntervalBands } from "../shared/config";
import { DEFAULT_INTERVAL_BANDS } from "../shared/config";

export type ReleaseCategory = "RAPID" | "SLOW" | "INELIGIBLE";

export const RELEASE_CATEGORIES: readonly ReleaseCategory[] = ["RAPID", "SLOW", "INELIGIBLE"];

export interface ReleaseClassification {
  category: ReleaseCategory;
  averageIntervalDays: number | null;
}

export interface ReleaseEvent {
  createdAt: string;
  publishedAt: string | null;
  tagName: string | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const INELIGIBLE: ReleaseClassification = { category: "INELIGIBLE", averageIntervalDays: null };

function parseTimestamp(value: string | null | undefined): number | null {
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

export function categorize(averageDays: number, bands: IntervalBands = DEFAULT_INTERVAL_BANDS): ReleaseCategory {
  if (averageDays >= bands.rapidMinDays && averageDays <= bands.rapidMaxDays) {
    return "RAPID";
  }
  if (averageDays > bands.slowAboveDays) {
    return "SLOW";
  }
  return "INELIGIBLE";
}

/**
 * Average whole-day gap between consecutive releases, most recent first.
 *
 * Same-day and out-of-order pairs (delta <= 0) are dropped before averaging, which
 * shrinks the sample and pushes the average up for repos that tag several releases
 * on one day. The category is decided on the unrounded average; the reported
 * average is rounded to one decimal.
 */
export function classifyReleases(
  timestamps: Iterable<string | null | undefined>,
  bands: IntervalBands = DEFAULT_INTERVAL_BANDS
): ReleaseClassification {
  const instants: number[] = [];
  for (const value of timestamps) {
    const parsed = parseTimestamp(value);
    if (parsed !== null) {
      instants.push(parsed);
    }
  }

  if (instants.length < 2) {
    return INELIGIBLE;
  }

  instants.sort((a, b) => b - a);

  const deltas: number[] = [];
  for (let i = 0; i < instants.length - 1; i += 1) {
    const days = Math.floor((instants[i] - instants[i + 1]) / DAY_MS);
    if (days > 0) {
      deltas.push(days);
    }
  }

  if (deltas.length === 0) {
    return INELIGIBLE;
  }

  const average = deltas.reduce((sum, days) => sum + days, 0) / deltas.length;

  return {
    category: categorize(average, bands),
    averageIntervalDays: Math.round(average * 10) / 10,
  };
}

export function classifyReleaseEvents(
  events: Iterable<ReleaseEvent>,
  bands: IntervalBands = DEFAULT_INTERVAL_BANDS
): ReleaseClassification {
  const timestamps: string[] = [];
  for (const event of events) {
    timestamps.push(event.createdAt);
  }
  return classifyReleases(timestamps, bands);
}

export function isReleaseCategory(value: unknown): value is ReleaseCategory {
  return typeof value === "string" && (RELEASE_CATEGORIES as readonly string[]).includes(value);
}

/** Accepts the spellings found in older dataset files ("rapid", "NOT_ELIGIBLE", ...). */
export function parseReleaseCategory(value: unknown): ReleaseCategory {
  if (typeof value !== "string") {
    return "INELIGIBLE";
  }
  const normalized = value.trim().toUpperCase();
  if (normalized === "RAPID" || normalized === "SLOW") {
    return normalized;
  }
  return "INELIGIBLE";
}
