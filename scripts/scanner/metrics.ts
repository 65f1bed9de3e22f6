import type { MetricKind, MetricValue, MetricsBag, Rating } from "../dataset/types";

export const METRIC_CATALOG = {
  bugs: "integer",
  vulnerabilities: "integer",
  code_smells: "integer",
  sqale_index: "integer",
  ncloc: "integer",
  complexity: "integer",
  cognitive_complexity: "integer",
  coverage: "percentage",
  duplicated_lines_density: "percentage",
  reliability_rating: "rating",
  security_rating: "rating",
  sqale_rating: "rating",
  alert_status: "status",
} as const satisfies Record<string, MetricKind>;

export type MetricKey = keyof typeof METRIC_CATALOG;

export const METRIC_KEYS: MetricKey[] = [
  "bugs",
  "vulnerabilities",
  "code_smells",
  "sqale_index",
  "ncloc",
  "complexity",
  "cognitive_complexity",
  "coverage",
  "duplicated_lines_density",
  "reliability_rating",
  "security_rating",
  "sqale_rating",
  "alert_status",
];

const RATINGS: readonly Rating[] = ["A", "B", "C", "D", "E"];
const METRIC_KINDS: readonly MetricKind[] = ["integer", "percentage", "rating", "status"];

function isMetricKey(key: string): key is MetricKey {
  return Object.prototype.hasOwnProperty.call(METRIC_CATALOG, key);
}

/** Unknown measure keys are carried as status strings. */
export function metricKind(key: string): MetricKind {
  return isMetricKey(key) ? METRIC_CATALOG[key] : "status";
}

function readNumber(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === "string" && raw.trim() !== "") {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isRating(value: unknown): value is Rating {
  return typeof value === "string" && RATINGS.some((rating) => rating === value);
}

function readRating(raw: unknown): Rating | null {
  if (typeof raw === "string") {
    const letter = raw.trim().toUpperCase();
    if (isRating(letter)) {
      return letter;
    }
  }
  const numeric = readNumber(raw);
  if (numeric === null) {
    return null;
  }
  return RATINGS[Math.round(numeric) - 1] ?? null;
}

/**
 * Converts a raw measure from the scanning server (or a flat-file cell) into a typed value.
 * Ratings arrive as "1.0".."5.0" and become A..E. Returns null for an empty or unreadable value.
 */
export function toMetricValue(key: string, raw: unknown): MetricValue | null {
  if (raw === null || raw === undefined || raw === "") {
    return null;
  }
  switch (metricKind(key)) {
    case "integer": {
      const value = readNumber(raw);
      return value === null ? null : { kind: "integer", value: Math.round(value) };
    }
    case "percentage": {
      const value = readNumber(raw);
      return value === null ? null : { kind: "percentage", value };
    }
    case "rating": {
      const value = readRating(raw);
      return value === null ? null : { kind: "rating", value };
    }
    case "status":
      return typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean"
        ? { kind: "status", value: String(raw) }
        : null;
  }
}

export function formatMetricValue(metric: MetricValue): string {
  switch (metric.kind) {
    case "integer":
    case "percentage":
      return String(metric.value);
    case "rating":
    case "status":
      return metric.value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTaggedMetric(value: unknown): value is { kind: MetricKind; value: unknown } {
  return isRecord(value) && METRIC_KINDS.some((kind) => kind === value.kind) && "value" in value;
}

/**
 * Accepts either a bag of tagged values (the stored form) or a flat map of raw measures
 * (older files) and returns a typed bag. Entries that cannot be read are dropped.
 */
export function toMetricsBag(raw: unknown): MetricsBag | null {
  if (!isRecord(raw)) {
    return null;
  }
  const bag: MetricsBag = {};
  for (const [key, entry] of Object.entries(raw)) {
    const value = toMetricValue(key, isTaggedMetric(entry) ? entry.value : entry);
    if (value) {
      bag[key] = value;
    }
  }
  return Object.keys(bag).length > 0 ? bag : null;
}
