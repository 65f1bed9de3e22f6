import { parseReleaseCategory } from "../classifier/interval";
import { repairRecord } from "../keys/project-key";
import { formatMetricValue, METRIC_KEYS, toMetricsBag } from "../scanner/metrics";
import type { MetricsBag, RepositoryRecord, TabularRow } from "./types";

export const RECORD_COLUMNS = [
  "owner",
  "name",
  "full_name",
  "stars",
  "forks",
  "language",
  "release_count",
  "contributors",
  "avg_release_interval",
  "release_type",
  "collected_at",
  "analyzed",
  "analyzed_at",
] as const;

export const TABULAR_COLUMNS: readonly string[] = [...RECORD_COLUMNS, ...METRIC_KEYS];

/** Fixed projection used by `exportTabular` when no columns are given. */
export const EXPORT_COLUMNS: readonly string[] = [
  "full_name",
  "owner",
  "name",
  "release_type",
  "language",
  "stars",
  "forks",
  "release_count",
  "avg_release_interval",
  "contributors",
];

// Header names written by earlier versions of the collection scripts.
const COLUMN_ALIASES: Record<string, readonly string[]> = {
  stars: ["stargazer_count"],
  forks: ["fork_count"],
  release_count: ["total_releases"],
  contributors: ["collaborator_count"],
  avg_release_interval: ["avg_release_interval_days", "median_release_interval"],
  analyzed: ["sonarqube_analyzed"],
  analyzed_at: ["sonarqube_analyzed_at"],
};

export function readCell(row: TabularRow, column: string): string {
  const direct = row[column];
  if (direct !== undefined && direct.trim() !== "") {
    return direct.trim();
  }
  for (const alias of COLUMN_ALIASES[column] ?? []) {
    const value = row[alias];
    if (value !== undefined && value.trim() !== "") {
      return value.trim();
    }
  }
  return "";
}

function toCount(value: unknown): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : 0;
}

function toDecimal(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

function toFlag(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  return typeof value === "string" && ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

function toText(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

export function buildFullName(owner: string, name: string): string {
  return `${owner}/${name}`;
}

/** Reads a tabular row whose owner and name are already usable. */
export function rowToRecord(row: TabularRow): RepositoryRecord {
  const owner = readCell(row, "owner");
  const name = readCell(row, "name");

  const metricCells: Record<string, string> = {};
  for (const key of METRIC_KEYS) {
    const cell = readCell(row, key);
    if (cell !== "") {
      metricCells[key] = cell;
    }
  }
  const metrics = toMetricsBag(metricCells);

  return {
    owner,
    name,
    fullName: buildFullName(owner, name),
    stars: toCount(readCell(row, "stars")),
    forks: toCount(readCell(row, "forks")),
    language: toText(readCell(row, "language")),
    releaseCount: toCount(readCell(row, "release_count")),
    contributorCount: toCount(readCell(row, "contributors")),
    classification: {
      category: parseReleaseCategory(readCell(row, "release_type")),
      averageIntervalDays: toDecimal(readCell(row, "avg_release_interval")),
    },
    analyzed: toFlag(readCell(row, "analyzed")),
    metrics,
    lastAnalyzedAt: toText(readCell(row, "analyzed_at")),
    collectedAt: toText(readCell(row, "collected_at")),
  };
}

export function recordToRow(record: RepositoryRecord): TabularRow {
  const row: TabularRow = {
    owner: record.owner,
    name: record.name,
    full_name: record.fullName,
    stars: String(record.stars),
    forks: String(record.forks),
    language: record.language ?? "",
    release_count: String(record.releaseCount),
    contributors: String(record.contributorCount),
    avg_release_interval:
      record.classification.averageIntervalDays === null ? "" : String(record.classification.averageIntervalDays),
    release_type: record.classification.category,
    collected_at: record.collectedAt ?? "",
    analyzed: record.analyzed ? "true" : "false",
    analyzed_at: record.lastAnalyzedAt ?? "",
  };
  for (const key of METRIC_KEYS) {
    const metric = record.metrics?.[key];
    row[key] = metric ? formatMetricValue(metric) : "";
  }
  return row;
}

/** Moves aliased cells of a row under the canonical headers so nothing is lost on rewrite. */
export function canonicalizeRow(row: TabularRow): TabularRow {
  const canonical: TabularRow = {};
  for (const column of TABULAR_COLUMNS) {
    canonical[column] = readCell(row, column);
  }
  return canonical;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick(source: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Normalizes one entry of a structured dataset file. Accepts the current camelCase shape
 * and the snake_case shape of older files. Returns null when no identity can be recovered.
 */
export function normalizeRecord(raw: unknown): RepositoryRecord | null {
  if (!isRecord(raw)) {
    return null;
  }

  let owner = toText(raw.owner) ?? "";
  let name = toText(raw.name) ?? "";
  if (owner === "" || name === "" || owner.includes("/") || name.includes("/")) {
    const repaired = repairRecord({ owner, name, fullName: pick(raw, "fullName", "full_name") });
    if (!repaired) {
      return null;
    }
    owner = repaired.owner;
    name = repaired.name;
    if (name.includes("/")) {
      return null;
    }
  }

  const classification = isRecord(raw.classification) ? raw.classification : {};
  const metrics: MetricsBag | null = toMetricsBag(pick(raw, "metrics", "sonarqube_metrics"));

  return {
    owner,
    name,
    fullName: buildFullName(owner, name),
    stars: toCount(pick(raw, "stars", "stargazerCount", "stargazer_count")),
    forks: toCount(pick(raw, "forks", "forkCount", "fork_count")),
    language: toText(raw.language),
    releaseCount: toCount(pick(raw, "releaseCount", "release_count", "total_releases")),
    contributorCount: toCount(pick(raw, "contributorCount", "contributors", "collaborator_count")),
    classification: {
      category: parseReleaseCategory(pick(classification, "category") ?? pick(raw, "release_type", "releaseType")),
      averageIntervalDays: toDecimal(
        pick(classification, "averageIntervalDays") ?? pick(raw, "avg_release_interval_days", "avg_release_interval")
      ),
    },
    analyzed: toFlag(pick(raw, "analyzed", "sonarqube_analyzed")),
    metrics,
    lastAnalyzedAt: toText(pick(raw, "lastAnalyzedAt", "sonarqube_analyzed_at", "analyzed_at")),
    collectedAt: toText(pick(raw, "collectedAt", "collected_at")),
  };
}
