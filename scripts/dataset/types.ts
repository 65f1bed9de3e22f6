import type { ReleaseCategory, ReleaseClassification } from "../classifier/interval";

export type Rating = "A" | "B" | "C" | "D" | "E";

export type MetricValue =
  | { kind: "integer"; value: number }
  | { kind: "percentage"; value: number }
  | { kind: "rating"; value: Rating }
  | { kind: "status"; value: string };

export type MetricKind = MetricValue["kind"];

export type MetricsBag = Record<string, MetricValue>;

export interface RepositoryRecord {
  owner: string;
  name: string;
  /** `owner/name`; unique within a snapshot. */
  fullName: string;
  stars: number;
  forks: number;
  language: string | null;
  releaseCount: number;
  contributorCount: number;
  classification: ReleaseClassification;
  analyzed: boolean;
  metrics: MetricsBag | null;
  lastAnalyzedAt: string | null;
  collectedAt: string | null;
}

export interface DatasetMetadata {
  createdAt: string;
  lastUpdated: string;
  totalRepositories: number;
  countsByCategory: Record<ReleaseCategory, number>;
  analyzedCount: number;
}

/** One row of a flat file, keyed by header cell. */
export type TabularRow = Record<string, string>;

export interface DatasetSnapshot {
  metadata: DatasetMetadata;
  repositories: RepositoryRecord[];
  /** Tabular rows that could not be repaired into a record; written back as-is, never counted. */
  unrepaired: TabularRow[];
}

export type UpsertResult = "added" | "exists";

export type MergeResult = "updated" | "not_found";
