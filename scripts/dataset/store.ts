import fs from "fs-extra";
import path from "node:path";

import type { ReleaseCategory } from "../classifier/interval";
import { needsRepair, repairRecord, validateRepositoryIdentity } from "../keys/project-key";
import type { DatasetFormat } from "../shared/config";
import { describeError, PersistenceError } from "../shared/errors";
import { buildFullName, canonicalizeRow, EXPORT_COLUMNS, normalizeRecord, recordToRow, rowToRecord, TABULAR_COLUMNS } from "./codec";
import { formatCsv, parseCsv } from "./csv";
import type {
  DatasetMetadata,
  DatasetSnapshot,
  MergeResult,
  MetricsBag,
  RepositoryRecord,
  TabularRow,
  UpsertResult,
} from "./types";

export interface DatasetStoreOptions {
  path: string;
  format: DatasetFormat;
  /** Where a tabular dataset is written back; defaults to `<input>_analyzed.csv`. */
  analyzedPath?: string;
  now?: () => Date;
}

export interface CategoryStatistics {
  count: number;
  averageIntervalDays: number | null;
  averageContributors: number | null;
}

export interface DatasetStatistics {
  total: number;
  analyzed: number;
  byCategory: Record<ReleaseCategory, CategoryStatistics>;
  lastUpdated: string;
}

export interface ListOptions {
  category?: ReleaseCategory;
  limit?: number;
}

export function analyzedPathFor(filePath: string): string {
  const extension = path.extname(filePath);
  const base = extension ? filePath.slice(0, -extension.length) : filePath;
  if (base.endsWith("_analyzed")) {
    return filePath;
  }
  return `${base}_analyzed${extension || ".csv"}`;
}

function countByCategory(repositories: readonly RepositoryRecord[]): Record<ReleaseCategory, number> {
  const counts: Record<ReleaseCategory, number> = { RAPID: 0, SLOW: 0, INELIGIBLE: 0 };
  for (const record of repositories) {
    counts[record.classification.category] += 1;
  }
  return counts;
}

export function computeMetadata(
  repositories: readonly RepositoryRecord[],
  createdAt: string,
  lastUpdated: string
): DatasetMetadata {
  return {
    createdAt,
    lastUpdated,
    totalRepositories: repositories.length,
    countsByCategory: countByCategory(repositories),
    analyzedCount: repositories.filter((record) => record.analyzed).length,
  };
}

function average(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return Math.round((values.reduce((sum, value) => sum + value, 0) / values.length) * 10) / 10;
}

function readCreatedAt(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("metadata" in raw)) {
    return null;
  }
  const metadata = raw.metadata;
  if (typeof metadata !== "object" || metadata === null) {
    return null;
  }
  const createdAt = "createdAt" in metadata ? metadata.createdAt : "created_at" in metadata ? metadata.created_at : null;
  return typeof createdAt === "string" ? createdAt : null;
}

function readRepositoryEntries(raw: unknown): unknown[] | null {
  if (typeof raw !== "object" || raw === null || !("repositories" in raw)) {
    return null;
  }
  return Array.isArray(raw.repositories) ? raw.repositories : null;
}

/**
 * Keyed, de-duplicated collection of repository records persisted as a structured
 * document (`{ metadata, repositories }`) or a flat CSV file.
 *
 * Not safe for concurrent writers: every save rewrites the whole file, last writer wins.
 */
export class DatasetStore {
  readonly path: string;
  readonly format: DatasetFormat;
  readonly analyzedPath: string;
  private readonly now: () => Date;
  private snapshot: DatasetSnapshot | null = null;
  private readonly index = new Map<string, RepositoryRecord>();
  private loadedFrom: string | null = null;

  constructor(options: DatasetStoreOptions) {
    this.path = options.path;
    this.format = options.format;
    this.analyzedPath = options.analyzedPath ?? analyzedPathFor(options.path);
    this.now = options.now ?? (() => new Date());
  }

  /** The file the last `load()` actually read, or null if it started empty. */
  get sourcePath(): string | null {
    return this.loadedFrom;
  }

  /** Where `save()` writes. */
  get targetPath(): string {
    return this.format === "csv" ? this.analyzedPath : this.path;
  }

  get size(): number {
    return this.current().repositories.length;
  }

  private emptySnapshot(): DatasetSnapshot {
    const stamp = this.now().toISOString();
    return { metadata: computeMetadata([], stamp, stamp), repositories: [], unrepaired: [] };
  }

  private current(): DatasetSnapshot {
    if (!this.snapshot) {
      throw new Error("DatasetStore.load() must be called before using the store");
    }
    return this.snapshot;
  }

  private adopt(snapshot: DatasetSnapshot): DatasetSnapshot {
    const repositories: RepositoryRecord[] = [];
    this.index.clear();
    let duplicates = 0;

    for (const record of snapshot.repositories) {
      const existing = this.index.get(record.fullName);
      if (!existing) {
        this.index.set(record.fullName, record);
        repositories.push(record);
        continue;
      }
      duplicates += 1;
      // An analyzed duplicate replaces an unanalyzed one in place; otherwise the first wins.
      if (!existing.analyzed && record.analyzed) {
        repositories[repositories.indexOf(existing)] = record;
        this.index.set(record.fullName, record);
      }
    }

    if (duplicates > 0) {
      console.warn(`⚠️  Collapsed ${duplicates} duplicate record(s) while loading the dataset`);
    }

    this.snapshot = { ...snapshot, repositories };
    return this.snapshot;
  }

  /**
   * Reads the configured file into memory. A missing, unreadable or unparseable file yields
   * an empty snapshot with a warning; this never throws.
   */
  async load(): Promise<DatasetSnapshot> {
    this.loadedFrom = null;
    try {
      const snapshot = this.format === "csv" ? await this.loadTabular() : await this.loadDocument();
      return this.adopt(snapshot);
    } catch (error) {
      console.warn(`⚠️  Could not read dataset ${this.path}: ${describeError(error)}. Starting empty.`);
      this.loadedFrom = null;
      return this.adopt(this.emptySnapshot());
    }
  }

  private async loadDocument(): Promise<DatasetSnapshot> {
    if (!(await fs.pathExists(this.path))) {
      return this.emptySnapshot();
    }

    const raw: unknown = await fs.readJson(this.path);
    const entries = readRepositoryEntries(raw);
    if (!entries) {
      throw new Error("expected an object with a repositories array");
    }

    const repositories: RepositoryRecord[] = [];
    let dropped = 0;
    for (const entry of entries) {
      const record = normalizeRecord(entry);
      if (record) {
        repositories.push(record);
      } else {
        dropped += 1;
      }
    }
    if (dropped > 0) {
      console.warn(`⚠️  Skipped ${dropped} record(s) without a recoverable owner/name in ${this.path}`);
    }

    this.loadedFrom = this.path;
    const stamp = this.now().toISOString();
    return {
      metadata: computeMetadata(repositories, readCreatedAt(raw) ?? stamp, stamp),
      repositories,
      unrepaired: [],
    };
  }

  private async loadTabular(): Promise<DatasetSnapshot> {
    let source: string | null = null;
    if (this.analyzedPath !== this.path && (await fs.pathExists(this.analyzedPath))) {
      source = this.analyzedPath;
      console.log(`📝 Resuming from analyzed file ${this.analyzedPath}`);
    } else if (await fs.pathExists(this.path)) {
      source = this.path;
    }
    if (!source) {
      return this.emptySnapshot();
    }

    const { rows } = parseCsv(await fs.readFile(source, "utf8"));
    const repositories: RepositoryRecord[] = [];
    const unrepaired: TabularRow[] = [];
    let repaired = 0;

    rows.forEach((row, position) => {
      let candidate: TabularRow | null = row;
      if (needsRepair(row)) {
        candidate = repairRecord(row);
        if (candidate && validateRepositoryIdentity(candidate).valid) {
          repaired += 1;
        } else {
          candidate = null;
        }
      }
      if (!candidate) {
        console.warn(
          `⚠️  Row ${position + 2}: cannot recover owner/name ` +
            `(owner='${row.owner ?? ""}', name='${row.name ?? ""}', full_name='${row.full_name ?? ""}'); kept as-is`
        );
        unrepaired.push(row);
        return;
      }
      repositories.push(rowToRecord(candidate));
    });

    if (repaired > 0) {
      console.log(`🔧 Repaired ${repaired} row(s) with a corrupted owner/name`);
    }

    this.loadedFrom = source;
    const stamp = this.now().toISOString();
    return { metadata: computeMetadata(repositories, stamp, stamp), repositories, unrepaired };
  }

  list(options: ListOptions = {}): RepositoryRecord[] {
    let records = this.current().repositories;
    if (options.category) {
      const category = options.category;
      records = records.filter((record) => record.classification.category === category);
    }
    if (options.limit !== undefined && options.limit > 0) {
      records = records.slice(0, options.limit);
    }
    return [...records];
  }

  get(owner: string, name: string): RepositoryRecord | undefined {
    this.current();
    return this.index.get(buildFullName(owner.trim(), name.trim()));
  }

  has(fullName: string): boolean {
    this.current();
    return this.index.has(fullName.trim());
  }

  upsert(record: RepositoryRecord): UpsertResult {
    const snapshot = this.current();
    const owner = record.owner.trim();
    const name = record.name.trim();
    const fullName = buildFullName(owner, name);
    if (this.index.has(fullName)) {
      return "exists";
    }
    const stored: RepositoryRecord = { ...record, owner, name, fullName };
    snapshot.repositories.push(stored);
    this.index.set(fullName, stored);
    return "added";
  }

  /** Drops a record that has not been saved yet. Returns false when the key is unknown. */
  remove(fullName: string): boolean {
    const snapshot = this.current();
    const key = fullName.trim();
    const record = this.index.get(key);
    if (!record) {
      return false;
    }
    this.index.delete(key);
    snapshot.repositories = snapshot.repositories.filter((candidate) => candidate !== record);
    return true;
  }

  /** Attaches metrics to an existing record in place. Never creates a record. */
  mergeAnalysis(fullName: string, metrics: MetricsBag, analyzedAt?: string): MergeResult {
    this.current();
    const record = this.index.get(fullName.trim());
    if (!record) {
      return "not_found";
    }
    record.metrics = { ...metrics };
    record.analyzed = true;
    record.lastAnalyzedAt = analyzedAt ?? this.now().toISOString();
    return "updated";
  }

  /**
   * Recomputes the metadata and writes the complete snapshot through a temporary file.
   * On failure the previous file is left as it was and a PersistenceError is raised.
   */
  async save(snapshot?: DatasetSnapshot): Promise<DatasetSnapshot> {
    const live = snapshot ? this.adopt(snapshot) : this.current();
    live.metadata = computeMetadata(live.repositories, live.metadata.createdAt, this.now().toISOString());

    const target = this.targetPath;
    const temporary = `${target}.tmp`;
    try {
      if (this.format === "csv") {
        const rows = [...live.repositories.map(recordToRow), ...live.unrepaired.map(canonicalizeRow)];
        await fs.outputFile(temporary, formatCsv(TABULAR_COLUMNS, rows), "utf8");
      } else {
        await fs.outputJson(
          temporary,
          { metadata: live.metadata, repositories: live.repositories },
          { spaces: 2 }
        );
      }
      await fs.rename(temporary, target);
    } catch (error) {
      await fs.remove(temporary).catch((cleanupError: unknown) => {
        console.warn(`⚠️  Could not remove ${temporary}: ${describeError(cleanupError)}`);
      });
      throw new PersistenceError(`Failed to save dataset to ${target}: ${describeError(error)}`, target, {
        cause: error,
      });
    }

    return live;
  }

  /** Writes exactly `columns`, in order; unknown columns come out empty. */
  async exportTabular(filePath: string, columns: readonly string[] = EXPORT_COLUMNS): Promise<number> {
    const records = this.current().repositories;
    const rows = records.map((record) => {
      const full = recordToRow(record);
      const projected: TabularRow = {};
      for (const column of columns) {
        projected[column] = full[column] ?? "";
      }
      return projected;
    });
    await fs.outputFile(filePath, formatCsv(columns, rows), "utf8");
    return rows.length;
  }

  statistics(): DatasetStatistics {
    const snapshot = this.current();
    const summarize = (category: ReleaseCategory): CategoryStatistics => {
      const members = snapshot.repositories.filter((record) => record.classification.category === category);
      const intervals = members
        .map((record) => record.classification.averageIntervalDays)
        .filter((value): value is number => value !== null);
      return {
        count: members.length,
        averageIntervalDays: average(intervals),
        averageContributors: average(members.map((record) => record.contributorCount)),
      };
    };
    return {
      total: snapshot.repositories.length,
      analyzed: snapshot.repositories.filter((record) => record.analyzed).length,
      byCategory: { RAPID: summarize("RAPID"), SLOW: summarize("SLOW"), INELIGIBLE: summarize("INELIGIBLE") },
      lastUpdated: snapshot.metadata.lastUpdated,
    };
  }
}
