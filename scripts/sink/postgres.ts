import pg from "pg";

import { formatMetricValue } from "../scanner/metrics";
import type { MetricsBag, RepositoryRecord } from "../dataset/types";

/** The slice of `pg.Pool` / `pg.PoolClient` the sink uses. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS study_repositories (
    id SERIAL PRIMARY KEY,
    full_name TEXT NOT NULL UNIQUE,
    owner TEXT NOT NULL,
    name TEXT NOT NULL,
    stars INTEGER NOT NULL DEFAULT 0,
    forks INTEGER NOT NULL DEFAULT 0,
    language TEXT,
    release_count INTEGER NOT NULL DEFAULT 0,
    contributor_count INTEGER NOT NULL DEFAULT 0,
    avg_release_interval_days NUMERIC(10, 1),
    release_type TEXT NOT NULL,
    collected_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS study_repository_metrics (
    full_name TEXT PRIMARY KEY REFERENCES study_repositories (full_name),
    measures JSONB NOT NULL,
    analyzed_at TIMESTAMPTZ,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

/**
 * Optional reporting copy of the dataset. Rows are upserted by `full_name` and never deleted.
 */
export class PostgresSink {
  constructor(
    private readonly client: Queryable,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  static fromUrl(connectionString: string): PostgresSink {
    const pool = new pg.Pool({ connectionString });
    return new PostgresSink(pool, () => pool.end());
  }

  async ensureSchema(): Promise<void> {
    await this.client.query(SCHEMA);
  }

  async upsertRepository(record: RepositoryRecord): Promise<void> {
    await this.client.query(
      `
      INSERT INTO study_repositories (
        full_name, owner, name, stars, forks, language,
        release_count, contributor_count, avg_release_interval_days, release_type,
        collected_at, created_at, updated_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, NOW(), NOW())
      ON CONFLICT (full_name) DO UPDATE SET
        owner = EXCLUDED.owner,
        name = EXCLUDED.name,
        stars = EXCLUDED.stars,
        forks = EXCLUDED.forks,
        language = COALESCE(EXCLUDED.language, study_repositories.language),
        release_count = EXCLUDED.release_count,
        contributor_count = EXCLUDED.contributor_count,
        avg_release_interval_days = EXCLUDED.avg_release_interval_days,
        release_type = EXCLUDED.release_type,
        collected_at = COALESCE(EXCLUDED.collected_at, study_repositories.collected_at),
        updated_at = NOW()
      `,
      [
        record.fullName,
        record.owner,
        record.name,
        record.stars,
        record.forks,
        record.language,
        record.releaseCount,
        record.contributorCount,
        record.classification.averageIntervalDays,
        record.classification.category,
        record.collectedAt,
      ]
    );
  }

  async upsertMetrics(fullName: string, metrics: MetricsBag, analyzedAt: string | null): Promise<void> {
    const measures: Record<string, string> = {};
    for (const [key, value] of Object.entries(metrics)) {
      measures[key] = formatMetricValue(value);
    }

    await this.client.query(
      `
      INSERT INTO study_repository_metrics (full_name, measures, analyzed_at, updated_at)
      VALUES ($1, $2, $3, NOW())
      ON CONFLICT (full_name) DO UPDATE SET
        measures = EXCLUDED.measures,
        analyzed_at = COALESCE(EXCLUDED.analyzed_at, study_repository_metrics.analyzed_at),
        updated_at = NOW()
      `,
      [fullName, JSON.stringify(measures), analyzedAt]
    );
  }

  /** Repository row first, then its metrics when the record has been analyzed. */
  async upsertRecord(record: RepositoryRecord): Promise<void> {
    await this.upsertRepository(record);
    if (record.metrics) {
      await this.upsertMetrics(record.fullName, record.metrics, record.lastAnalyzedAt);
    }
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
