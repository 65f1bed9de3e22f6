import path from "node:path";

import { ConfigurationError } from "./errors";

export type DatasetFormat = "json" | "csv";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  rateLimitMarginMs: number;
  maxRateLimitWaits: number;
  requestTimeoutMs: number;
}

export interface CatalogConfig {
  token: string;
  pacingMs: number;
  retry: RetryPolicy;
  rateLimitThreshold: number;
}

export interface ThresholdConfig {
  minStars: number;
  minForks: number;
  minReleases: number;
  minContributors: number;
}

export interface IntervalBands {
  rapidMinDays: number;
  rapidMaxDays: number;
  slowAboveDays: number;
}

export interface TargetConfig {
  rapid: number;
  slow: number;
  searchBudget: number;
  query: string;
}

export interface DatasetConfig {
  path: string;
  format: DatasetFormat;
}

export interface SonarConfig {
  host: string;
  token: string;
  timeoutMs: number;
  pollAttempts: number;
  pollIntervalMs: number;
  scannerTimeoutMs: number;
  scannerImage: string;
}

export interface WorkspaceConfig {
  baseDir: string;
  cloneTimeoutMs: number;
  maxRepoBytes: number;
}

export interface StudyConfig {
  catalog: CatalogConfig;
  thresholds: ThresholdConfig;
  intervals: IntervalBands;
  targets: TargetConfig;
  dataset: DatasetConfig;
  sonar: SonarConfig;
  workspace: WorkspaceConfig;
  databaseUrl: string | null;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 10_000,
  maxDelayMs: 120_000,
  rateLimitMarginMs: 5_000,
  maxRateLimitWaits: 3,
  requestTimeoutMs: 30_000,
};

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  minStars: 50,
  minForks: 50,
  minReleases: 19,
  minContributors: 19,
};

export const DEFAULT_INTERVAL_BANDS: IntervalBands = {
  rapidMinDays: 5,
  rapidMaxDays: 35,
  slowAboveDays: 60,
};

export const DEFAULT_DATASET_PATH = path.join("data", "repositories_dataset.json");

export function defaultSearchQuery(thresholds: ThresholdConfig): string {
  return `stars:>${thresholds.minStars} forks:>${thresholds.minForks} sort:stars-desc`;
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer (got '${raw}')`);
  }
  return parsed;
}

export function parseDatasetFormat(value: string | undefined, filePath: string): DatasetFormat {
  if (value === "json" || value === "csv") {
    return value;
  }
  if (value !== undefined && value.trim() !== "") {
    throw new ConfigurationError(`Unsupported dataset format '${value}' (expected json or csv)`);
  }
  return path.extname(filePath).toLowerCase() === ".csv" ? "csv" : "json";
}

export interface ConfigOverrides {
  datasetPath?: string;
  datasetFormat?: string;
  thresholds?: Partial<ThresholdConfig>;
  targets?: Partial<TargetConfig>;
  pacingMs?: number;
  debug?: boolean;
}

/**
 * Builds the single configuration value handed to every component.
 * Credentials are not checked here; call `requireGithubToken` / `requireSonarToken`
 * from the entry point that actually needs them.
 */
export function loadStudyConfig(env: Env, overrides: ConfigOverrides = {}): StudyConfig {
  const limits = overrides.thresholds ?? {};
  const thresholds: ThresholdConfig = {
    minStars: limits.minStars ?? readInt(env, "MIN_STARS", DEFAULT_THRESHOLDS.minStars),
    minForks: limits.minForks ?? readInt(env, "MIN_FORKS", DEFAULT_THRESHOLDS.minForks),
    minReleases: limits.minReleases ?? readInt(env, "MIN_RELEASES", DEFAULT_THRESHOLDS.minReleases),
    minContributors: limits.minContributors ?? readInt(env, "MIN_CONTRIBUTORS", DEFAULT_THRESHOLDS.minContributors),
  };
  const targets = overrides.targets ?? {};

  const datasetPath = overrides.datasetPath ?? env.DATASET_PATH ?? DEFAULT_DATASET_PATH;

  return {
    catalog: {
      token: env.GITHUB_TOKEN ?? "",
      pacingMs: overrides.pacingMs ?? readInt(env, "CATALOG_PACING_MS", 1_000),
      rateLimitThreshold: readInt(env, "RATE_LIMIT_THRESHOLD", 100),
      retry: {
        ...DEFAULT_RETRY_POLICY,
        maxAttempts: readInt(env, "CATALOG_MAX_ATTEMPTS", DEFAULT_RETRY_POLICY.maxAttempts),
        requestTimeoutMs: readInt(env, "CATALOG_TIMEOUT_MS", DEFAULT_RETRY_POLICY.requestTimeoutMs),
      },
    },
    thresholds,
    intervals: { ...DEFAULT_INTERVAL_BANDS },
    targets: {
      rapid: targets.rapid ?? readInt(env, "TARGET_RAPID", 100),
      slow: targets.slow ?? readInt(env, "TARGET_SLOW", 100),
      searchBudget: targets.searchBudget ?? readInt(env, "SEARCH_BUDGET", 1_000),
      query: targets.query ?? env.SEARCH_QUERY ?? defaultSearchQuery(thresholds),
    },
    dataset: {
      path: datasetPath,
      format: parseDatasetFormat(overrides.datasetFormat ?? env.DATASET_FORMAT, datasetPath),
    },
    sonar: {
      host: (env.SONAR_HOST ?? "http://localhost:9000").replace(/\/+$/, ""),
      token: env.SONAR_TOKEN ?? "",
      timeoutMs: readInt(env, "SONAR_TIMEOUT_MS", 30_000),
      pollAttempts: readInt(env, "SONAR_POLL_ATTEMPTS", 10),
      pollIntervalMs: readInt(env, "SONAR_POLL_INTERVAL_MS", 3_000),
      scannerTimeoutMs: readInt(env, "SCANNER_TIMEOUT_MS", 900_000),
      scannerImage: env.SCANNER_IMAGE ?? "sonarsource/sonar-scanner-cli",
    },
    workspace: {
      baseDir: env.WORKSPACE_DIR ?? path.join("tmp", "workspaces"),
      cloneTimeoutMs: readInt(env, "CLONE_TIMEOUT_MS", 300_000),
      maxRepoBytes: readInt(env, "MAX_REPO_BYTES", 2 * 1024 ** 3),
    },
    databaseUrl: env.DATABASE_URL && env.DATABASE_URL.trim() !== "" ? env.DATABASE_URL : null,
    debug: overrides.debug ?? env.DEBUG === "true",
  };
}

export function requireGithubToken(config: StudyConfig): string {
  if (!config.catalog.token) {
    throw new ConfigurationError("GITHUB_TOKEN is required. Set it via environment variable or .env file.");
  }
  return config.catalog.token;
}

export function requireSonarToken(config: StudyConfig): string {
  if (!config.sonar.token) {
    throw new ConfigurationError("SONAR_TOKEN is required. Set it via environment variable or .env file.");
  }
  return config.sonar.token;
}
