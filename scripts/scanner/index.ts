#!/usr/bin/env node
import "dotenv/config";
import Table from "cli-table3";
import { Command, InvalidArgumentError } from "commander";
import fs from "fs-extra";
import path from "node:path";

import { isReleaseCategory, type ReleaseCategory } from "../classifier/interval";
import { mergeShards, writeShard, type ShardEntry, type ShardMergeReport } from "../dataset/shards";
import { DatasetStore } from "../dataset/store";
import type { RepositoryRecord } from "../dataset/types";
import { PostgresSink } from "../sink/postgres";
import { isDirectInvocation, parseCount, parsePositive } from "../shared/cli";
import { loadStudyConfig, requireSonarToken } from "../shared/config";
import { ConfigurationError } from "../shared/errors";
import { runWorkerPool } from "./pool";
import { analyzeRepository, runScanner, type AnalysisOutcome } from "./scan";
import { SonarClient } from "./sonar";
import { Workspace } from "./workspace";

export interface RecordSink {
  upsertRecord(record: RepositoryRecord): Promise<void>;
}

export interface AnalysisRunOptions {
  store: DatasetStore;
  shardDir: string;
  concurrency: number;
  analyze: (record: RepositoryRecord, workerId: number) => Promise<AnalysisOutcome>;
  category?: ReleaseCategory;
  limit?: number;
  /** When false, records that already carry metrics are analyzed again. Defaults to true. */
  skipAnalyzed?: boolean;
  sink?: RecordSink | null;
}

export interface AnalysisRunReport {
  resumed: ShardMergeReport;
  attempted: number;
  analyzed: number;
  failures: Array<Extract<AnalysisOutcome, { status: "failed" }>>;
  merged: ShardMergeReport;
}

/**
 * Analyzes every record not yet analyzed. Workers append results to their own shard file as
 * they go; the shards are merged into the store and saved once at the end. Shards left
 * behind by an interrupted run are merged before anything new is attempted.
 */
export async function runAnalysis(options: AnalysisRunOptions): Promise<AnalysisRunReport> {
  const { store, shardDir } = options;

  const resumed = await mergeShards(store, shardDir);
  if (resumed.shards > 0) {
    console.log(`♻️  Recovered ${resumed.merged} result(s) from ${resumed.shards} leftover shard(s)`);
    await store.save();
    await fs.remove(shardDir);
  }

  const skipAnalyzed = options.skipAnalyzed ?? true;
  let pending = store.list({ category: options.category }).filter((record) => !skipAnalyzed || !record.analyzed);
  if (options.limit !== undefined && options.limit > 0) {
    pending = pending.slice(0, options.limit);
  }
  console.log(`🔬 ${pending.length} repositories to analyze with ${options.concurrency} worker(s)`);

  const shardEntries = new Map<number, ShardEntry[]>();
  const outcomes = await runWorkerPool(
    pending,
    options.concurrency,
    async (record, workerId) => {
      const outcome = await options.analyze(record, workerId);
      if (outcome.status === "analyzed") {
        const entries = shardEntries.get(workerId) ?? [];
        entries.push({ fullName: outcome.fullName, metrics: outcome.metrics, analyzedAt: outcome.analyzedAt });
        shardEntries.set(workerId, entries);
        await writeShard(shardDir, workerId, entries);
      }
      return outcome;
    },
    (outcome, index, total) => {
      const prefix = `[${index + 1}/${total}] ${outcome.fullName}`;
      if (outcome.status === "analyzed") {
        console.log(`✅ ${prefix}`);
      } else {
        console.error(`❌ ${prefix}: ${outcome.reason}`);
      }
    }
  );

  const merged = await mergeShards(store, shardDir);
  await store.save();
  await fs.remove(shardDir);

  const failures = outcomes.filter(
    (outcome): outcome is Extract<AnalysisOutcome, { status: "failed" }> => outcome.status === "failed"
  );
  const analyzed = outcomes.length - failures.length;

  if (options.sink) {
    for (const outcome of outcomes) {
      if (outcome.status !== "analyzed") {
        continue;
      }
      const record = store.list().find((candidate) => candidate.fullName === outcome.fullName);
      if (record) {
        await options.sink.upsertRecord(record);
      }
    }
  }

  return { resumed, attempted: outcomes.length, analyzed, failures, merged };
}

function parseCategory(value: string): ReleaseCategory {
  const normalized = value.trim().toUpperCase();
  if (!isReleaseCategory(normalized)) {
    throw new InvalidArgumentError("Expected RAPID, SLOW or INELIGIBLE.");
  }
  return normalized;
}

interface AnalyzeOptions {
  dataset?: string;
  format?: string;
  workers: number;
  category?: ReleaseCategory;
  limit?: number;
  shardDir?: string;
  skipAnalyzed: boolean;
  sink?: boolean;
  debug?: boolean;
}

async function main() {
  const program = new Command();

  program
    .description("Clone, scan and record code-quality metrics for collected repositories")
    .option("--dataset <path>", "Dataset file (.json or .csv)")
    .option("--format <format>", "Dataset format: json or csv (default: from extension)")
    .option("-w, --workers <number>", "Number of repositories to analyze in parallel", parsePositive, 2)
    .option("--category <category>", "Only analyze one release category", parseCategory)
    .option("-n, --limit <number>", "Analyze at most this many repositories", parseCount)
    .option("--shard-dir <dir>", "Directory for per-worker result shards (default: beside the dataset)")
    .option("--no-skip-analyzed", "Analyze records that already have metrics again")
    .option("--sink", "Mirror analyzed records into Postgres (needs DATABASE_URL)", false)
    .option("--debug", "Enable verbose logging", false)
    .parse(process.argv);

  const options = program.opts<AnalyzeOptions>();
  const config = loadStudyConfig(process.env, {
    datasetPath: options.dataset,
    datasetFormat: options.format,
    debug: options.debug || undefined,
  });
  const token = requireSonarToken(config);

  const sonar = new SonarClient({
    host: config.sonar.host,
    token,
    timeoutMs: config.sonar.timeoutMs,
    debug: config.debug,
  });
  const status = await sonar.ping();
  if (status !== "UP") {
    throw new ConfigurationError(
      status === null
        ? `Scanning server at ${config.sonar.host} is unreachable.`
        : `Scanning server at ${config.sonar.host} is not ready (status ${status}).`
    );
  }

  let sink: PostgresSink | null = null;
  if (options.sink) {
    if (!config.databaseUrl) {
      throw new ConfigurationError("--sink needs DATABASE_URL.");
    }
    sink = PostgresSink.fromUrl(config.databaseUrl);
    await sink.ensureSchema();
  }

  const store = new DatasetStore({ path: config.dataset.path, format: config.dataset.format });
  await store.load();

  const workspaces = new Map<number, Workspace>();
  const workspaceFor = (workerId: number) => {
    const existing = workspaces.get(workerId);
    if (existing) {
      return existing;
    }
    const created = new Workspace({ ...config.workspace, workerId });
    workspaces.set(workerId, created);
    return created;
  };

  try {
    const report = await runAnalysis({
      store,
      shardDir: options.shardDir ?? path.join(path.dirname(config.dataset.path), "shards"),
      concurrency: options.workers,
      skipAnalyzed: options.skipAnalyzed,
      category: options.category,
      limit: options.limit,
      sink,
      analyze: (record, workerId) =>
        analyzeRepository(record, {
          workspace: workspaceFor(workerId),
          sonar,
          scan: (dir, projectKey) =>
            runScanner(dir, projectKey, {
              host: config.sonar.host,
              token,
              image: config.sonar.scannerImage,
              timeoutMs: config.sonar.scannerTimeoutMs,
            }),
          poll: { attempts: config.sonar.pollAttempts, intervalMs: config.sonar.pollIntervalMs },
        }),
    });

    const summary = new Table({ head: ["Attempted", "Analyzed", "Failed", "Merged", "Recovered"] });
    summary.push([report.attempted, report.analyzed, report.failures.length, report.merged.merged, report.resumed.merged]);
    console.log(summary.toString());

    if (report.failures.length > 0) {
      const table = new Table({ head: ["Repository", "Kind", "Reason"] });
      for (const failure of report.failures) {
        table.push([failure.fullName, failure.error.kind, failure.reason]);
      }
      console.log(table.toString());
    }
  } finally {
    await sink?.close();
  }
}

if (isDirectInvocation(import.meta.url)) {
  main().catch((error) => {
    console.error("\n❌ Analysis failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
