#!/usr/bin/env node
import "dotenv/config";
import Table from "cli-table3";
import { Command } from "commander";

import { createCatalogClient } from "../catalog/client";
import { DatasetStore } from "../dataset/store";
import type { RepositoryRecord } from "../dataset/types";
import { PostgresSink } from "../sink/postgres";
import { isDirectInvocation, parseCount } from "../shared/cli";
import { ConfigurationError } from "../shared/errors";
import { loadStudyConfig, requireGithubToken } from "../shared/config";
import { collectRepositories, type CandidateOutcome, type CollectionReport } from "./collect";

interface CollectOptions {
  dataset?: string;
  format?: string;
  targetRapid?: number;
  targetSlow?: number;
  maxSearch?: number;
  query?: string;
  minStars?: number;
  minForks?: number;
  minReleases?: number;
  minContributors?: number;
  pacing?: number;
  sink?: boolean;
  debug?: boolean;
}

/** Most frequent rejection/failure reasons first; numbers are collapsed so similar reasons group. */
export function tallyReasons(outcomes: readonly CandidateOutcome[], limit = 10): Array<[reason: string, count: number]> {
  const counts = new Map<string, number>();
  for (const outcome of outcomes) {
    if (outcome.status !== "rejected" && outcome.status !== "failed") {
      continue;
    }
    const reason = (outcome.reason ?? "unknown").replace(/\d+(\.\d+)?/g, "N");
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])).slice(0, limit);
}

function printReport(report: CollectionReport, targets: { rapid: number; slow: number }): void {
  const summary = new Table({ head: ["Processed", "Accepted", "Rejected", "Failed", "Skipped", "RAPID", "SLOW"] });
  summary.push([
    report.processed,
    report.accepted,
    report.rejected,
    report.failed,
    report.skipped,
    `${report.totals.RAPID}/${targets.rapid}`,
    `${report.totals.SLOW}/${targets.slow}`,
  ]);
  console.log(summary.toString());

  const reasons = tallyReasons(report.outcomes);
  if (reasons.length > 0) {
    const table = new Table({ head: ["Reason", "Count"] });
    for (const [reason, count] of reasons) {
      table.push([reason, count]);
    }
    console.log(table.toString());
  }
}

async function main() {
  const program = new Command();

  program
    .description("Search GitHub for candidate repositories and classify their release cadence")
    .option("--dataset <path>", "Dataset file (.json or .csv)")
    .option("--format <format>", "Dataset format: json or csv (default: from extension)")
    .option("--target-rapid <number>", "Target number of RAPID repositories", parseCount)
    .option("--target-slow <number>", "Target number of SLOW repositories", parseCount)
    .option("--max-search <number>", "Maximum number of search results to walk", parseCount)
    .option("--query <expression>", "Search expression (default built from the star/fork minimums)")
    .option("--min-stars <number>", "Stars must exceed this", parseCount)
    .option("--min-forks <number>", "Forks must exceed this", parseCount)
    .option("--min-releases <number>", "Releases must exceed this", parseCount)
    .option("--min-contributors <number>", "Contributors must exceed this", parseCount)
    .option("--pacing <ms>", "Delay between candidates", parseCount)
    .option("--sink", "Mirror accepted records into Postgres (needs DATABASE_URL)", false)
    .option("--debug", "Log every rejected candidate", false)
    .parse(process.argv);

  const options = program.opts<CollectOptions>();
  const config = loadStudyConfig(process.env, {
    datasetPath: options.dataset,
    datasetFormat: options.format,
    thresholds: {
      minStars: options.minStars,
      minForks: options.minForks,
      minReleases: options.minReleases,
      minContributors: options.minContributors,
    },
    targets: {
      rapid: options.targetRapid,
      slow: options.targetSlow,
      searchBudget: options.maxSearch,
      query: options.query,
    },
    pacingMs: options.pacing,
    debug: options.debug || undefined,
  });
  requireGithubToken(config);

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
  console.log(`📦 ${store.size} repositories in ${config.dataset.path}`);

  const client = createCatalogClient(config.catalog, { debug: config.debug });
  const mirror = sink;

  try {
    const report = await collectRepositories({
      client,
      store,
      settings: {
        thresholds: config.thresholds,
        intervals: config.intervals,
        targets: config.targets,
        pacingMs: config.catalog.pacingMs,
        debug: config.debug,
      },
      onAccepted: mirror ? (record: RepositoryRecord) => mirror.upsertRecord(record) : undefined,
    });

    console.log(
      report.stoppedBecause === "targets_met"
        ? "\n🎯 Targets met"
        : "\n⚠️  Search budget exhausted before the targets were met"
    );
    printReport(report, config.targets);
  } finally {
    await sink?.close();
  }
}

if (isDirectInvocation(import.meta.url)) {
  main().catch((error) => {
    console.error("\n❌ Collection failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
