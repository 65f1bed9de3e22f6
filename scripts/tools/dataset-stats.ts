#!/usr/bin/env node
import "dotenv/config";
import Table from "cli-table3";
import { Command } from "commander";

import { RELEASE_CATEGORIES } from "../classifier/interval";
import { DatasetStore, type DatasetStatistics } from "../dataset/store";
import { isDirectInvocation } from "../shared/cli";
import { loadStudyConfig } from "../shared/config";

const formatAverage = (value: number | null) => (value === null ? "-" : value.toFixed(1));

export function statisticsRows(stats: DatasetStatistics): string[][] {
  const share = (count: number) => (stats.total === 0 ? "0.0%" : `${((count / stats.total) * 100).toFixed(1)}%`);
  return RELEASE_CATEGORIES.map((category) => {
    const entry = stats.byCategory[category];
    return [
      category,
      String(entry.count),
      share(entry.count),
      formatAverage(entry.averageIntervalDays),
      formatAverage(entry.averageContributors),
    ];
  });
}

async function main() {
  const program = new Command();

  program
    .description("Print per-category statistics for a dataset file")
    .option("--dataset <path>", "Dataset file (.json or .csv)")
    .option("--format <format>", "Dataset format: json or csv (default: from extension)")
    .parse(process.argv);

  const options = program.opts<{ dataset?: string; format?: string }>();
  const config = loadStudyConfig(process.env, { datasetPath: options.dataset, datasetFormat: options.format });

  const store = new DatasetStore({ path: config.dataset.path, format: config.dataset.format });
  await store.load();
  const stats = store.statistics();

  const table = new Table({ head: ["Category", "Repositories", "Share", "Avg interval (days)", "Avg contributors"] });
  for (const row of statisticsRows(stats)) {
    table.push(row);
  }

  console.log(`📊 ${store.sourcePath ?? config.dataset.path}`);
  console.log(table.toString());
  console.log(`Analyzed: ${stats.analyzed}/${stats.total}`);
  console.log(`Last updated: ${stats.lastUpdated}`);
}

if (isDirectInvocation(import.meta.url)) {
  main().catch((error) => {
    console.error("\n❌ Stats failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
