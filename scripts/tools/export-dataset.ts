#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";

import { EXPORT_COLUMNS } from "../dataset/codec";
import { DatasetStore } from "../dataset/store";
import type { RepositoryRecord } from "../dataset/types";
import { PostgresSink } from "../sink/postgres";
import { isDirectInvocation } from "../shared/cli";
import { loadStudyConfig } from "../shared/config";
import { ConfigurationError, describeError } from "../shared/errors";

export function parseColumns(value: string): string[] {
  return value
    .split(",")
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
}

/** Upserts every record; a failing record is logged and counted, the rest still go through. */
export async function pushToSink(
  records: readonly RepositoryRecord[],
  sink: Pick<PostgresSink, "upsertRecord">
): Promise<{ written: number; failed: number }> {
  let written = 0;
  let failed = 0;
  for (const record of records) {
    try {
      await sink.upsertRecord(record);
      written += 1;
    } catch (error) {
      failed += 1;
      console.error(`❌ ${record.fullName}: ${describeError(error)}`);
    }
  }
  return { written, failed };
}

async function main() {
  const program = new Command();

  program
    .description("Export the dataset to a flat file and/or mirror it into Postgres")
    .option("--dataset <path>", "Dataset file (.json or .csv)")
    .option("--format <format>", "Dataset format: json or csv (default: from extension)")
    .option("--out <file>", "Write a CSV export to this path")
    .option("--columns <list>", "Comma-separated columns for the export", parseColumns, [...EXPORT_COLUMNS])
    .option("--sink", "Upsert every record into Postgres (needs DATABASE_URL)", false)
    .parse(process.argv);

  const options = program.opts<{ dataset?: string; format?: string; out?: string; columns: string[]; sink: boolean }>();
  if (!options.out && !options.sink) {
    throw new ConfigurationError("Nothing to do: pass --out and/or --sink.");
  }

  const config = loadStudyConfig(process.env, { datasetPath: options.dataset, datasetFormat: options.format });
  const store = new DatasetStore({ path: config.dataset.path, format: config.dataset.format });
  await store.load();

  if (options.out) {
    const count = await store.exportTabular(options.out, options.columns);
    console.log(`✅ Exported ${count} repositories to ${options.out}`);
  }

  if (options.sink) {
    if (!config.databaseUrl) {
      throw new ConfigurationError("--sink needs DATABASE_URL.");
    }
    const sink = PostgresSink.fromUrl(config.databaseUrl);
    try {
      await sink.ensureSchema();
      const { written, failed } = await pushToSink(store.list(), sink);
      console.log(`✅ Upserted ${written} repositories into Postgres${failed > 0 ? ` (${failed} failed)` : ""}`);
    } finally {
      await sink.close();
    }
  }
}

if (isDirectInvocation(import.meta.url)) {
  main().catch((error) => {
    console.error("\n❌ Export failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
