#!/usr/bin/env node
import "dotenv/config";
import Table from "cli-table3";
import { Command } from "commander";

import { DatasetStore } from "../dataset/store";
import type { MetricsBag, RepositoryRecord } from "../dataset/types";
import { sanitizeProjectKey, validateRepositoryIdentity } from "../keys/project-key";
import { SonarClient, type SonarProject } from "../scanner/sonar";
import { isDirectInvocation } from "../shared/cli";
import { loadStudyConfig, requireSonarToken } from "../shared/config";
import { ConfigurationError, describeError } from "../shared/errors";

export interface RecoveryTarget {
  owner: string;
  name: string;
  projectKey: string;
  /** False for a project the server knows that the dataset does not. */
  inDataset: boolean;
}

export interface MeasureLookup {
  fetchMeasures(projectKey: string): Promise<MetricsBag | null>;
}

export interface RecoveryReport {
  targets: number;
  recovered: number;
  added: number;
  notFound: string[];
  failed: Array<{ projectKey: string; reason: string }>;
}

/** Splits a project key on its first underscore; owners never contain one after sanitizing. */
export function splitProjectKey(key: string): { owner: string; name: string } | null {
  const index = key.indexOf("_");
  if (index <= 0 || index === key.length - 1) {
    return null;
  }
  return { owner: key.slice(0, index), name: key.slice(index + 1) };
}

/**
 * Records without metrics, plus (when `projects` is given) every server project whose key
 * matches no record in the dataset.
 */
export function planRecovery(records: readonly RepositoryRecord[], projects: readonly SonarProject[] | null): RecoveryTarget[] {
  const targets: RecoveryTarget[] = records
    .filter((record) => !record.analyzed || record.metrics === null)
    .map((record) => ({
      owner: record.owner,
      name: record.name,
      projectKey: sanitizeProjectKey(record.owner, record.name),
      inDataset: true,
    }));

  if (projects) {
    const known = new Set(records.map((record) => sanitizeProjectKey(record.owner, record.name)));
    for (const project of projects) {
      if (known.has(project.key)) {
        continue;
      }
      const parts = splitProjectKey(project.key);
      if (parts && validateRepositoryIdentity(parts).valid) {
        known.add(project.key);
        targets.push({ ...parts, projectKey: project.key, inDataset: false });
      }
    }
  }

  return targets;
}

function placeholderRecord(target: RecoveryTarget): RepositoryRecord {
  return {
    owner: target.owner,
    name: target.name,
    fullName: `${target.owner}/${target.name}`,
    stars: 0,
    forks: 0,
    language: null,
    releaseCount: 0,
    contributorCount: 0,
    classification: { category: "INELIGIBLE", averageIntervalDays: null },
    analyzed: false,
    metrics: null,
    lastAnalyzedAt: null,
    collectedAt: null,
  };
}

export interface RecoveryOptions {
  store: DatasetStore;
  sonar: MeasureLookup;
  targets: readonly RecoveryTarget[];
  dryRun?: boolean;
  now?: () => Date;
}

/** Fetches measures for each target and merges them into the store. Saving is left to the caller. */
export async function recoverMetrics(options: RecoveryOptions): Promise<RecoveryReport> {
  const { store, sonar, targets } = options;
  const now = options.now ?? (() => new Date());
  const report: RecoveryReport = { targets: targets.length, recovered: 0, added: 0, notFound: [], failed: [] };

  for (const [position, target] of targets.entries()) {
    const prefix = `[${position + 1}/${targets.length}] ${target.owner}/${target.name}`;
    let metrics: MetricsBag | null;
    try {
      metrics = await sonar.fetchMeasures(target.projectKey);
    } catch (error) {
      const reason = describeError(error);
      report.failed.push({ projectKey: target.projectKey, reason });
      console.error(`❌ ${prefix}: ${reason}`);
      continue;
    }

    if (!metrics) {
      report.notFound.push(target.projectKey);
      console.log(`⚠️  ${prefix}: no measures on the server`);
      continue;
    }

    report.recovered += 1;
    console.log(`✅ ${prefix}: ${Object.keys(metrics).length} measure(s)`);
    if (options.dryRun) {
      continue;
    }

    const fullName = `${target.owner}/${target.name}`;
    if (!target.inDataset && store.upsert(placeholderRecord(target)) === "added") {
      report.added += 1;
    }
    store.mergeAnalysis(fullName, metrics, now().toISOString());
  }

  return report;
}

async function main() {
  const program = new Command();

  program
    .description("Recover metrics for dataset records from projects already analyzed on the scanning server")
    .option("--dataset <path>", "Dataset file (.json or .csv)")
    .option("--format <format>", "Dataset format: json or csv (default: from extension)")
    .option("--all", "Also add server projects that are missing from the dataset", false)
    .option("--dry-run", "Report what would be recovered without writing", false)
    .option("--debug", "Enable verbose logging", false)
    .parse(process.argv);

  const options = program.opts<{ dataset?: string; format?: string; all: boolean; dryRun: boolean; debug: boolean }>();
  const config = loadStudyConfig(process.env, {
    datasetPath: options.dataset,
    datasetFormat: options.format,
    debug: options.debug || undefined,
  });
  const token = requireSonarToken(config);

  const sonar = new SonarClient({ host: config.sonar.host, token, timeoutMs: config.sonar.timeoutMs, debug: config.debug });
  const status = await sonar.ping();
  if (status === null) {
    throw new ConfigurationError(`Scanning server at ${config.sonar.host} is unreachable.`);
  }
  console.log(`✅ Scanning server status: ${status}`);

  const store = new DatasetStore({ path: config.dataset.path, format: config.dataset.format });
  await store.load();

  const projects = options.all ? await sonar.listProjects() : null;
  if (projects) {
    console.log(`🔍 ${projects.length} project(s) on the server`);
  }
  const targets = planRecovery(store.list(), projects);
  if (targets.length === 0) {
    console.log("\n✅ Every record already has metrics");
    return;
  }

  const report = await recoverMetrics({ store, sonar, targets, dryRun: options.dryRun });

  const table = new Table({ head: ["Targets", "Recovered", "Added", "Not found", "Failed"] });
  table.push([report.targets, report.recovered, report.added, report.notFound.length, report.failed.length]);
  console.log(table.toString());

  if (options.dryRun) {
    console.log("\n💡 Dry run. Nothing was written.");
    return;
  }
  if (report.recovered > 0) {
    await store.save();
    console.log(`\n✅ Saved ${store.targetPath}`);
  }
}

if (isDirectInvocation(import.meta.url)) {
  main().catch((error) => {
    console.error("\n❌ Recovery failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
