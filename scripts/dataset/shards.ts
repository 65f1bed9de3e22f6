import fs from "fs-extra";
import path from "node:path";

import { toMetricsBag } from "../scanner/metrics";
import { describeError } from "../shared/errors";
import type { DatasetStore } from "./store";
import type { MetricsBag } from "./types";

export interface ShardEntry {
  fullName: string;
  metrics: MetricsBag;
  analyzedAt: string;
}

export interface Shard {
  workerId: number;
  entries: ShardEntry[];
}

export interface ShardMergeReport {
  shards: number;
  merged: number;
  notFound: string[];
}

const SHARD_PATTERN = /^shard-(\d+)\.json$/;

export function shardPath(dir: string, workerId: number): string {
  return path.join(dir, `shard-${workerId}.json`);
}

/** Each worker owns exactly one shard file and rewrites it whole. */
export async function writeShard(dir: string, workerId: number, entries: readonly ShardEntry[]): Promise<string> {
  const filePath = shardPath(dir, workerId);
  const temporary = `${filePath}.tmp`;
  await fs.outputJson(temporary, { workerId, entries }, { spaces: 2 });
  await fs.rename(temporary, filePath);
  return filePath;
}

function readEntry(raw: unknown): ShardEntry | null {
  if (typeof raw !== "object" || raw === null) {
    return null;
  }
  const fullName = "fullName" in raw ? raw.fullName : undefined;
  const analyzedAt = "analyzedAt" in raw ? raw.analyzedAt : undefined;
  const metrics = toMetricsBag("metrics" in raw ? raw.metrics : undefined);
  if (typeof fullName !== "string" || typeof analyzedAt !== "string" || !metrics) {
    return null;
  }
  return { fullName, analyzedAt, metrics };
}

export async function readShards(dir: string): Promise<Shard[]> {
  if (!(await fs.pathExists(dir))) {
    return [];
  }

  const names = (await fs.readdir(dir)).filter((name) => SHARD_PATTERN.test(name)).sort();
  const shards: Shard[] = [];

  for (const name of names) {
    const filePath = path.join(dir, name);
    try {
      const raw: unknown = await fs.readJson(filePath);
      const list = typeof raw === "object" && raw !== null && "entries" in raw ? raw.entries : undefined;
      if (!Array.isArray(list)) {
        console.warn(`⚠️  Skipping shard ${name}: no entries array`);
        continue;
      }
      const entries = list.map(readEntry).filter((entry): entry is ShardEntry => entry !== null);
      const workerMatch = name.match(SHARD_PATTERN);
      shards.push({ workerId: workerMatch ? Number(workerMatch[1]) : -1, entries });
    } catch (error) {
      console.warn(`⚠️  Skipping shard ${name}: ${describeError(error)}`);
    }
  }

  return shards;
}

/** Applies every shard entry to the store. The caller saves once afterwards. */
export async function mergeShards(store: DatasetStore, dir: string): Promise<ShardMergeReport> {
  const shards = await readShards(dir);
  const report: ShardMergeReport = { shards: shards.length, merged: 0, notFound: [] };

  for (const shard of shards) {
    for (const entry of shard.entries) {
      if (store.mergeAnalysis(entry.fullName, entry.metrics, entry.analyzedAt) === "updated") {
        report.merged += 1;
      } else {
        report.notFound.push(entry.fullName);
      }
    }
  }

  return report;
}
