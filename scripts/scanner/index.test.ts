import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { writeShard } from "../dataset/shards";
import { DatasetStore } from "../dataset/store";
import type { RepositoryRecord } from "../dataset/types";
import { ScannerFailure } from "../shared/errors";
import { runAnalysis } from "./index";
import type { AnalysisOutcome } from "./scan";

const fixedNow = () => new Date("2024-06-01T00:00:00.000Z");

function record(name: string, analyzed = false): RepositoryRecord {
  return {
    owner: "acme",
    name,
    fullName: `acme/${name}`,
    stars: 800,
    forks: 80,
    language: "Java",
    releaseCount: 30,
    contributorCount: 25,
    classification: { category: "SLOW", averageIntervalDays: 75 },
    analyzed,
    metrics: null,
    lastAnalyzedAt: null,
    collectedAt: "2024-05-01T00:00:00.000Z",
  };
}

describe("runAnalysis", () => {
  let tmpDir: string;
  let shardDir: string;
  let store: DatasetStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "rcs-analyze-"));
    shardDir = path.join(tmpDir, "shards");
    store = new DatasetStore({ path: path.join(tmpDir, "dataset.json"), format: "json", now: fixedNow });
    await store.load();
    for (const entry of [record("one", true), record("two"), record("three"), record("four")]) {
      store.upsert(entry);
    }
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("recovers leftover shards, analyzes the rest and saves once merged", async () => {
    await writeShard(shardDir, 1, [
      { fullName: "acme/two", metrics: { bugs: { kind: "integer", value: 1 } }, analyzedAt: "2024-05-30T00:00:00.000Z" },
    ]);
    const analyze = vi.fn(async (target: RepositoryRecord): Promise<AnalysisOutcome> => {
      if (target.name === "four") {
        const error = new ScannerFailure("Scanner failed for acme_four: exit 2");
        return { status: "failed", fullName: target.fullName, projectKey: "acme_four", reason: error.message, error };
      }
      return {
        status: "analyzed",
        fullName: target.fullName,
        projectKey: `acme_${target.name}`,
        metrics: { sqale_rating: { kind: "rating", value: "B" } },
        analyzedAt: "2024-06-01T00:00:00.000Z",
      };
    });
    const sink = { upsertRecord: vi.fn(async () => undefined) };

    const report = await runAnalysis({ store, shardDir, concurrency: 2, analyze, sink });

    expect(report.resumed).toEqual({ shards: 1, merged: 1, notFound: [] });
    expect(analyze.mock.calls.map(([target]) => target.name).sort()).toEqual(["four", "three"]);
    expect(report).toMatchObject({ attempted: 2, analyzed: 1 });
    expect(report.failures.map((failure) => failure.reason)).toEqual(["Scanner failed for acme_four: exit 2"]);
    expect(report.merged).toEqual({ shards: 1, merged: 1, notFound: [] });
    expect(await fs.pathExists(shardDir)).toBe(false);

    const written = await fs.readJson(path.join(tmpDir, "dataset.json"));
    const analyzedNames = written.repositories
      .filter((entry: RepositoryRecord) => entry.analyzed)
      .map((entry: RepositoryRecord) => entry.name);
    expect(analyzedNames).toEqual(["one", "two", "three"]);
    expect(written.metadata.analyzedCount).toBe(3);

    expect(sink.upsertRecord).toHaveBeenCalledTimes(1);
    expect(sink.upsertRecord).toHaveBeenCalledWith(expect.objectContaining({ fullName: "acme/three", analyzed: true }));
  });

  it("honours the limit", async () => {
    const analyze = vi.fn(
      async (target: RepositoryRecord): Promise<AnalysisOutcome> => ({
        status: "analyzed",
        fullName: target.fullName,
        projectKey: `acme_${target.name}`,
        metrics: { bugs: { kind: "integer", value: 0 } },
        analyzedAt: "2024-06-01T00:00:00.000Z",
      })
    );

    const report = await runAnalysis({ store, shardDir, concurrency: 1, analyze, limit: 1 });

    expect(analyze).toHaveBeenCalledTimes(1);
    expect(analyze.mock.calls[0][0].name).toBe("two");
    expect(report.resumed.shards).toBe(0);
    expect(store.get("acme", "two")?.metrics).toEqual({ bugs: { kind: "integer", value: 0 } });
  });

  it("re-analyzes records that already have metrics when skipping is off", async () => {
    const analyze = vi.fn(
      async (target: RepositoryRecord): Promise<AnalysisOutcome> => ({
        status: "analyzed",
        fullName: target.fullName,
        projectKey: `acme_${target.name}`,
        metrics: { bugs: { kind: "integer", value: 2 } },
        analyzedAt: "2024-06-01T00:00:00.000Z",
      })
    );

    const report = await runAnalysis({ store, shardDir, concurrency: 2, analyze, skipAnalyzed: false });

    expect(report.attempted).toBe(4);
    expect(analyze.mock.calls.map(([target]) => target.name).sort()).toEqual(["four", "one", "three", "two"]);
    expect(store.get("acme", "one")?.metrics).toEqual({ bugs: { kind: "integer", value: 2 } });
  });

  it("attempts nothing when the category has no pending records", async () => {
    const analyze = vi.fn(async (): Promise<AnalysisOutcome> => {
      throw new Error("not expected");
    });

    const report = await runAnalysis({ store, shardDir, concurrency: 2, analyze, category: "RAPID" });

    expect(analyze).not.toHaveBeenCalled();
    expect(report).toMatchObject({ attempted: 0, analyzed: 0, failures: [] });
  });
});
