import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { DatasetStore } from "../dataset/store";
import type { MetricsBag, RepositoryRecord } from "../dataset/types";
import { ScannerFailure } from "../shared/errors";
import { planRecovery, recoverMetrics, splitProjectKey, type MeasureLookup } from "./recover-metrics";

const fixedNow = () => new Date("2024-06-01T00:00:00.000Z");

function record(owner: string, name: string, metrics: MetricsBag | null = null): RepositoryRecord {
  return {
    owner,
    name,
    fullName: `${owner}/${name}`,
    stars: 700,
    forks: 70,
    language: "C",
    releaseCount: 50,
    contributorCount: 60,
    classification: { category: "SLOW", averageIntervalDays: 120 },
    analyzed: metrics !== null,
    metrics,
    lastAnalyzedAt: metrics ? "2024-05-01T00:00:00.000Z" : null,
    collectedAt: "2024-04-01T00:00:00.000Z",
  };
}

const done: MetricsBag = { bugs: { kind: "integer", value: 0 } };

describe("splitProjectKey", () => {
  it("splits on the first underscore", () => {
    expect(splitProjectKey("acme_my_repo")).toEqual({ owner: "acme", name: "my_repo" });
    expect(splitProjectKey("_repo")).toBeNull();
    expect(splitProjectKey("acme_")).toBeNull();
    expect(splitProjectKey("plain")).toBeNull();
  });
});

describe("planRecovery", () => {
  const records = [record("acme", "done", done), record("acme", "todo")];

  it("targets records without metrics", () => {
    expect(planRecovery(records, null)).toEqual([
      { owner: "acme", name: "todo", projectKey: "acme_todo", inDataset: true },
    ]);
  });

  it("adds server projects the dataset does not know", () => {
    const targets = planRecovery(records, [
      { key: "acme_done", name: "done" },
      { key: "beta_new_thing", name: "new_thing" },
      { key: "orphan", name: "orphan" },
    ]);

    expect(targets.map((target) => [target.projectKey, target.inDataset])).toEqual([
      ["acme_todo", true],
      ["beta_new_thing", false],
    ]);
    expect(targets[1]).toMatchObject({ owner: "beta", name: "new_thing" });
  });
});

describe("recoverMetrics", () => {
  let store: DatasetStore;

  beforeEach(async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "rcs-recover-"));
    store = new DatasetStore({ path: path.join(tmpDir, "dataset.json"), format: "json", now: fixedNow });
    await store.load();
    store.upsert(record("acme", "todo"));
    store.upsert(record("acme", "missing"));
    store.upsert(record("acme", "denied"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  const sonar: MeasureLookup = {
    fetchMeasures: async (projectKey) => {
      if (projectKey === "acme_missing") {
        return null;
      }
      if (projectKey === "acme_denied") {
        throw new ScannerFailure("Could not read measures for acme_denied: HTTP 403");
      }
      return { ncloc: { kind: "integer", value: 1200 } };
    },
  };

  it("merges what the server has and reports the rest", async () => {
    const targets = [
      ...planRecovery(store.list(), null),
      { owner: "beta", name: "extra", projectKey: "beta_extra", inDataset: false },
    ];

    const report = await recoverMetrics({ store, sonar, targets, now: fixedNow });

    expect(report).toEqual({
      targets: 4,
      recovered: 2,
      added: 1,
      notFound: ["acme_missing"],
      failed: [{ projectKey: "acme_denied", reason: "Could not read measures for acme_denied: HTTP 403" }],
    });
    expect(store.get("acme", "todo")).toMatchObject({
      analyzed: true,
      metrics: { ncloc: { kind: "integer", value: 1200 } },
      lastAnalyzedAt: "2024-06-01T00:00:00.000Z",
    });
    expect(store.get("beta", "extra")).toMatchObject({
      analyzed: true,
      classification: { category: "INELIGIBLE", averageIntervalDays: null },
    });
    expect(store.get("acme", "missing")?.analyzed).toBe(false);
  });

  it("writes nothing on a dry run", async () => {
    const targets = planRecovery(store.list(), null);

    const report = await recoverMetrics({ store, sonar, targets, dryRun: true });

    expect(report.recovered).toBe(1);
    expect(store.get("acme", "todo")?.analyzed).toBe(false);
    expect(store.size).toBe(3);
  });
});
