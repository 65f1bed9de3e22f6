import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { mergeShards, readShards, shardPath, writeShard } from "./shards";
import { DatasetStore } from "./store";

describe("shards", () => {
  let tmpDir: string;
  let shardDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "rcs-shards-"));
    shardDir = path.join(tmpDir, "shards");
  });

  it("writes one file per worker", async () => {
    const written = await writeShard(shardDir, 2, []);
    expect(written).toBe(shardPath(shardDir, 2));
    expect(await fs.readJson(written)).toEqual({ workerId: 2, entries: [] });
  });

  it("skips malformed shards and entries", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await writeShard(shardDir, 1, [
      { fullName: "acme/widgets", analyzedAt: "2024-06-01T00:00:00.000Z", metrics: { bugs: { kind: "integer", value: 1 } } },
    ]);
    await fs.writeFile(path.join(shardDir, "shard-2.json"), "not json", "utf8");
    await fs.writeJson(path.join(shardDir, "shard-3.json"), { entries: [{ fullName: "acme/x" }] });
    await fs.writeJson(path.join(shardDir, "notes.json"), { entries: [] });

    const shards = await readShards(shardDir);

    expect(shards.map((shard) => [shard.workerId, shard.entries.length])).toEqual([
      [1, 1],
      [3, 0],
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("returns nothing when the directory is missing", async () => {
    expect(await readShards(path.join(tmpDir, "absent"))).toEqual([]);
  });

  it("merges every worker's results into the store", async () => {
    const store = new DatasetStore({ path: path.join(tmpDir, "dataset.json"), format: "json" });
    await store.load();
    store.upsert({
      owner: "acme",
      name: "widgets",
      fullName: "acme/widgets",
      stars: 100,
      forks: 60,
      language: "Go",
      releaseCount: 30,
      contributorCount: 25,
      classification: { category: "SLOW", averageIntervalDays: 80 },
      analyzed: false,
      metrics: null,
      lastAnalyzedAt: null,
      collectedAt: null,
    });

    await writeShard(shardDir, 1, [
      {
        fullName: "acme/widgets",
        analyzedAt: "2024-06-01T00:00:00.000Z",
        metrics: { alert_status: { kind: "status", value: "OK" } },
      },
    ]);
    await writeShard(shardDir, 2, [
      { fullName: "ghost/repo", analyzedAt: "2024-06-01T00:00:00.000Z", metrics: { bugs: { kind: "integer", value: 0 } } },
    ]);

    const report = await mergeShards(store, shardDir);

    expect(report).toEqual({ shards: 2, merged: 1, notFound: ["ghost/repo"] });
    expect(store.get("acme", "widgets")).toMatchObject({
      analyzed: true,
      lastAnalyzedAt: "2024-06-01T00:00:00.000Z",
      metrics: { alert_status: { kind: "status", value: "OK" } },
    });
    expect(store.size).toBe(1);
  });
});
