import { describe, expect, it } from "vitest";

import { canonicalizeRow, normalizeRecord, recordToRow, rowToRecord, TABULAR_COLUMNS } from "./codec";
import type { RepositoryRecord } from "./types";

describe("rowToRecord", () => {
  it("reads the column names of older files", () => {
    const record = rowToRecord({
      owner: "acme",
      name: "widgets",
      stargazer_count: "1200",
      fork_count: "300",
      language: "Go",
      total_releases: "45",
      collaborator_count: "88",
      avg_release_interval_days: "12.5",
      release_type: "rapid",
      sonarqube_analyzed: "True",
      sonarqube_analyzed_at: "2024-05-01T00:00:00Z",
      bugs: "3",
      reliability_rating: "2.0",
    });

    expect(record).toEqual({
      owner: "acme",
      name: "widgets",
      fullName: "acme/widgets",
      stars: 1200,
      forks: 300,
      language: "Go",
      releaseCount: 45,
      contributorCount: 88,
      classification: { category: "RAPID", averageIntervalDays: 12.5 },
      analyzed: true,
      metrics: {
        bugs: { kind: "integer", value: 3 },
        reliability_rating: { kind: "rating", value: "B" },
      },
      lastAnalyzedAt: "2024-05-01T00:00:00Z",
      collectedAt: null,
    });
  });

  it("treats unknown categories as ineligible and blank numbers as zero", () => {
    const record = rowToRecord({ owner: "acme", name: "tool", release_type: "NOT_ELIGIBLE", stars: "" });
    expect(record.classification).toEqual({ category: "INELIGIBLE", averageIntervalDays: null });
    expect(record.stars).toBe(0);
    expect(record.metrics).toBeNull();
    expect(record.analyzed).toBe(false);
  });
});

describe("recordToRow", () => {
  it("writes every canonical column", () => {
    const record: RepositoryRecord = {
      owner: "acme",
      name: "widgets",
      fullName: "acme/widgets",
      stars: 10,
      forks: 2,
      language: null,
      releaseCount: 20,
      contributorCount: 21,
      classification: { category: "SLOW", averageIntervalDays: null },
      analyzed: true,
      metrics: { coverage: { kind: "percentage", value: 71.3 } },
      lastAnalyzedAt: "2024-05-02T00:00:00Z",
      collectedAt: "2024-05-01T00:00:00Z",
    };

    const row = recordToRow(record);

    expect(Object.keys(row)).toEqual([...TABULAR_COLUMNS]);
    expect(row).toMatchObject({
      full_name: "acme/widgets",
      language: "",
      avg_release_interval: "",
      release_type: "SLOW",
      analyzed: "true",
      coverage: "71.3",
      bugs: "",
    });
    expect(rowToRecord(row)).toEqual(record);
  });
});

describe("canonicalizeRow", () => {
  it("moves aliased cells under canonical headers", () => {
    const row = canonicalizeRow({ owner: "", name: "lonely", stargazer_count: "5", extra: "dropped" });
    expect(Object.keys(row)).toEqual([...TABULAR_COLUMNS]);
    expect(row.stars).toBe("5");
    expect(row.name).toBe("lonely");
  });
});

describe("normalizeRecord", () => {
  it("reads the snake_case layout of older document files", () => {
    const record = normalizeRecord({
      owner: "acme",
      name: "widgets",
      full_name: "acme/widgets",
      release_type: "slow",
      stargazer_count: 100,
      fork_count: 60,
      total_releases: 30,
      avg_release_interval_days: 75.2,
      collaborator_count: 40,
      sonarqube_analyzed: true,
      sonarqube_metrics: { bugs: "4", sqale_rating: "1.0" },
    });

    expect(record).toEqual({
      owner: "acme",
      name: "widgets",
      fullName: "acme/widgets",
      stars: 100,
      forks: 60,
      language: null,
      releaseCount: 30,
      contributorCount: 40,
      classification: { category: "SLOW", averageIntervalDays: 75.2 },
      analyzed: true,
      metrics: {
        bugs: { kind: "integer", value: 4 },
        sqale_rating: { kind: "rating", value: "A" },
      },
      lastAnalyzedAt: null,
      collectedAt: null,
    });
  });

  it("repairs a missing owner from the full name", () => {
    const record = normalizeRecord({ owner: "", name: "wgcloutianshiyeben", full_name: "tianshiyeben/wgcloud" });
    expect(record?.fullName).toBe("tianshiyeben/wgcloud");
  });

  it("gives up on entries without a usable identity", () => {
    expect(normalizeRecord({ owner: "", name: "lonely" })).toBeNull();
    expect(normalizeRecord("acme/widgets")).toBeNull();
  });
});
