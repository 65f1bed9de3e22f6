import { describe, expect, it } from "vitest";

import { statisticsRows } from "./dataset-stats";

describe("statisticsRows", () => {
  it("renders one row per category with shares and averages", () => {
    const rows = statisticsRows({
      total: 4,
      analyzed: 1,
      lastUpdated: "2024-06-01T00:00:00.000Z",
      byCategory: {
        RAPID: { count: 3, averageIntervalDays: 13.8, averageContributors: 25.5 },
        SLOW: { count: 1, averageIntervalDays: 90, averageContributors: 40 },
        INELIGIBLE: { count: 0, averageIntervalDays: null, averageContributors: null },
      },
    });

    expect(rows).toEqual([
      ["RAPID", "3", "75.0%", "13.8", "25.5"],
      ["SLOW", "1", "25.0%", "90.0", "40.0"],
      ["INELIGIBLE", "0", "0.0%", "-", "-"],
    ]);
  });

  it("handles an empty dataset", () => {
    const empty = { count: 0, averageIntervalDays: null, averageContributors: null };
    const rows = statisticsRows({
      total: 0,
      analyzed: 0,
      lastUpdated: "2024-06-01T00:00:00.000Z",
      byCategory: { RAPID: empty, SLOW: empty, INELIGIBLE: empty },
    });
    expect(rows.map((row) => row[2])).toEqual(["0.0%", "0.0%", "0.0%"]);
  });
});
