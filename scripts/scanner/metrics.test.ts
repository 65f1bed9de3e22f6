import { describe, expect, it } from "vitest";

import { formatMetricValue, metricKind, toMetricsBag, toMetricValue } from "./metrics";

describe("toMetricValue", () => {
  it("turns numeric ratings into letters", () => {
    expect(toMetricValue("reliability_rating", "1.0")).toEqual({ kind: "rating", value: "A" });
    expect(toMetricValue("security_rating", "5.0")).toEqual({ kind: "rating", value: "E" });
    expect(toMetricValue("sqale_rating", "b")).toEqual({ kind: "rating", value: "B" });
    expect(toMetricValue("sqale_rating", "7")).toBeNull();
  });

  it("reads counts and percentages", () => {
    expect(toMetricValue("bugs", "12")).toEqual({ kind: "integer", value: 12 });
    expect(toMetricValue("ncloc", 4500)).toEqual({ kind: "integer", value: 4500 });
    expect(toMetricValue("coverage", "83.4")).toEqual({ kind: "percentage", value: 83.4 });
    expect(toMetricValue("bugs", "many")).toBeNull();
    expect(toMetricValue("bugs", "")).toBeNull();
  });

  it("keeps the quality gate and unknown measures as status strings", () => {
    expect(toMetricValue("alert_status", "OK")).toEqual({ kind: "status", value: "OK" });
    expect(metricKind("new_measure")).toBe("status");
    expect(toMetricValue("new_measure", 3)).toEqual({ kind: "status", value: "3" });
  });
});

describe("formatMetricValue", () => {
  it("renders each kind as a cell", () => {
    expect(formatMetricValue({ kind: "integer", value: 7 })).toBe("7");
    expect(formatMetricValue({ kind: "percentage", value: 12.5 })).toBe("12.5");
    expect(formatMetricValue({ kind: "rating", value: "C" })).toBe("C");
    expect(formatMetricValue({ kind: "status", value: "ERROR" })).toBe("ERROR");
  });
});

describe("toMetricsBag", () => {
  it("accepts tagged and raw values and drops empty ones", () => {
    expect(toMetricsBag({ bugs: { kind: "integer", value: 3 }, coverage: "50.5", alert_status: null })).toEqual({
      bugs: { kind: "integer", value: 3 },
      coverage: { kind: "percentage", value: 50.5 },
    });
  });

  it("returns null when nothing is readable", () => {
    expect(toMetricsBag(null)).toBeNull();
    expect(toMetricsBag({})).toBeNull();
    expect(toMetricsBag(["bugs"])).toBeNull();
  });
});
