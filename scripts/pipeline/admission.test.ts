import { describe, expect, it } from "vitest";

import type { RepositoryDetails } from "../catalog/types";
import { DEFAULT_THRESHOLDS } from "../shared/config";
import { checkAdmission } from "./admission";

function details(overrides: Partial<RepositoryDetails> = {}): RepositoryDetails {
  return {
    owner: "acme",
    name: "widgets",
    fullName: "acme/widgets",
    stars: 500,
    forks: 120,
    language: "Go",
    releaseCount: 30,
    contributorCount: 40,
    ...overrides,
  };
}

describe("checkAdmission", () => {
  it("admits a repository above every minimum", () => {
    expect(checkAdmission(details(), DEFAULT_THRESHOLDS)).toEqual({ admitted: true });
  });

  it("rejects a value equal to the minimum", () => {
    expect(checkAdmission(details({ releaseCount: 19 }), DEFAULT_THRESHOLDS)).toEqual({
      admitted: false,
      reason: "releases 19 not above minimum 19",
    });
  });

  it("reports the first failing gate", () => {
    expect(checkAdmission(details({ forks: 3, contributorCount: 1 }), DEFAULT_THRESHOLDS)).toEqual({
      admitted: false,
      reason: "forks 3 not above minimum 50",
    });
  });
});
