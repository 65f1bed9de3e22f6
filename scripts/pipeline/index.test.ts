import { describe, expect, it } from "vitest";

import type { CandidateOutcome } from "./collect";
import { tallyReasons } from "./index";

const outcome = (status: CandidateOutcome["status"], reason: string | null): CandidateOutcome => ({
  fullName: "acme/widgets",
  status,
  reason,
  category: null,
});

describe("tallyReasons", () => {
  it("groups reasons that differ only in numbers", () => {
    const reasons = tallyReasons([
      outcome("rejected", "stars 10 not above minimum 50"),
      outcome("rejected", "stars 12 not above minimum 50"),
      outcome("failed", "boom"),
      outcome("accepted", null),
      outcome("skipped", "already in dataset"),
      outcome("rejected", "interval 45.5 days outside rapid/slow bands"),
    ]);

    expect(reasons).toEqual([
      ["stars N not above minimum N", 2],
      ["boom", 1],
      ["interval N days outside rapid/slow bands", 1],
    ]);
  });

  it("honours the limit", () => {
    expect(tallyReasons([outcome("failed", "a"), outcome("failed", "b")], 1)).toEqual([["a", 1]]);
  });
});
