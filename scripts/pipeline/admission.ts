import type { RepositoryDetails } from "../catalog/types";
import type { ThresholdConfig } from "../shared/config";

export type AdmissionThresholds = ThresholdConfig;

export type AdmissionResult = { admitted: true } | { admitted: false; reason: string };

/** Every gate is strict: a candidate must exceed each minimum, matching the `stars:>N` search qualifier. */
export function checkAdmission(details: RepositoryDetails, thresholds: AdmissionThresholds): AdmissionResult {
  const gates: Array<[label: string, actual: number, minimum: number]> = [
    ["stars", details.stars, thresholds.minStars],
    ["forks", details.forks, thresholds.minForks],
    ["releases", details.releaseCount, thresholds.minReleases],
    ["contributors", details.contributorCount, thresholds.minContributors],
  ];

  for (const [label, actual, minimum] of gates) {
    if (actual <= minimum) {
      return { admitted: false, reason: `${label} ${actual} not above minimum ${minimum}` };
    }
  }
  return { admitted: true };
}
