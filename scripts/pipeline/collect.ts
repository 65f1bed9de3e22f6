import { collectReleaseHistory } from "../catalog/client";
import type { DetailsLookup, ReleaseStream, RepositoryDetails, RepositorySummary } from "../catalog/types";
import { classifyReleaseEvents, type ReleaseCategory } from "../classifier/interval";
import type { DatasetStore } from "../dataset/store";
import type { RepositoryRecord } from "../dataset/types";
import { validateRepositoryIdentity } from "../keys/project-key";
import { sleep as defaultSleep, type Sleep } from "../catalog/rate-limiter";
import type { IntervalBands, TargetConfig, ThresholdConfig } from "../shared/config";
import { describeError } from "../shared/errors";
import { checkAdmission } from "./admission";

export interface CandidateSource {
  search(queryExpression: string, maxResults: number): Promise<RepositorySummary[]>;
  getDetails(owner: string, name: string): Promise<DetailsLookup>;
  getAllReleases(owner: string, name: string): ReleaseStream;
}

export type CollectionStore = Pick<DatasetStore, "has" | "upsert" | "remove" | "save" | "list">;

export interface CollectionSettings {
  thresholds: ThresholdConfig;
  intervals: IntervalBands;
  targets: TargetConfig;
  pacingMs: number;
  debug?: boolean;
}

export type CandidateStatus = "accepted" | "rejected" | "failed" | "skipped";

export interface CandidateOutcome {
  fullName: string;
  status: CandidateStatus;
  reason: string | null;
  category: ReleaseCategory | null;
  /** Set on an accepted candidate whose mirror into the sink failed. */
  warning?: string;
}

export type StopReason = "targets_met" | "budget_exhausted";

export interface CollectionReport {
  processed: number;
  accepted: number;
  rejected: number;
  failed: number;
  skipped: number;
  outcomes: CandidateOutcome[];
  stoppedBecause: StopReason;
  /** RAPID/SLOW totals over the whole store at the end of the run. */
  totals: { RAPID: number; SLOW: number };
}

export interface CollectionDeps {
  client: CandidateSource;
  store: CollectionStore;
  settings: CollectionSettings;
  sleep?: Sleep;
  now?: () => Date;
  /** Called after each accepted record is saved (e.g. to mirror it into Postgres). A failure here only warns. */
  onAccepted?: (record: RepositoryRecord) => Promise<void>;
}

type TargetCategory = "RAPID" | "SLOW";

function countTargets(records: readonly RepositoryRecord[]): { RAPID: number; SLOW: number } {
  const totals = { RAPID: 0, SLOW: 0 };
  for (const record of records) {
    const category = record.classification.category;
    if (category === "RAPID" || category === "SLOW") {
      totals[category] += 1;
    }
  }
  return totals;
}

function targetFor(category: TargetCategory, targets: TargetConfig): number {
  return category === "RAPID" ? targets.rapid : targets.slow;
}

function toRecord(details: RepositoryDetails, category: ReleaseCategory, average: number | null, now: Date): RepositoryRecord {
  return {
    owner: details.owner,
    name: details.name,
    fullName: `${details.owner}/${details.name}`,
    stars: details.stars,
    forks: details.forks,
    language: details.language,
    releaseCount: details.releaseCount,
    contributorCount: details.contributorCount,
    classification: { category, averageIntervalDays: average },
    analyzed: false,
    metrics: null,
    lastAnalyzedAt: null,
    collectedAt: now.toISOString(),
  };
}

/**
 * Walks search results in order and admits repositories into the store until both
 * category targets are met or the search budget runs out. Targets count what the store
 * already holds, so a rerun picks up where the last one stopped. Every per-candidate
 * failure becomes a reason on that candidate; nothing here aborts the batch.
 */
export async function collectRepositories(deps: CollectionDeps): Promise<CollectionReport> {
  const { client, store, settings } = deps;
  const wait = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const totals = countTargets(store.list());
  const outcomes: CandidateOutcome[] = [];

  const targetsMet = () => totals.RAPID >= settings.targets.rapid && totals.SLOW >= settings.targets.slow;
  const report = (stoppedBecause: StopReason): CollectionReport => {
    const tally = (status: CandidateStatus) => outcomes.filter((outcome) => outcome.status === status).length;
    return {
      processed: outcomes.length,
      accepted: tally("accepted"),
      rejected: tally("rejected"),
      failed: tally("failed"),
      skipped: tally("skipped"),
      outcomes,
      stoppedBecause,
      totals: { ...totals },
    };
  };

  if (targetsMet()) {
    console.log(`✅ Targets already met (RAPID ${totals.RAPID}, SLOW ${totals.SLOW}); nothing to collect`);
    return report("targets_met");
  }

  const candidates = await client.search(settings.targets.query, settings.targets.searchBudget);
  console.log(`🔍 ${candidates.length} candidate(s) for "${settings.targets.query}"`);

  const evaluate = async (summary: RepositorySummary): Promise<CandidateOutcome> => {
    const outcome = (status: CandidateStatus, reason: string | null, category: ReleaseCategory | null = null) => ({
      fullName: summary.fullName,
      status,
      reason,
      category,
    });

    const lookup = await client.getDetails(summary.owner, summary.name);
    if (lookup.status === "absent") {
      return outcome("failed", lookup.reason);
    }
    const details = lookup.details;

    const identity = validateRepositoryIdentity(details);
    if (!identity.valid) {
      return outcome("rejected", identity.errors.join("; "));
    }

    const admission = checkAdmission(details, settings.thresholds);
    if (!admission.admitted) {
      return outcome("rejected", admission.reason);
    }

    const history = await collectReleaseHistory(client.getAllReleases(details.owner, details.name));
    if (!history.complete) {
      return outcome("failed", `release history incomplete after ${history.events.length} release(s): ${history.error.message}`);
    }

    const classification = classifyReleaseEvents(history.events, settings.intervals);
    const { category, averageIntervalDays } = classification;
    if (category === "INELIGIBLE") {
      const reason =
        averageIntervalDays === null
          ? "fewer than two release days to compare"
          : `interval ${averageIntervalDays} days outside rapid/slow bands`;
      return outcome("rejected", reason, category);
    }

    if (totals[category] >= targetFor(category, settings.targets)) {
      return outcome("rejected", `target for ${category} already met`, category);
    }

    const record = toRecord(details, category, averageIntervalDays, now());
    if (store.upsert(record) === "exists") {
      return outcome("skipped", "already in dataset", category);
    }
    totals[category] += 1;
    try {
      await store.save();
    } catch (error) {
      store.remove(record.fullName);
      totals[category] -= 1;
      return outcome("failed", `not saved: ${describeError(error)}`, category);
    }

    if (deps.onAccepted) {
      try {
        await deps.onAccepted(record);
      } catch (error) {
        return { ...outcome("accepted", null, category), warning: `mirror failed: ${describeError(error)}` };
      }
    }
    return outcome("accepted", null, category);
  };

  let stoppedBecause: StopReason | null = null;
  for (const [position, summary] of candidates.entries()) {
    if (targetsMet()) {
      stoppedBecause = "targets_met";
      break;
    }

    const prefix = `[${position + 1}/${candidates.length}] ${summary.fullName}`;
    if (store.has(summary.fullName)) {
      outcomes.push({ fullName: summary.fullName, status: "skipped", reason: "already in dataset", category: null });
      if (settings.debug) {
        console.log(`⏭️  ${prefix}: already in dataset`);
      }
      continue;
    }

    let result: CandidateOutcome;
    try {
      result = await evaluate(summary);
    } catch (error) {
      result = { fullName: summary.fullName, status: "failed", reason: describeError(error), category: null };
    }
    outcomes.push(result);

    if (result.status === "accepted") {
      console.log(`✅ ${prefix}: ${result.category} (RAPID ${totals.RAPID}/${settings.targets.rapid}, SLOW ${totals.SLOW}/${settings.targets.slow})`);
      if (result.warning) {
        console.warn(`⚠️  ${prefix}: ${result.warning}`);
      }
    } else if (result.status === "failed") {
      console.error(`❌ ${prefix}: ${result.reason}`);
    } else if (settings.debug) {
      console.log(`⏭️  ${prefix}: ${result.reason}`);
    }

    if (settings.pacingMs > 0 && position < candidates.length - 1) {
      await wait(settings.pacingMs);
    }
  }

  return report(stoppedBecause ?? (targetsMet() ? "targets_met" : "budget_exhausted"));
}
