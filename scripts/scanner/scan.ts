import path from "node:path";

import { sanitizeProjectKey, validateProjectKey } from "../keys/project-key";
import type { MetricsBag, RepositoryRecord } from "../dataset/types";
import { describeError, isStudyError, ScannerFailure, ValidationError, type StudyError } from "../shared/errors";
import { runCommand, stderrTail, type ExecFile } from "./exec";
import type { PollOptions } from "./sonar";

export interface ScannerOptions {
  host: string;
  token: string;
  image: string;
  timeoutMs: number;
  exec?: ExecFile;
}

/** Runs the scanner container against `sourceDir`; the results land on the server, not here. */
export async function runScanner(sourceDir: string, projectKey: string, options: ScannerOptions): Promise<void> {
  const exec = options.exec ?? runCommand;
  const args = [
    "run",
    "--rm",
    "--network",
    "host",
    "-v",
    `${path.resolve(sourceDir)}:/usr/src`,
    options.image,
    `-Dsonar.projectKey=${projectKey}`,
    "-Dsonar.sources=.",
    `-Dsonar.host.url=${options.host}`,
    `-Dsonar.token=${options.token}`,
  ];
  try {
    await exec("docker", args, { timeoutMs: options.timeoutMs });
  } catch (error) {
    const detail = stderrTail(error) ?? describeError(error);
    throw new ScannerFailure(`Scanner failed for ${projectKey}: ${detail}`, { cause: error });
  }
}

export interface CloneWorkspace {
  clone(owner: string, name: string): Promise<string>;
  cleanup(dir: string): Promise<void>;
}

export interface MeasureSource {
  waitForMeasures(projectKey: string, options: PollOptions): Promise<MetricsBag | null>;
}

export interface AnalysisDeps {
  workspace: CloneWorkspace;
  sonar: MeasureSource;
  scan: (sourceDir: string, projectKey: string) => Promise<void>;
  poll: PollOptions;
  now?: () => Date;
}

export type AnalysisOutcome =
  | { status: "analyzed"; fullName: string; projectKey: string; metrics: MetricsBag; analyzedAt: string }
  | { status: "failed"; fullName: string; projectKey: string; reason: string; error: StudyError };

/** Clone, scan, poll for measures; the clone is always removed. Never throws. */
export async function analyzeRepository(record: RepositoryRecord, deps: AnalysisDeps): Promise<AnalysisOutcome> {
  const projectKey = sanitizeProjectKey(record.owner, record.name);
  const fullName = record.fullName;
  const failed = (error: StudyError): AnalysisOutcome => ({
    status: "failed",
    fullName,
    projectKey,
    reason: error.message,
    error,
  });

  const validation = validateProjectKey(projectKey);
  if (!validation.valid) {
    return failed(new ValidationError(`Invalid project key ${projectKey}`, validation.errors));
  }

  let dir: string | null = null;
  try {
    dir = await deps.workspace.clone(record.owner, record.name);
    await deps.scan(dir, projectKey);
    const metrics = await deps.sonar.waitForMeasures(projectKey, deps.poll);
    if (!metrics) {
      return failed(new ScannerFailure(`No measures for ${projectKey} after ${deps.poll.attempts} poll(s)`));
    }
    return {
      status: "analyzed",
      fullName,
      projectKey,
      metrics,
      analyzedAt: (deps.now ?? (() => new Date()))().toISOString(),
    };
  } catch (error) {
    return failed(isStudyError(error) ? error : new ScannerFailure(describeError(error), { cause: error }));
  } finally {
    if (dir) {
      await deps.workspace.cleanup(dir).catch((cleanupError: unknown) => {
        console.warn(`⚠️  Could not remove ${dir}: ${describeError(cleanupError)}`);
      });
    }
  }
}
