import { sleep as defaultSleep, type Sleep } from "../catalog/rate-limiter";
import { runRequest, type RequestOutcome } from "../catalog/request";
import type { MetricsBag } from "../dataset/types";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../shared/config";
import { NotFoundError, ScannerFailure } from "../shared/errors";
import { METRIC_KEYS, toMetricsBag } from "./metrics";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface SonarClientOptions {
  host: string;
  token: string;
  timeoutMs: number;
  fetch?: FetchLike;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  debug?: boolean;
}

export interface SonarProject {
  key: string;
  name: string;
}

export interface PollOptions {
  attempts: number;
  intervalMs: number;
}

const PROJECTS_PAGE_SIZE = 500;

class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly response: { headers: Record<string, string> },
    message: string
  ) {
    super(message);
    this.name = "HttpStatusError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readMeasures(body: unknown): MetricsBag | null {
  if (!isRecord(body) || !isRecord(body.component)) {
    return null;
  }
  const measures = body.component.measures;
  if (!Array.isArray(measures)) {
    return null;
  }
  const raw: Record<string, unknown> = {};
  for (const measure of measures) {
    if (isRecord(measure) && typeof measure.metric === "string") {
      raw[measure.metric] = measure.value;
    }
  }
  return toMetricsBag(raw);
}

/** Client for the scanning server's web API (measures, project search, health). */
export class SonarClient {
  private readonly host: string;
  private readonly token: string;
  private readonly fetchImpl: FetchLike;
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly debug: boolean;

  constructor(options: SonarClientOptions) {
    this.host = options.host.replace(/\/+$/, "");
    this.token = options.token;
    this.fetchImpl = options.fetch ?? fetch;
    this.retry = {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: 3,
      baseDelayMs: 2_000,
      maxDelayMs: 30_000,
      requestTimeoutMs: options.timeoutMs,
      ...options.retry,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.debug = options.debug ?? false;
  }

  private async getJson(pathname: string, params: Record<string, string> = {}): Promise<RequestOutcome<unknown>> {
    const url = new URL(`${this.host}${pathname}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    return runRequest(
      `sonar ${pathname}`,
      async (signal) => {
        const response = await this.fetchImpl(url, {
          headers: { Authorization: `Bearer ${this.token}`, Accept: "application/json" },
          signal,
        });
        if (!response.ok) {
          throw new HttpStatusError(
            response.status,
            { headers: Object.fromEntries(response.headers.entries()) },
            `HTTP ${response.status} from ${pathname}`
          );
        }
        const body: unknown = await response.json();
        return body;
      },
      this.retry,
      { sleep: this.sleep, debug: this.debug }
    );
  }

  /** Measures for a project, or null when the server does not know it (yet). */
  async fetchMeasures(projectKey: string): Promise<MetricsBag | null> {
    const outcome = await this.getJson("/api/measures/component", {
      component: projectKey,
      metricKeys: METRIC_KEYS.join(","),
    });
    if (outcome.state === "failed") {
      if (outcome.error instanceof NotFoundError) {
        return null;
      }
      throw new ScannerFailure(`Could not read measures for ${projectKey}: ${outcome.error.message}`, {
        cause: outcome.error,
      });
    }
    return readMeasures(outcome.data);
  }

  /** Measures appear some time after a scan finishes; poll until they do. */
  async waitForMeasures(projectKey: string, options: PollOptions): Promise<MetricsBag | null> {
    for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
      const metrics = await this.fetchMeasures(projectKey);
      if (metrics) {
        return metrics;
      }
      if (attempt < options.attempts) {
        if (this.debug) {
          console.log(`⏳ [${projectKey}] measures not ready (${attempt}/${options.attempts})`);
        }
        await this.sleep(options.intervalMs);
      }
    }
    return null;
  }

  async listProjects(): Promise<SonarProject[]> {
    const projects: SonarProject[] = [];
    let page = 1;

    while (true) {
      const outcome = await this.getJson("/api/components/search_projects", {
        p: String(page),
        ps: String(PROJECTS_PAGE_SIZE),
      });
      if (outcome.state === "failed") {
        console.log(`⚠️  Project listing stopped at page ${page}: ${outcome.error.message}`);
        break;
      }

      const body = outcome.data;
      const components = isRecord(body) && Array.isArray(body.components) ? body.components : [];
      for (const component of components) {
        if (isRecord(component) && typeof component.key === "string") {
          projects.push({
            key: component.key,
            name: typeof component.name === "string" ? component.name : component.key,
          });
        }
      }

      const paging = isRecord(body) && isRecord(body.paging) ? body.paging : {};
      const total = typeof paging.total === "number" ? paging.total : 0;
      if (components.length === 0 || projects.length >= total) {
        break;
      }
      page += 1;
    }

    return projects;
  }

  /** Server health status ("UP", "STARTING", ...), or null when unreachable. */
  async ping(): Promise<string | null> {
    const outcome = await this.getJson("/api/system/status");
    if (outcome.state === "failed") {
      return null;
    }
    const body = outcome.data;
    return isRecord(body) && typeof body.status === "string" ? body.status : null;
  }
}
