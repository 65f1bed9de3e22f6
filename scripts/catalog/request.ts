import type { RetryPolicy } from "../shared/config";
import {
  NotFoundError,
  PermanentRequestError,
  RateLimitError,
  StudyError,
  TransientNetworkError,
  describeError,
} from "../shared/errors";
import { readHeaderNumber, readResetInstant, sleep as defaultSleep, type Sleep } from "./rate-limiter";

export type RequestState =
  | "idle"
  | "requesting"
  | "success"
  | "rate_limited"
  | "waiting"
  | "backoff"
  | "failed";

export interface RequestTransition {
  label: string;
  from: RequestState;
  to: RequestState;
  attempt: number;
  delayMs?: number;
}

export type RequestOutcome<T> =
  | { state: "success"; data: T; attempts: number }
  | { state: "failed"; error: StudyError; attempts: number };

export interface RequestHooks {
  sleep?: Sleep;
  /** Awaited before each attempt, ahead of that attempt's timeout. */
  beforeAttempt?: () => Promise<unknown>;
  now?: () => number;
  onTransition?: (transition: RequestTransition) => void;
  debug?: boolean;
}

type HeaderBag = Record<string, string | number | undefined>;

const TRANSIENT_STATUSES = new Set([500, 502, 503, 504]);
const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);
const UNKNOWN_RESET_WAIT_MS = 60_000;
const MIN_RATE_LIMIT_WAIT_MS = 1_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readHeaders(value: unknown): HeaderBag {
  if (!isRecord(value)) {
    return {};
  }
  const headers: HeaderBag = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string" || typeof entry === "number") {
      headers[key.toLowerCase()] = entry;
    }
  }
  return headers;
}

function readStatus(error: Record<string, unknown>): number | null {
  return typeof error.status === "number" ? error.status : null;
}

function responseHeaders(error: Record<string, unknown>): HeaderBag {
  if (isRecord(error.response)) {
    return readHeaders(error.response.headers);
  }
  return readHeaders(error.headers);
}

function graphqlErrorTypes(error: Record<string, unknown>): string[] {
  if (!Array.isArray(error.errors)) {
    return [];
  }
  return error.errors
    .map((entry: unknown) => (isRecord(entry) && typeof entry.type === "string" ? entry.type : null))
    .filter((type): type is string => type !== null);
}

function isNetworkFailure(error: unknown, depth = 0): boolean {
  if (!isRecord(error) || depth > 3) {
    return false;
  }
  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return true;
  }
  if (typeof error.code === "string" && TRANSIENT_CODES.has(error.code)) {
    return true;
  }
  return isNetworkFailure(error.cause, depth + 1);
}

/**
 * Maps whatever the transport threw onto the error taxonomy. Octokit's RequestError
 * and GraphqlResponseError are recognised by shape (status/response/errors) so that
 * duplicated copies of the octokit packages do not defeat the check.
 */
export function classifyRequestError(error: unknown, now: number = Date.now()): StudyError {
  if (error instanceof StudyError) {
    return error;
  }

  const message = describeError(error);
  if (!isRecord(error)) {
    return new PermanentRequestError(message, null, { cause: error });
  }

  const headers = responseHeaders(error);
  const graphqlTypes = graphqlErrorTypes(error);
  if (graphqlTypes.includes("RATE_LIMITED")) {
    return new RateLimitError(message, readResetInstant(headers), { cause: error });
  }
  if (graphqlTypes.length > 0 && graphqlTypes.every((type) => type === "NOT_FOUND")) {
    return new NotFoundError(message, { cause: error });
  }

  const status = readStatus(error);
  if (status === 403 || status === 429) {
    const remaining = readHeaderNumber(headers["x-ratelimit-remaining"]);
    if (remaining === 0) {
      return new RateLimitError(message, readResetInstant(headers), { cause: error });
    }
    if (status === 429) {
      const retryAfter = readHeaderNumber(headers["retry-after"]);
      const resetAt = retryAfter === null ? null : new Date(now + retryAfter * 1000);
      return new RateLimitError(message, resetAt, { cause: error });
    }
    return new PermanentRequestError(message, status, { cause: error });
  }
  if (status === 404) {
    return new NotFoundError(message, { cause: error });
  }
  if (status !== null && TRANSIENT_STATUSES.has(status)) {
    return new TransientNetworkError(message, status, { cause: error });
  }
  if (status === null && isNetworkFailure(error)) {
    return new TransientNetworkError(message, null, { cause: error });
  }
  return new PermanentRequestError(message, status, { cause: error });
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

export function rateLimitWait(resetAt: Date | null, now: number, marginMs: number): number {
  if (!resetAt) {
    return UNKNOWN_RESET_WAIT_MS;
  }
  return Math.max(MIN_RATE_LIMIT_WAIT_MS, resetAt.getTime() - now + marginMs);
}

/**
 * Runs one logical upstream request through the retry state machine.
 *
 * idle → requesting → success
 *                   → rate_limited → waiting → requesting   (does not spend an attempt)
 *                   → backoff → requesting                  (transient, up to maxAttempts)
 *                   → failed                                (permanent, or budget spent)
 *
 * Never throws: a failed outcome means "no data this cycle".
 */
export async function runRequest<T>(
  label: string,
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  hooks: RequestHooks = {}
): Promise<RequestOutcome<T>> {
  const wait = hooks.sleep ?? defaultSleep;
  const now = hooks.now ?? Date.now;
  let state: RequestState = "idle";
  let attempts = 0;
  let rateLimitWaits = 0;

  const move = (to: RequestState, delayMs?: number) => {
    hooks.onTransition?.({ label, from: state, to, attempt: attempts, delayMs });
    state = to;
  };

  while (true) {
    attempts += 1;
    await hooks.beforeAttempt?.();
    move("requesting");
    try {
      const data = await operation(AbortSignal.timeout(policy.requestTimeoutMs));
      move("success");
      return { state: "success", data, attempts };
    } catch (raw) {
      const error = classifyRequestError(raw, now());

      if (error instanceof RateLimitError) {
        move("rate_limited");
        if (rateLimitWaits >= policy.maxRateLimitWaits) {
          console.error(`❌ [${label}] still rate limited after ${rateLimitWaits} wait(s); giving up`);
          move("failed");
          return { state: "failed", error, attempts };
        }
        rateLimitWaits += 1;
        attempts -= 1;
        const delayMs = rateLimitWait(error.resetAt, now(), policy.rateLimitMarginMs);
        console.log(
          `⏸️  [${label}] rate limit reached; waiting ${Math.ceil(delayMs / 1000)}s` +
            (error.resetAt ? ` until ${error.resetAt.toISOString()}` : "")
        );
        move("waiting", delayMs);
        await wait(delayMs);
        continue;
      }

      if (error instanceof TransientNetworkError) {
        if (attempts >= policy.maxAttempts) {
          console.error(`❌ [${label}] failed after ${attempts} attempt(s): ${error.message}`);
          move("failed");
          return { state: "failed", error, attempts };
        }
        const delayMs = backoffDelay(attempts, policy);
        console.log(
          `⚠️  [${label}] transient error (${error.status ?? "network"}), retrying in ${Math.ceil(delayMs / 1000)}s ` +
            `(attempt ${attempts}/${policy.maxAttempts})`
        );
        move("backoff", delayMs);
        await wait(delayMs);
        continue;
      }

      if (hooks.debug || !(error instanceof NotFoundError)) {
        console.error(`❌ [${label}] ${error.message}`);
      }
      move("failed");
      return { state: "failed", error, attempts };
    }
  }
}
