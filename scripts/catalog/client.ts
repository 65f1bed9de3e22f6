import { withCustomRequest } from "@octokit/graphql";
import { Octokit } from "@octokit/rest";

import type { ReleaseEvent } from "../classifier/interval";
import type { CatalogConfig, RetryPolicy } from "../shared/config";
import { NotFoundError } from "../shared/errors";
import { RateLimiter, sleep as defaultSleep, type Sleep } from "./rate-limiter";
import { runRequest, type RequestOutcome, type RequestTransition } from "./request";
import type {
  DetailsLookup,
  DetailsResponse,
  GraphqlClient,
  ReleaseHistory,
  ReleaseStream,
  ReleasesResponse,
  RepositoryNode,
  RepositorySummary,
  SearchResponse,
} from "./types";

const SEARCH_PAGE_SIZE = 50;
const RELEASES_PAGE_SIZE = 100;

const SEARCH_QUERY = /* GraphQL */ `
  query ($queryString: String!, $first: Int!, $cursor: String) {
    search(query: $queryString, type: REPOSITORY, first: $first, after: $cursor) {
      repositoryCount
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        ... on Repository {
          nameWithOwner
          name
          owner {
            login
          }
          stargazerCount
          forkCount
          primaryLanguage {
            name
          }
        }
      }
    }
  }
`;

const DETAILS_QUERY = /* GraphQL */ `
  query ($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      nameWithOwner
      name
      owner {
        login
      }
      stargazerCount
      forkCount
      primaryLanguage {
        name
      }
      releases {
        totalCount
      }
    }
  }
`;

const RELEASES_QUERY = /* GraphQL */ `
  query ($owner: String!, $name: String!, $first: Int!, $cursor: String) {
    repository(owner: $owner, name: $name) {
      releases(first: $first, after: $cursor, orderBy: { field: CREATED_AT, direction: DESC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          tagName
          createdAt
          publishedAt
        }
      }
    }
  }
`;

export interface CatalogClientOptions {
  graphqlClient: GraphqlClient;
  octokit: Octokit;
  retry: RetryPolicy;
  pacingMs?: number;
  sleep?: Sleep;
  now?: () => number;
  debug?: boolean;
  onTransition?: (transition: RequestTransition) => void;
  /** Pre-emptive rate-limit pacing, applied before each attempt starts its timeout. */
  throttle?: Pick<RateLimiter, "checkAndWait">;
}

function toSummary(node: RepositoryNode | null | undefined): RepositorySummary | null {
  if (!node || !node.name) {
    return null;
  }
  const owner = node.owner?.login ?? node.nameWithOwner?.split("/")[0] ?? "";
  if (!owner) {
    return null;
  }
  return {
    owner,
    name: node.name,
    fullName: node.nameWithOwner ?? `${owner}/${node.name}`,
    stars: node.stargazerCount ?? 0,
    forks: node.forkCount ?? 0,
    language: node.primaryLanguage?.name ?? null,
  };
}

/** Reads the page number of `rel="last"` from a GitHub Link header. */
export function lastPageFromLink(link: string | number | undefined): number | null {
  if (typeof link !== "string") {
    return null;
  }
  for (const part of link.split(",")) {
    if (!/rel="last"/.test(part)) {
      continue;
    }
    const match = part.match(/[?&]page=(\d+)/);
    if (match) {
      return Number.parseInt(match[1], 10);
    }
  }
  return null;
}

export class CatalogClient {
  private readonly graphqlClient: GraphqlClient;
  private readonly octokit: Octokit;
  private readonly retry: RetryPolicy;
  private readonly pacingMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly debug: boolean;
  private readonly onTransition: ((transition: RequestTransition) => void) | undefined;
  private readonly throttle: Pick<RateLimiter, "checkAndWait"> | undefined;

  constructor(options: CatalogClientOptions) {
    this.graphqlClient = options.graphqlClient;
    this.octokit = options.octokit;
    this.retry = options.retry;
    this.pacingMs = options.pacingMs ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;
    this.onTransition = options.onTransition;
    this.throttle = options.throttle;
  }

  private async request<T>(label: string, operation: (signal: AbortSignal) => Promise<T>): Promise<RequestOutcome<T>> {
    const throttle = this.throttle;
    return runRequest(label, operation, this.retry, {
      sleep: this.sleep,
      now: this.now,
      onTransition: this.onTransition,
      debug: this.debug,
      beforeAttempt: throttle ? () => throttle.checkAndWait() : undefined,
    });
  }

  private async pause(): Promise<void> {
    if (this.pacingMs > 0) {
      await this.sleep(this.pacingMs);
    }
  }

  /**
   * Pages through the repository search until `maxResults` summaries are gathered or the
   * upstream runs out. A page that fails ends the search early with what was collected.
   */
  async search(queryExpression: string, maxResults: number): Promise<RepositorySummary[]> {
    const results: RepositorySummary[] = [];
    let cursor: string | null = null;
    let page = 1;

    while (results.length < maxResults) {
      const first = Math.min(SEARCH_PAGE_SIZE, maxResults - results.length);
      const outcome: RequestOutcome<SearchResponse> = await this.request(`search page ${page}`, (signal) =>
        this.graphqlClient<SearchResponse>(SEARCH_QUERY, {
          queryString: queryExpression,
          first,
          cursor,
          request: { signal },
        })
      );

      if (outcome.state === "failed") {
        console.log(`⚠️  Search stopped at page ${page} with ${results.length} result(s): ${outcome.error.message}`);
        break;
      }

      const connection = outcome.data.search;
      for (const node of connection.nodes) {
        const summary = toSummary(node);
        if (summary && results.length < maxResults) {
          results.push(summary);
        }
      }

      if (this.debug) {
        console.log(`🔍 Search page ${page}: ${results.length}/${maxResults} (upstream total ${connection.repositoryCount})`);
      }

      if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) {
        break;
      }
      cursor = connection.pageInfo.endCursor;
      page += 1;
      await this.pause();
    }

    return results;
  }

  async getDetails(owner: string, name: string): Promise<DetailsLookup> {
    const slug = `${owner}/${name}`;
    const outcome = await this.request(`details ${slug}`, (signal) =>
      this.graphqlClient<DetailsResponse>(DETAILS_QUERY, { owner, name, request: { signal } })
    );
    if (outcome.state === "failed") {
      return { status: "absent", reason: `details unavailable: ${outcome.error.message}`, error: outcome.error };
    }

    const repository = outcome.data.repository;
    const summary = toSummary(repository);
    if (!repository || !summary) {
      const error = new NotFoundError(`Repository ${slug} not found`);
      return { status: "absent", reason: "repository not found or inaccessible", error };
    }

    const contributors = await this.getContributorCount(owner, name);
    if (contributors.state === "failed") {
      return {
        status: "absent",
        reason: `contributors unavailable: ${contributors.error.message}`,
        error: contributors.error,
      };
    }

    return {
      status: "found",
      details: {
        ...summary,
        releaseCount: repository.releases.totalCount,
        contributorCount: contributors.data,
      },
    };
  }

  /** One contributor per page, so the last page number is the contributor count. */
  async getContributorCount(owner: string, name: string): Promise<RequestOutcome<number>> {
    return this.request(`contributors ${owner}/${name}`, async (signal) => {
      const response = await this.octokit.rest.repos.listContributors({
        owner,
        repo: name,
        per_page: 1,
        anon: "true",
        request: { signal },
      });
      const lastPage = lastPageFromLink(response.headers.link);
      if (lastPage !== null) {
        return lastPage;
      }
      return Array.isArray(response.data) ? response.data.length : 0;
    });
  }

  async *getAllReleases(owner: string, name: string): ReleaseStream {
    const slug = `${owner}/${name}`;
    let cursor: string | null = null;
    let page = 1;

    while (true) {
      const outcome: RequestOutcome<ReleasesResponse> = await this.request(`releases ${slug} page ${page}`, (signal) =>
        this.graphqlClient<ReleasesResponse>(RELEASES_QUERY, {
          owner,
          name,
          first: RELEASES_PAGE_SIZE,
          cursor,
          request: { signal },
        })
      );

      if (outcome.state === "failed") {
        return { complete: false, error: outcome.error };
      }
      const repository = outcome.data.repository;
      if (!repository) {
        return { complete: false, error: new NotFoundError(`Repository ${slug} not found`) };
      }

      const connection = repository.releases;
      for (const node of connection.nodes) {
        if (!node || !node.createdAt) {
          continue;
        }
        const event: ReleaseEvent = {
          createdAt: node.createdAt,
          publishedAt: node.publishedAt ?? null,
          tagName: node.tagName ?? null,
        };
        yield event;
      }

      if (this.debug) {
        console.log(`[${slug}] [releases] page ${page}: ${connection.nodes.length} release(s)`);
      }

      if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) {
        return { complete: true };
      }
      cursor = connection.pageInfo.endCursor;
      page += 1;
      await this.pause();
    }
  }
}

export async function collectReleaseHistory(stream: ReleaseStream): Promise<ReleaseHistory> {
  const events: ReleaseEvent[] = [];
  while (true) {
    const step = await stream.next();
    if (step.done) {
      return { ...step.value, events };
    }
    events.push(step.value);
  }
}

export interface CatalogClientFactoryOptions {
  sleep?: Sleep;
  now?: () => number;
  debug?: boolean;
  fetch?: typeof fetch;
}

/**
 * Wires a live client: GraphQL goes through the same Octokit request pipeline as REST,
 * so the rate limiter sees the headers of every call.
 */
export function createCatalogClient(config: CatalogConfig, options: CatalogClientFactoryOptions = {}): CatalogClient {
  const rateLimiter = new RateLimiter({
    threshold: config.rateLimitThreshold,
    marginMs: config.retry.rateLimitMarginMs,
    sleep: options.sleep,
    now: options.now,
  });
  const octokit = new Octokit({ auth: config.token, request: options.fetch ? { fetch: options.fetch } : undefined });
  octokit.hook.after("request", (response) => {
    rateLimiter.updateFromHeaders(response.headers);
  });

  const client = new CatalogClient({
    graphqlClient: withCustomRequest(octokit.request),
    octokit,
    retry: config.retry,
    pacingMs: config.pacingMs,
    sleep: options.sleep,
    now: options.now,
    debug: options.debug,
    throttle: rateLimiter,
  });
  return client;
}
