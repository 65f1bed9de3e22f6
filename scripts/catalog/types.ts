import type { graphql } from "@octokit/graphql";

import type { ReleaseEvent } from "../classifier/interval";
import type { StudyError } from "../shared/errors";

export type GraphqlClient = typeof graphql;

export interface RepositorySummary {
  owner: string;
  name: string;
  fullName: string;
  stars: number;
  forks: number;
  language: string | null;
}

export interface RepositoryDetails extends RepositorySummary {
  releaseCount: number;
  contributorCount: number;
}

export type DetailsLookup =
  | { status: "found"; details: RepositoryDetails }
  | { status: "absent"; reason: string; error: StudyError };

export type ReleaseHistoryStatus = { complete: true } | { complete: false; error: StudyError };

export type ReleaseHistory = ReleaseHistoryStatus & { events: ReleaseEvent[] };

export type ReleaseStream = AsyncGenerator<ReleaseEvent, ReleaseHistoryStatus, void>;

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface RepositoryNode {
  nameWithOwner?: string;
  name?: string;
  owner?: { login: string } | null;
  stargazerCount?: number;
  forkCount?: number;
  primaryLanguage?: { name: string } | null;
}

export interface SearchResponse {
  search: {
    repositoryCount: number;
    pageInfo: PageInfo;
    nodes: Array<RepositoryNode | null>;
  };
}

export interface DetailsResponse {
  repository: (RepositoryNode & { releases: { totalCount: number } }) | null;
}

export interface ReleasesResponse {
  repository: {
    releases: {
      pageInfo: PageInfo;
      nodes: Array<{ tagName: string | null; createdAt: string | null; publishedAt: string | null } | null>;
    };
  } | null;
}
