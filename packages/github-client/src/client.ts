import { Octokit } from "@octokit/rest";
import { collectPages, PAGE_SIZE } from "./paginate";
import {
  ENTERPRISES_QUERY,
  FOLLOWERS_QUERY,
  FOLLOWING_QUERY,
  GISTS_QUERY,
  ORGANIZATIONS_QUERY,
  REPOSITORIES_QUERY,
  STARRED_REPOSITORIES_QUERY,
  VIEWER_QUERY,
} from "./queries";
import type {
  Connection,
  Enterprise,
  Gist,
  Organization,
  Person,
  Repository,
  StarredRepository,
  UserInfo,
} from "./types";

// A type alias rather than an interface so it stays assignable to Octokit's
// index-signature request parameters.
export type GraphQLVariables = {
  first: number;
  cursor: string | null;
};

/** Executes one GraphQL document and resolves with its `data`. */
export type GraphQLRequest = <T>(
  query: string,
  variables?: GraphQLVariables
) => Promise<T>;

export interface GitHubClientOptions {
  authToken: string;
  baseUrl?: string;
  userAgent?: string;
  /** Replaces the Octokit transport, e.g. with an in-memory fake. */
  request?: GraphQLRequest;
}

export const DEFAULT_REPOSITORY_LIMIT = 1000;
export const DEFAULT_STARRED_LIMIT = 500;

type ViewerConnection<K extends string, T> = {
  viewer: Record<K, Connection<T>>;
};

export class GitHubClient {
  private request: GraphQLRequest;

  constructor(options: GitHubClientOptions) {
    if (options.request) {
      this.request = options.request;
      return;
    }

    const octokit = new Octokit({
      auth: options.authToken,
      baseUrl: options.baseUrl,
      userAgent: options.userAgent ?? "ecosystem-tracker v0.1",
      log: console,
    });
    this.request = <T>(query: string, variables?: GraphQLVariables) =>
      octokit.graphql<T>(query, variables);
  }

  async fetchViewer(): Promise<UserInfo> {
    const data = await this.request<{ viewer: UserInfo }>(VIEWER_QUERY);
    return data.viewer;
  }

  fetchOrganizations(): Promise<Organization[]> {
    return this.paginateViewer<"organizations", Organization>(
      "organizations",
      ORGANIZATIONS_QUERY
    );
  }

  fetchEnterprises(): Promise<Enterprise[]> {
    return this.paginateViewer<"enterprises", Enterprise>(
      "enterprises",
      ENTERPRISES_QUERY
    );
  }

  // Most recently updated first
  fetchRepositories(limit = DEFAULT_REPOSITORY_LIMIT): Promise<Repository[]> {
    return this.paginateViewer<"repositories", Repository>(
      "repositories",
      REPOSITORIES_QUERY,
      limit
    );
  }

  fetchFollowers(): Promise<Person[]> {
    return this.paginateViewer<"followers", Person>("followers", FOLLOWERS_QUERY);
  }

  fetchFollowing(): Promise<Person[]> {
    return this.paginateViewer<"following", Person>("following", FOLLOWING_QUERY);
  }

  // Most recently starred first
  fetchStarredRepositories(
    limit = DEFAULT_STARRED_LIMIT
  ): Promise<StarredRepository[]> {
    return this.paginateViewer<"starredRepositories", StarredRepository>(
      "starredRepositories",
      STARRED_REPOSITORIES_QUERY,
      limit
    );
  }

  fetchGists(): Promise<Gist[]> {
    return this.paginateViewer<"gists", Gist>("gists", GISTS_QUERY);
  }

  private paginateViewer<K extends string, T>(
    field: K,
    query: string,
    limit?: number
  ): Promise<T[]> {
    return collectPages<T>(
      async (cursor) => {
        const data = await this.request<ViewerConnection<K, T>>(query, {
          first: PAGE_SIZE,
          cursor,
        });
        return data.viewer[field];
      },
      { limit }
    );
  }
}
