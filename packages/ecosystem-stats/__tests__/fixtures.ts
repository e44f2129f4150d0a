import {
  GitHubClient,
  type GraphQLRequest,
  VIEWER_QUERY,
} from "@ecosystem-tracker/github-client";
import type { SnapshotStore } from "../src/snapshots/store";
import type { SnapshotName } from "../src/tasks/ecosystem/data-config";

export class MemorySnapshotStore implements SnapshotStore {
  readonly documents = new Map<SnapshotName, unknown>();
  readonly writes: SnapshotName[] = [];

  write(name: SnapshotName, data: unknown): void {
    this.writes.push(name);
    this.documents.set(name, data);
  }

  read(name: SnapshotName): unknown {
    return this.documents.get(name) ?? null;
  }
}

/** Pages per connection field; an Error entry fails that request. */
export type FakePages = Record<string, Array<unknown[] | Error>>;

// Serves `viewer.<field>` pages for the client's list queries, matched on the
// connection field name in the query document.
export function fakeGitHubClient(
  pages: FakePages,
  viewer: Record<string, unknown> = { login: "test-user" }
): GitHubClient {
  const served: Record<string, number> = {};

  const request: GraphQLRequest = async <T>(query: string): Promise<T> => {
    if (query === VIEWER_QUERY) {
      return { viewer } as T;
    }

    const field = Object.keys(pages).find((key) =>
      query.includes(`${key}(first: $first`)
    );
    if (!field) throw new Error("No fake pages for query");

    const index = served[field] ?? 0;
    served[field] = index + 1;
    const page = pages[field][index];
    if (page instanceof Error) throw page;

    return {
      viewer: {
        [field]: {
          nodes: page,
          pageInfo: {
            hasNextPage: index < pages[field].length - 1,
            endCursor: `${field}-${index + 1}`,
          },
        },
      },
    } as T;
  };

  return new GitHubClient({ authToken: "test-token", request });
}
