import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { collectEcosystem, type CollectOptions } from "../src/tasks/ecosystem/collect";
import { fakeGitHubClient, type FakePages, MemorySnapshotStore } from "./fixtures";

const fixedNow = () => new Date("2024-01-01T12:00:00.000Z");

const defaultConfig: CollectOptions["config"] = {
  ecosystemUser: "",
  repositoryLimit: 1000,
  starredLimit: 500,
  collectEnterprises: false,
};

const graphPages: FakePages = {
  organizations: [[{ login: "cogcities" }], [{ login: "regima-uk" }]],
  repositories: [[{ nameWithOwner: "test-user/a" }, { nameWithOwner: "test-user/b" }]],
  followers: [[{ login: "f1" }]],
  following: [[]],
  starredRepositories: [[{ nameWithOwner: "x/y" }]],
  gists: [[{ name: "g1" }, { name: "g2" }, { name: "g3" }]],
};

describe("collectEcosystem", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes every snapshot, then the summary", async () => {
    const store = new MemorySnapshotStore();

    const summary = await collectEcosystem({
      client: fakeGitHubClient(graphPages),
      store,
      config: defaultConfig,
      now: fixedNow,
    });

    expect(store.writes).toEqual([
      "user_info",
      "organizations",
      "repositories",
      "followers",
      "following",
      "starred_repos",
      "gists",
      "summary",
    ]);
    expect(summary).toEqual({
      timestamp: "2024-01-01T12:00:00.000Z",
      user: "test-user",
      counts: {
        organizations: 2,
        repositories: 2,
        followers: 1,
        following: 0,
        starred_repos: 1,
        gists: 3,
      },
    });
    expect(summary.counts).not.toHaveProperty("enterprises");
    expect(store.documents.get("summary")).toEqual(summary);
    expect(store.documents.get("organizations")).toEqual([
      { login: "cogcities" },
      { login: "regima-uk" },
    ]);
    expect(console.log).toHaveBeenCalledWith("\n[1/7] Querying user info...");
    expect(console.log).toHaveBeenCalledWith("\n[3/7] Querying repositories (up to 1000)...");
  });

  it("collects enterprises when enabled", async () => {
    const store = new MemorySnapshotStore();

    const summary = await collectEcosystem({
      client: fakeGitHubClient({
        ...graphPages,
        enterprises: [[{ slug: "test-ent", name: "Test Enterprise" }]],
      }),
      store,
      config: { ...defaultConfig, collectEnterprises: true },
      now: fixedNow,
    });

    expect(store.writes.slice(0, 3)).toEqual([
      "user_info",
      "enterprises",
      "organizations",
    ]);
    expect(summary.counts.enterprises).toBe(1);
    expect(console.log).toHaveBeenCalledWith("\n[2/8] Querying enterprises...");
  });

  it("caps repositories and starred repositories at the configured limits", async () => {
    const store = new MemorySnapshotStore();

    const summary = await collectEcosystem({
      client: fakeGitHubClient(graphPages),
      store,
      config: { ...defaultConfig, repositoryLimit: 1, starredLimit: 0 },
      now: fixedNow,
    });

    expect(summary.counts.repositories).toBe(1);
    expect(summary.counts.starred_repos).toBe(0);
    expect(store.documents.get("starred_repos")).toEqual([]);
  });

  it("stops at the first failing query without writing a summary", async () => {
    const store = new MemorySnapshotStore();

    await expect(
      collectEcosystem({
        client: fakeGitHubClient({
          ...graphPages,
          followers: [new Error("HTTP 502")],
        }),
        store,
        config: defaultConfig,
        now: fixedNow,
      })
    ).rejects.toThrow("HTTP 502");

    expect(store.writes).toEqual(["user_info", "organizations", "repositories"]);
    expect(store.documents.has("summary")).toBe(false);
  });

  it("warns when the token owner differs from the configured user", async () => {
    await collectEcosystem({
      client: fakeGitHubClient(graphPages),
      store: new MemorySnapshotStore(),
      config: { ...defaultConfig, ecosystemUser: "someone-else" },
      now: fixedNow,
    });

    expect(console.warn).toHaveBeenCalledWith(
      "  ⚠️  Token belongs to test-user, not someone-else; collecting the token owner's graph"
    );
  });

  it("does not warn when the configured user matches in any case", async () => {
    await collectEcosystem({
      client: fakeGitHubClient(graphPages),
      store: new MemorySnapshotStore(),
      config: { ...defaultConfig, ecosystemUser: "Test-User" },
      now: fixedNow,
    });

    expect(console.warn).not.toHaveBeenCalled();
  });
});
