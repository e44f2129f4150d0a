import { describe, it, expect } from "vitest";
import { loadCollectorConfig, loadReporterConfig } from "../src/env";
import { ConfigError } from "../src/errors";

describe("loadCollectorConfig", () => {
  it("applies defaults around the token", () => {
    expect(loadCollectorConfig({ GITHUB_TOKEN: "test-token" })).toEqual({
      githubToken: "test-token",
      ecosystemUser: "",
      githubApiUrl: "https://api.github.com",
      repositoryLimit: 1000,
      starredLimit: 500,
      collectEnterprises: false,
      dataDir: "data",
    });
  });

  it("reads overrides", () => {
    const config = loadCollectorConfig({
      GITHUB_TOKEN: "test-token",
      ECOSYSTEM_USER: "test-user",
      GITHUB_API_URL: "https://github.example.test/api/v3",
      REPOSITORY_LIMIT: "25",
      STARRED_LIMIT: "0",
      COLLECT_ENTERPRISES: "true",
      DATA_DIR: "snapshots",
    });

    expect(config).toEqual({
      githubToken: "test-token",
      ecosystemUser: "test-user",
      githubApiUrl: "https://github.example.test/api/v3",
      repositoryLimit: 25,
      starredLimit: 0,
      collectEnterprises: true,
      dataDir: "snapshots",
    });
  });

  it("requires a token", () => {
    expect(() => loadCollectorConfig({})).toThrow(ConfigError);
    expect(() => loadCollectorConfig({})).toThrow(/GITHUB_TOKEN/);
  });

  it("rejects a blank token", () => {
    expect(() => loadCollectorConfig({ GITHUB_TOKEN: "   " })).toThrow(
      "Invalid environment: GITHUB_TOKEN must be a non-empty string"
    );
  });

  it("rejects limits that are not non-negative integers", () => {
    expect(() =>
      loadCollectorConfig({ GITHUB_TOKEN: "test-token", REPOSITORY_LIMIT: "-1" })
    ).toThrow('REPOSITORY_LIMIT expected a non-negative integer, got "-1"');
    expect(() =>
      loadCollectorConfig({ GITHUB_TOKEN: "test-token", STARRED_LIMIT: "2.5" })
    ).toThrow(ConfigError);
  });
});

describe("loadReporterConfig", () => {
  it("needs no token", () => {
    expect(loadReporterConfig({})).toEqual({
      dataDir: "data",
      reportPath: "README.md",
      reportTitle: "Ecosystem Dashboard",
    });
  });

  it("reads overrides", () => {
    expect(
      loadReporterConfig({
        DATA_DIR: "snapshots",
        REPORT_PATH: "docs/dashboard.md",
        REPORT_TITLE: "Test Dashboard",
      })
    ).toEqual({
      dataDir: "snapshots",
      reportPath: "docs/dashboard.md",
      reportTitle: "Test Dashboard",
    });
  });
});
