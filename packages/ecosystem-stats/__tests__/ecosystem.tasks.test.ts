import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ConfigError } from "../src/errors";
import { runCommand } from "../src/tasks/ecosystem/ecosystem.tasks";

describe("runCommand", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "ecosystem-tasks-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("rejects unknown commands", async () => {
    await expect(runCommand("publish", {})).rejects.toThrow(
      "Unknown command: publish"
    );
  });

  it("fails collect before any request when the token is missing", async () => {
    await expect(runCommand("collect", {})).rejects.toThrow(ConfigError);
  });

  it("fails update on configuration", async () => {
    await expect(runCommand("update", {})).rejects.toThrow(ConfigError);
  });

  it("skips the report when nothing has been collected", async () => {
    const reportPath = path.join(workDir, "README.md");

    await runCommand("report", {
      DATA_DIR: path.join(workDir, "data"),
      REPORT_PATH: reportPath,
    });

    expect(fs.existsSync(reportPath)).toBe(false);
    expect(console.log).toHaveBeenCalledWith("Executing ecosystem task: report");
  });

  it("renders a report from snapshots on disk", async () => {
    const dataDir = path.join(workDir, "data");
    fs.mkdirSync(dataDir);
    fs.writeFileSync(
      path.join(dataDir, "summary.json"),
      JSON.stringify({
        timestamp: "2024-06-01T00:00:00.000Z",
        user: "test-user",
        counts: { organizations: 0, repositories: 0 },
      })
    );
    const reportPath = path.join(workDir, "README.md");

    await runCommand("report", {
      DATA_DIR: dataDir,
      REPORT_PATH: reportPath,
      REPORT_TITLE: "Test Dashboard",
    });

    const lines = fs.readFileSync(reportPath, "utf-8").split("\n");
    expect(lines[0]).toBe("# Test Dashboard");
    expect(lines).toContain("**Last Updated:** 2024-06-01T00:00:00.000Z");
  });
});
