import "../../setup-env";
import { GitHubClient } from "@ecosystem-tracker/github-client";
import { loadCollectorConfig, loadReporterConfig } from "../../env";
import { FileSnapshotStore } from "../../snapshots/store";
import { collectEcosystem } from "./collect";
import { generateReport } from "./ecosystem.reports";

export const commands = ["collect", "report", "update"] as const;

export type Command = (typeof commands)[number];

function isCommand(command: string): command is Command {
  return commands.some((known) => known === command);
}

async function runCollect(environment: NodeJS.ProcessEnv): Promise<void> {
  const config = loadCollectorConfig(environment);
  const client = new GitHubClient({
    authToken: config.githubToken,
    baseUrl: config.githubApiUrl,
  });
  await collectEcosystem({
    client,
    store: new FileSnapshotStore(config.dataDir),
    config,
  });
}

function runReport(environment: NodeJS.ProcessEnv): void {
  const config = loadReporterConfig(environment);
  console.log("=".repeat(60));
  console.log("📝 Ecosystem Report Generator");
  console.log(`Timestamp: ${new Date().toISOString()}`);
  console.log("=".repeat(60));

  generateReport({
    store: new FileSnapshotStore(config.dataDir),
    reportPath: config.reportPath,
    title: config.reportTitle,
  });
}

async function runCommand(
  command: string,
  environment: NodeJS.ProcessEnv = process.env
): Promise<void> {
  console.log(`Executing ecosystem task: ${command}`);

  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}`);
  }

  switch (command) {
    case "collect":
      await runCollect(environment);
      break;
    case "report":
      runReport(environment);
      break;
    case "update":
      // Fail on configuration before collecting anything.
      loadReporterConfig(environment);
      await runCollect(environment);
      runReport(environment);
      break;
  }
}

if (require.main === module) {
  const command = process.argv[2];
  if (!command) {
    console.error(`Please provide a command: ${commands.join(", ")}`);
    process.exit(1);
  }

  runCommand(command)
    .then(() => {
      console.log("Command completed successfully!");
      process.exit(0);
    })
    .catch((error) => {
      console.error("Command failed:", error);
      process.exit(1);
    });
}

export { runCommand };
