import { bool, cleanEnv, EnvMissingError, makeValidator, str } from "envalid";
import { ConfigError } from "./errors";

export interface CollectorConfig {
  githubToken: string;
  ecosystemUser: string;
  githubApiUrl: string;
  repositoryLimit: number;
  starredLimit: number;
  collectEnterprises: boolean;
  dataDir: string;
}

export interface ReporterConfig {
  dataDir: string;
  reportPath: string;
  reportTitle: string;
}

const requiredSecret = makeValidator<string>((input) => {
  if (input.trim() === "") {
    throw new Error("must be a non-empty string");
  }
  return input;
});

const limit = makeValidator<number>((input) => {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`expected a non-negative integer, got "${input}"`);
  }
  return value;
});

// envalid prints and exits by default; surface problems as ConfigError instead
// so the task runner decides how to stop.
function throwOnInvalid({
  errors,
}: {
  errors: Partial<Record<string, Error>>;
}): void {
  const problems = Object.entries(errors).map(
    ([key, error]) =>
      `${key} ${error instanceof EnvMissingError || !error ? "is missing" : error.message}`
  );
  if (problems.length > 0) {
    throw new ConfigError(`Invalid environment: ${problems.join("; ")}`);
  }
}

const sharedSpecs = {
  DATA_DIR: str({ default: "data", desc: "Snapshot directory" }),
};

export function loadCollectorConfig(
  environment: NodeJS.ProcessEnv = process.env
): CollectorConfig {
  const env = cleanEnv(
    environment,
    {
      ...sharedSpecs,
      GITHUB_TOKEN: requiredSecret({ desc: "GitHub bearer token" }),
      ECOSYSTEM_USER: str({ default: "" }),
      GITHUB_API_URL: str({ default: "https://api.github.com" }),
      REPOSITORY_LIMIT: limit({ default: 1000 }),
      STARRED_LIMIT: limit({ default: 500 }),
      COLLECT_ENTERPRISES: bool({ default: false }),
    },
    { reporter: throwOnInvalid }
  );

  return {
    githubToken: env.GITHUB_TOKEN,
    ecosystemUser: env.ECOSYSTEM_USER,
    githubApiUrl: env.GITHUB_API_URL,
    repositoryLimit: env.REPOSITORY_LIMIT,
    starredLimit: env.STARRED_LIMIT,
    collectEnterprises: env.COLLECT_ENTERPRISES,
    dataDir: env.DATA_DIR,
  };
}

export function loadReporterConfig(
  environment: NodeJS.ProcessEnv = process.env
): ReporterConfig {
  const env = cleanEnv(
    environment,
    {
      ...sharedSpecs,
      REPORT_PATH: str({ default: "README.md" }),
      REPORT_TITLE: str({ default: "Ecosystem Dashboard" }),
    },
    { reporter: throwOnInvalid }
  );

  return {
    dataDir: env.DATA_DIR,
    reportPath: env.REPORT_PATH,
    reportTitle: env.REPORT_TITLE,
  };
}
