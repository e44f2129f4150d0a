import type { GitHubClient } from "@ecosystem-tracker/github-client";
import type { CollectorConfig } from "../../env";
import type { SnapshotStore } from "../../snapshots/store";
import type { EcosystemSummary } from "../../types";
import type { SnapshotName } from "./data-config";

export interface CollectOptions {
  client: GitHubClient;
  store: SnapshotStore;
  config: Pick<
    CollectorConfig,
    "ecosystemUser" | "repositoryLimit" | "starredLimit" | "collectEnterprises"
  >;
  now?: () => Date;
}

const BANNER = "=".repeat(60);

/**
 * Queries the viewer's account graph and writes one snapshot per entity type,
 * then a summary of the collected counts.
 *
 * Each snapshot is written as soon as its query finishes. The first failing
 * request aborts the run; snapshots written before it are left in place.
 */
export async function collectEcosystem(
  options: CollectOptions
): Promise<EcosystemSummary> {
  const { client, store, config } = options;
  const now = options.now ?? (() => new Date());
  const scriptStartTime = Date.now();

  const totalSteps = config.collectEnterprises ? 8 : 7;
  let step = 0;

  async function collectList<T>(
    name: SnapshotName,
    label: string,
    fetch: () => Promise<T[]>
  ): Promise<T[]> {
    step++;
    console.log(`\n[${step}/${totalSteps}] Querying ${label}...`);
    const items = await fetch();
    store.write(name, items);
    console.log(`  📊 Found ${items.length} ${label}`);
    return items;
  }

  console.log(BANNER);
  console.log("🌐 Ecosystem Query");
  console.log(`Timestamp: ${now().toISOString()}`);
  console.log(BANNER);
  if (config.ecosystemUser) {
    console.log(`🎯 Ecosystem user: ${config.ecosystemUser}`);
  }

  try {
    step++;
    console.log(`\n[${step}/${totalSteps}] Querying user info...`);
    const userInfo = await client.fetchViewer();
    store.write("user_info", userInfo);
    console.log(`  👤 User: ${userInfo.login}`);

    if (
      config.ecosystemUser &&
      config.ecosystemUser.toLowerCase() !== userInfo.login.toLowerCase()
    ) {
      console.warn(
        `  ⚠️  Token belongs to ${userInfo.login}, not ${config.ecosystemUser}; collecting the token owner's graph`
      );
    }

    const enterprises = config.collectEnterprises
      ? await collectList("enterprises", "enterprises", () =>
          client.fetchEnterprises()
        )
      : undefined;

    const organizations = await collectList(
      "organizations",
      "organizations",
      () => client.fetchOrganizations()
    );
    const repositories = await collectList(
      "repositories",
      `repositories (up to ${config.repositoryLimit})`,
      () => client.fetchRepositories(config.repositoryLimit)
    );
    const followers = await collectList("followers", "followers", () =>
      client.fetchFollowers()
    );
    const following = await collectList("following", "following", () =>
      client.fetchFollowing()
    );
    const starred = await collectList(
      "starred_repos",
      `starred repositories (up to ${config.starredLimit})`,
      () => client.fetchStarredRepositories(config.starredLimit)
    );
    const gists = await collectList("gists", "gists", () => client.fetchGists());

    const summary: EcosystemSummary = {
      timestamp: now().toISOString(),
      user: userInfo.login,
      counts: {
        // Only present when COLLECT_ENTERPRISES is on.
        ...(enterprises ? { enterprises: enterprises.length } : {}),
        organizations: organizations.length,
        repositories: repositories.length,
        followers: followers.length,
        following: following.length,
        starred_repos: starred.length,
        gists: gists.length,
      },
    };
    store.write("summary", summary);

    const duration = ((Date.now() - scriptStartTime) / 1000).toFixed(2);
    console.log(`\n${BANNER}`);
    console.log(`✨ Ecosystem query complete in ${duration}s!`);
    console.log(BANNER);

    return summary;
  } catch (error) {
    const duration = ((Date.now() - scriptStartTime) / 1000).toFixed(2);
    console.error(`\n❌ Ecosystem query failed after ${duration}s:`, error);
    throw error;
  }
}
