import * as fs from "fs";
import * as path from "path";
import {
  enterpriseSchema,
  type EnterpriseSnapshot,
  organizationSchema,
  type OrganizationSnapshot,
  readListSnapshot,
  readSnapshot,
  repositorySchema,
  type RepositorySnapshot,
  summarySchema,
  type SummarySnapshot,
} from "../../snapshots/schema";
import type { SnapshotStore } from "../../snapshots/store";
import type { RepositoryStats } from "../../types";
import {
  analyzeRepositories,
  categorizeOrganizations,
  mapOrganizationsToEnterprises,
  topByRepositoryCount,
  topLanguages,
  truncate,
} from "./analyze";
import { type CategoryName, dataFiles, reportLimits, schedule } from "./data-config";

export interface ReportInput {
  summary: SummarySnapshot;
  enterprises: EnterpriseSnapshot[];
  organizations: OrganizationSnapshot[];
  repositories: RepositorySnapshot[];
}

export interface ReportOptions {
  title: string;
  /** Directory prefix of the data file links, relative to the report. */
  dataLinkBase?: string;
}

const ORG_TABLE_HEADER = [
  "| Organization | Repos | Members | Description |",
  "|--------------|-------|---------|-------------|",
];

function organizationRow(
  org: OrganizationSnapshot,
  descriptionWidth: number
): string {
  const description = truncate(
    org.description || "No description",
    descriptionWidth
  );
  return `| [${org.login}](https://github.com/${org.login}) | ${org.repositories.totalCount} | ${org.membersWithRole.totalCount} | ${description} |`;
}

function generateHeaderSection(
  title: string,
  summary: SummarySnapshot,
  renderedAt: Date
): string {
  return `# ${title}

> Automated ecosystem tracking for the ${summary.user ?? "unknown"} GitHub network

**Last Updated:** ${summary.timestamp}

**Report Generated:** ${renderedAt.toISOString()}
`;
}

function generateOverviewSection(counts: SummarySnapshot["counts"]): string {
  const rows: Array<[string, number]> = [
    ["Enterprises", counts.enterprises ?? 0],
    ["Organizations", counts.organizations],
    ["Repositories", counts.repositories],
    ["Followers", counts.followers],
    ["Following", counts.following],
    ["Starred Repos", counts.starred_repos],
    ["Gists", counts.gists],
  ];

  const lines = [
    "## 📊 Overview\n",
    "| Metric | Count |",
    "|--------|-------|",
    ...rows.map(([metric, value]) => `| ${metric} | ${value} |`),
  ];
  return lines.join("\n") + "\n";
}

function generateEnterpriseSection(enterprises: EnterpriseSnapshot[]): string {
  if (enterprises.length === 0) {
    return "## 🏛️ Enterprises\n\n*No enterprise data available*\n";
  }

  const lines = [
    "## 🏛️ Enterprises\n",
    "| Enterprise | Slug | Organizations | Members | Admin |",
    "|------------|------|---------------|---------|-------|",
  ];
  for (const ent of enterprises) {
    const url = ent.url ?? `https://github.com/enterprises/${ent.slug}`;
    lines.push(
      `| [${ent.name}](${url}) | \`${ent.slug}\` | ${ent.organizations.totalCount} | ${ent.members.totalCount} | ${ent.viewerIsAdmin ? "✅" : "❌"} |`
    );
  }

  lines.push("\n### Enterprise → Organization Mapping");
  for (const ent of enterprises) {
    if (ent.organizations.nodes.length === 0) continue;
    lines.push(`\n#### ${ent.name} (\`${ent.slug}\`)\n`, ...ORG_TABLE_HEADER);
    for (const org of topByRepositoryCount(ent.organizations.nodes)) {
      lines.push(organizationRow(org, reportLimits.enterpriseOrgDescription));
    }
  }
  return lines.join("\n") + "\n";
}

function generateCategorySection(
  categories: Map<CategoryName, OrganizationSnapshot[]>
): string {
  const lines = ["## 🏢 Organization Categories"];
  for (const [category, orgs] of categories) {
    lines.push(`\n### ${category}\n`, ...ORG_TABLE_HEADER);
    for (const org of topByRepositoryCount(
      orgs,
      reportLimits.organizationsPerCategory
    )) {
      lines.push(organizationRow(org, reportLimits.categoryOrgDescription));
    }
  }
  return lines.join("\n") + "\n";
}

function generateRepositorySection(
  repositories: RepositorySnapshot[],
  stats: RepositoryStats
): string {
  const lines = [
    "## 💻 Repository Statistics\n",
    "| Metric | Value |",
    "|--------|-------|",
    `| Total Repositories | ${repositories.length} |`,
    `| Public | ${stats.public} |`,
    `| Private | ${stats.private} |`,
    `| Forks | ${stats.forks} |`,
    `| Original | ${stats.original} |`,
    `| Archived | ${stats.archived} |`,
    "\n### Top Languages\n",
    "| Language | Count | Percentage |",
    "|----------|-------|------------|",
  ];
  for (const share of topLanguages(stats.languages, reportLimits.languages)) {
    lines.push(`| ${share.language} | ${share.count} | ${share.percentage}% |`);
  }

  lines.push(
    "\n### Recently Updated Repositories\n",
    "| Repository | Language | Stars | Updated |",
    "|------------|----------|-------|---------|"
  );
  // Snapshot order is already most recently updated first.
  for (const repo of repositories.slice(0, reportLimits.recentRepositories)) {
    const language = repo.primaryLanguage?.name ?? "Unknown";
    const updated = truncate(repo.updatedAt, reportLimits.updatedDate);
    lines.push(
      `| [${repo.nameWithOwner}](https://github.com/${repo.nameWithOwner}) | ${language} | ${repo.stargazerCount} | ${updated} |`
    );
  }
  return lines.join("\n") + "\n";
}

function generateDataFilesSection(dataLinkBase: string): string {
  const lines = [
    "## 📁 Data Files\n",
    "The following data files are automatically updated:\n",
    ...dataFiles.map(({ name, description }) => {
      const file = `${dataLinkBase}/${name}.json`;
      return `- [\`${file}\`](${file}) - ${description}`;
    }),
  ];
  return lines.join("\n") + "\n";
}

function generateScheduleSection(): string {
  return `## 🔄 Update Schedule

This dashboard is automatically updated ${schedule.description}.

You can also trigger a manual update from the [Actions tab](${schedule.workflowPath}).

---

*Generated by Ecosystem Tracker*
`;
}

/**
 * Renders the dashboard. Output depends only on `input` apart from the
 * "Report Generated" line, which shows `renderedAt`.
 */
export function renderReport(
  input: ReportInput,
  renderedAt: Date,
  options: ReportOptions
): string {
  const { summary, enterprises, organizations, repositories } = input;

  const sections = [
    generateHeaderSection(options.title, summary, renderedAt),
    generateOverviewSection(summary.counts),
    generateEnterpriseSection(enterprises),
    generateCategorySection(categorizeOrganizations(organizations)),
    generateRepositorySection(repositories, analyzeRepositories(repositories)),
    generateDataFilesSection(options.dataLinkBase ?? "data"),
    generateScheduleSection(),
  ];
  return sections.join("\n");
}

export interface GenerateReportOptions extends ReportOptions {
  store: SnapshotStore;
  reportPath: string;
  now?: () => Date;
}

/**
 * Reads the snapshots and writes the rendered report to `reportPath`.
 * Returns the written path, or `null` when there is no summary snapshot.
 */
export function generateReport(options: GenerateReportOptions): string | null {
  const { store, reportPath } = options;
  const now = options.now ?? (() => new Date());

  const summary = readSnapshot(store, "summary", summarySchema);
  if (!summary) {
    console.log("No summary data found, skipping report generation");
    return null;
  }

  const enterprises = readListSnapshot(store, "enterprises", enterpriseSchema);
  const organizations = readListSnapshot(
    store,
    "organizations",
    organizationSchema
  );
  const repositories = readListSnapshot(store, "repositories", repositorySchema);
  console.log(
    `📥 Loaded ${enterprises.length} enterprises, ${organizations.length} organizations, ${repositories.length} repositories`
  );

  const { byOrganization, conflicts } =
    mapOrganizationsToEnterprises(enterprises);
  console.log(`🔗 ${byOrganization.size} organizations belong to an enterprise`);
  for (const login of conflicts) {
    const owner = byOrganization.get(login);
    console.warn(
      `  ⚠️  ${login} is listed under several enterprises, keeping ${owner?.enterpriseSlug}`
    );
  }

  const report = renderReport(
    { summary, enterprises, organizations, repositories },
    now(),
    options
  );

  fs.mkdirSync(path.dirname(reportPath), { recursive: true });
  fs.writeFileSync(reportPath, report);
  console.log(`📝 Generated ${reportPath}`);
  return reportPath;
}
