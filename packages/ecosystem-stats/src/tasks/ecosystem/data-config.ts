export const snapshotNames = [
  "user_info",
  "enterprises",
  "organizations",
  "repositories",
  "followers",
  "following",
  "starred_repos",
  "gists",
  "summary",
] as const;

export type SnapshotName = (typeof snapshotNames)[number];

// Linked from the report, in this order.
export const dataFiles: Array<{ name: SnapshotName; description: string }> = [
  { name: "summary", description: "Overview statistics" },
  { name: "enterprises", description: "Enterprise details" },
  { name: "organizations", description: "Organization details" },
  { name: "repositories", description: "Repository listings" },
  { name: "followers", description: "Follower information" },
  { name: "following", description: "Following information" },
  { name: "starred_repos", description: "Starred repositories" },
  { name: "gists", description: "Gist information" },
];

export const categoryNames = [
  "Core Cognitive",
  "Zone Network",
  "RegimA Network",
  "O9 Network",
  "Echo Mirrors",
  "Special Purpose",
  "Other",
] as const;

export type CategoryName = (typeof categoryNames)[number];

export const FALLBACK_CATEGORY: CategoryName = "Other";

export interface CategoryRule {
  category: CategoryName;
  /** Receives the lowercased organization login. */
  matches: (login: string) => boolean;
}

const containsAny =
  (...fragments: string[]) =>
  (login: string): boolean =>
    fragments.some((fragment) => login.includes(fragment));

// Evaluated in order; the first matching rule decides the category.
export const categoryRules: CategoryRule[] = [
  { category: "Core Cognitive", matches: containsAny("cog", "oz", "echo") },
  { category: "Zone Network", matches: containsAny("zone", "rez", "rzone") },
  { category: "RegimA Network", matches: containsAny("regima") },
  {
    // Prefix test for o9/o6 but substring test for e9.
    category: "O9 Network",
    matches: (login) =>
      login.startsWith("o9") || login.startsWith("o6") || login.includes("e9"),
  },
  // Shadowed by "echo" above; kept so the category still exists.
  { category: "Echo Mirrors", matches: containsAny("org-echo") },
  {
    category: "Special Purpose",
    matches: containsAny("unicorn", "cosmic", "kaw", "hyper", "marduk", "gnn"),
  },
];

export const reportLimits = {
  organizationsPerCategory: 10,
  languages: 10,
  recentRepositories: 15,
  enterpriseOrgDescription: 40,
  categoryOrgDescription: 50,
  updatedDate: 10,
};

export const schedule = {
  description: "every **Sunday at 00:00 UTC** via GitHub Actions",
  workflowPath: "../../actions/workflows/update-ecosystem.yml",
};
