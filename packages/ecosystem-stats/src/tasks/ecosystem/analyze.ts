import type {
  EnterpriseSnapshot,
  RepositorySnapshot,
} from "../../snapshots/schema";
import type { EnterpriseRef, LanguageShare, RepositoryStats } from "../../types";
import {
  type CategoryName,
  categoryNames,
  categoryRules,
  FALLBACK_CATEGORY,
} from "./data-config";

export function categorizeOrganization(login: string): CategoryName {
  const normalized = login.toLowerCase();
  const rule = categoryRules.find((candidate) => candidate.matches(normalized));
  return rule ? rule.category : FALLBACK_CATEGORY;
}

/**
 * Buckets organizations by login. Categories keep their declaration order and
 * those left empty are omitted.
 */
export function categorizeOrganizations<T extends { login: string }>(
  organizations: T[]
): Map<CategoryName, T[]> {
  const categories = new Map<CategoryName, T[]>(
    categoryNames.map((name) => [name, []])
  );

  for (const org of organizations) {
    categories.get(categorizeOrganization(org.login))?.push(org);
  }

  for (const [name, members] of categories) {
    if (members.length === 0) categories.delete(name);
  }
  return categories;
}

export interface EnterpriseMapping {
  byOrganization: Map<string, EnterpriseRef>;
  /** Logins listed under more than one enterprise; the last one listed wins. */
  conflicts: string[];
}

export function mapOrganizationsToEnterprises(
  enterprises: EnterpriseSnapshot[]
): EnterpriseMapping {
  const byOrganization = new Map<string, EnterpriseRef>();
  const conflicts = new Set<string>();

  for (const enterprise of enterprises) {
    for (const org of enterprise.organizations.nodes) {
      if (!org.login) continue;

      const previous = byOrganization.get(org.login);
      if (previous && previous.enterpriseSlug !== enterprise.slug) {
        conflicts.add(org.login);
      }
      byOrganization.set(org.login, {
        enterpriseName: enterprise.name,
        enterpriseSlug: enterprise.slug,
      });
    }
  }

  return { byOrganization, conflicts: [...conflicts] };
}

export function analyzeRepositories(
  repositories: RepositorySnapshot[]
): RepositoryStats {
  const stats: RepositoryStats = {
    public: 0,
    private: 0,
    forks: 0,
    original: 0,
    archived: 0,
    languages: new Map(),
    byOwner: new Map(),
  };

  for (const repo of repositories) {
    if (repo.isPrivate) stats.private++;
    else stats.public++;

    if (repo.isFork) stats.forks++;
    else stats.original++;

    if (repo.isArchived) stats.archived++;

    if (repo.primaryLanguage) {
      const language = repo.primaryLanguage.name;
      stats.languages.set(language, (stats.languages.get(language) ?? 0) + 1);
    }

    const owner = repo.owner.login;
    stats.byOwner.set(owner, (stats.byOwner.get(owner) ?? 0) + 1);
  }

  return stats;
}

/**
 * Formats a percentage to one decimal place. Exact binary ties (x.x5, which
 * only occur for .25 and .75 fractions) round to the even tenth; everything
 * else goes through `toFixed`.
 */
export function formatPercentage(value: number): string {
  const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (!isTie) return value.toFixed(1);

  const tenths = Math.floor(value * 10);
  const even = tenths % 2 === 0 ? tenths : tenths + 1;
  return (even / 10).toFixed(1);
}

export function topLanguages(
  languages: Map<string, number>,
  limit = 10
): LanguageShare[] {
  let tagged = 0;
  for (const n of languages.values()) tagged += n;

  return [...languages.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([language, count]) => ({
      language,
      count,
      percentage: formatPercentage(tagged > 0 ? (count / tagged) * 100 : 0),
    }));
}

/** Stable descending sort by repository count, optionally cut to `limit`. */
export function topByRepositoryCount<
  T extends { repositories: { totalCount: number } },
>(organizations: T[], limit?: number): T[] {
  const sorted = [...organizations].sort(
    (a, b) => b.repositories.totalCount - a.repositories.totalCount
  );
  return limit === undefined ? sorted : sorted.slice(0, limit);
}

// Counts code points, not UTF-16 units, so astral characters are not split.
export function truncate(text: string, width: number): string {
  return Array.from(text).slice(0, width).join("");
}
