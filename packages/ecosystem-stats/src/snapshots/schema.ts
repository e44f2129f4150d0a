import { z } from "zod";
import { SnapshotError } from "../errors";
import type { SummaryCounts } from "../types";
import type { SnapshotName } from "../tasks/ecosystem/data-config";
import type { SnapshotStore } from "./store";

// Only the fields the report reads are declared; every other field in a
// snapshot is dropped on parse. Absent or null values fall back to the
// defaults below.

const count = z
  .object({ totalCount: z.number().nullish().transform((n) => n ?? 0) })
  .nullish()
  .transform((value) => value ?? { totalCount: 0 });

const nullableText = z
  .string()
  .nullish()
  .transform((text) => text ?? null);

const textOr = (fallback: string) =>
  z
    .string()
    .nullish()
    .transform((text) => text ?? fallback);

const flag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

export const organizationSchema = z.object({
  login: textOr(""),
  name: nullableText,
  description: nullableText,
  membersWithRole: count,
  repositories: count,
});

const enterpriseOrganizations = z.object({
  totalCount: z.number().nullish().transform((n) => n ?? 0),
  nodes: z
    .array(organizationSchema)
    .nullish()
    .transform((nodes) => nodes ?? []),
});

export const enterpriseSchema = z.object({
  name: textOr("Unknown"),
  slug: textOr(""),
  url: nullableText,
  viewerIsAdmin: flag,
  members: count,
  organizations: enterpriseOrganizations
    .nullish()
    .transform(
      (value): z.output<typeof enterpriseOrganizations> =>
        value ?? { totalCount: 0, nodes: [] }
    ),
});

export const repositorySchema = z.object({
  nameWithOwner: textOr("Unknown"),
  isPrivate: flag,
  isFork: flag,
  isArchived: flag,
  primaryLanguage: z
    .object({ name: textOr("Unknown") })
    .nullish()
    .transform((language) => language ?? null),
  stargazerCount: z.number().nullish().transform((n) => n ?? 0),
  updatedAt: textOr(""),
  owner: z
    .object({ login: textOr("Unknown") })
    .nullish()
    .transform((owner) => owner ?? { login: "Unknown" }),
});

const summaryCount = z.number().nullish().transform((n) => n ?? 0);

export const summarySchema = z.object({
  timestamp: textOr("Unknown"),
  user: nullableText,
  counts: z
    .object({
      enterprises: z
        .number()
        .nullish()
        .transform((n) => n ?? undefined),
      organizations: summaryCount,
      repositories: summaryCount,
      followers: summaryCount,
      following: summaryCount,
      starred_repos: summaryCount,
      gists: summaryCount,
    })
    .nullish()
    .transform(
      (counts): SummaryCounts =>
        counts ?? {
          organizations: 0,
          repositories: 0,
          followers: 0,
          following: 0,
          starred_repos: 0,
          gists: 0,
        }
    ),
});

export type OrganizationSnapshot = z.output<typeof organizationSchema>;
export type EnterpriseSnapshot = z.output<typeof enterpriseSchema>;
export type RepositorySnapshot = z.output<typeof repositorySchema>;
export type SummarySnapshot = z.output<typeof summarySchema>;

export function readSnapshot<S extends z.ZodTypeAny>(
  store: SnapshotStore,
  name: SnapshotName,
  schema: S
): z.output<S> | null {
  let raw: unknown;
  try {
    raw = store.read(name);
  } catch (error) {
    throw new SnapshotError(
      name,
      error instanceof Error ? error.message : String(error)
    );
  }
  if (raw === null) {
    return null;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new SnapshotError(name, result.error.message);
  }
  return result.data;
}

/** Reads a list snapshot, treating an absent one as empty. */
export function readListSnapshot<S extends z.ZodTypeAny>(
  store: SnapshotStore,
  name: SnapshotName,
  itemSchema: S
): z.output<S>[] {
  return readSnapshot(store, name, z.array(itemSchema)) ?? [];
}
