export interface TotalCount {
  totalCount: number;
}

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface Connection<T> {
  pageInfo: PageInfo;
  nodes: T[];
}

export interface Language {
  name: string;
}

export interface UserInfo {
  login: string;
  id: string;
  name: string | null;
  bio: string | null;
  company: string | null;
  location: string | null;
  email: string;
  websiteUrl: string | null;
  avatarUrl: string;
  createdAt: string;
  updatedAt: string;
  followers: TotalCount;
  following: TotalCount;
  repositories: TotalCount;
  starredRepositories: TotalCount;
  organizations: TotalCount;
  gists: TotalCount;
}

export interface Organization {
  login: string;
  id: string;
  name: string | null;
  description: string | null;
  url: string;
  avatarUrl: string;
  createdAt: string;
  membersWithRole: TotalCount;
  repositories: TotalCount;
  teams: TotalCount;
}

export interface EnterpriseOrganization {
  login: string;
  name: string | null;
  description: string | null;
  repositories: TotalCount;
  membersWithRole: TotalCount;
}

export interface Enterprise {
  name: string;
  slug: string;
  url: string;
  viewerIsAdmin: boolean;
  members: TotalCount;
  // First 100 organizations only; totalCount is the full count.
  organizations: TotalCount & { nodes: EnterpriseOrganization[] };
}

export interface Repository {
  nameWithOwner: string;
  name: string;
  description: string | null;
  url: string;
  isPrivate: boolean;
  isFork: boolean;
  isArchived: boolean;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
  primaryLanguage: Language | null;
  stargazerCount: number;
  forkCount: number;
  issues: TotalCount;
  pullRequests: TotalCount;
  defaultBranchRef: { name: string } | null;
  owner: {
    login: string;
    id: string;
  };
}

// Shape shared by followers and following.
export interface Person {
  login: string;
  id: string;
  name: string | null;
  avatarUrl: string;
  bio: string | null;
  company: string | null;
  location: string | null;
  followers: TotalCount;
  following: TotalCount;
  repositories: TotalCount;
}

export interface StarredRepository {
  nameWithOwner: string;
  name: string;
  description: string | null;
  url: string;
  stargazerCount: number;
  forkCount: number;
  primaryLanguage: Language | null;
}

export interface Gist {
  name: string;
  description: string | null;
  url: string;
  isPublic: boolean;
  createdAt: string;
  updatedAt: string;
  files: Array<{ name: string }> | null;
}
