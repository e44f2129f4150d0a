// GraphQL documents for the viewer's account graph. Every list query takes
// $first and $cursor and returns pageInfo { hasNextPage endCursor } + nodes.

export const VIEWER_QUERY = /* GraphQL */ `
  query {
    viewer {
      login
      id
      name
      bio
      company
      location
      email
      websiteUrl
      avatarUrl
      createdAt
      updatedAt
      followers { totalCount }
      following { totalCount }
      repositories { totalCount }
      starredRepositories { totalCount }
      organizations { totalCount }
      gists { totalCount }
    }
  }
`;

export const ORGANIZATIONS_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      organizations(first: $first, after: $cursor) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          login
          id
          name
          description
          url
          avatarUrl
          createdAt
          membersWithRole { totalCount }
          repositories { totalCount }
          teams { totalCount }
        }
      }
    }
  }
`;

export const ENTERPRISES_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      enterprises(first: $first, after: $cursor) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          name
          slug
          url
          viewerIsAdmin
          members { totalCount }
          organizations(first: 100) {
            totalCount
            nodes {
              login
              name
              description
              repositories { totalCount }
              membersWithRole { totalCount }
            }
          }
        }
      }
    }
  }
`;

export const REPOSITORIES_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      repositories(first: $first, after: $cursor, orderBy: { field: UPDATED_AT, direction: DESC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          nameWithOwner
          name
          description
          url
          isPrivate
          isFork
          isArchived
          createdAt
          updatedAt
          pushedAt
          primaryLanguage { name }
          stargazerCount
          forkCount
          issues { totalCount }
          pullRequests { totalCount }
          defaultBranchRef { name }
          owner {
            login
            ... on Organization { id }
            ... on User { id }
          }
        }
      }
    }
  }
`;

const PERSON_FIELDS = `
  login
  id
  name
  avatarUrl
  bio
  company
  location
  followers { totalCount }
  following { totalCount }
  repositories { totalCount }
`;

export const FOLLOWERS_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      followers(first: $first, after: $cursor) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          ${PERSON_FIELDS}
        }
      }
    }
  }
`;

export const FOLLOWING_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      following(first: $first, after: $cursor) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          ${PERSON_FIELDS}
        }
      }
    }
  }
`;

export const STARRED_REPOSITORIES_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      starredRepositories(first: $first, after: $cursor, orderBy: { field: STARRED_AT, direction: DESC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          nameWithOwner
          name
          description
          url
          stargazerCount
          forkCount
          primaryLanguage { name }
        }
      }
    }
  }
`;

export const GISTS_QUERY = /* GraphQL */ `
  query($first: Int!, $cursor: String) {
    viewer {
      gists(first: $first, after: $cursor, orderBy: { field: UPDATED_AT, direction: DESC }) {
        pageInfo {
          hasNextPage
          endCursor
        }
        nodes {
          name
          description
          url
          isPublic
          createdAt
          updatedAt
          files { name }
        }
      }
    }
  }
`;
