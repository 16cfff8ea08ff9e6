import type { RequestClient, RequestResult } from "../request-client";
import type { DateWindow, PullRequestRecord, PullRequestState } from "../types";
import type { PageInfo } from "./shared";

export const MAX_PULL_REQUEST_PAGES = 10;

export interface PullRequestNode {
  url: string;
  title: string;
  additions: number;
  deletions: number;
  state: PullRequestState;
  createdAt: string | null;
  author: { login: string } | null;
  repository: { nameWithOwner: string };
}

export const PULL_REQUEST_FIELDS = /* GraphQL */ `
  url
  title
  additions
  deletions
  state
  createdAt
  author {
    login
  }
  repository {
    nameWithOwner
  }
`;

export function toPullRequestRecord(node: PullRequestNode, reviewCount = 0): PullRequestRecord {
  return {
    url: node.url,
    title: node.title,
    repo: node.repository.nameWithOwner,
    authorLogin: node.author?.login ?? null,
    additions: node.additions,
    deletions: node.deletions,
    reviewCount,
    state: node.state,
    createdAt: node.createdAt,
  };
}

type PullRequestHit = PullRequestNode & { reviews: { totalCount: number } };
// Non-pull-request hits come back as empty objects.
type SearchHit = PullRequestHit | { url?: undefined };

function isPullRequestHit(node: SearchHit): node is PullRequestHit {
  return node.url !== undefined;
}

interface PullRequestSearchResponse {
  search: {
    issueCount: number;
    nodes: SearchHit[];
    pageInfo: PageInfo;
  };
}

const PULL_REQUEST_SEARCH_QUERY = /* GraphQL */ `
  query PullRequestSearch($q: String!, $cursor: String) {
    search(query: $q, type: ISSUE, first: 100, after: $cursor) {
      issueCount
      nodes {
        ... on PullRequest {
          ${PULL_REQUEST_FIELDS}
          reviews {
            totalCount
          }
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

interface SearchPullRequestsParams {
  client: RequestClient;
  login: string;
  window: DateWindow;
  maxPages?: number;
}

/** Pull requests opened by `login` inside the window. */
export async function searchPullRequests({
  client,
  login,
  window,
  maxPages = MAX_PULL_REQUEST_PAGES,
}: SearchPullRequestsParams): Promise<PullRequestRecord[]> {
  const q = `author:${login} type:pr created:${window.since}..${window.until}`;
  const pullRequests: PullRequestRecord[] = [];
  let cursor: string | null = null;

  for (let page = 0; page < maxPages; page += 1) {
    const result: RequestResult<PullRequestSearchResponse> = await client.request<PullRequestSearchResponse>({
      protocol: "graphql",
      endpoint: PULL_REQUEST_SEARCH_QUERY,
      params: { q, cursor },
    });
    if (!result.ok) {
      break;
    }

    const { nodes, pageInfo }: PullRequestSearchResponse["search"] = result.body.search;
    for (const node of nodes) {
      if (isPullRequestHit(node)) {
        pullRequests.push(toPullRequestRecord(node, node.reviews.totalCount));
      }
    }
    if (!pageInfo.hasNextPage) {
      break;
    }
    cursor = pageInfo.endCursor;
  }

  return pullRequests;
}
