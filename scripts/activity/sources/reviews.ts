import type { RequestClient } from "../request-client";
import type { DateWindow } from "../types";
import { PULL_REQUEST_FIELDS, type PullRequestNode } from "./pull-requests";
import { windowTimestamps, type PageInfo } from "./shared";

export const MAX_REVIEW_PAGES = 10;

export interface ReviewContribution {
  occurredAt: string | null;
  pullRequest: PullRequestNode;
}

interface ReviewContributionsResponse {
  user: {
    contributionsCollection: {
      pullRequestReviewContributions: {
        nodes: ReviewContribution[];
        pageInfo: PageInfo;
      };
    };
  } | null;
}

const REVIEW_CONTRIBUTIONS_QUERY = /* GraphQL */ `
  query ReviewContributions($login: String!, $from: DateTime!, $to: DateTime!, $cursor: String) {
    user(login: $login) {
      contributionsCollection(from: $from, to: $to) {
        pullRequestReviewContributions(first: 100, after: $cursor) {
          nodes {
            occurredAt
            pullRequest {
              ${PULL_REQUEST_FIELDS}
            }
          }
          pageInfo {
            hasNextPage
            endCursor
          }
        }
      }
    }
  }
`;

interface FetchReviewContributionsParams {
  client: RequestClient;
  login: string;
  /** Must span at most one year. */
  window: DateWindow;
  maxPages?: number;
}

/**
 * Every review `login` submitted inside the window, one entry per review.
 * Review contributions are dated by the review itself, unlike a search on the
 * pull request's update time.
 */
export async function fetchReviewContributions({
  client,
  login,
  window,
  maxPages = MAX_REVIEW_PAGES,
}: FetchReviewContributionsParams): Promise<ReviewContribution[]> {
  const contributions: ReviewContribution[] = [];
  let cursor: string | null = null;

  for (let page = 0; page < maxPages; page += 1) {
    const result = await client.request<ReviewContributionsResponse>({
      protocol: "graphql",
      endpoint: REVIEW_CONTRIBUTIONS_QUERY,
      params: { login, ...windowTimestamps(window), cursor },
    });
    if (!result.ok || !result.body.user) {
      break;
    }

    const connection: NonNullable<ReviewContributionsResponse["user"]>["contributionsCollection"]["pullRequestReviewContributions"] = result.body.user.contributionsCollection.pullRequestReviewContributions;
    contributions.push(...connection.nodes);
    if (!connection.pageInfo.hasNextPage) {
      break;
    }
    cursor = connection.pageInfo.endCursor;
  }

  return contributions;
}
