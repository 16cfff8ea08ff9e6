import type { Octokit } from "@octokit/rest";
import { GraphqlResponseError } from "@octokit/graphql";
import { RequestError } from "@octokit/request-error";

import { TransportFailure, type RequestSpec, type Transport, type TransportResponse } from "./request-client";

export const SCRAPE_BASE_URL = "https://github.com";

function graphqlErrorTypes(error: GraphqlResponseError<unknown>): string[] {
  return (error.errors ?? []).map((entry) => entry.type ?? "UNKNOWN");
}

export function toTransportFailure(error: unknown): unknown {
  if (error instanceof RequestError) {
    return new TransportFailure(error.message, {
      status: error.status,
      headers: error.response?.headers ?? {},
    });
  }
  if (error instanceof GraphqlResponseError) {
    return new TransportFailure(error.message, {
      status: null,
      headers: error.headers,
      graphqlErrorTypes: graphqlErrorTypes(error),
    });
  }
  return error;
}

/**
 * Sends REST and GraphQL calls through the authenticated Octokit instance and
 * scrape calls through an unauthenticated one pointed at the website.
 */
export class OctokitTransport implements Transport {
  constructor(private readonly octokit: Octokit, private readonly scraper: Octokit) {}

  async send<T>(spec: RequestSpec, signal: AbortSignal): Promise<TransportResponse<T>> {
    try {
      if (spec.protocol === "graphql") {
        const body = await this.octokit.graphql<T>(spec.endpoint, { ...spec.params, request: { signal } });
        return { status: 200, body };
      }

      const client = spec.protocol === "scrape" ? this.scraper : this.octokit;
      const response = await client.request(spec.endpoint, { ...spec.params, request: { signal } });
      return { status: response.status, body: response.data };
    } catch (error) {
      // Batched lookups report missing entities as NOT_FOUND next to the data that did resolve.
      if (
        error instanceof GraphqlResponseError &&
        error.data &&
        graphqlErrorTypes(error).every((type) => type === "NOT_FOUND")
      ) {
        return { status: 200, body: error.data };
      }
      throw toTransportFailure(error);
    }
  }
}
