import type { Endpoints } from "@octokit/types";

import { isBotLogin } from "../bots";
import type { RequestClient, RequestSpec } from "../request-client";
import { PAGE_SIZE, requireArray } from "./shared";

export const MAX_MEMBER_PAGES = 100;

type MemberListData = Endpoints["GET /orgs/{org}/members"]["response"]["data"];

export interface ListMembersParams {
  client: RequestClient;
  org: string;
  team?: string | null;
  /** Only members who made their membership public; needs no org read access. */
  publicOnly?: boolean;
  /** Only organization owners; takes precedence over `publicOnly`. */
  ownersOnly?: boolean;
  maxPages?: number;
  debug?: boolean;
}

interface MemberScope {
  org: string;
  team?: string | null;
  publicOnly: boolean;
  ownersOnly: boolean;
}

function memberEndpoint({ org, team, publicOnly, ownersOnly }: MemberScope): RequestSpec {
  if (team && ownersOnly) {
    throw new Error("Owners-only listing cannot be limited to a team");
  }
  if (team) {
    return { protocol: "rest", endpoint: "GET /orgs/{org}/teams/{team_slug}/members", params: { org, team_slug: team } };
  }
  if (ownersOnly) {
    return { protocol: "rest", endpoint: "GET /orgs/{org}/members", params: { org, role: "admin" } };
  }
  return {
    protocol: "rest",
    endpoint: publicOnly ? "GET /orgs/{org}/public_members" : "GET /orgs/{org}/members",
    params: { org },
  };
}

/** Member logins of an organization or team in listing order, without bot accounts. */
export async function listMembers({
  client,
  org,
  team,
  publicOnly = true,
  ownersOnly = false,
  maxPages = MAX_MEMBER_PAGES,
  debug,
}: ListMembersParams): Promise<string[]> {
  const spec = memberEndpoint({ org, team, publicOnly, ownersOnly });
  const seen = new Set<string>();
  const logins: string[] = [];
  let bots = 0;

  for (let page = 1; page <= maxPages; page += 1) {
    const result = await client.request<MemberListData>({
      ...spec,
      params: { ...spec.params, per_page: PAGE_SIZE, page },
    });
    if (!result.ok) {
      if (page === 1) {
        throw new Error(`Unable to list members of ${team ? `${org}/${team}` : org} (${result.errorClass})`);
      }
      break;
    }

    const members = requireArray(result.body, spec.endpoint, "members");
    for (const member of members) {
      const key = member.login.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      if (isBotLogin(member.login)) {
        bots += 1;
        continue;
      }
      logins.push(member.login);
    }
    if (members.length < PAGE_SIZE) {
      break;
    }
  }

  if (debug && bots > 0) {
    console.log(`[${org}] skipped ${bots} bot account${bots === 1 ? "" : "s"}`);
  }
  return logins;
}
