import { describe, expect, it } from "vitest";

import { fakeClient, ok } from "../testing/fake-client";
import { SMALL_FORK_BRANCH_LIMIT, listBranches, selectUserBranches } from "./fork-branches";

describe("selectUserBranches", () => {
  it("keeps every non-upstream branch of a small fork", () => {
    const branches = ["main", "release/2.0", "dependabot/npm_and_yarn/lodash", "my-idea", "gh-pages", "Release-1"];

    expect(selectUserBranches(branches, "alice")).toEqual(["main", "my-idea"]);
  });

  it("keeps only user-looking branches of a large fork", () => {
    const upstream = Array.from({ length: SMALL_FORK_BRANCH_LIMIT }, (_, index) => `upstream-${index}`);
    const branches = [...upstream, "master", "eng/fonts", "Alice/layout", "alice-wip", "bob/other", "patch-1"];

    expect(selectUserBranches(branches, "ALICE")).toEqual(["master", "eng/fonts", "Alice/layout", "alice-wip", "patch-1"]);
  });
});

describe("listBranches", () => {
  it("pages until a short page", async () => {
    const fullPage = Array.from({ length: 100 }, (_, index) => ({ name: `b${index}` }));
    const client = fakeClient((spec) => ok(spec.params?.page === 1 ? fullPage : [{ name: "last" }]));

    const branches = await listBranches({ client, repo: "alice/fork" });

    expect(branches).toHaveLength(101);
    expect(branches[100]).toBe("last");
    expect(client.request).toHaveBeenCalledTimes(2);
  });
});
