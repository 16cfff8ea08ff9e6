import { describe, expect, it, vi } from "vitest";

import { MemoCache } from "./memo-cache";

describe("MemoCache", () => {
  it("shares one in-flight computation between concurrent callers", async () => {
    const cache = new MemoCache<string, string[]>();
    const compute = vi.fn(async (key: string) => [key.toUpperCase()]);

    const [first, second] = await Promise.all([
      cache.getOrCompute("w3c/csswg-drafts", compute),
      cache.getOrCompute("w3c/csswg-drafts", compute),
    ]);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(first).toBe(second);
  });

  it("forgets failed computations", async () => {
    const cache = new MemoCache<string, number>();
    const failing = vi.fn(async () => {
      throw new Error("offline");
    });

    await expect(cache.getOrCompute("k", failing)).rejects.toThrow("offline");
    await Promise.resolve();
    expect(cache.has("k")).toBe(false);

    await expect(cache.getOrCompute("k", async () => 7)).resolves.toBe(7);
  });

  it("evicts the least recently used key past capacity", async () => {
    const cache = new MemoCache<string, number>(2);
    await cache.getOrCompute("a", async () => 1);
    await cache.getOrCompute("b", async () => 2);
    await cache.getOrCompute("a", async () => 99);
    await cache.getOrCompute("c", async () => 3);

    expect(cache.size).toBe(2);
    expect(cache.has("a")).toBe(true);
    expect(cache.has("b")).toBe(false);
  });
});
