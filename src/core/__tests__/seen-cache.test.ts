import { describe, it, expect } from "vitest";
import { SeenCache } from "../seen-cache.js";

describe("SeenCache", () => {
  it("reports whether a key is new", () => {
    const cache = new SeenCache(3);
    expect(cache.add("https://example.test/a")).toBe(true);
    expect(cache.add("https://example.test/a")).toBe(false);
    expect(cache.contains("https://example.test/a")).toBe(true);
    expect(cache.size()).toBe(1);
  });

  it("evicts the first-seen key once past capacity", () => {
    const cache = new SeenCache(100);
    for (let i = 1; i <= 101; i++) cache.add(`u${i}`);

    expect(cache.size()).toBe(100);
    expect(cache.contains("u1")).toBe(false);
    expect(cache.contains("u2")).toBe(true);
    expect(cache.contains("u101")).toBe(true);
  });

  it("does not refresh a key that is added again", () => {
    const cache = new SeenCache(2);
    cache.add("a");
    cache.add("b");
    cache.add("a");
    cache.add("c");

    expect(cache.contains("a")).toBe(false);
    expect(cache.contains("b")).toBe(true);
    expect(cache.contains("c")).toBe(true);
  });

  it("forgets everything on clear", () => {
    const cache = new SeenCache(5);
    cache.add("a");
    cache.clear();
    expect(cache.size()).toBe(0);
    expect(cache.add("a")).toBe(true);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new SeenCache(0)).toThrow(RangeError);
  });
});
