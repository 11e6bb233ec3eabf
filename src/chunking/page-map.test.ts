import { describe, expect, it } from "vitest";
import { PageMap, buildPageMap } from "./page-map";

describe("buildPageMap", () => {
  const text = "[Page 1]\nAlpha\n\n[Page 2]\nBeta";

  it("records each marker offset with its page", () => {
    const map = buildPageMap(text);
    expect(map.size).toBe(2);
    expect([...map.entries()]).toEqual([
      [0, 1],
      [16, 2],
    ]);
  });

  it("resolves offsets to the latest marker at or before them", () => {
    const map = buildPageMap(text);
    expect(map.pageAt(0)).toBe(1);
    expect(map.pageAt(15)).toBe(1);
    expect(map.pageAt(16)).toBe(2);
    expect(map.pageAt(10_000)).toBe(2);
  });

  it("treats text before the first marker as page 1", () => {
    const map = buildPageMap("Cover\n[Page 3]\nBody");
    expect(map.pageAt(0)).toBe(1);
    expect(map.pageAt(6)).toBe(3);
  });

  it("defaults every offset to page 1 without markers", () => {
    const map = buildPageMap("no markers here");
    expect(map.size).toBe(0);
    expect(map.pageAt(5)).toBe(1);
  });

  it("ignores malformed markers", () => {
    expect(buildPageMap("[Page ]\n[page 2]\n[Page x]").size).toBe(0);
  });
});

describe("PageMap", () => {
  it("binary-searches many markers", () => {
    const markers = Array.from({ length: 50 }, (_, i) => [i * 100, i + 1] as const);
    const map = new PageMap(markers);
    expect(map.pageAt(4_950)).toBe(50);
    expect(map.pageAt(1_299)).toBe(13);
    expect(map.pageAt(1_300)).toBe(14);
  });
});
