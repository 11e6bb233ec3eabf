import { describe, expect, it } from "vitest";
import {
  type BoundaryMatcher,
  detectBoundaries,
  numberedClauseMatcher,
  recitalMatcher,
  scheduleMatcher,
  sectionHeaderMatcher,
} from "./boundaries";

const offsets = (found: Iterable<{ offset: number }>) => [...found].map((b) => b.offset);

describe("numberedClauseMatcher", () => {
  it("matches numbered headings at line start", () => {
    const text = "1. Scope\n1.2 Term\n  4.1.2. Notices";
    expect(offsets(numberedClauseMatcher(text))).toEqual([0, 9, 18]);
  });

  it("requires a dotted numeral followed by a capitalised word", () => {
    expect(offsets(numberedClauseMatcher("2024 was a year\n3. lowercase\n12 Months"))).toEqual([]);
  });

  it("does not match mid-line numerals", () => {
    expect(offsets(numberedClauseMatcher("see clause 4. Payment"))).toEqual([]);
  });
});

describe("header matchers", () => {
  it("detects section, article and clause headers in any case", () => {
    const text = "SECTION 4\nArticle 12\nclause 7";
    expect(offsets(sectionHeaderMatcher(text))).toEqual([0, 10, 21]);
  });

  it("detects schedules, appendices and annexes", () => {
    const text = "SCHEDULE 2\nAppendix A\nANNEX b";
    expect(offsets(scheduleMatcher(text))).toEqual([0, 11, 22]);
  });

  it("detects recitals", () => {
    expect(offsets(recitalMatcher("Intro\nWHEREAS, the parties"))).toEqual([6]);
  });
});

describe("detectBoundaries", () => {
  it("merges matchers in offset order", () => {
    const text = "SCHEDULE 1\n1. Definitions\nSECTION 2";
    expect(detectBoundaries(text)).toEqual([
      { offset: 0, kind: "schedule" },
      { offset: 11, kind: "numbered_clause" },
      { offset: 26, kind: "section_header" },
    ]);
  });

  it("lets the earlier matcher win on a shared offset", () => {
    const asSchedule: BoundaryMatcher = () => [{ offset: 0, kind: "schedule" }];
    const asRecital: BoundaryMatcher = () => [{ offset: 0, kind: "recital" }];
    expect(detectBoundaries("x", [asSchedule, asRecital])).toEqual([{ offset: 0, kind: "schedule" }]);
    expect(detectBoundaries("x", [asRecital, asSchedule])).toEqual([{ offset: 0, kind: "recital" }]);
  });

  it("returns nothing for unstructured prose", () => {
    expect(detectBoundaries("Plain text. More plain text.")).toEqual([]);
  });

  it("is repeatable across calls", () => {
    const text = "1. Alpha\n2. Beta";
    expect(detectBoundaries(text)).toEqual(detectBoundaries(text));
  });
});
