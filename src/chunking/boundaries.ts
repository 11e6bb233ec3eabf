import type { BoundaryKind } from "../types";

/** A detected structural marker: where it starts and what kind it is. */
export interface Boundary {
  readonly offset: number;
  readonly kind: BoundaryKind;
}

/** Independent detector for one kind of structural boundary. */
export type BoundaryMatcher = (text: string) => Iterable<Boundary>;

function lineMatcher(pattern: RegExp, kind: BoundaryKind): BoundaryMatcher {
  return function* (text: string) {
    // fresh instance per call: lastIndex is per-regex state
    const re = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g");
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      yield { offset: m.index, kind };
      if (m[0].length === 0) re.lastIndex++;
    }
  };
}

/** `1.2 Scope`, `3. Payment`, `4.1.2 Notices` at the start of a line. */
export const numberedClauseMatcher = lineMatcher(
  /^[ \t]*(?=\d+\.)\d+(?:\.\d+)*\.?[ \t]+[A-Z]/gm,
  "numbered_clause",
);

/** `SECTION 4`, `Article 12`, `CLAUSE 7`. */
export const sectionHeaderMatcher = lineMatcher(
  /^[ \t]*(?:SECTION|ARTICLE|CLAUSE)[ \t]+\d+/gim,
  "section_header",
);

/** `SCHEDULE 2`, `Appendix A`, `ANNEX B`. */
export const scheduleMatcher = lineMatcher(
  /^[ \t]*(?:SCHEDULE|APPENDIX|ANNEX)[ \t]+[A-Z0-9]/gim,
  "schedule",
);

/** `WHEREAS,` recitals. Not part of the default set; see the chunker's `recitals` option. */
export const recitalMatcher = lineMatcher(/^[ \t]*WHEREAS[,:]/gim, "recital");

export const DEFAULT_BOUNDARY_MATCHERS: readonly BoundaryMatcher[] = [
  numberedClauseMatcher,
  sectionHeaderMatcher,
  scheduleMatcher,
];

/**
 * Run every matcher and merge the results in ascending offset order.
 * When several matchers hit the same offset, the earliest matcher in
 * `matchers` decides the kind.
 */
export function detectBoundaries(
  text: string,
  matchers: readonly BoundaryMatcher[] = DEFAULT_BOUNDARY_MATCHERS,
): Boundary[] {
  const byOffset = new Map<number, Boundary>();
  for (const matcher of matchers) {
    for (const b of matcher(text)) {
      if (!byOffset.has(b.offset)) byOffset.set(b.offset, b);
    }
  }
  return [...byOffset.values()].sort((a, b) => a.offset - b.offset);
}
