/**
 * Character offset → page number lookup for extracted document text.
 *
 * Extraction writes a `[Page N]` marker at the start of each page's content.
 * The map is built once from the original text; chunk offsets are always
 * resolved against that same text, never against a trimmed fragment.
 */

const PAGE_MARKER = /\[Page (\d+)\]/g;

export class PageMap {
  private readonly offsets: number[];
  private readonly pages: number[];

  /** @param markers Marker offset/page pairs in ascending offset order. */
  public constructor(markers: ReadonlyArray<readonly [offset: number, page: number]>) {
    this.offsets = markers.map(([offset]) => offset);
    this.pages = markers.map(([, page]) => page);
  }

  /** Number of page markers found. */
  public get size(): number {
    return this.offsets.length;
  }

  /** Marker offsets mapped to their page numbers, in ascending offset order. */
  public entries(): ReadonlyMap<number, number> {
    return new Map(this.offsets.map((o, i) => [o, this.pages[i]]));
  }

  /**
   * Page of the latest marker at or before `offset`. Positions before the
   * first marker, and every position when there are no markers, are page 1.
   */
  public pageAt(offset: number): number {
    let lo = 0;
    let hi = this.offsets.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.offsets[mid] <= offset) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found < 0 ? 1 : this.pages[found];
  }
}

export function buildPageMap(rawText: string): PageMap {
  const markers: Array<[number, number]> = [];
  const re = new RegExp(PAGE_MARKER);
  let m: RegExpExecArray | null;
  while ((m = re.exec(rawText)) !== null) {
    markers.push([m.index, Number(m[1])]);
  }
  return new PageMap(markers);
}
