import type { BoundaryKind, Chunk, ChunkMetadata, ChunkType } from "../types";
import {
  type BoundaryMatcher,
  DEFAULT_BOUNDARY_MATCHERS,
  detectBoundaries,
  recitalMatcher,
} from "./boundaries";
import { PageMap, buildPageMap } from "./page-map";
import {
  type SentenceSpan,
  joinSentences,
  packSentences,
  rebalanceTail,
  splitSentences,
  wrapSentence,
} from "./sentences";

/**
 * Options accepted by {@link LegalChunker}. Every field is optional.
 */
export interface ChunkerOptions {
  maxChunkSize?: number; // hard ceiling per chunk (default 800)
  minChunkSize?: number; // average below this ⇒ sentence fallback (default 100)
  minClauseLength?: number; // shorter clause candidates are dropped (default 50)
  overlapSentences?: number; // fallback continuity seed (default 1)
  /** Also open clauses at `WHEREAS` recitals. Ignored when `matchers` is set. */
  recitals?: boolean;
  matchers?: readonly BoundaryMatcher[];
  verbose?: boolean;
}

const CLAUSE_NUMBER = /^\s*(\d+(?:\.\d+)*)/;

/**
 * Splits contracts and tender documents along their own structure (numbered
 * clauses, section and schedule headers) so each chunk reads as a unit on
 * its own, and falls back to sentence packing when the document has no
 * usable structure. Deterministic: the same text always yields the same
 * chunks.
 */
export class LegalChunker {
  public readonly maxChunkSize: number;
  public readonly minChunkSize: number;
  public readonly minClauseLength: number;
  public readonly overlapSentences: number;
  private readonly matchers: readonly BoundaryMatcher[];
  private readonly verbose: boolean;

  public constructor(opts: ChunkerOptions = {}) {
    this.maxChunkSize = Math.max(1, Math.floor(opts.maxChunkSize ?? 800));
    this.minChunkSize = opts.minChunkSize ?? 100;
    this.minClauseLength = opts.minClauseLength ?? 50;
    this.overlapSentences = Math.max(0, Math.floor(opts.overlapSentences ?? 1));
    this.matchers =
      opts.matchers ??
      (opts.recitals ? [...DEFAULT_BOUNDARY_MATCHERS, recitalMatcher] : DEFAULT_BOUNDARY_MATCHERS);
    this.verbose = !!opts.verbose;
  }

  /**
   * Chunk a whole document. Empty or whitespace-only text yields `[]`; the
   * caller decides whether that is a failed upload.
   *
   * @param rawText Extracted text, `[Page N]` markers included.
   * @param baseMetadata Copied onto every chunk (e.g. path, filename).
   */
  public chunkDocument(rawText: string, baseMetadata: ChunkMetadata = {}): Chunk[] {
    if (!rawText.trim()) return [];
    const pageMap = buildPageMap(rawText);
    const label = String(baseMetadata.filename ?? baseMetadata.path ?? "document");

    const clauses = this.chunkByClauses(rawText, baseMetadata, pageMap);
    if (clauses.length > 0 && !this.isPoorlyStructured(clauses)) {
      if (this.verbose)
        console.error(`[Chunker] Clause chunking for ${label}: ${clauses.length} chunks`);
      return clauses;
    }
    const fallback = this.chunkBySentences(rawText, baseMetadata, pageMap);
    if (this.verbose)
      console.error(`[Chunker] Sentence fallback for ${label}: ${fallback.length} chunks`);
    return fallback;
  }

  /** Clause-boundary pass. Returns `[]` when no boundary is detected. */
  public chunkByClauses(text: string, metadata: ChunkMetadata, pageMap: PageMap): Chunk[] {
    const boundaries = detectBoundaries(text, this.matchers);
    const chunks: Chunk[] = [];

    boundaries.forEach((boundary, i) => {
      const end = i + 1 < boundaries.length ? boundaries[i + 1].offset : text.length;
      const raw = text.slice(boundary.offset, end);
      const body = raw.trim();
      // stray numerals and empty headers
      if (body.length < this.minClauseLength) return;

      const first = boundary.offset + (raw.length - raw.trimStart().length);
      const clauseNumber = CLAUSE_NUMBER.exec(body)?.[1];

      if (body.length <= this.maxChunkSize) {
        chunks.push(
          makeChunk(body, "clause", first, pageMap, metadata, clauseNumber, boundary.kind),
        );
        return;
      }
      const groups = rebalanceTail(
        this.packText(body, first, 0),
        this.minClauseLength,
        this.maxChunkSize,
      );
      for (const group of groups) {
        chunks.push(
          makeChunk(
            joinSentences(group),
            "clause",
            group[0].start,
            pageMap,
            metadata,
            clauseNumber,
            boundary.kind,
          ),
        );
      }
    });

    return chunks;
  }

  /** Uniform sentence packing over the whole text, ignoring structure. */
  public chunkBySentences(text: string, metadata: ChunkMetadata, pageMap: PageMap): Chunk[] {
    return this.packText(text, 0, this.overlapSentences).map((group) =>
      makeChunk(joinSentences(group), "fallback", group[0].start, pageMap, metadata),
    );
  }

  private packText(text: string, base: number, overlap: number): SentenceSpan[][] {
    const spans = splitSentences(text, base).flatMap((s) => wrapSentence(s, this.maxChunkSize));
    return packSentences(spans, this.maxChunkSize, overlap);
  }

  private isPoorlyStructured(chunks: readonly Chunk[]): boolean {
    if (chunks.length < 2) return true;
    const avg = chunks.reduce((n, c) => n + c.text.length, 0) / chunks.length;
    return avg < this.minChunkSize;
  }
}

function makeChunk(
  text: string,
  chunkType: ChunkType,
  start: number,
  pageMap: PageMap,
  metadata: ChunkMetadata,
  clauseNumber?: string,
  boundary?: BoundaryKind,
): Chunk {
  const chunk: Chunk = {
    text,
    chunkType,
    page: pageMap.pageAt(start),
    start,
    ...(clauseNumber !== undefined ? { clauseNumber } : {}),
    ...(boundary !== undefined ? { boundary } : {}),
    metadata: Object.freeze({ ...metadata }),
  };
  return Object.freeze(chunk);
}

const defaultChunker = new LegalChunker();

/** Chunk with default settings. */
export function chunkDocument(rawText: string, baseMetadata: ChunkMetadata = {}): Chunk[] {
  return defaultChunker.chunkDocument(rawText, baseMetadata);
}
