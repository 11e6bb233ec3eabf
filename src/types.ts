/**
 * Shared domain types used by the chunking, scoring and storage layers.
 */

/** Any numeric vector; stored vectors are Float32Array, tests often use plain arrays. */
export type Vector = ArrayLike<number>;

/** Scalar values allowed in chunk metadata and vector payloads. */
export type PayloadValue = string | number | boolean | null;

export type ChunkMetadata = Record<string, PayloadValue>;

/** Structural unit that opened a clause chunk. */
export type BoundaryKind = "numbered_clause" | "section_header" | "schedule" | "recital";

export type ChunkType = "clause" | "fallback";

/**
 * A retrieval unit cut from a document. Created by the chunker and frozen;
 * `page` is the page holding the character at `start` in the original text.
 */
export interface Chunk {
  readonly text: string;
  readonly chunkType: ChunkType;
  /** 1-based page number. */
  readonly page: number;
  /** Offset of the chunk's first character in the original document. */
  readonly start: number;
  /** Leading clause numeral such as "3.2" (clause chunks only). */
  readonly clauseNumber?: string;
  readonly boundary?: BoundaryKind;
  readonly metadata: Readonly<ChunkMetadata>;
}

export interface Capability {
  readonly id: string;
  readonly text: string;
  readonly category?: string | null;
  readonly yearsExperience?: number | null;
  /** Record id in the `capabilities` vector collection. */
  readonly vectorId?: string | null;
  /** Resolved embedding; filled by the caller before scoring. */
  readonly embedding?: Vector | null;
}

export interface PastWin {
  readonly contractTitle?: string | null;
  readonly buyerName: string;
  readonly value?: number | null;
  /** ISO date (YYYY-MM-DD). */
  readonly awardDate?: string | null;
}

export interface SearchPreferences {
  readonly minValue?: number | null;
  readonly maxValue?: number | null;
  readonly preferredRegions?: readonly string[];
  readonly excludedCategories?: readonly string[];
  readonly keywords?: readonly string[];
}

export interface CompanyProfile {
  readonly firmId: string;
  readonly companyName: string;
  readonly capabilities: readonly Capability[];
  readonly pastWins: readonly PastWin[];
  readonly preferences?: SearchPreferences | null;
}

/** A procurement notice as produced by ingestion. */
export interface Contract {
  readonly noticeId: string;
  readonly title: string;
  readonly description?: string | null;
  readonly buyerName?: string | null;
  readonly value?: number | null;
  readonly region?: string | null;
  readonly vectorId?: string | null;
  readonly embedding?: Vector | null;
}

export interface MatchResult {
  readonly noticeId: string;
  readonly capabilityScore: number;
  readonly pastWinScore: number;
  readonly preferenceScore: number;
  readonly totalScore: number;
  readonly matchReasons: readonly string[];
  readonly passesFilters: boolean;
}

/** Exclusion is a terminal outcome of its own, never a low score. */
export type ScoreOutcome =
  | { readonly status: "scored"; readonly result: MatchResult }
  | { readonly status: "excluded"; readonly noticeId: string; readonly reasons: readonly string[] };

/** Text → fixed-length vector. */
export interface Embedder {
  embed(text: string): Promise<Float32Array>;
  getModelName(): string;
}

/** Fetches a stored vector by collection + record id. */
export interface VectorLookup {
  getVector(collection: string, id: string): Promise<Float32Array | undefined>;
}
