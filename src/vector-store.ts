import type { PayloadValue, Vector, VectorLookup } from "./types";
import { cosineSimilarity } from "./scoring/similarity";

/** Thrown when a vector does not match its collection's dimensionality. */
export class VectorDimensionError extends Error {
  constructor(collection: string, expected: number, actual: number) {
    super(`Collection '${collection}' holds ${expected}-d vectors; got ${actual}-d.`);
    this.name = "VectorDimensionError";
  }
}

/** Well-known collection names. */
export const COLLECTIONS = {
  documents: "documents",
  capabilities: "capabilities",
  contracts: "contracts",
} as const;

export type Payload = Readonly<Record<string, PayloadValue>>;

export interface VectorRecord {
  readonly id: string;
  readonly collection: string;
  readonly vector: Float32Array;
  readonly payload: Payload;
}

export interface SearchHit {
  record: VectorRecord;
  score: number;
}

/**
 * In-process vector store: named collections of records held in memory and
 * scanned linearly on search. Persisted as a whole by {@link Persistence}.
 */
export class MemoryVectorStore implements VectorLookup {
  private readonly collections = new Map<string, Map<string, VectorRecord>>();

  /** Insert or replace a record. */
  public upsert(record: VectorRecord): void {
    const coll = this.collection(record.collection);
    const dim = this.dimension(record.collection);
    if (dim !== undefined && dim !== record.vector.length) {
      const existing = coll.get(record.id);
      // replacing the only record may change the dimension
      if (!(existing && coll.size === 1))
        throw new VectorDimensionError(record.collection, dim, record.vector.length);
    }
    coll.set(record.id, record);
  }

  public get(collection: string, id: string): VectorRecord | undefined {
    return this.collections.get(collection)?.get(id);
  }

  public async getVector(collection: string, id: string): Promise<Float32Array | undefined> {
    return this.get(collection, id)?.vector;
  }

  public delete(collection: string, id: string): boolean {
    return this.collections.get(collection)?.delete(id) ?? false;
  }

  /** Records of one collection in insertion order. */
  public list(collection: string): VectorRecord[] {
    return [...(this.collections.get(collection)?.values() ?? [])];
  }

  /** Record count of one collection, or of all of them. */
  public size(collection?: string): number {
    if (collection !== undefined) return this.collections.get(collection)?.size ?? 0;
    let n = 0;
    for (const c of this.collections.values()) n += c.size;
    return n;
  }

  /** Vector length shared by a collection's records; undefined while empty. */
  public dimension(collection: string): number | undefined {
    const first = this.collections.get(collection)?.values().next();
    return first && !first.done ? first.value.vector.length : undefined;
  }

  /**
   * Top-k records by cosine similarity, best first.
   *
   * @param filter Optional predicate on the record payload.
   */
  public search(
    collection: string,
    query: Vector,
    topK: number,
    filter?: (payload: Payload) => boolean,
  ): SearchHit[] {
    const hits: SearchHit[] = [];
    for (const record of this.collections.get(collection)?.values() ?? []) {
      if (filter && !filter(record.payload)) continue;
      hits.push({ record, score: cosineSimilarity(record.vector, query) });
    }
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, Math.max(0, topK));
  }

  /** Bulk insert (e.g. from a persisted snapshot). Mismatched records are skipped. */
  public load(records: Iterable<VectorRecord>): number {
    let loaded = 0;
    for (const r of records) {
      try {
        this.upsert(r);
        loaded++;
      } catch (e) {
        console.error(`[MCP] Skipping stored record ${r.collection}/${r.id}:`, e);
      }
    }
    return loaded;
  }

  /** Every record across all collections. */
  public records(): VectorRecord[] {
    return [...this.collections.values()].flatMap((c) => [...c.values()]);
  }

  private collection(name: string): Map<string, VectorRecord> {
    let coll = this.collections.get(name);
    if (!coll) {
      coll = new Map();
      this.collections.set(name, coll);
    }
    return coll;
  }
}
