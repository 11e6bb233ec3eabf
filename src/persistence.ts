import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import type { PayloadValue } from "./types";
import type { Payload, VectorRecord } from "./vector-store";

/**
 * Settings a persisted store was built with. A stored file is only reused
 * when all of them match the running configuration; otherwise its vectors
 * would be stale (different model) or its chunks cut differently.
 */
export interface StoreMeta {
  modelName: string;
  maxChunkSize: number;
  minChunkSize: number;
  overlapSentences: number;
  /** Whether `WHEREAS` recitals open clause chunks. */
  recitals: boolean;
}

/**
 * Parameters used when persisting the vector store to disk.
 *
 * Vectors are serialized as base64-encoded 32-bit floats (little-endian)
 * under `vector`; metadata is stored alongside for compatibility checks on
 * the next load.
 */
export interface SaveParams extends StoreMeta {
  storePath?: string;
  records: readonly VectorRecord[];
  verbose?: boolean;
}

export interface LoadParams extends StoreMeta {
  storePath?: string;
  verbose?: boolean;
}

function isPayloadValue(v: unknown): v is PayloadValue {
  return v === null || ["string", "number", "boolean"].includes(typeof v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function decodeVector(emb: unknown): Float32Array | null {
  if (Array.isArray(emb)) return emb.length ? new Float32Array(emb.map((n) => Number(n) || 0)) : null;
  if (typeof emb !== "string" || emb.length === 0) return null;
  const buf = Buffer.from(emb, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy: the Buffer may share a pooled ArrayBuffer at an unaligned offset
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

function encodeVector(v: Float32Array): string {
  const buf = Buffer.alloc(v.length * 4);
  v.forEach((x, i) => buf.writeFloatLE(x, i * 4));
  return buf.toString("base64");
}

function parsePayload(raw: unknown): Payload | null {
  if (!isRecord(raw)) return null;
  const out: Record<string, PayloadValue> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (!isPayloadValue(v)) return null;
    out[k] = v;
  }
  return out;
}

/**
 * Load/save of the vector store snapshot. An instance carries a default store
 * path and verbosity; each call may override them.
 */
export class Persistence {
  private storePath?: string;
  private verbose: boolean;

  /**
   * @param storePath Default JSON file path for the snapshot.
   * @param verbose   Emit verbose logging by default.
   */
  public constructor(storePath?: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  /**
   * Read a snapshot. Returns `null` when nothing usable is on disk or the
   * snapshot was built with different settings (callers rebuild then).
   * Individually malformed records are skipped.
   */
  public async load(params: LoadParams): Promise<VectorRecord[] | null> {
    const storePath = params.storePath ?? this.storePath;
    const verbose = params.verbose ?? this.verbose;
    if (!storePath) return null;
    if (!fsSync.existsSync(storePath)) return null;
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(storePath, "utf8"));
      if (!isRecord(parsed) || !Array.isArray(parsed.records)) return null;
      const meta = isRecord(parsed.meta) ? parsed.meta : {};
      if (
        meta.modelName !== params.modelName ||
        meta.maxChunkSize !== params.maxChunkSize ||
        meta.minChunkSize !== params.minChunkSize ||
        meta.overlapSentences !== params.overlapSentences ||
        meta.recitals !== params.recitals
      ) {
        console.error(
          `[MCP] Stored index incompatible (model/chunk params differ). Performing cold rebuild.`,
        );
        return null;
      }

      const records: VectorRecord[] = [];
      for (const r of parsed.records) {
        if (!isRecord(r)) continue;
        const { id, collection, vector, payload } = r;
        if (typeof id !== "string" || typeof collection !== "string") continue;
        const vec = decodeVector(vector);
        const pl = parsePayload(payload ?? {});
        if (!vec || !pl) continue;
        records.push({ id, collection, vector: vec, payload: pl });
      }
      console.error(`[MCP] Loaded persisted store: ${records.length} records.`);
      if (verbose) console.error(`[MCP][verbose] Loaded from ${storePath}`);
      return records;
    } catch (e) {
      console.error(`[MCP] Failed to load store at ${storePath}:`, e);
      return null;
    }
  }

  /** Write a snapshot (no-op without a store path). Failures are logged. */
  public async save(params: SaveParams): Promise<void> {
    const storePath = params.storePath ?? this.storePath;
    const verbose = params.verbose ?? this.verbose;
    if (!storePath) return;
    try {
      const out = {
        version: 2,
        meta: {
          modelName: params.modelName,
          maxChunkSize: params.maxChunkSize,
          minChunkSize: params.minChunkSize,
          overlapSentences: params.overlapSentences,
          recitals: params.recitals,
          savedAt: new Date().toISOString(),
          vectorEncoding: "f32le-base64",
        },
        records: params.records.map((r) => ({
          id: r.id,
          collection: r.collection,
          vector: encodeVector(r.vector),
          payload: r.payload,
        })),
      };
      await fs.mkdir(path.dirname(storePath), { recursive: true });
      await fs.writeFile(storePath, JSON.stringify(out));
      if (verbose) console.error(`[MCP][verbose] Persisted store to ${storePath}`);
    } catch (e) {
      console.error(`[MCP] Failed to save store:`, e);
    }
  }
}
