import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { Embedder } from "./types";
import type { LegalChunker } from "./chunking/legal-chunker";
import { PdfExtractor } from "./pdf-extractor";
import { COLLECTIONS, type MemoryVectorStore, type VectorRecord } from "./vector-store";
import { statusManager } from "./status";

/**
 * Options required to construct a {@link DocumentIndexer}. All fields are
 * mandatory except `pdf` (defaults to an extractor caching in `root`) and
 * `verbose`.
 */
export interface IndexerOptions {
  root: string; // documents root directory
  allowedExt: string[]; // extensions WITHOUT leading dot
  excludedFolders: string[]; // folder names pruned during discovery
  embedder: Embedder;
  vectors: MemoryVectorStore;
  chunker: LegalChunker;
  pdf?: PdfExtractor;
  verbose?: boolean;
}

export interface FileInfo {
  rel: string;
  abs: string;
  size: number;
}

export interface IndexSummary {
  files: number;
  changed: number;
  removed: number;
  chunks: number;
}

/**
 * Discovers tender documents under the root, chunks them with the legal
 * chunker and keeps their embeddings in the `documents` collection.
 *
 * Builds are incremental against whatever the store already holds: files
 * whose size changed are re-chunked, vanished files are dropped and
 * unchanged files keep their stored chunks.
 */
export class DocumentIndexer {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly embedder: Embedder;
  private readonly vectors: MemoryVectorStore;
  private readonly chunker: LegalChunker;
  private readonly pdf: PdfExtractor;
  private readonly verbose: boolean;
  // files that produced no chunks, by size, so unchanged ones are not re-read
  private readonly skipped = new Map<string, number>();

  public constructor(opts: IndexerOptions) {
    this.root = opts.root;
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders;
    this.embedder = opts.embedder;
    this.vectors = opts.vectors;
    this.chunker = opts.chunker;
    this.pdf = opts.pdf ?? new PdfExtractor(undefined, opts.root, opts.verbose);
    this.verbose = !!opts.verbose;
  }

  public async build(): Promise<IndexSummary> {
    const files = await this.discoverFiles();
    const stored = this.storedByPath();
    console.error(
      `[MCP] ${stored.size ? "Incremental" : "Cold"} build: ${files.length} files under ${this.root}`,
    );
    if (this.verbose) console.error(`[MCP][verbose] Extensions: ${this.allowedExt.join(", ")}`);

    const current = new Set(files.map((f) => f.rel));
    for (const rel of this.skipped.keys()) if (!current.has(rel)) this.skipped.delete(rel);
    let removed = 0;
    for (const [rel, records] of stored) {
      if (current.has(rel)) continue;
      for (const r of records) this.vectors.delete(COLLECTIONS.documents, r.id);
      removed++;
    }

    const changed = files.filter((f) => {
      const records = stored.get(f.rel);
      if (!records) return this.skipped.get(f.rel) !== f.size;
      return records[0]?.payload.fileSize !== f.size;
    });
    // credit chunks carried over from the store
    statusManager.incEmbedded(this.vectors.size(COLLECTIONS.documents) - this.countRecords(changed, stored));

    for (const [i, file] of changed.entries()) {
      if (this.verbose && i % 20 === 0)
        console.error(`[MCP][verbose] Indexing ${i}/${changed.length}: ${file.rel}`);
      try {
        await this.indexFile(file, stored.get(file.rel) ?? []);
      } catch (e) {
        console.error(`[MCP] Failed to index file ${file.rel}:`, e);
      }
    }

    const chunks = this.vectors.size(COLLECTIONS.documents);
    statusManager.setIndexTotals(files.length, chunks);
    if (!removed && !changed.length) console.error(`[MCP] No changes detected. Using cached embeddings.`);
    else
      console.error(
        `[MCP] Index updated. Changed files: ${changed.length}, removed: ${removed}. Total chunks: ${chunks}`,
      );
    return { files: files.length, changed: changed.length, removed, chunks };
  }

  /** Ensure a (possibly user-supplied) relative path stays within the documents root. */
  public ensureWithinRoot(relPath: string): string {
    return DocumentIndexer.ensureWithinRoot(this.root, relPath);
  }

  /**
   * Static helper variant of {@link ensureWithinRoot}. Throws an MCP
   * InvalidRequest error if the resolved path escapes the root.
   */
  public static ensureWithinRoot(root: string, relPath: string): string {
    const abs = path.resolve(root, relPath);
    const normRoot = path.resolve(root) + path.sep;
    if (!abs.startsWith(normRoot))
      throw new McpError(ErrorCode.InvalidRequest, "Path outside DOCUMENTS_ROOT");
    return abs;
  }

  /** Raw text of a document under the root (PDFs come back with page markers). */
  public async loadDocument(relPath: string): Promise<string> {
    const abs = this.ensureWithinRoot(relPath);
    let size: number;
    try {
      const st = await fs.stat(abs);
      if (!st.isFile()) throw new McpError(ErrorCode.InvalidRequest, `Not a file: ${relPath}`);
      size = st.size;
    } catch (e) {
      if (e instanceof McpError) throw e;
      throw new McpError(ErrorCode.InvalidRequest, `File not found: ${relPath}`);
    }
    return this.readText({ rel: path.relative(this.root, abs), abs, size });
  }

  private async readText(file: FileInfo): Promise<string> {
    if (PdfExtractor.isPdf(file.abs)) return this.pdf.extractText(file.abs, file.rel, file.size);
    return fs.readFile(file.abs, "utf8");
  }

  private async indexFile(file: FileInfo, previous: readonly VectorRecord[]): Promise<void> {
    const text = await this.readText(file);
    const chunks = this.chunker.chunkDocument(text, {
      path: file.rel,
      filename: path.basename(file.rel),
    });

    // embed everything before touching the store so a failure keeps the old chunks
    const records: VectorRecord[] = [];
    for (const [idx, chunk] of chunks.entries()) {
      records.push({
        id: `${file.rel}#${idx}`,
        collection: COLLECTIONS.documents,
        vector: await this.embedder.embed(chunk.text),
        payload: {
          path: file.rel,
          chunkIndex: idx,
          page: chunk.page,
          chunkType: chunk.chunkType,
          clauseNumber: chunk.clauseNumber ?? null,
          fileSize: file.size,
          text: chunk.text,
        },
      });
    }

    for (const r of previous) this.vectors.delete(COLLECTIONS.documents, r.id);
    if (!records.length) {
      console.error(`[MCP] No text chunks produced for ${file.rel}; skipping.`);
      this.skipped.set(file.rel, file.size);
      statusManager.incSkipped();
      return;
    }
    this.skipped.delete(file.rel);
    for (const r of records) this.vectors.upsert(r);
    statusManager.incEmbedded(records.length);
  }

  private storedByPath(): Map<string, VectorRecord[]> {
    const byPath = new Map<string, VectorRecord[]>();
    for (const r of this.vectors.list(COLLECTIONS.documents)) {
      const p = r.payload.path;
      if (typeof p !== "string") continue;
      let arr = byPath.get(p);
      if (!arr) {
        arr = [];
        byPath.set(p, arr);
      }
      arr.push(r);
    }
    return byPath;
  }

  private countRecords(files: readonly FileInfo[], stored: Map<string, VectorRecord[]>): number {
    return files.reduce((n, f) => n + (stored.get(f.rel)?.length ?? 0), 0);
  }

  private async discoverFiles(): Promise<FileInfo[]> {
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, {
      cwd: this.root,
      dot: false,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
    });
    const infos: FileInfo[] = [];
    for (const abs of files.sort()) {
      try {
        const st = await fs.stat(abs);
        infos.push({ rel: path.relative(this.root, abs).split(path.sep).join("/"), abs, size: st.size });
      } catch (e) {
        console.error(`[MCP] Cannot stat ${abs}:`, e);
      }
    }
    return infos;
  }
}
