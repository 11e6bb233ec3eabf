/**
 * PDF text extraction with an on-disk cache.
 *
 * Each page's text is prefixed with a `[Page N]` marker so the chunker can
 * attribute chunks to pages. Extracted text is kept in a single
 * pdf-text-cache.json next to INDEX_STORE_PATH (or in the documents root):
 *
 *   {
 *     "version": 2,
 *     "entries": {
 *       "/abs/path/tender.pdf": {
 *         "pdfPath": "lot-1/tender.pdf",
 *         "pdfSize": 12345,
 *         "extractedAt": "2026-01-01T00:00:00Z",
 *         "text": "[Page 1]\n...",
 *         "pageCount": 10
 *       }
 *     }
 *   }
 *
 * An entry is stale once the PDF's size changes.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";

export interface PdfCacheEntry {
  pdfPath: string;
  pdfSize: number;
  extractedAt: string;
  text: string;
  pageCount: number;
}

interface PdfCacheStore {
  version: number;
  entries: Record<string, PdfCacheEntry>;
}

const CACHE_VERSION = 2;

function isCacheEntry(v: unknown): v is PdfCacheEntry {
  return (
    typeof v === "object" &&
    v !== null &&
    "pdfPath" in v &&
    typeof v.pdfPath === "string" &&
    "pdfSize" in v &&
    typeof v.pdfSize === "number" &&
    "extractedAt" in v &&
    typeof v.extractedAt === "string" &&
    "text" in v &&
    typeof v.text === "string" &&
    "pageCount" in v &&
    typeof v.pageCount === "number"
  );
}

/** Join per-page texts into one string with `[Page N]` markers. */
export function withPageMarkers(pages: ReadonlyArray<{ num: number; text: string }>): string {
  return pages.map((p) => `[Page ${p.num}]\n${p.text.trim()}`).join("\n\n");
}

export class PdfExtractor {
  private readonly cacheFilePath: string;
  private readonly verbose: boolean;
  private cacheStore: PdfCacheStore | null = null;

  /**
   * @param indexStorePath Optional index store path (its folder holds the cache)
   * @param root Documents root (cache folder when no store path is set)
   */
  constructor(indexStorePath: string | undefined, root: string, verbose = false) {
    const cacheDir = indexStorePath ? path.dirname(indexStorePath) : root;
    this.cacheFilePath = path.join(cacheDir, "pdf-text-cache.json");
    this.verbose = verbose;
  }

  private async loadCacheStore(): Promise<PdfCacheStore> {
    if (this.cacheStore) return this.cacheStore;
    const store: PdfCacheStore = { version: CACHE_VERSION, entries: {} };
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.cacheFilePath, "utf8"));
      if (
        typeof parsed === "object" &&
        parsed !== null &&
        "version" in parsed &&
        parsed.version === CACHE_VERSION &&
        "entries" in parsed &&
        typeof parsed.entries === "object" &&
        parsed.entries !== null
      ) {
        for (const [key, entry] of Object.entries(parsed.entries)) {
          if (isCacheEntry(entry)) store.entries[key] = entry;
        }
      }
    } catch {
      // missing or corrupt cache: start fresh
    }
    this.cacheStore = store;
    return store;
  }

  private async saveCacheStore(): Promise<void> {
    if (!this.cacheStore) return;
    try {
      await fs.mkdir(path.dirname(this.cacheFilePath), { recursive: true });
      await fs.writeFile(this.cacheFilePath, JSON.stringify(this.cacheStore, null, 2), "utf8");
    } catch (e) {
      console.error(`[PDF] Failed to save cache store:`, e);
    }
  }

  private async getCachedText(pdfAbsPath: string, pdfSize: number): Promise<PdfCacheEntry | null> {
    const store = await this.loadCacheStore();
    const entry = store.entries[pdfAbsPath];
    if (entry && entry.pdfSize === pdfSize && entry.text) {
      if (this.verbose) console.error(`[PDF] Cache hit for ${path.basename(pdfAbsPath)}`);
      return entry;
    }
    if (this.verbose)
      console.error(
        `[PDF] Cache ${entry ? "stale" : "miss"} for ${path.basename(pdfAbsPath)}`,
      );
    return null;
  }

  /**
   * Text of a PDF with page markers, from cache when valid. Extraction
   * failures are logged and yield an empty string so indexing can continue.
   */
  public async extractText(
    pdfAbsPath: string,
    pdfRelPath: string,
    pdfSize: number,
  ): Promise<string> {
    const cached = await this.getCachedText(pdfAbsPath, pdfSize);
    if (cached) return cached.text;

    if (this.verbose) console.error(`[PDF] Extracting text from ${path.basename(pdfAbsPath)}...`);
    try {
      const parser = new PDFParse({ data: await fs.readFile(pdfAbsPath) });
      const result = await parser.getText();
      await parser.destroy();

      const entry: PdfCacheEntry = {
        pdfPath: pdfRelPath,
        pdfSize,
        extractedAt: new Date().toISOString(),
        text: withPageMarkers(result.pages),
        pageCount: result.pages.length,
      };
      const store = await this.loadCacheStore();
      store.entries[pdfAbsPath] = entry;
      await this.saveCacheStore();
      return entry.text;
    } catch (e) {
      console.error(`[PDF] Failed to extract text from ${path.basename(pdfAbsPath)}:`, e);
      return "";
    }
  }

  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
