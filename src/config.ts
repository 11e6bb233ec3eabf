import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Version comes straight from package.json (tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Single dotenv.config() call for the whole process: the project-root .env
// wins when present, otherwise dotenv's default lookup in the cwd.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  DOCUMENTS_ROOT: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  MAX_CHUNK_SIZE: number;
  MIN_CHUNK_SIZE: number;
  OVERLAP_SENTENCES: number;
  TOP_CAPABILITIES: number;
  RECITAL_BOUNDARIES: boolean;
  CONTRACT_CACHE_SIZE: number;
  INDEX_STORE_PATH: string | undefined;
  PROFILES_PATH: string | undefined;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

function list(raw: string | undefined, fallback: string[]): string[] {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items?.length ? items : fallback;
}

function flag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function int(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

/**
 * Parse runtime settings from the environment. Unset or unparseable values
 * fall back to defaults rather than failing startup.
 */
export function getConfig(env: Env = process.env): Config {
  // Folder of tender packs / contracts to index. Conspicuous placeholder when unset.
  const DOCUMENTS_ROOT = env.DOCUMENTS_ROOT?.trim() || "/path/to/tender/documents";

  const ALLOWED_EXT = list(env.ALLOWED_EXT, ["pdf", "txt", "md"]).map((e) =>
    e.replace(/^\./, "").toLowerCase(),
  );

  // Folder names (not globs) pruned during discovery.
  const EXCLUDED_FOLDERS = list(env.EXCLUDED_FOLDERS, [
    "node_modules",
    ".git",
    ".cache",
    "archive",
  ]);

  const VERBOSE = flag(env.VERBOSE);

  // Chunk sizing: ceiling per chunk, and the average below which clause
  // chunking is judged poor and sentence packing is used instead.
  const MAX_CHUNK_SIZE = int(env.MAX_CHUNK_SIZE, 800, 1, 8000);
  const MIN_CHUNK_SIZE = int(env.MIN_CHUNK_SIZE, 100, 0, 8000);
  const OVERLAP_SENTENCES = int(env.OVERLAP_SENTENCES, 1, 0, 20);

  // Number of best capability similarities averaged per notice.
  const TOP_CAPABILITIES = int(env.TOP_CAPABILITIES, 3, 1, 50);

  // Treat `WHEREAS` recitals as clause boundaries.
  const RECITAL_BOUNDARIES = flag(env.RECITAL_BOUNDARIES);

  // Scored notice vectors kept (and persisted); least recently used go first.
  const CONTRACT_CACHE_SIZE = int(env.CONTRACT_CACHE_SIZE, 1000, 1, 100_000);

  const INDEX_STORE_PATH = env.INDEX_STORE_PATH?.trim() || undefined;
  const PROFILES_PATH = env.PROFILES_PATH?.trim() || undefined;

  // 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    DOCUMENTS_ROOT,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    VERBOSE,
    MAX_CHUNK_SIZE,
    MIN_CHUNK_SIZE,
    OVERLAP_SENTENCES,
    TOP_CAPABILITIES,
    RECITAL_BOUNDARIES,
    CONTRACT_CACHE_SIZE,
    INDEX_STORE_PATH,
    PROFILES_PATH,
    MCP_TRANSPORT,
  };
}
