/**
 * Transformers model cache configuration.
 *
 * Kept apart from the embeddings module so startup can configure the cache
 * before any model or pipeline is created.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@huggingface/transformers";

/**
 * Configure the transformers cache directory for Node.js execution.
 *
 * @param cacheDir Optional explicit directory. Falls back to TRANSFORMERS_CACHE,
 *                 then a project-local .cache/transformers folder.
 * @returns Resolved cache directory path actually used.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir =
    cacheDir?.trim() ||
    process.env.TRANSFORMERS_CACHE?.trim() ||
    path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[MCP] Using TRANSFORMERS cache at: ${dir}`);
  return dir;
}
