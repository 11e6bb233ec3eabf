import { pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import type { Embedder } from "./types";
import { configureTransformersCache } from "./cache";

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/**
 * Local sentence-embedding model behind the {@link Embedder} interface.
 * A single instance can be reused for any number of embed() calls.
 */
export class Embeddings implements Embedder {
  private modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;

  public constructor(modelName?: string) {
    // Resolution precedence: explicit ctor arg > MODEL_NAME env var > default 768-d model
    this.modelName =
      modelName?.trim() || process.env.MODEL_NAME?.trim() || "Xenova/bge-base-en-v1.5";
  }

  /** Point the model cache at disk; call before {@link init}. */
  public static configureCache(cacheDir?: string): Promise<string> {
    return configureTransformersCache(cacheDir);
  }

  /** @returns Resolved (possibly defaulted) underlying model identifier. */
  public getModelName(): string {
    return this.modelName;
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.embedder) return;
    console.error(`[MCP] Loading embedding model: ${this.modelName}`);
    this.embedder = await pipeline("feature-extraction", this.modelName);
    console.error(`[MCP] Model ready: ${this.modelName}`);
  }

  /**
   * Mean-pooled, L2-normalized embedding of `text`. Very long inputs are
   * truncated by the model tokenizer.
   *
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    const output = await this.embedder(text, { pooling: "mean", normalize: true });
    if (!(output.data instanceof Float32Array))
      throw new Error(`Model ${this.modelName} returned non-float32 embeddings`);
    return output.data;
  }
}
