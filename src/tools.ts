import { z } from "zod";
import { McpError, ErrorCode, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { CompanyProfile, Contract, Embedder, MatchResult, ScoreOutcome } from "./types";
import type { LegalChunker } from "./chunking/legal-chunker";
import type { MatchScorer } from "./scoring/match-scorer";
import { recommendImprovements } from "./scoring/recommendations";
import type { CapabilityStore } from "./capability-store";
import { contractEmbeddingText, hydrateContract, hydrateProfile, type ProfileStore } from "./profiles";
import { COLLECTIONS, type MemoryVectorStore, type VectorRecord } from "./vector-store";

const DEFAULT_CONTRACT_CACHE_SIZE = 1000;

/** Where chunk_document reads files from (the document indexer in production). */
export interface DocumentSource {
  loadDocument(relPath: string): Promise<string>;
}

export interface ToolContext {
  embedder: Embedder;
  vectors: MemoryVectorStore;
  chunker: LegalChunker;
  scorer: MatchScorer;
  profiles: ProfileStore;
  capabilities: CapabilityStore;
  documents: DocumentSource;
  /** Notice vectors kept in the contracts collection (default 1000). */
  contractCacheSize?: number;
  /** Called after a tool changed profiles or stored vectors. */
  onChange?: () => Promise<void>;
}

const SearchArgs = z.object({
  query: z.string().trim().min(1),
  top_k: z.number().int().min(1).max(50).default(5),
  path_prefix: z.string().optional(),
});

const ChunkArgs = z
  .object({
    path: z.string().min(1).optional(),
    text: z.string().optional(),
    limit: z.number().int().min(1).max(500).default(50),
  })
  .refine((a) => (a.path === undefined) !== (a.text === undefined), {
    message: "Provide exactly one of 'path' or 'text'",
  });

const ContractInput = z
  .object({
    notice_id: z.string().min(1),
    title: z.string().min(1),
    description: z.string().nullish(),
    buyer_name: z.string().nullish(),
    value: z.number().nonnegative().nullish(),
    region: z.string().nullish(),
  })
  .transform(
    (c): Contract => ({
      noticeId: c.notice_id,
      title: c.title,
      description: c.description ?? null,
      buyerName: c.buyer_name ?? null,
      value: c.value ?? null,
      region: c.region ?? null,
    }),
  );

const FirmArgs = z.object({ firm_id: z.string().min(1) });

const ScoreArgs = FirmArgs.extend({ contract: ContractInput });

const RankArgs = FirmArgs.extend({
  contracts: z.array(ContractInput).min(1).max(200),
  limit: z.number().int().min(1).max(200).default(20),
});

const UpdateCapabilityArgs = FirmArgs.extend({
  capability_id: z.string().min(1),
  text: z.string().trim().min(1),
});

function parseArgs<Out>(schema: z.ZodType<Out, z.ZodTypeDef, unknown>, args: unknown): Out {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new McpError(
      ErrorCode.InvalidParams,
      `Invalid arguments at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`,
    );
  }
  return result.data;
}

const round = (n: number) => Number(n.toFixed(4));

function matchToJson(m: MatchResult) {
  return {
    notice_id: m.noticeId,
    total_score: round(m.totalScore),
    capability_score: round(m.capabilityScore),
    past_win_score: round(m.pastWinScore),
    preference_score: round(m.preferenceScore),
    passes_filters: m.passesFilters,
    match_reasons: m.matchReasons,
  };
}

function outcomeToJson(o: ScoreOutcome) {
  return o.status === "scored"
    ? { status: o.status, ...matchToJson(o.result) }
    : { status: o.status, notice_id: o.noticeId, reasons: o.reasons };
}

const contractProperties = {
  notice_id: { type: "string", description: "Unique notice identifier." },
  title: { type: "string" },
  description: { type: "string" },
  buyer_name: { type: "string", description: "Contracting authority." },
  value: { type: "number", description: "Estimated value in GBP.", minimum: 0 },
  region: { type: "string" },
};

const contractSchema = {
  type: "object",
  properties: contractProperties,
  required: ["notice_id", "title"],
};

/** Tool listing served to MCP clients. */
export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "search_documents",
    description:
      "Semantically search indexed tender documents and return matching chunks with path, page, clause number and score.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Natural language search query." },
        top_k: {
          type: "number",
          description: "Maximum number of matches to return (1-50). Defaults to 5.",
          minimum: 1,
          maximum: 50,
        },
        path_prefix: {
          type: "string",
          description: "Only search documents whose path starts with this prefix.",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "chunk_document",
    description:
      "Split a contract or tender document into clause-aware chunks. Pass either a path under DOCUMENTS_ROOT or raw text ([Page N] markers are honoured).",
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "Document path relative to DOCUMENTS_ROOT." },
        text: { type: "string", description: "Raw document text." },
        limit: {
          type: "number",
          description: "Maximum number of chunks returned (1-500). Defaults to 50.",
          minimum: 1,
          maximum: 500,
        },
      },
    },
  },
  {
    name: "score_contract",
    description:
      "Score a procurement notice against a company profile (capabilities, past wins, preferences), or report why it is excluded.",
    inputSchema: {
      type: "object",
      properties: { firm_id: { type: "string" }, contract: contractSchema },
      required: ["firm_id", "contract"],
    },
  },
  {
    name: "rank_contracts",
    description: "Score a batch of notices for one company and return them best first.",
    inputSchema: {
      type: "object",
      properties: {
        firm_id: { type: "string" },
        contracts: { type: "array", items: contractSchema, minItems: 1, maxItems: 200 },
        limit: {
          type: "number",
          description: "Maximum number of scored notices returned. Defaults to 20.",
          minimum: 1,
          maximum: 200,
        },
      },
      required: ["firm_id", "contracts"],
    },
  },
  {
    name: "recommend_improvements",
    description: "Suggest profile changes that would raise a company's match scores.",
    inputSchema: {
      type: "object",
      properties: { firm_id: { type: "string" } },
      required: ["firm_id"],
    },
  },
  {
    name: "update_capability",
    description: "Rewrite one capability statement of a company and re-embed it.",
    inputSchema: {
      type: "object",
      properties: {
        firm_id: { type: "string" },
        capability_id: { type: "string" },
        text: { type: "string", description: "New capability statement." },
      },
      required: ["firm_id", "capability_id", "text"],
    },
  },
];

/**
 * Tool handlers. Each takes the raw `arguments` of a tool call, validates
 * them and returns a JSON-serializable result; failures surface as
 * {@link McpError}s.
 */
export class TenderTools {
  private readonly queues = new Map<string, Promise<void>>();

  public constructor(private readonly ctx: ToolContext) {}

  public async call(name: string, args: unknown): Promise<unknown> {
    switch (name) {
      case "search_documents":
        return this.searchDocuments(args);
      case "chunk_document":
        return this.chunkDocument(args);
      case "score_contract":
        return this.scoreContract(args);
      case "rank_contracts":
        return this.rankContracts(args);
      case "recommend_improvements":
        return this.recommend(args);
      case "update_capability":
        return this.updateCapability(args);
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  public async searchDocuments(args: unknown) {
    const { query, top_k, path_prefix } = parseArgs(SearchArgs, args);
    const q = await this.ctx.embedder.embed(query);
    const hits = this.ctx.vectors.search(
      COLLECTIONS.documents,
      q,
      top_k,
      path_prefix === undefined
        ? undefined
        : (p) => typeof p.path === "string" && p.path.startsWith(path_prefix),
    );
    return {
      matches: hits.map(({ record, score }) => ({
        path: record.payload.path,
        page: record.payload.page,
        chunk_index: record.payload.chunkIndex,
        chunk_type: record.payload.chunkType,
        clause_number: record.payload.clauseNumber ?? null,
        score: round(score),
        snippet: record.payload.text,
      })),
    };
  }

  public async chunkDocument(args: unknown) {
    const { path, text, limit } = parseArgs(ChunkArgs, args);
    const raw = path !== undefined ? await this.ctx.documents.loadDocument(path) : (text ?? "");
    const chunks = this.ctx.chunker.chunkDocument(raw, path !== undefined ? { path } : {});
    return {
      strategy: chunks[0]?.chunkType ?? "none",
      total: chunks.length,
      chunks: chunks.slice(0, limit).map((c, index) => ({
        index,
        page: c.page,
        chunk_type: c.chunkType,
        clause_number: c.clauseNumber ?? null,
        length: c.text.length,
        text: c.text,
      })),
    };
  }

  public async scoreContract(args: unknown) {
    const { firm_id, contract } = parseArgs(ScoreArgs, args);
    const profile = await this.hydratedProfile(firm_id);
    const outcome = this.ctx.scorer.evaluate(await this.embedContract(contract), profile);
    return { firm_id, ...outcomeToJson(outcome) };
  }

  public async rankContracts(args: unknown) {
    const { firm_id, contracts, limit } = parseArgs(RankArgs, args);
    const profile = await this.hydratedProfile(firm_id);
    const embedded: Contract[] = [];
    for (const c of contracts) embedded.push(await this.embedContract(c));
    const { scored, excluded } = this.ctx.scorer.rank(embedded, profile);
    return {
      firm_id,
      total_scored: scored.length,
      scored: scored.slice(0, limit).map(matchToJson),
      excluded: excluded.map((e) => ({ notice_id: e.noticeId, reasons: e.reasons })),
    };
  }

  public async recommend(args: unknown) {
    const { firm_id } = parseArgs(FirmArgs, args);
    const recommendations = recommendImprovements(this.requireProfile(firm_id));
    return {
      firm_id,
      recommendations: recommendations.map((r) => ({
        category: r.category,
        priority: r.priority,
        current_score: r.currentScore,
        potential_score: r.potentialScore,
        action: r.action,
        impact: r.impact,
        specific_actions: r.specificActions,
      })),
    };
  }

  public async updateCapability(args: unknown) {
    const { firm_id, capability_id, text } = parseArgs(UpdateCapabilityArgs, args);
    const next = await this.serialize(firm_id, async () => {
      const current = this.requireProfile(firm_id).capabilities.find((c) => c.id === capability_id);
      if (!current)
        throw new McpError(
          ErrorCode.InvalidRequest,
          `Unknown capability '${capability_id}' for firm '${firm_id}'`,
        );
      const updated = await this.ctx.capabilities.update(firm_id, current, text);
      this.ctx.profiles.replaceCapability(firm_id, updated);
      await this.ctx.onChange?.();
      return updated;
    });
    return {
      firm_id,
      capability: {
        id: next.id,
        text: next.text,
        category: next.category ?? null,
        vector_id: next.vectorId ?? null,
      },
    };
  }

  /**
   * Run `task` after every earlier task queued under `key` has settled, so
   * each one reads the state the previous one left behind.
   */
  private serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // the queue only orders tasks; callers see failures through `run`
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, settled);
    return run.finally(() => {
      if (this.queues.get(key) === settled) this.queues.delete(key);
    });
  }

  private requireProfile(firmId: string): CompanyProfile {
    const profile = this.ctx.profiles.get(firmId);
    if (!profile) throw new McpError(ErrorCode.InvalidRequest, `Unknown firm '${firmId}'`);
    return profile;
  }

  private hydratedProfile(firmId: string): Promise<CompanyProfile> {
    return hydrateProfile(this.requireProfile(firmId), this.ctx.vectors);
  }

  /**
   * Embed a notice into the contracts collection, reusing the stored vector
   * when its text is unchanged. The collection is kept to
   * `contractCacheSize` records, dropping the least recently scored.
   */
  private async embedContract(contract: Contract): Promise<Contract> {
    const text = contractEmbeddingText(contract);
    const existing = this.ctx.vectors.get(COLLECTIONS.contracts, contract.noticeId);
    const record: VectorRecord =
      existing?.payload.text === text
        ? existing
        : {
            id: contract.noticeId,
            collection: COLLECTIONS.contracts,
            vector: await this.ctx.embedder.embed(text),
            payload: {
              title: contract.title,
              buyerName: contract.buyerName ?? null,
              value: contract.value ?? null,
              region: contract.region ?? null,
              text,
            },
          };
    // re-insert so the collection's order tracks recency
    this.ctx.vectors.delete(COLLECTIONS.contracts, record.id);
    this.ctx.vectors.upsert(record);
    this.evictContracts();
    return hydrateContract({ ...contract, vectorId: contract.noticeId }, this.ctx.vectors);
  }

  private evictContracts(): void {
    const limit = Math.max(1, this.ctx.contractCacheSize ?? DEFAULT_CONTRACT_CACHE_SIZE);
    const stored = this.ctx.vectors.list(COLLECTIONS.contracts);
    for (const r of stored.slice(0, Math.max(0, stored.length - limit))) {
      this.ctx.vectors.delete(COLLECTIONS.contracts, r.id);
    }
  }
}
