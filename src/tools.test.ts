import { beforeEach, describe, expect, it } from "vitest";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { CapabilityStore } from "./capability-store";
import { LegalChunker } from "./chunking/legal-chunker";
import { ProfileStore } from "./profiles";
import { MatchScorer } from "./scoring/match-scorer";
import { FakeEmbedder } from "./testing/fake-embedder";
import { TOOL_DEFINITIONS, TenderTools, type ToolContext } from "./tools";
import type { CompanyProfile } from "./types";
import { COLLECTIONS, MemoryVectorStore } from "./vector-store";

const vocab = ["cloud", "migration", "payroll", "fleet", "payment", "invoice", "delivery"];
const notes = "Delivery happens weekly. Delivery is tracked.";

const firm: CompanyProfile = {
  firmId: "firm-1",
  companyName: "Northgate Digital",
  capabilities: [{ id: "c1", text: "Cloud migration" }],
  pastWins: [],
};

describe("TenderTools", () => {
  let vectors: MemoryVectorStore;
  let embedder: FakeEmbedder;
  let profiles: ProfileStore;
  let changes: number;
  let ctx: ToolContext;
  let tools: TenderTools;

  beforeEach(async () => {
    vectors = new MemoryVectorStore();
    embedder = new FakeEmbedder(vocab);
    profiles = new ProfileStore();
    changes = 0;
    let n = 0;
    const capabilities = new CapabilityStore(vectors, embedder, () => `vec-${++n}`);
    for (const p of [
      firm,
      { ...firm, firmId: "firm-2", preferences: { maxValue: 50_000 } },
    ]) {
      profiles.put((await capabilities.sync(p)).profile);
    }
    ctx = {
      embedder,
      vectors,
      chunker: new LegalChunker(),
      scorer: new MatchScorer(),
      profiles,
      capabilities,
      documents: {
        loadDocument: async (p) => {
          if (p === "notes.md") return notes;
          throw new McpError(ErrorCode.InvalidRequest, `File not found: ${p}`);
        },
      },
      onChange: async () => {
        changes++;
      },
    };
    tools = new TenderTools(ctx);
  });

  it("lists a definition for every handled tool", () => {
    expect(TOOL_DEFINITIONS.map((t) => t.name)).toEqual([
      "search_documents",
      "chunk_document",
      "score_contract",
      "rank_contracts",
      "recommend_improvements",
      "update_capability",
    ]);
  });

  describe("errors", () => {
    it("rejects unknown tools", async () => {
      await expect(tools.call("nope", {})).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    });

    it("rejects invalid arguments", async () => {
      await expect(tools.call("score_contract", { firm_id: "firm-1" })).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
      });
      await expect(tools.call("search_documents", undefined)).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
      });
    });

    it("rejects unknown firms", async () => {
      await expect(tools.call("recommend_improvements", { firm_id: "ghost" })).rejects.toMatchObject({
        code: ErrorCode.InvalidRequest,
      });
    });
  });

  describe("score_contract", () => {
    const contract = { notice_id: "N-1", title: "Cloud migration" };

    it("scores a notice against the firm", async () => {
      expect(await tools.call("score_contract", { firm_id: "firm-1", contract })).toEqual({
        firm_id: "firm-1",
        status: "scored",
        notice_id: "N-1",
        total_score: 0.7,
        capability_score: 1,
        past_win_score: 0,
        preference_score: 1,
        passes_filters: true,
        match_reasons: ["Strong capability match (100%)"],
      });
    });

    it("reuses the stored notice vector when the notice is unchanged", async () => {
      await tools.call("score_contract", { firm_id: "firm-1", contract });
      const calls = embedder.calls.length;
      await tools.call("score_contract", { firm_id: "firm-1", contract });
      expect(embedder.calls.length).toBe(calls);
      await tools.call("score_contract", { firm_id: "firm-1", contract: { ...contract, title: "Fleet" } });
      expect(embedder.calls.length).toBe(calls + 1);
      expect(vectors.size(COLLECTIONS.contracts)).toBe(1);
    });

    it("keeps only the most recently scored notice vectors", async () => {
      const bounded = new TenderTools({ ...ctx, contractCacheSize: 2 });
      const ranked = await bounded.call("rank_contracts", {
        firm_id: "firm-1",
        contracts: [
          { notice_id: "N-1", title: "Cloud migration" },
          { notice_id: "N-2", title: "Payroll" },
          { notice_id: "N-3", title: "Fleet" },
        ],
      });
      expect(ranked).toMatchObject({ total_scored: 3 });
      const ids = () => vectors.list(COLLECTIONS.contracts).map((r) => r.id);
      expect(ids()).toEqual(["N-2", "N-3"]);

      const calls = embedder.calls.length;
      await bounded.call("score_contract", { firm_id: "firm-1", contract: { notice_id: "N-2", title: "Payroll" } });
      expect(ids()).toEqual(["N-3", "N-2"]);
      expect(embedder.calls.length).toBe(calls);

      await bounded.call("score_contract", { firm_id: "firm-1", contract: { notice_id: "N-4", title: "Invoice" } });
      expect(ids()).toEqual(["N-2", "N-4"]);
      expect(embedder.calls.length).toBe(calls + 1);
    });

    it("reports exclusions", async () => {
      const result = await tools.call("score_contract", {
        firm_id: "firm-2",
        contract: { ...contract, value: 100_000 },
      });
      expect(result).toEqual({
        firm_id: "firm-2",
        status: "excluded",
        notice_id: "N-1",
        reasons: ["Contract value £100,000 above maximum £50,000"],
      });
    });
  });

  it("ranks notices best first", async () => {
    const result = await tools.call("rank_contracts", {
      firm_id: "firm-2",
      limit: 1,
      contracts: [
        { notice_id: "N-2", title: "Payroll", value: 10_000 },
        { notice_id: "N-1", title: "Cloud migration", value: 10_000 },
        { notice_id: "N-3", title: "Fleet", value: 90_000 },
      ],
    });
    expect(result).toMatchObject({
      firm_id: "firm-2",
      total_scored: 2,
      scored: [{ notice_id: "N-1" }],
      excluded: [{ notice_id: "N-3", reasons: ["Contract value £90,000 above maximum £50,000"] }],
    });
  });

  it("recommends profile improvements", async () => {
    const result = await tools.call("recommend_improvements", { firm_id: "firm-1" });
    expect(result).toMatchObject({
      firm_id: "firm-1",
      recommendations: [
        { category: "past_wins", priority: "high", current_score: 0, potential_score: 30 },
        { category: "capabilities", priority: "high" },
        { category: "preferences", priority: "low" },
      ],
    });
  });

  describe("update_capability", () => {
    it("re-embeds the capability and saves the change", async () => {
      const result = await tools.call("update_capability", {
        firm_id: "firm-1",
        capability_id: "c1",
        text: "Fleet payroll",
      });
      expect(result).toEqual({
        firm_id: "firm-1",
        capability: { id: "c1", text: "Fleet payroll", category: null, vector_id: "vec-3" },
      });
      expect(profiles.get("firm-1")?.capabilities[0].vectorId).toBe("vec-3");
      expect(vectors.get(COLLECTIONS.capabilities, "vec-1")).toBeUndefined();
      expect(changes).toBe(1);
    });

    it("applies concurrent updates of one capability in turn", async () => {
      const [first, second] = await Promise.all([
        tools.call("update_capability", { firm_id: "firm-1", capability_id: "c1", text: "Fleet payroll" }),
        tools.call("update_capability", { firm_id: "firm-1", capability_id: "c1", text: "Cloud payroll" }),
      ]);
      expect(first).toMatchObject({ capability: { vector_id: "vec-3" } });
      expect(second).toMatchObject({ capability: { vector_id: "vec-4" } });
      const firmRecords = vectors
        .list(COLLECTIONS.capabilities)
        .filter((r) => r.payload.firmId === "firm-1")
        .map((r) => [r.id, r.payload.text]);
      expect(firmRecords).toEqual([["vec-4", "Cloud payroll"]]);
      expect(profiles.get("firm-1")?.capabilities[0]).toMatchObject({ text: "Cloud payroll", vectorId: "vec-4" });
      expect(changes).toBe(2);
    });

    it("keeps applying updates after one fails", async () => {
      const [failed, applied] = await Promise.allSettled([
        tools.call("update_capability", { firm_id: "firm-1", capability_id: "c9", text: "Fleet" }),
        tools.call("update_capability", { firm_id: "firm-1", capability_id: "c1", text: "Fleet" }),
      ]);
      expect(failed.status).toBe("rejected");
      expect(applied).toMatchObject({ status: "fulfilled", value: { capability: { vector_id: "vec-3" } } });
    });

    it("rejects unknown capabilities", async () => {
      await expect(
        tools.call("update_capability", { firm_id: "firm-1", capability_id: "c9", text: "x" }),
      ).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });
      expect(changes).toBe(0);
    });
  });

  describe("search_documents", () => {
    beforeEach(async () => {
      for (const [id, text] of [
        ["a.txt#0", "Payment is due on invoice."],
        ["b.txt#0", "Fleet delivery schedule."],
      ]) {
        vectors.upsert({
          id,
          collection: COLLECTIONS.documents,
          vector: await embedder.embed(text),
          payload: { path: id.split("#")[0], chunkIndex: 0, page: 2, chunkType: "clause", clauseNumber: "4", text },
        });
      }
    });

    it("returns the closest chunks with their location", async () => {
      const result = await tools.call("search_documents", { query: "invoice payment", top_k: 1 });
      expect(result).toEqual({
        matches: [
          {
            path: "a.txt",
            page: 2,
            chunk_index: 0,
            chunk_type: "clause",
            clause_number: "4",
            score: 1,
            snippet: "Payment is due on invoice.",
          },
        ],
      });
    });

    it("filters by path prefix", async () => {
      const result = await tools.searchDocuments({ query: "invoice payment", path_prefix: "b" });
      expect(result.matches.map((m) => m.path)).toEqual(["b.txt"]);
    });
  });

  describe("chunk_document", () => {
    const expected = {
      strategy: "fallback",
      total: 1,
      chunks: [{ index: 0, page: 1, chunk_type: "fallback", clause_number: null, length: 45, text: notes }],
    };

    it("chunks raw text", async () => {
      expect(await tools.call("chunk_document", { text: notes })).toEqual(expected);
    });

    it("chunks a document by path", async () => {
      expect(await tools.call("chunk_document", { path: "notes.md" })).toEqual(expected);
    });

    it("needs exactly one source", async () => {
      await expect(tools.call("chunk_document", { path: "notes.md", text: notes })).rejects.toMatchObject({
        code: ErrorCode.InvalidParams,
      });
      await expect(tools.call("chunk_document", {})).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    it("reports an empty strategy for blank text", async () => {
      expect(await tools.call("chunk_document", { text: "  " })).toEqual({ strategy: "none", total: 0, chunks: [] });
    });
  });
});
