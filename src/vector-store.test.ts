import { describe, expect, it } from "vitest";
import { MemoryVectorStore, VectorDimensionError, type VectorRecord } from "./vector-store";

const rec = (id: string, vector: number[], payload: VectorRecord["payload"] = {}, collection = "documents"): VectorRecord => ({
  id,
  collection,
  vector: new Float32Array(vector),
  payload,
});

describe("MemoryVectorStore", () => {
  it("stores, replaces and deletes records per collection", () => {
    const store = new MemoryVectorStore();
    store.upsert(rec("a", [1, 0]));
    store.upsert(rec("a", [0, 1], { v: 2 }));
    store.upsert(rec("a", [1, 1, 1], {}, "contracts"));
    expect(store.size("documents")).toBe(1);
    expect(store.size()).toBe(2);
    expect(store.get("documents", "a")?.payload).toEqual({ v: 2 });
    expect(store.delete("documents", "a")).toBe(true);
    expect(store.delete("documents", "a")).toBe(false);
    expect(store.list("documents")).toEqual([]);
  });

  it("resolves stored vectors through the lookup interface", async () => {
    const store = new MemoryVectorStore();
    store.upsert(rec("cap-1", [0.5, 0.5], {}, "capabilities"));
    expect(Array.from((await store.getVector("capabilities", "cap-1")) ?? [])).toEqual([0.5, 0.5]);
    expect(await store.getVector("capabilities", "missing")).toBeUndefined();
  });

  it("rejects vectors of another dimension", () => {
    const store = new MemoryVectorStore();
    store.upsert(rec("a", [1, 0]));
    store.upsert(rec("b", [0, 1]));
    expect(() => store.upsert(rec("c", [1, 0, 0]))).toThrow(VectorDimensionError);
    expect(store.dimension("documents")).toBe(2);
  });

  it("lets the only record change dimension", () => {
    const store = new MemoryVectorStore();
    store.upsert(rec("a", [1, 0]));
    store.upsert(rec("a", [1, 0, 0]));
    expect(store.dimension("documents")).toBe(3);
  });

  it("searches best first with top-k and payload filter", () => {
    const store = new MemoryVectorStore();
    store.upsert(rec("near", [1, 0.1], { path: "a/1.txt" }));
    store.upsert(rec("far", [0, 1], { path: "a/2.txt" }));
    store.upsert(rec("mid", [1, 1], { path: "b/3.txt" }));
    expect(store.search("documents", [1, 0], 2).map((h) => h.record.id)).toEqual(["near", "mid"]);
    const filtered = store.search("documents", [1, 0], 5, (p) => String(p.path).startsWith("a/"));
    expect(filtered.map((h) => h.record.id)).toEqual(["near", "far"]);
    expect(store.search("empty", [1, 0], 5)).toEqual([]);
  });

  it("skips mismatched records on bulk load", () => {
    const store = new MemoryVectorStore();
    const loaded = store.load([rec("a", [1, 0]), rec("b", [1, 0, 0]), rec("c", [0, 1])]);
    expect(loaded).toBe(2);
    expect(store.records().map((r) => r.id)).toEqual(["a", "c"]);
  });
});
