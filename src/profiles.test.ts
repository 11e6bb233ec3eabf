import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ProfileStore,
  ProfileValidationError,
  contractEmbeddingText,
  hydrateContract,
  hydrateProfile,
} from "./profiles";
import { MemoryVectorStore } from "./vector-store";

const fileJson = {
  profiles: [
    {
      firm_id: "firm-1",
      company_name: "Northgate Digital",
      capabilities: [
        { id: "c1", text: "Cloud migration", category: "IT", years_experience: 6, vector_id: "v1" },
        { id: "c2", text: "Payroll integration" },
      ],
      past_wins: [
        { contract_title: "Hosting", buyer_name: "Leeds City Council", value: 80000, award_date: "2024-03-01" },
      ],
      preferences: { min_value: 10000, preferred_regions: ["North West"] },
    },
    { firm_id: "firm-2", company_name: "Harbour Fleet Ltd" },
  ],
};

describe("ProfileStore.parse", () => {
  it("maps the file format onto profiles", () => {
    const [first, second] = ProfileStore.parse(fileJson);
    expect(first).toEqual({
      firmId: "firm-1",
      companyName: "Northgate Digital",
      capabilities: [
        { id: "c1", text: "Cloud migration", category: "IT", yearsExperience: 6, vectorId: "v1" },
        { id: "c2", text: "Payroll integration", category: null, yearsExperience: null, vectorId: null },
      ],
      pastWins: [
        { contractTitle: "Hosting", buyerName: "Leeds City Council", value: 80000, awardDate: "2024-03-01" },
      ],
      preferences: {
        minValue: 10000,
        maxValue: null,
        preferredRegions: ["North West"],
        excludedCategories: [],
        keywords: [],
      },
    });
    expect(second).toEqual({
      firmId: "firm-2",
      companyName: "Harbour Fleet Ltd",
      capabilities: [],
      pastWins: [],
      preferences: null,
    });
  });

  it("names the offending field", () => {
    const bad = { profiles: [{ firm_id: "f", company_name: "C", past_wins: [{ buyer_name: "B", value: -5 }] }] };
    expect(() => ProfileStore.parse(bad)).toThrow(ProfileValidationError);
    expect(() => ProfileStore.parse(bad)).toThrow(/profiles\.0\.past_wins\.0\.value/);
  });

  it("rejects duplicate firm ids", () => {
    const dup = { profiles: [fileJson.profiles[1], fileJson.profiles[1]] };
    expect(() => ProfileStore.parse(dup)).toThrow("Duplicate firm_id 'firm-2'");
  });

  it("rejects badly formatted award dates", () => {
    const bad = { profiles: [{ firm_id: "f", company_name: "C", past_wins: [{ buyer_name: "B", award_date: "01/03/2024" }] }] };
    expect(() => ProfileStore.parse(bad)).toThrow(/expected YYYY-MM-DD/);
  });
});

describe("ProfileStore file handling", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "profiles-"));
    file = path.join(dir, "profiles.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads, updates and saves profiles", async () => {
    await fs.writeFile(file, JSON.stringify(fileJson));
    const store = new ProfileStore(file);
    expect(await store.load()).toBe(2);

    const updated = store.replaceCapability("firm-1", { id: "c2", text: "Payroll", vectorId: "v9" });
    expect(updated?.capabilities[1]).toEqual({ id: "c2", text: "Payroll", vectorId: "v9" });
    await store.save();

    const reloaded = new ProfileStore(file);
    await reloaded.load();
    expect(reloaded.get("firm-1")?.capabilities[1]).toEqual({
      id: "c2",
      text: "Payroll",
      category: null,
      yearsExperience: null,
      vectorId: "v9",
    });
    expect(reloaded.list().map((p) => p.firmId)).toEqual(["firm-1", "firm-2"]);
  });

  it("ignores unknown firms and capabilities on replace", async () => {
    await fs.writeFile(file, JSON.stringify(fileJson));
    const store = new ProfileStore(file);
    await store.load();
    expect(store.replaceCapability("nobody", { id: "c1", text: "x" })).toBeUndefined();
    expect(store.replaceCapability("firm-1", { id: "c9", text: "x" })).toBeUndefined();
  });

  it("starts empty when the file is missing or unset", async () => {
    expect(await new ProfileStore(file).load()).toBe(0);
    expect(await new ProfileStore().load()).toBe(0);
  });

  it("reports invalid JSON as a validation error", async () => {
    await fs.writeFile(file, "{oops");
    await expect(new ProfileStore(file).load()).rejects.toThrow(ProfileValidationError);
  });
});

describe("hydration", () => {
  const vectors = new MemoryVectorStore();
  vectors.upsert({ id: "v1", collection: "capabilities", vector: new Float32Array([1, 0]), payload: {} });
  vectors.upsert({ id: "N-1", collection: "contracts", vector: new Float32Array([0, 1]), payload: {} });

  it("attaches capability embeddings and nulls the rest", async () => {
    const [profile] = ProfileStore.parse(fileJson);
    const hydrated = await hydrateProfile(profile, vectors);
    expect(Array.from(hydrated.capabilities[0].embedding ?? [])).toEqual([1, 0]);
    expect(hydrated.capabilities[1].embedding).toBeNull();
  });

  it("attaches the stored notice embedding", async () => {
    const contract = { noticeId: "N-1", title: "Fleet", vectorId: "N-1" };
    expect(Array.from((await hydrateContract(contract, vectors)).embedding ?? [])).toEqual([0, 1]);
    expect((await hydrateContract({ ...contract, vectorId: "missing" }, vectors)).embedding).toBeNull();
    expect((await hydrateContract({ noticeId: "N-2", title: "x" }, vectors)).embedding).toBeNull();
  });
});

describe("contractEmbeddingText", () => {
  it("puts the key fields on one line", () => {
    expect(
      contractEmbeddingText({
        noticeId: "N-1",
        title: "Fleet\nservices",
        buyerName: "Leeds City Council",
        value: 250000,
      }),
    ).toBe(
      "Title: Fleet services Description: No description Buyer: Leeds City Council Value: £250,000.00 Region: Not specified",
    );
  });

  it("truncates long descriptions", () => {
    const text = contractEmbeddingText({ noticeId: "N-1", title: "T", description: "x".repeat(3000) });
    expect(text).toHaveLength(1500);
  });
});
