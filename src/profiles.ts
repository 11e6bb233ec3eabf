import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Capability, CompanyProfile, Contract, VectorLookup } from "./types";
import { COLLECTIONS } from "./vector-store";

/** Raised when the profiles file does not match the expected shape. */
export class ProfileValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileValidationError";
  }
}

const CapabilityFile = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  category: z.string().nullish(),
  years_experience: z.number().int().nonnegative().nullish(),
  vector_id: z.string().nullish(),
});

const PastWinFile = z.object({
  contract_title: z.string().nullish(),
  buyer_name: z.string().min(1),
  value: z.number().nonnegative().nullish(),
  award_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .nullish(),
});

const PreferencesFile = z.object({
  min_value: z.number().nonnegative().nullish(),
  max_value: z.number().nonnegative().nullish(),
  preferred_regions: z.array(z.string()).default([]),
  excluded_categories: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
});

const ProfileFile = z.object({
  firm_id: z.string().min(1),
  company_name: z.string().min(1),
  capabilities: z.array(CapabilityFile).default([]),
  past_wins: z.array(PastWinFile).default([]),
  preferences: PreferencesFile.nullish(),
});

const ProfilesFile = z.object({ profiles: z.array(ProfileFile) });

type ProfileRecord = z.infer<typeof ProfileFile>;

function fromFile(p: ProfileRecord): CompanyProfile {
  return {
    firmId: p.firm_id,
    companyName: p.company_name,
    capabilities: p.capabilities.map((c) => ({
      id: c.id,
      text: c.text,
      category: c.category ?? null,
      yearsExperience: c.years_experience ?? null,
      vectorId: c.vector_id ?? null,
    })),
    pastWins: p.past_wins.map((w) => ({
      contractTitle: w.contract_title ?? null,
      buyerName: w.buyer_name,
      value: w.value ?? null,
      awardDate: w.award_date ?? null,
    })),
    preferences: p.preferences
      ? {
          minValue: p.preferences.min_value ?? null,
          maxValue: p.preferences.max_value ?? null,
          preferredRegions: p.preferences.preferred_regions,
          excludedCategories: p.preferences.excluded_categories,
          keywords: p.preferences.keywords,
        }
      : null,
  };
}

function toFile(p: CompanyProfile): ProfileRecord {
  return {
    firm_id: p.firmId,
    company_name: p.companyName,
    capabilities: p.capabilities.map((c) => ({
      id: c.id,
      text: c.text,
      category: c.category ?? null,
      years_experience: c.yearsExperience ?? null,
      vector_id: c.vectorId ?? null,
    })),
    past_wins: p.pastWins.map((w) => ({
      contract_title: w.contractTitle ?? null,
      buyer_name: w.buyerName,
      value: w.value ?? null,
      award_date: w.awardDate ?? null,
    })),
    preferences: p.preferences
      ? {
          min_value: p.preferences.minValue ?? null,
          max_value: p.preferences.maxValue ?? null,
          preferred_regions: [...(p.preferences.preferredRegions ?? [])],
          excluded_categories: [...(p.preferences.excludedCategories ?? [])],
          keywords: [...(p.preferences.keywords ?? [])],
        }
      : null,
  };
}

/**
 * Company profiles keyed by firm id. Profiles are immutable values; every
 * change replaces the whole object so readers never see a half-updated one.
 */
export class ProfileStore {
  private readonly profiles = new Map<string, CompanyProfile>();

  /** @param filePath JSON file to load from and save to (optional). */
  public constructor(private readonly filePath?: string) {}

  /** Validate a parsed profiles document. */
  public static parse(json: unknown): CompanyProfile[] {
    const result = ProfilesFile.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ProfileValidationError(
        `Invalid profiles file at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown error"}`,
      );
    }
    const seen = new Set<string>();
    for (const p of result.data.profiles) {
      if (seen.has(p.firm_id)) throw new ProfileValidationError(`Duplicate firm_id '${p.firm_id}'`);
      seen.add(p.firm_id);
    }
    return result.data.profiles.map(fromFile);
  }

  /**
   * Load the profiles file. A missing path or file leaves the store empty;
   * a malformed file throws {@link ProfileValidationError}.
   */
  public async load(): Promise<number> {
    if (!this.filePath) return 0;
    if (!fsSync.existsSync(this.filePath)) {
      console.error(`[MCP] Profiles file not found at ${this.filePath}; no company profiles loaded.`);
      return 0;
    }
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(this.filePath, "utf8"));
    } catch (e) {
      throw new ProfileValidationError(
        `Profiles file ${this.filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
    this.profiles.clear();
    for (const p of ProfileStore.parse(json)) this.profiles.set(p.firmId, p);
    console.error(`[MCP] Loaded ${this.profiles.size} company profiles.`);
    return this.profiles.size;
  }

  /** Write all profiles back (no-op without a file path). */
  public async save(): Promise<void> {
    if (!this.filePath) return;
    const out = { profiles: this.list().map(toFile) };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(out, null, 2), "utf8");
  }

  public get(firmId: string): CompanyProfile | undefined {
    return this.profiles.get(firmId);
  }

  public list(): CompanyProfile[] {
    return [...this.profiles.values()];
  }

  public put(profile: CompanyProfile): void {
    this.profiles.set(profile.firmId, profile);
  }

  /**
   * Swap one capability (matched by id) for a new version.
   * @returns The new profile, or undefined when firm or capability is unknown.
   */
  public replaceCapability(firmId: string, capability: Capability): CompanyProfile | undefined {
    const profile = this.profiles.get(firmId);
    if (!profile || !profile.capabilities.some((c) => c.id === capability.id)) return undefined;
    const next: CompanyProfile = {
      ...profile,
      capabilities: profile.capabilities.map((c) => (c.id === capability.id ? capability : c)),
    };
    this.profiles.set(firmId, next);
    return next;
  }
}

/** Attach stored capability embeddings; capabilities without one get `null`. */
export async function hydrateProfile(
  profile: CompanyProfile,
  lookup: VectorLookup,
): Promise<CompanyProfile> {
  const capabilities = await Promise.all(
    profile.capabilities.map(async (c) => ({
      ...c,
      embedding: c.vectorId ? ((await lookup.getVector(COLLECTIONS.capabilities, c.vectorId)) ?? null) : null,
    })),
  );
  return { ...profile, capabilities };
}

/** Attach the stored notice embedding, when the contract references one. */
export async function hydrateContract(contract: Contract, lookup: VectorLookup): Promise<Contract> {
  if (!contract.vectorId) return { ...contract, embedding: contract.embedding ?? null };
  const embedding = await lookup.getVector(COLLECTIONS.contracts, contract.vectorId);
  return { ...contract, embedding: embedding ?? null };
}

const MAX_EMBED_CHARS = 1500;

/** Text embedded for a notice: key fields on one line, truncated. */
export function contractEmbeddingText(contract: Contract): string {
  const value =
    typeof contract.value === "number"
      ? `£${contract.value.toLocaleString("en-GB", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`
      : "Not specified";
  const text = [
    `Title: ${contract.title}`,
    `Description: ${contract.description || "No description"}`,
    `Buyer: ${contract.buyerName || "Not specified"}`,
    `Value: ${value}`,
    `Region: ${contract.region || "Not specified"}`,
  ]
    .join(" ")
    .replace(/\r\n|\r|\n/g, " ");
  return text.slice(0, MAX_EMBED_CHARS);
}
