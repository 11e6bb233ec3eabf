import { randomUUID } from "node:crypto";
import type { Capability, CompanyProfile, Embedder } from "./types";
import { COLLECTIONS, type MemoryVectorStore } from "./vector-store";

export interface SyncResult {
  profile: CompanyProfile;
  /** Capabilities embedded by this call. */
  embedded: number;
  /** Capabilities whose embedding failed; they keep no vector. */
  failed: number;
}

/**
 * Keeps capability embeddings in the `capabilities` collection in step with
 * the profiles that own them.
 *
 * Changing a capability writes a new record under a fresh id before the old
 * one is removed, so a reader holding either id always finds a vector.
 */
export class CapabilityStore {
  public constructor(
    private readonly vectors: MemoryVectorStore,
    private readonly embedder: Embedder,
    private readonly newId: () => string = randomUUID,
  ) {}

  /** Whether the capability references a stored vector. */
  public has(capability: Capability): boolean {
    return !!capability.vectorId && !!this.vectors.get(COLLECTIONS.capabilities, capability.vectorId);
  }

  /** Embed capability text and store it under a new record id. */
  public async add(firmId: string, capability: Capability, text = capability.text): Promise<Capability> {
    const vector = await this.embedder.embed(text);
    const id = this.newId();
    this.vectors.upsert({
      id,
      collection: COLLECTIONS.capabilities,
      vector,
      payload: {
        firmId,
        capabilityId: capability.id,
        text,
        category: capability.category ?? null,
      },
    });
    return { ...capability, text, vectorId: id, embedding: null };
  }

  /**
   * Embed every capability of a profile that has no stored vector yet.
   * A failed embedding is logged and leaves that capability unscored.
   */
  public async sync(profile: CompanyProfile): Promise<SyncResult> {
    let embedded = 0;
    let failed = 0;
    const capabilities: Capability[] = [];
    for (const cap of profile.capabilities) {
      if (this.has(cap)) {
        capabilities.push(cap);
        continue;
      }
      try {
        capabilities.push(await this.add(profile.firmId, cap));
        embedded++;
      } catch (e) {
        console.error(`[MCP] Failed to embed capability ${profile.firmId}/${cap.id}:`, e);
        capabilities.push({ ...cap, vectorId: null });
        failed++;
      }
    }
    return { profile: { ...profile, capabilities }, embedded, failed };
  }

  /**
   * Replace a capability's text and embedding. The new vector is stored
   * first; if embedding throws, the old record is left as it was.
   */
  public async update(firmId: string, capability: Capability, text: string): Promise<Capability> {
    const next = await this.add(firmId, capability, text);
    if (capability.vectorId) this.vectors.delete(COLLECTIONS.capabilities, capability.vectorId);
    return next;
  }

  public remove(capability: Capability): boolean {
    if (!capability.vectorId) return false;
    return this.vectors.delete(COLLECTIONS.capabilities, capability.vectorId);
  }
}
