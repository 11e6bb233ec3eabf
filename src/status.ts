import { APP_VERSION } from "./config";

/** Document indexing progress. Monotonic, non-negative counters. */
export interface IndexingStatus {
  /** Files discovered that matched the extension allow-list. */
  filesDiscovered: number;
  /** Chunks currently held for all discovered files. */
  chunksTotal: number;
  /** Chunks with an embedding so far. */
  chunksEmbedded: number;
  /** Files that produced no chunks (empty or unreadable text). */
  filesSkipped: number;
}

export interface ProfileStatus {
  profilesLoaded: number;
  capabilitiesEmbedded: number;
}

/**
 * In-memory snapshot of server lifecycle, indexing and profile state,
 * served by /health in HTTP mode.
 *
 * ready = true only once the document index is built and capabilities are
 * embedded.
 */
export interface ServerStatus {
  version: string;
  documentsRoot: string;
  modelName: string;
  /** 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  startedAt: string;
  indexing: IndexingStatus;
  profiles: ProfileStatus;
}

export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      documentsRoot: initial?.documentsRoot ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? {
        filesDiscovered: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
        filesSkipped: 0,
      },
      profiles: initial?.profiles ?? { profilesLoaded: 0, capabilitiesEmbedded: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDocumentsRoot(root: string) {
    this.data.documentsRoot = root;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public setIndexTotals(files: number, chunks: number) {
    this.data.indexing.filesDiscovered = files;
    this.data.indexing.chunksTotal = chunks;
  }

  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  public incSkipped(count = 1) {
    this.data.indexing.filesSkipped += count;
  }

  public setProfiles(profiles: number, capabilitiesEmbedded: number) {
    this.data.profiles.profilesLoaded = profiles;
    this.data.profiles.capabilitiesEmbedded = capabilitiesEmbedded;
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Shared across indexer, profile loading and transports.
export const statusManager = new StatusManager();
