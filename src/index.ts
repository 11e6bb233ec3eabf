/**
 * Application entry point.
 *
 * Startup:
 * 1. Load configuration (dotenv + env knobs, see config.ts).
 * 2. Configure the on-disk transformers cache and load the embedding model.
 * 3. Restore the persisted vector store when INDEX_STORE_PATH is set and
 *    was built with the same model and chunk settings.
 * 4. Index tender documents under DOCUMENTS_ROOT (incremental against the
 *    restored store).
 * 5. Load company profiles from PROFILES_PATH and embed capabilities that
 *    have no stored vector.
 * 6. Serve MCP tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http, which also serves /health).
 *
 * Tools: search_documents, chunk_document, score_contract, rank_contracts,
 * recommend_improvements, update_capability (contracts in tools.ts).
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - DOCUMENTS_ROOT       Folder of tender documents to index.
 *  - ALLOWED_EXT          Comma list of file extensions (default pdf,txt,md).
 *  - EXCLUDED_FOLDERS     Comma list of folder names skipped during discovery.
 *  - VERBOSE              '1'/'true' enables extra logging.
 *  - MAX_CHUNK_SIZE       Max characters per chunk (default 800, cap 8000).
 *  - MIN_CHUNK_SIZE       Average chunk size below which sentence packing is used (default 100).
 *  - OVERLAP_SENTENCES    Sentences carried between fallback chunks (default 1).
 *  - TOP_CAPABILITIES     Best capability similarities averaged per notice (default 3).
 *  - RECITAL_BOUNDARIES   '1'/'true' opens clause chunks at WHEREAS recitals.
 *  - CONTRACT_CACHE_SIZE  Scored notice vectors kept, least recently used evicted (default 1000).
 *  - INDEX_STORE_PATH     JSON snapshot of all vectors, reloaded on restart.
 *  - PROFILES_PATH        Company profiles JSON file.
 *  - MODEL_NAME           Embedding model (default Xenova/bge-base-en-v1.5).
 *  - MCP_TRANSPORT        'stdio' (default) or 'http'/'streamable-http'.
 *  - TRANSFORMERS_CACHE   Directory for model downloads.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { ListToolsRequestSchema, CallToolRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { Embeddings } from "./embeddings";
import { DocumentIndexer } from "./indexer";
import { LegalChunker } from "./chunking/legal-chunker";
import { MatchScorer } from "./scoring/match-scorer";
import { MemoryVectorStore } from "./vector-store";
import { Persistence, type StoreMeta } from "./persistence";
import { PdfExtractor } from "./pdf-extractor";
import { ProfileStore } from "./profiles";
import { CapabilityStore } from "./capability-store";
import { TenderTools, TOOL_DEFINITIONS } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import { statusManager } from "./status";
import { APP_VERSION, getConfig, type Config } from "./config";

const config: Config = getConfig();
const {
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
} = config;

statusManager.setDocumentsRoot(DOCUMENTS_ROOT);

// Configure the cache before any model/pipeline is created.
await Embeddings.configureCache().catch((e) =>
  console.error("[MCP] Failed to set TRANSFORMERS cache directory:", e),
);

const embeddings = new Embeddings();
await embeddings.init();
statusManager.setModelName(embeddings.getModelName());

const storeMeta: StoreMeta = {
  modelName: embeddings.getModelName(),
  maxChunkSize: MAX_CHUNK_SIZE,
  minChunkSize: MIN_CHUNK_SIZE,
  overlapSentences: OVERLAP_SENTENCES,
  recitals: RECITAL_BOUNDARIES,
};
const persistence = new Persistence(INDEX_STORE_PATH, VERBOSE);
const vectors = new MemoryVectorStore();
const stored = await persistence.load(storeMeta);
if (stored) vectors.load(stored);

const chunker = new LegalChunker({
  maxChunkSize: MAX_CHUNK_SIZE,
  minChunkSize: MIN_CHUNK_SIZE,
  overlapSentences: OVERLAP_SENTENCES,
  recitals: RECITAL_BOUNDARIES,
  verbose: VERBOSE,
});
const indexer = new DocumentIndexer({
  root: DOCUMENTS_ROOT,
  allowedExt: ALLOWED_EXT,
  excludedFolders: EXCLUDED_FOLDERS,
  embedder: embeddings,
  vectors,
  chunker,
  pdf: new PdfExtractor(INDEX_STORE_PATH, DOCUMENTS_ROOT, VERBOSE),
  verbose: VERBOSE,
});

// Blocks startup until the index is built; progress goes to stderr.
await indexer.build();

const profiles = new ProfileStore(PROFILES_PATH);
await profiles.load();
const capabilities = new CapabilityStore(vectors, embeddings);
let newlyEmbedded = 0;
for (const profile of profiles.list()) {
  const synced = await capabilities.sync(profile);
  profiles.put(synced.profile);
  newlyEmbedded += synced.embedded;
}
if (newlyEmbedded) await profiles.save();
const embeddedCount = profiles
  .list()
  .reduce((n, p) => n + p.capabilities.filter((c) => capabilities.has(c)).length, 0);
statusManager.setProfiles(profiles.list().length, embeddedCount);

const saveStore = () => persistence.save({ ...storeMeta, records: vectors.records() });
await saveStore();
statusManager.markReady();

const tools = new TenderTools({
  embedder: embeddings,
  vectors,
  chunker,
  scorer: new MatchScorer({ topCapabilities: TOP_CAPABILITIES, verbose: VERBOSE }),
  profiles,
  capabilities,
  documents: indexer,
  contractCacheSize: CONTRACT_CACHE_SIZE,
  onChange: async () => {
    await profiles.save();
    await saveStore();
  },
});

/**
 * Factory for a new MCP Server instance with tool handlers. HTTP mode creates
 * one per session; the index, profiles and model are shared.
 */
function createServer(): Server {
  const server = new Server(
    { name: "tender-match-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const result = await tools.call(req.params.name, req.params.arguments);
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  });

  return server;
}

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(createServer);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(createServer);
}
