/**
 * Vault: note chunking, embeddings, incremental indexing, date-aware
 * query translation and semantic search with citations.
 */

export {
  VaultNoteSchema,
  SearchResultSchema,
  TranslatedQuerySchema,
  emptyIndexingResult,
} from './schemas.js'
export type {
  VaultNote,
  NoteRecord,
  NoteChunkData,
  EmbeddedChunk,
  StoredNoteHash,
  SearchResult,
  TranslatedQuery,
  IndexingResult,
  VaultStats,
} from './schemas.js'

// Notes
export { splitFrontmatter, extractTitle, fileStem, noteDateFromPath } from './frontmatter.js'
export type { Frontmatter, FrontmatterSplit } from './frontmatter.js'
export { chunkNote, buildNotePrefix, estimateTokens, CHARS_PER_TOKEN } from './chunker.js'
export type { ChunkerOptions } from './chunker.js'
export { scanVault, readNoteFile, hashContent, toVaultPath } from './scanner.js'
export type { ScanOptions, NoteFile } from './scanner.js'

// Embeddings and storage
export {
  OpenAIEmbeddingClient,
  DEFAULT_RETRY_POLICY,
  MAX_INPUTS_PER_REQUEST,
  backoffDelayMs,
  isRetryableError,
} from './embedding-client.js'
export type {
  EmbeddingClient,
  EmbedOptions,
  EmbedResult,
  EmbeddingsTransport,
  RetryPolicy,
  OpenAIEmbeddingClientOptions,
} from './embedding-client.js'
export type { VectorIndex, SaveNoteResult, DeleteNotesResult, IndexCounts } from './vector-index.js'
export { SqliteVectorIndex } from './sqlite-vector-index.js'
export { packFloat32, unpackFloat32, cosineSimilarity, similarityScore } from './vector-math.js'

// Indexing
export { VaultIndexer } from './indexer.js'
export type { VaultIndexerDeps, IndexOptions } from './indexer.js'
export { VaultLock, sharedVaultLock } from './vault-lock.js'

// Query translation and search
export { DateQueryTranslator, translateDateQuery, dayTerms } from './date-query-translator.js'
export { DEFAULT_DATE_RULES } from './date-rules.js'
export type { DateRule, DateRuleMatch, DateRange } from './date-rules.js'
export type { CalendarDate } from './calendar.js'
export { VaultSearchEngine, dedupeByNote, filterByNoteDate } from './search-engine.js'
export type { VaultSearchEngineDeps, SearchOptions, CitedSearch } from './search-engine.js'
export { formatCitations, buildVaultUri, citationName, DEFAULT_MAX_CITATIONS } from './citations.js'

export { createVaultRecall, createEmbeddingClient } from './vault-recall.js'
export type { VaultRecall, VaultRecallOverrides } from './vault-recall.js'
