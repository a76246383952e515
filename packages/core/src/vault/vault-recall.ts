/**
 * Wires a validated config into a ready indexer and search engine over one
 * SQLite database.
 */

import type { EmbeddingSettings, VaultRecallConfig } from '../config/index.js'
import { vaultDisplayName } from '../config/index.js'
import { openDatabase } from '../storage/index.js'
import type { VaultDatabase } from '../storage/index.js'
import { OpenAIEmbeddingClient } from './embedding-client.js'
import type { EmbeddingClient } from './embedding-client.js'
import { SqliteVectorIndex } from './sqlite-vector-index.js'
import { VaultIndexer } from './indexer.js'
import { VaultSearchEngine } from './search-engine.js'
import type { VaultLock } from './vault-lock.js'

export interface VaultRecall {
  indexer: VaultIndexer
  search: VaultSearchEngine
  index: SqliteVectorIndex
  /** Closes the database if this instance opened it. */
  close(): void
}

export interface VaultRecallOverrides {
  /** Use an open database instead of `config.databasePath`; the caller keeps ownership. */
  db?: VaultDatabase
  embeddingClient?: EmbeddingClient
  lock?: VaultLock
  now?: () => Date
}

export function createEmbeddingClient(settings: EmbeddingSettings): OpenAIEmbeddingClient {
  return new OpenAIEmbeddingClient({
    apiKey: settings.apiKey,
    model: settings.model,
    dimensions: settings.dimensions,
    baseUrl: settings.baseUrl,
    requestTimeoutMs: settings.requestTimeoutMs,
  })
}

export function createVaultRecall(config: VaultRecallConfig, overrides: VaultRecallOverrides = {}): VaultRecall {
  const ownsDb = overrides.db === undefined
  const db = overrides.db ?? openDatabase(config.databasePath)
  const index = new SqliteVectorIndex(db)
  const embeddingClient = overrides.embeddingClient ?? createEmbeddingClient(config.embedding)

  const indexer = new VaultIndexer({
    vault: config.vault,
    indexer: config.indexer,
    index,
    embeddingClient,
    lock: overrides.lock,
  })
  const search = new VaultSearchEngine({
    index,
    embeddingClient,
    search: config.search,
    vaultName: vaultDisplayName(config),
    now: overrides.now,
  })

  return {
    indexer,
    search,
    index,
    close() {
      if (ownsDb) db.close()
    },
  }
}
