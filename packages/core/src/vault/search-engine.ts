/**
 * Semantic search over the vault index.
 *
 * Date phrases in the query are expanded into concrete date terms before the
 * query is embedded, so "what did I do yesterday" lands near the daily note
 * named after yesterday's date.
 */

import { Ok, unwrap } from '../common/index.js'
import type { Result } from '../common/index.js'
import { VaultError } from '../common/index.js'
import type { SearchSettings } from '../config/index.js'
import type { SearchResult, TranslatedQuery, VaultStats } from './schemas.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { VectorIndex } from './vector-index.js'
import { DateQueryTranslator } from './date-query-translator.js'
import { noteDateFromPath } from './frontmatter.js'
import { formatCitations } from './citations.js'

export interface VaultSearchEngineDeps {
  index: VectorIndex
  embeddingClient: EmbeddingClient
  search: SearchSettings
  /** Vault name used in citation links. */
  vaultName: string
  translator?: DateQueryTranslator
  /** Reference clock for relative dates. */
  now?: () => Date
}

export interface SearchOptions {
  topK?: number
  minScore?: number
  signal?: AbortSignal
}

export interface CitedSearch {
  query: TranslatedQuery
  results: SearchResult[]
  /** Empty when there are no results. */
  citations: string
}

/** Best chunk per note, highest score first. */
export function dedupeByNote(results: SearchResult[]): SearchResult[] {
  const best = new Map<string, SearchResult>()
  for (const result of results) {
    const current = best.get(result.filePath)
    if (!current || result.score > current.score) {
      best.set(result.filePath, result)
    }
  }
  return [...best.values()].sort((a, b) => b.score - a.score)
}

/** Drops dated notes outside the range. Notes without a date in their name are kept. */
export function filterByNoteDate(results: SearchResult[], startDate: string, endDate: string): SearchResult[] {
  return results.filter((result) => {
    const date = noteDateFromPath(result.filePath)
    return date === null || (date >= startDate && date <= endDate)
  })
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw VaultError.cancelled()
}

export class VaultSearchEngine {
  private readonly index: VectorIndex
  private readonly embeddingClient: EmbeddingClient
  private readonly settings: SearchSettings
  private readonly vaultName: string
  private readonly translator: DateQueryTranslator
  private readonly now: () => Date

  constructor(deps: VaultSearchEngineDeps) {
    this.index = deps.index
    this.embeddingClient = deps.embeddingClient
    this.settings = deps.search
    this.vaultName = deps.vaultName
    this.translator = deps.translator ?? new DateQueryTranslator()
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Top notes for a query, one result per note.
   *
   * Embedding and index failures are thrown, not swallowed; callers decide
   * whether a failed search is fatal.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const { results } = await this.run(query, options)
    return results
  }

  async searchWithCitations(query: string, options: SearchOptions = {}): Promise<CitedSearch> {
    const { translated, results } = await this.run(query, options)
    return {
      query: translated,
      results,
      citations: formatCitations(results, this.vaultName, this.settings.maxCitations),
    }
  }

  /** False when search is disabled or the index cannot serve similarity queries yet. */
  isAvailable(): boolean {
    return this.settings.enabled && this.index.isAvailable()
  }

  getStats(): Result<VaultStats, VaultError> {
    const counts = this.index.getStats()
    if (!counts.ok) return counts
    return Ok({
      indexedNotes: counts.value.notes,
      indexedChunks: counts.value.chunks,
      vectorSearchAvailable: this.isAvailable(),
    })
  }

  private async run(
    query: string,
    options: SearchOptions,
  ): Promise<{ translated: TranslatedQuery; results: SearchResult[] }> {
    const translated = this.translator.translate(query, this.now())
    if (!this.settings.enabled || query.trim() === '') {
      return { translated, results: [] }
    }

    const topK = options.topK ?? this.settings.topK
    const minScore = options.minScore ?? this.settings.minScore
    throwIfAborted(options.signal)

    const queryEmbedding = await this.embeddingClient.embedOne(translated.combinedQuery, { signal: options.signal })
    throwIfAborted(options.signal)

    const candidates = unwrap(this.index.nearestNeighbors(queryEmbedding, topK * 2, minScore))
    let results = dedupeByNote(candidates)

    if (this.settings.filterByDateRange && translated.startDate && translated.endDate) {
      results = filterByNoteDate(results, translated.startDate, translated.endDate)
    }
    results = results.slice(0, topK)

    const top = results[0] ? results[0].score.toFixed(2) : '-'
    console.log(
      `[vault-search] ${results.length}/${candidates.length} results (top ${top}, ${translated.dateTerms.length} date terms)`,
    )
    return { translated, results }
  }
}
