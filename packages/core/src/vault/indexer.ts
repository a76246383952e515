/**
 * Vault indexer: scans the vault, chunks new and modified notes, embeds them
 * in batches, and keeps the vector index in step with the files on disk.
 *
 * Change detection is by content hash. A note's hash is written together with
 * its full chunk set, so a note whose embedding fails keeps its old hash and is
 * retried on the next run.
 */

import { Ok } from '../common/index.js'
import type { Result } from '../common/index.js'
import { VaultError, errorMessage } from '../common/index.js'
import type { IndexerSettings, VaultSettings } from '../config/index.js'
import type { EmbeddedChunk, IndexingResult, NoteChunkData, NoteRecord, StoredNoteHash } from './schemas.js'
import { emptyIndexingResult } from './schemas.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { VectorIndex } from './vector-index.js'
import { chunkNote } from './chunker.js'
import { extractTitle } from './frontmatter.js'
import { ensureVaultRoot, readNoteFile, scanVault, toVaultPath } from './scanner.js'
import { VaultLock, sharedVaultLock, vaultLockKey } from './vault-lock.js'

export interface IndexOptions {
  signal?: AbortSignal
}

export interface VaultIndexerDeps {
  vault: Pick<VaultSettings, 'path' | 'include' | 'exclude'>
  indexer: IndexerSettings
  index: VectorIndex
  embeddingClient: EmbeddingClient
  /** Defaults to the process-wide lock, keyed by resolved vault path. */
  lock?: VaultLock
}

interface PendingNote {
  record: NoteRecord
  chunks: NoteChunkData[]
  /** Filled in chunk order as batches complete. */
  embeddings: number[][]
  isNew: boolean
  failed: boolean
}

interface PendingChunk {
  note: PendingNote
  chunk: NoteChunkData
}

export class VaultIndexer {
  private readonly vault: VaultIndexerDeps['vault']
  private readonly settings: IndexerSettings
  private readonly index: VectorIndex
  private readonly embeddingClient: EmbeddingClient
  private readonly lock: VaultLock
  private readonly lockKey: string

  constructor(deps: VaultIndexerDeps) {
    this.vault = deps.vault
    this.settings = deps.indexer
    this.index = deps.index
    this.embeddingClient = deps.embeddingClient
    this.lock = deps.lock ?? sharedVaultLock
    this.lockKey = vaultLockKey(deps.vault.path)
  }

  /** Full incremental pass over the vault. */
  async indexVault(options: IndexOptions = {}): Promise<Result<IndexingResult, VaultError>> {
    return this.lock.runExclusive(this.lockKey, () => this.runVaultIndex(options.signal))
  }

  /** Index a single note, given absolute or vault-relative. */
  async indexNote(filePath: string, options: IndexOptions = {}): Promise<Result<IndexingResult, VaultError>> {
    return this.lock.runExclusive(this.lockKey, async (): Promise<Result<IndexingResult, VaultError>> => {
      const startTime = Date.now()
      const ready = await this.checkPreconditions()
      if (!ready.ok) return ready

      const hashes = this.index.getNoteHashes()
      if (!hashes.ok) return hashes

      const result = emptyIndexingResult()
      result.notesScanned = 1
      await this.processPaths([toVaultPath(this.vault.path, filePath)], hashes.value, result, options.signal)

      result.durationMs = Date.now() - startTime
      return Ok(result)
    })
  }

  /** Drop one note and its chunks from the index. */
  async removeNote(filePath: string): Promise<Result<IndexingResult, VaultError>> {
    return this.lock.runExclusive(this.lockKey, async (): Promise<Result<IndexingResult, VaultError>> => {
      const startTime = Date.now()
      const relativePath = toVaultPath(this.vault.path, filePath)
      const deleted = this.index.deleteNote(relativePath)
      if (!deleted.ok) return deleted

      const result = emptyIndexingResult()
      result.notesRemoved = deleted.value.notesRemoved
      result.chunksRemoved = deleted.value.chunksRemoved
      result.durationMs = Date.now() - startTime
      if (deleted.value.notesRemoved > 0) {
        console.log(`[indexer] removed ${relativePath} from index`)
      }
      return Ok(result)
    })
  }

  private async checkPreconditions(): Promise<Result<void, VaultError>> {
    const config = this.embeddingClient.checkConfiguration()
    if (!config.ok) return config
    return ensureVaultRoot(this.vault.path)
  }

  private async runVaultIndex(signal?: AbortSignal): Promise<Result<IndexingResult, VaultError>> {
    const startTime = Date.now()

    const ready = await this.checkPreconditions()
    if (!ready.ok) return ready

    const scan = await scanVault(this.vault.path, { include: this.vault.include, exclude: this.vault.exclude })
    if (!scan.ok) return scan

    const hashes = this.index.getNoteHashes()
    if (!hashes.ok) return hashes

    const result = emptyIndexingResult()
    result.notesScanned = scan.value.length
    console.log(`[indexer] found ${scan.value.length} notes in ${this.vault.path}`)

    await this.processPaths(scan.value, hashes.value, result, signal)

    if (!result.cancelled) {
      const onDisk = new Set(scan.value)
      const removed = [...hashes.value.keys()].filter((path) => !onDisk.has(path))
      if (removed.length > 0) {
        const deleted = this.index.bulkDeleteNotes(removed)
        if (deleted.ok) {
          result.notesRemoved = deleted.value.notesRemoved
          result.chunksRemoved += deleted.value.chunksRemoved
        } else {
          result.errors.push(`Failed to remove deleted notes: ${deleted.error.message}`)
        }
      }
    }

    result.durationMs = Date.now() - startTime
    const elapsed = (result.durationMs / 1000).toFixed(1)
    console.log(
      `[indexer] ${result.cancelled ? 'cancelled' : 'done'} in ${elapsed}s: ${result.notesAdded} added, ${result.notesUpdated} updated, `
      + `${result.notesRemoved} removed, ${result.chunksCreated} chunks, ${result.errors.length} errors`,
    )

    return Ok(result)
  }

  /**
   * Read, hash and chunk the given notes, then embed every pending chunk in
   * batches and persist each note once all of its chunks have vectors.
   */
  private async processPaths(
    paths: string[],
    hashes: Map<string, StoredNoteHash>,
    result: IndexingResult,
    signal?: AbortSignal,
  ): Promise<void> {
    const pending: PendingNote[] = []

    for (const relativePath of paths) {
      if (signal?.aborted) {
        result.cancelled = true
        return
      }

      try {
        const file = await readNoteFile(this.vault.path, relativePath)
        const stored = hashes.get(relativePath)
        if (stored && stored.contentHash === file.contentHash) continue

        const title = extractTitle(file.content, relativePath)
        const chunks = chunkNote(file.content, relativePath, title, {
          targetTokens: this.settings.chunkTargetTokens,
          overlapTokens: this.settings.chunkOverlapTokens,
        })

        pending.push({
          record: {
            filePath: relativePath,
            title,
            contentHash: file.contentHash,
            fileModifiedAt: file.modifiedAt,
          },
          chunks,
          embeddings: [],
          isNew: !stored,
          failed: false,
        })
      } catch (err) {
        console.warn(`[indexer] failed to read/chunk ${relativePath}: ${errorMessage(err)}`)
        result.errors.push(`${relativePath}: ${errorMessage(err)}`)
      }
    }

    const added = pending.filter((note) => note.isNew).length
    console.log(`[indexer] changes: ${added} to add, ${pending.length - added} to update`)

    // Notes without chunks are complete already
    for (const note of pending) {
      if (note.chunks.length === 0) this.persist(note, result)
    }

    const queue: PendingChunk[] = pending.flatMap((note) => note.chunks.map((chunk) => ({ note, chunk })))
    const batchSize = this.settings.embeddingBatchSize

    for (let start = 0; start < queue.length; start += batchSize) {
      if (signal?.aborted) {
        result.cancelled = true
        return
      }

      const batch = queue.slice(start, start + batchSize)
      const batchNumber = start / batchSize + 1

      let embeddings: number[][]
      try {
        const embedded = await this.embeddingClient.embed(batch.map((item) => item.chunk.text), { signal })
        if (embedded.embeddings.length !== batch.length) {
          throw VaultError.protocol(`Expected ${batch.length} embeddings, got ${embedded.embeddings.length}`)
        }
        embeddings = embedded.embeddings
      } catch (err) {
        if (signal?.aborted) {
          result.cancelled = true
          return
        }
        console.warn(`[indexer] embedding batch ${batchNumber} failed: ${errorMessage(err)}`)
        result.errors.push(`Embedding batch ${batchNumber} failed: ${errorMessage(err)}`)
        for (const item of batch) item.note.failed = true
        continue
      }

      // Chunks of a note are contiguous in the queue, so vectors arrive in chunk order.
      batch.forEach((item, i) => item.note.embeddings.push(embeddings[i]))

      for (const note of new Set(batch.map((item) => item.note))) {
        if (!note.failed && note.embeddings.length === note.chunks.length) {
          this.persist(note, result)
        }
      }
    }
  }

  private persist(note: PendingNote, result: IndexingResult): void {
    const chunks: EmbeddedChunk[] = note.chunks.map((chunk, i) => ({ ...chunk, embedding: note.embeddings[i] }))
    const saved = this.index.saveNote(note.record, chunks)

    if (!saved.ok) {
      console.warn(`[indexer] failed to save ${note.record.filePath}: ${saved.error.message}`)
      result.errors.push(`${note.record.filePath}: ${saved.error.message}`)
      return
    }

    if (note.isNew) {
      result.notesAdded++
    } else {
      result.notesUpdated++
    }
    result.chunksCreated += saved.value.chunksCreated
    result.chunksRemoved += saved.value.chunksRemoved
  }
}
