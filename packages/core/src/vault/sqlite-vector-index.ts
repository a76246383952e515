/**
 * SQLite-backed vector index: notes and their embedded chunks in one database.
 * Follows the repository pattern: constructor(db), methods return Result<T>.
 * Similarity is scored in process over the stored Float32 blobs.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, attempt } from '../common/index.js'
import type { Result } from '../common/index.js'
import { VaultError, errorMessage } from '../common/index.js'
import type { EmbeddedChunk, NoteRecord, SearchResult, StoredNoteHash } from './schemas.js'
import type { DeleteNotesResult, IndexCounts, SaveNoteResult, VectorIndex } from './vector-index.js'
import { packFloat32, unpackFloat32, cosineSimilarity, similarityScore } from './vector-math.js'

interface ChunkMatchRow {
  chunk_index: number
  chunk_text: string
  start_line: number | null
  end_line: number | null
  dimensions: number
  embedding: Buffer
  file_path: string
  title: string | null
}

export class SqliteVectorIndex implements VectorIndex {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  getNoteHashes(): Result<Map<string, StoredNoteHash>, VaultError> {
    try {
      const rows = this.db
        .prepare('SELECT id, file_path, content_hash FROM vault_notes')
        .all() as Array<{ id: string; file_path: string; content_hash: string }>

      return Ok(new Map(rows.map((row) => [row.file_path, { id: row.id, contentHash: row.content_hash }])))
    } catch (err) {
      return Err(VaultError.db(`Failed to load note hashes: ${errorMessage(err)}`, err))
    }
  }

  upsertNote(note: NoteRecord): Result<string, VaultError> {
    return attempt(
      () => this.upsertNoteRow(note),
      (err) => VaultError.db(`Failed to upsert note ${note.filePath}: ${errorMessage(err)}`, err),
    )
  }

  replaceChunksForNote(noteId: string, chunks: EmbeddedChunk[]): Result<{ removed: number; created: number }, VaultError> {
    return attempt(
      () => this.db.transaction(() => this.replaceChunkRows(noteId, chunks))(),
      (err) => VaultError.db(`Failed to replace chunks for note ${noteId}: ${errorMessage(err)}`, err),
    )
  }

  /**
   * Upsert the note and replace its whole chunk set in a single transaction,
   * so readers see either the old chunks or the new ones.
   */
  saveNote(note: NoteRecord, chunks: EmbeddedChunk[]): Result<SaveNoteResult, VaultError> {
    try {
      const saved = this.db.transaction((): SaveNoteResult => {
        const noteId = this.upsertNoteRow(note)
        const { removed, created } = this.replaceChunkRows(noteId, chunks)
        return { noteId, chunksRemoved: removed, chunksCreated: created }
      })()
      return Ok(saved)
    } catch (err) {
      return Err(VaultError.db(`Failed to save note ${note.filePath}: ${errorMessage(err)}`, err))
    }
  }

  nearestNeighbors(queryEmbedding: number[], k: number, minScore: number): Result<SearchResult[], VaultError> {
    if (k <= 0 || queryEmbedding.length === 0) return Ok([])

    try {
      const rows = this.db.prepare(`
        SELECT
          c.chunk_index, c.chunk_text, c.start_line, c.end_line, c.dimensions, c.embedding,
          n.file_path, n.title
        FROM note_chunks c
        JOIN vault_notes n ON n.id = c.note_id
      `).all() as ChunkMatchRow[]

      const matches: SearchResult[] = []
      let mismatched = 0

      for (const row of rows) {
        if (row.dimensions !== queryEmbedding.length) {
          mismatched++
          continue
        }
        const vec = unpackFloat32(row.embedding, row.dimensions)
        if (!vec) continue // Skip corrupt embeddings

        const score = similarityScore(cosineSimilarity(queryEmbedding, vec))
        if (score < minScore) continue

        matches.push({
          filePath: row.file_path,
          title: row.title,
          chunkText: row.chunk_text,
          score,
          startLine: row.start_line,
          endLine: row.end_line,
          chunkIndex: row.chunk_index,
        })
      }

      if (mismatched > 0) {
        console.warn(`[vector-index] skipped ${mismatched} chunks with dimensions other than ${queryEmbedding.length}`)
      }

      matches.sort((a, b) =>
        b.score - a.score
        || a.filePath.localeCompare(b.filePath)
        || a.chunkIndex - b.chunkIndex,
      )

      return Ok(matches.slice(0, k))
    } catch (err) {
      return Err(VaultError.db(`Nearest-neighbour query failed: ${errorMessage(err)}`, err))
    }
  }

  deleteNote(filePath: string): Result<DeleteNotesResult, VaultError> {
    return this.bulkDeleteNotes([filePath])
  }

  /** Delete notes by path in one transaction (chunks cascade). Unknown paths are ignored. */
  bulkDeleteNotes(filePaths: string[]): Result<DeleteNotesResult, VaultError> {
    if (filePaths.length === 0) return Ok({ notesRemoved: 0, chunksRemoved: 0 })

    try {
      const removed = this.db.transaction((): DeleteNotesResult => {
        const countStmt = this.db.prepare(`
          SELECT COUNT(*) as count FROM note_chunks c
          JOIN vault_notes n ON n.id = c.note_id
          WHERE n.file_path = ?
        `)
        const deleteStmt = this.db.prepare('DELETE FROM vault_notes WHERE file_path = ?')

        let notesRemoved = 0
        let chunksRemoved = 0
        for (const filePath of new Set(filePaths)) {
          const row = countStmt.get(filePath) as { count: number }
          const info = deleteStmt.run(filePath)
          if (info.changes > 0) {
            notesRemoved += info.changes
            chunksRemoved += row.count
          }
        }
        return { notesRemoved, chunksRemoved }
      })()

      return Ok(removed)
    } catch (err) {
      return Err(VaultError.db(`Failed to delete notes: ${errorMessage(err)}`, err))
    }
  }

  isAvailable(): boolean {
    try {
      this.db.prepare('SELECT 1 FROM note_chunks LIMIT 1').get()
      return true
    } catch (err) {
      console.warn(`[vector-index] vector search unavailable: ${errorMessage(err)}`)
      return false
    }
  }

  getStats(): Result<IndexCounts, VaultError> {
    try {
      const notes = this.db.prepare('SELECT COUNT(*) as count FROM vault_notes').get() as { count: number }
      const chunks = this.db.prepare('SELECT COUNT(*) as count FROM note_chunks').get() as { count: number }
      return Ok({ notes: notes.count, chunks: chunks.count })
    } catch (err) {
      return Err(VaultError.db(`Failed to read index stats: ${errorMessage(err)}`, err))
    }
  }

  private upsertNoteRow(note: NoteRecord): string {
    const now = new Date().toISOString()
    this.db.prepare(`
      INSERT INTO vault_notes (id, file_path, title, content_hash, file_modified_at, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(file_path) DO UPDATE SET
        title = excluded.title,
        content_hash = excluded.content_hash,
        file_modified_at = excluded.file_modified_at,
        updated_at = excluded.updated_at
    `).run(uuidv4(), note.filePath, note.title, note.contentHash, note.fileModifiedAt, now, now)

    const row = this.db
      .prepare('SELECT id FROM vault_notes WHERE file_path = ?')
      .get(note.filePath) as { id: string } | undefined
    if (!row) {
      throw VaultError.notFound('vault_notes', note.filePath)
    }
    return row.id
  }

  private replaceChunkRows(noteId: string, chunks: EmbeddedChunk[]): { removed: number; created: number } {
    const removed = this.db.prepare('DELETE FROM note_chunks WHERE note_id = ?').run(noteId).changes
    const insertStmt = this.db.prepare(`
      INSERT INTO note_chunks (id, note_id, chunk_index, chunk_text, start_line, end_line, dimensions, embedding, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `)
    const now = new Date().toISOString()

    for (const chunk of chunks) {
      insertStmt.run(
        uuidv4(),
        noteId,
        chunk.chunkIndex,
        chunk.text,
        chunk.startLine,
        chunk.endLine,
        chunk.embedding.length,
        packFloat32(chunk.embedding),
        now,
      )
    }

    return { removed, created: chunks.length }
  }
}
