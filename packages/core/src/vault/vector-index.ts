/**
 * Storage contract for notes, their embedded chunks, and nearest-neighbour lookup.
 * The indexer writes through it and the search engine reads through it.
 */

import type { Result } from '../common/index.js'
import type { VaultError } from '../common/index.js'
import type { EmbeddedChunk, NoteRecord, SearchResult, StoredNoteHash } from './schemas.js'

export interface SaveNoteResult {
  noteId: string
  chunksRemoved: number
  chunksCreated: number
}

export interface DeleteNotesResult {
  notesRemoved: number
  chunksRemoved: number
}

export interface IndexCounts {
  notes: number
  chunks: number
}

export interface VectorIndex {
  /** Stored hashes keyed by vault-relative file path. */
  getNoteHashes(): Result<Map<string, StoredNoteHash>, VaultError>
  /** Insert or update the note row; returns its id. */
  upsertNote(note: NoteRecord): Result<string, VaultError>
  replaceChunksForNote(noteId: string, chunks: EmbeddedChunk[]): Result<{ removed: number; created: number }, VaultError>
  /** Upsert + replace chunks in one transaction. */
  saveNote(note: NoteRecord, chunks: EmbeddedChunk[]): Result<SaveNoteResult, VaultError>
  /** Best `k` chunks scoring at least `minScore`, highest first. */
  nearestNeighbors(queryEmbedding: number[], k: number, minScore: number): Result<SearchResult[], VaultError>
  deleteNote(filePath: string): Result<DeleteNotesResult, VaultError>
  bulkDeleteNotes(filePaths: string[]): Result<DeleteNotesResult, VaultError>
  /** False when the backing store cannot serve similarity queries. */
  isAvailable(): boolean
  getStats(): Result<IndexCounts, VaultError>
}
