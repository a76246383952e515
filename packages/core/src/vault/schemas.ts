/**
 * Zod schemas and types for the vault index.
 */

import { z } from 'zod'
import { IsoDateSchema, RelativePathSchema, TimestampSchema, UUIDSchema } from '../common/index.js'

export const VaultNoteSchema = z.object({
  id: UUIDSchema,
  filePath: RelativePathSchema,
  title: z.string().nullable(),
  contentHash: z.string().min(1),
  fileModifiedAt: TimestampSchema,
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
})

export type VaultNote = z.infer<typeof VaultNoteSchema>

/** What the indexer knows about a note before it is stored. */
export interface NoteRecord {
  filePath: string
  title: string | null
  contentHash: string
  fileModifiedAt: string
}

/** A chunk produced by the chunker, before embedding. */
export interface NoteChunkData {
  chunkIndex: number
  text: string
  startLine: number
  endLine: number
  tokenEstimate: number
}

export interface EmbeddedChunk extends NoteChunkData {
  embedding: number[]
}

export interface StoredNoteHash {
  id: string
  contentHash: string
}

export const SearchResultSchema = z.object({
  filePath: z.string(),
  title: z.string().nullable(),
  chunkText: z.string(),
  /** Cosine similarity mapped onto 0..1. */
  score: z.number().min(0).max(1),
  startLine: z.number().int().nullable(),
  endLine: z.number().int().nullable(),
  chunkIndex: z.number().int().nonnegative(),
})

export type SearchResult = z.infer<typeof SearchResultSchema>

export const TranslatedQuerySchema = z.object({
  originalQuery: z.string(),
  dateTerms: z.array(z.string()),
  startDate: IsoDateSchema.optional(),
  endDate: IsoDateSchema.optional(),
  combinedQuery: z.string(),
})

export type TranslatedQuery = z.infer<typeof TranslatedQuerySchema>

export interface IndexingResult {
  notesScanned: number
  notesAdded: number
  notesUpdated: number
  notesRemoved: number
  chunksCreated: number
  chunksRemoved: number
  durationMs: number
  errors: string[]
  cancelled: boolean
}

export interface VaultStats {
  indexedNotes: number
  indexedChunks: number
  vectorSearchAvailable: boolean
}

export function emptyIndexingResult(): IndexingResult {
  return {
    notesScanned: 0,
    notesAdded: 0,
    notesUpdated: 0,
    notesRemoved: 0,
    chunksCreated: 0,
    chunksRemoved: 0,
    durationMs: 0,
    errors: [],
    cancelled: false,
  }
}
