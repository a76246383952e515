import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { openDatabase } from '../../src/storage/index.js'
import type { VaultDatabase } from '../../src/storage/index.js'
import { SqliteVectorIndex } from '../../src/vault/sqlite-vector-index.js'
import type { EmbeddedChunk, NoteRecord } from '../../src/vault/schemas.js'

function note(filePath: string, contentHash = `hash-${filePath}`): NoteRecord {
  return { filePath, title: null, contentHash, fileModifiedAt: '2026-01-18T08:00:00.000Z' }
}

function chunk(chunkIndex: number, embedding: number[], text = `chunk ${chunkIndex}`): EmbeddedChunk {
  return { chunkIndex, text, startLine: chunkIndex * 10, endLine: chunkIndex * 10 + 9, tokenEstimate: 2, embedding }
}

describe('SqliteVectorIndex', () => {
  let db: VaultDatabase
  let index: SqliteVectorIndex

  beforeEach(() => {
    db = openDatabase(':memory:')
    index = new SqliteVectorIndex(db)
  })

  afterEach(() => {
    db.close()
  })

  it('stores notes and reports their hashes by path', () => {
    const saved = index.saveNote(note('a.md', 'h1'), [chunk(0, [1, 0]), chunk(1, [0, 1])])
    expect(saved.ok).toBe(true)
    if (!saved.ok) return
    expect(saved.value.chunksCreated).toBe(2)
    expect(saved.value.chunksRemoved).toBe(0)

    const hashes = index.getNoteHashes()
    expect(hashes.ok).toBe(true)
    if (!hashes.ok) return
    expect(hashes.value.get('a.md')).toEqual({ id: saved.value.noteId, contentHash: 'h1' })
  })

  it('replaces the chunk set and keeps the note id on re-save', () => {
    const first = index.saveNote(note('a.md', 'h1'), [chunk(0, [1, 0]), chunk(1, [0, 1])])
    const second = index.saveNote(note('a.md', 'h2'), [chunk(0, [1, 1])])
    expect(first.ok && second.ok).toBe(true)
    if (!first.ok || !second.ok) return

    expect(second.value.noteId).toBe(first.value.noteId)
    expect(second.value.chunksRemoved).toBe(2)
    expect(index.getStats()).toEqual({ ok: true, value: { notes: 1, chunks: 1 } })
  })

  it('rolls back a failed save, keeping the old hash and chunks', () => {
    index.saveNote(note('a.md', 'h1'), [chunk(0, [1, 0])])

    const broken = index.saveNote(note('a.md', 'h2'), [chunk(0, [1, 0]), chunk(0, [0, 1])])

    expect(broken.ok).toBe(false)
    if (broken.ok) return
    expect(broken.error.code).toBe('DB_ERROR')
    const hashes = index.getNoteHashes()
    expect(hashes.ok && hashes.value.get('a.md')?.contentHash).toBe('h1')
    expect(index.getStats()).toEqual({ ok: true, value: { notes: 1, chunks: 1 } })
  })

  it('upserts notes and replaces chunks separately', () => {
    const id = index.upsertNote(note('b.md'))
    expect(id.ok).toBe(true)
    if (!id.ok) return

    expect(index.replaceChunksForNote(id.value, [chunk(0, [1, 0])])).toEqual({ ok: true, value: { removed: 0, created: 1 } })
    expect(index.replaceChunksForNote(id.value, [])).toEqual({ ok: true, value: { removed: 1, created: 0 } })
  })

  describe('nearestNeighbors', () => {
    beforeEach(() => {
      index.saveNote(note('same.md'), [chunk(0, [1, 0], 'same direction')])
      index.saveNote(note('ortho.md'), [chunk(0, [0, 1], 'orthogonal')])
      index.saveNote(note('opposite.md'), [chunk(0, [-1, 0], 'opposite')])
    })

    it('scores (1 + cosine) / 2, highest first', () => {
      const result = index.nearestNeighbors([2, 0], 10, 0)
      expect(result.ok).toBe(true)
      if (!result.ok) return

      expect(result.value.map((r) => [r.filePath, r.score])).toEqual([
        ['same.md', 1],
        ['ortho.md', 0.5],
        ['opposite.md', 0],
      ])
      expect(result.value[0]).toMatchObject({ chunkText: 'same direction', startLine: 0, endLine: 9, chunkIndex: 0, title: null })
    })

    it('drops matches below the minimum score and truncates to k', () => {
      const filtered = index.nearestNeighbors([1, 0], 10, 0.4)
      expect(filtered.ok && filtered.value.map((r) => r.filePath)).toEqual(['same.md', 'ortho.md'])

      const top = index.nearestNeighbors([1, 0], 1, 0)
      expect(top.ok && top.value.map((r) => r.filePath)).toEqual(['same.md'])
    })

    it('skips chunks stored with other dimensions', () => {
      index.saveNote(note('wide.md'), [chunk(0, [1, 0, 0])])

      const result = index.nearestNeighbors([1, 0], 10, 0)

      expect(result.ok && result.value.map((r) => r.filePath)).toEqual(['same.md', 'ortho.md', 'opposite.md'])
    })
  })

  it('bulk-deletes notes with their chunks and ignores unknown paths', () => {
    index.saveNote(note('a.md'), [chunk(0, [1, 0]), chunk(1, [0, 1])])
    index.saveNote(note('b.md'), [chunk(0, [1, 0])])
    index.saveNote(note('c.md'), [chunk(0, [1, 0])])

    const deleted = index.bulkDeleteNotes(['a.md', 'b.md', 'missing.md'])

    expect(deleted).toEqual({ ok: true, value: { notesRemoved: 2, chunksRemoved: 3 } })
    expect(index.getStats()).toEqual({ ok: true, value: { notes: 1, chunks: 1 } })
    expect(index.deleteNote('c.md')).toEqual({ ok: true, value: { notesRemoved: 1, chunksRemoved: 1 } })
  })

  it('reports availability of the chunk store', () => {
    expect(index.isAvailable()).toBe(true)
    db.exec('DROP TABLE note_chunks')
    expect(index.isAvailable()).toBe(false)
  })
})
