/**
 * Header-aware note chunker.
 * Packs markdown sections into size-bounded chunks, splits oversized sections
 * line by line, and seeds each new chunk with an overlap tail of the previous one.
 * Every chunk carries a short note prefix (name, date, tags) instead of the raw frontmatter.
 */

import { splitFrontmatter, frontmatterDate, frontmatterTags, fileStem } from './frontmatter.js'
import type { Frontmatter } from './frontmatter.js'
import type { NoteChunkData } from './schemas.js'

export interface ChunkerOptions {
  targetTokens?: number
  overlapTokens?: number
}

/** 1 token ≈ 4 chars for English text. */
export const CHARS_PER_TOKEN = 4

const DEFAULT_TARGET_TOKENS = 500
const DEFAULT_OVERLAP_TOKENS = 50

const HEADER_RE = /^(#{1,6})\s+(.+)$/
const FENCE_RE = /^\s*(```|~~~)/
const SENTENCE_END_RE = /[.!?]\s/

export function estimateTokens(chars: number): number {
  return Math.ceil(chars / CHARS_PER_TOKEN)
}

interface SourceLine {
  text: string
  lineNo: number
}

interface Section {
  header: SourceLine | null
  lines: SourceLine[]
  startLine: number
  endLine: number
}

interface Draft {
  body: string
  startLine: number
  endLine: number
}

export function buildNotePrefix(filePath: string, title: string | null | undefined, frontmatter: Frontmatter | null): string {
  const stem = fileStem(filePath)
  const parts: string[] = []

  if (title && title.trim().length > 0 && title.trim().toLowerCase() !== stem.toLowerCase()) {
    parts.push(`[Note: ${title.trim()} (${stem})]`)
  } else {
    parts.push(`[Note: ${stem}]`)
  }

  const date = frontmatterDate(frontmatter)
  if (date) parts.push(`Date: ${date}`)

  const tags = frontmatterTags(frontmatter)
  if (tags.length > 0) parts.push(`Tags: ${tags.join(', ')}`)

  return parts.join('\n') + '\n\n'
}

function parseSections(lines: string[], startLine: number): Section[] {
  const sections: Section[] = []
  let current: Section | null = null
  let inFence = false

  for (let i = startLine; i < lines.length; i++) {
    const text = lines[i]
    if (FENCE_RE.test(text)) inFence = !inFence

    if (!inFence && HEADER_RE.test(text)) {
      if (current) sections.push(current)
      current = { header: { text, lineNo: i }, lines: [], startLine: i, endLine: i }
      continue
    }

    if (!current) {
      // Content before the first header
      current = { header: null, lines: [], startLine: i, endLine: i }
    }
    current.lines.push({ text, lineNo: i })
    current.endLine = i
  }

  if (current) sections.push(current)
  return sections
}

function sectionText(section: Section): string {
  let text = section.header ? section.header.text + '\n' : ''
  for (const line of section.lines) {
    text += line.text + '\n'
  }
  return text
}

/**
 * Tail of `text` no longer than `maxChars`, starting at a paragraph break when one
 * falls inside the window, else at a sentence break, else at a raw character offset.
 */
export function overlapTail(text: string, maxChars: number): string {
  if (maxChars <= 0) return ''
  if (text.length <= maxChars) return text

  const window = text.slice(text.length - maxChars)

  const paragraph = window.indexOf('\n\n')
  if (paragraph !== -1) {
    const tail = window.slice(paragraph + 2)
    if (tail.trim().length > 0) return tail
  }

  const sentence = SENTENCE_END_RE.exec(window)
  if (sentence) {
    const tail = window.slice(sentence.index + 2)
    if (tail.trim().length > 0) return tail
  }

  return window
}

/** Overlap seed from the previous chunk, newline included, at most `room` chars long. */
function seedFrom(previous: string | null, overlapChars: number, room: number): string {
  if (previous === null) return ''
  const limit = Math.min(overlapChars, room - 1)
  if (limit <= 0) return ''
  const tail = overlapTail(previous, limit).trim()
  return tail.length > 0 ? tail + '\n' : ''
}

const CONTINUED = ' (continued)\n'
/** Shortest header text worth keeping in a shortened continuation marker. */
const MIN_MARKER_HEADER = 4

/**
 * Header line for a continuation chunk, at most `room` chars long. A header too
 * long for the room is cut short, and dropped once too little of it would remain.
 */
function continuationMarker(header: SourceLine | null, room: number): string {
  if (header === null) return ''
  const full = header.text + CONTINUED
  if (full.length <= room) return full

  const keep = room - CONTINUED.length
  if (keep < MIN_MARKER_HEADER) return ''
  return header.text.slice(0, keep).trimEnd() + CONTINUED
}

function splitLargeSection(section: Section, budget: number, overlapChars: number): Draft[] {
  const drafts: Draft[] = []
  const header = section.header

  let buffer = header ? header.text + '\n' : ''
  let start = section.startLine
  let end = header ? header.lineNo : section.startLine
  // Whether the buffer holds source lines, not only a marker and overlap seed
  let hasContent = header !== null
  let freshContent = header !== null

  for (const line of section.lines) {
    const addition = line.text.length + 1

    if (hasContent && buffer.length + addition > budget) {
      drafts.push({ body: buffer.trim(), startLine: start, endLine: end })

      const continued = continuationMarker(header, budget - addition)
      const seed = seedFrom(buffer, overlapChars, budget - continued.length - addition)
      buffer = continued + seed
      start = line.lineNo
      freshContent = false
    }

    buffer += line.text + '\n'
    end = line.lineNo
    hasContent = true
    if (line.text.trim().length > 0) freshContent = true
  }

  if (freshContent && buffer.trim().length > 0) {
    drafts.push({ body: buffer.trim(), startLine: start, endLine: end })
  } else if (drafts.length > 0) {
    // Trailing blank lines join the last chunk's span
    drafts[drafts.length - 1].endLine = end
  }

  return drafts
}

function packSections(sections: Section[], budget: number, overlapChars: number): Draft[] {
  const drafts: Draft[] = []
  let body = ''
  let start = 0
  let end = 0
  let previousBody: string | null = null

  const flush = (): void => {
    const trimmed = body.trim()
    if (trimmed.length > 0) {
      drafts.push({ body: trimmed, startLine: start, endLine: end })
      previousBody = trimmed
    }
    body = ''
  }

  const open = (section: Section, text: string): void => {
    body = seedFrom(previousBody, overlapChars, budget - text.length) + text
    start = section.startLine
    end = section.endLine
  }

  for (const section of sections) {
    const text = sectionText(section)
    if (text.trim().length === 0) continue

    if (body.length > 0 && body.length + text.length <= budget) {
      body += text
      end = section.endLine
      continue
    }

    flush()

    if (text.length > budget) {
      const parts = splitLargeSection(section, budget, overlapChars)
      drafts.push(...parts)
      if (parts.length > 0) previousBody = parts[parts.length - 1].body
      continue
    }

    open(section, text)
  }

  flush()
  return drafts
}

/**
 * Chunk one note. Line numbers are 0-based positions in the original file.
 */
export function chunkNote(
  text: string,
  filePath: string,
  title?: string | null,
  options?: ChunkerOptions,
): NoteChunkData[] {
  if (!text || text.trim().length === 0) {
    return []
  }

  const targetChars = (options?.targetTokens ?? DEFAULT_TARGET_TOKENS) * CHARS_PER_TOKEN
  const overlapChars = (options?.overlapTokens ?? DEFAULT_OVERLAP_TOKENS) * CHARS_PER_TOKEN

  const lines = text.replace(/\r\n?/g, '\n').split('\n')
  const { data, bodyStartLine } = splitFrontmatter(lines)
  const prefix = buildNotePrefix(filePath, title, data)

  // Budget for the body once the prefix is in place
  const budget = Math.max(1, targetChars - prefix.length)

  const drafts = packSections(parseSections(lines, bodyStartLine), budget, overlapChars)

  return drafts.map((draft, chunkIndex) => {
    const chunkText = prefix + draft.body
    return {
      chunkIndex,
      text: chunkText,
      // Blank lines ahead of the first header belong to the first chunk
      startLine: chunkIndex === 0 ? Math.min(draft.startLine, bodyStartLine) : draft.startLine,
      endLine: draft.endLine,
      tokenEstimate: estimateTokens(chunkText.length),
    }
  })
}
