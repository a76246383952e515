/**
 * YAML frontmatter extraction. Frontmatter keys are arbitrary, so the block is
 * kept as a string-keyed map and only date, tags and title are read from it.
 */

import { parse as parseYaml } from 'yaml'
import { basename, extname } from 'node:path'
import { VaultError, errorMessage } from '../common/index.js'

export type Frontmatter = Record<string, unknown>

export interface FrontmatterSplit {
  /** Null when the note has no (closed) frontmatter block. */
  data: Frontmatter | null
  /** Index of the first body line. */
  bodyStartLine: number
}

const ISO_DATE_PREFIX_RE = /^(\d{4}-\d{2}-\d{2})/
const H1_RE = /^#\s+(.+)$/

function isRecord(value: unknown): value is Frontmatter {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Split a leading `---` block off the note. A block that is never closed is not
 * frontmatter; the whole file is body.
 */
export function splitFrontmatter(lines: string[]): FrontmatterSplit {
  if (lines.length === 0 || lines[0].trim() !== '---') {
    return { data: null, bodyStartLine: 0 }
  }

  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === '---') {
      const yamlText = lines.slice(1, i).join('\n')
      let parsed: unknown
      try {
        parsed = parseYaml(yamlText)
      } catch (err) {
        throw VaultError.parse(`Malformed frontmatter: ${errorMessage(err)}`, err)
      }
      return { data: isRecord(parsed) ? parsed : {}, bodyStartLine: i + 1 }
    }
  }

  return { data: null, bodyStartLine: 0 }
}

export function frontmatterDate(data: Frontmatter | null): string | null {
  const value = data?.['date']
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString().slice(0, 10)
  }
  if (typeof value === 'string') {
    const match = ISO_DATE_PREFIX_RE.exec(value.trim())
    return match ? match[1] : null
  }
  return null
}

export function frontmatterTags(data: Frontmatter | null): string[] {
  const value = data?.['tags']
  const raw = Array.isArray(value)
    ? value.filter((t): t is string | number => typeof t === 'string' || typeof t === 'number').map(String)
    : typeof value === 'string'
      ? value.split(/[,\s]+/)
      : []
  return raw.map((t) => t.trim().replace(/^#/, '')).filter((t) => t.length > 0)
}

export function frontmatterTitle(data: Frontmatter | null): string | null {
  const value = data?.['title']
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

/** File name without directory or extension. */
export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath))
}

const FILE_DATE_RE = /\d{4}-\d{2}-\d{2}/

/** ISO date a daily note is named after, if any. */
export function noteDateFromPath(filePath: string): string | null {
  const match = FILE_DATE_RE.exec(fileStem(filePath))
  return match ? match[0] : null
}

/**
 * Note title: frontmatter `title`, else the first H1 in the body, else the file stem.
 */
export function extractTitle(content: string, filePath: string): string {
  const lines = content.replace(/\r\n?/g, '\n').split('\n')
  const { data, bodyStartLine } = splitFrontmatter(lines)

  const fromFrontmatter = frontmatterTitle(data)
  if (fromFrontmatter) return fromFrontmatter

  for (let i = bodyStartLine; i < lines.length; i++) {
    const match = H1_RE.exec(lines[i])
    if (match) return match[1].trim()
  }

  return fileStem(filePath)
}
