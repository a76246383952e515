/**
 * Citation block for search results, linking each note back into the vault app.
 */

import type { SearchResult } from './schemas.js'
import { fileStem, noteDateFromPath } from './frontmatter.js'

export const DEFAULT_MAX_CITATIONS = 5

/** `obsidian://open` link for a vault-relative note path. */
export function buildVaultUri(vaultName: string, filePath: string): string {
  return `obsidian://open?vault=${encodeURIComponent(vaultName)}&file=${encodeURIComponent(filePath)}`
}

/** Date in the file name (daily notes), else the stored title, else the bare stem. */
export function citationName(result: Pick<SearchResult, 'filePath' | 'title'>): string {
  const date = noteDateFromPath(result.filePath)
  if (date) return date
  const title = result.title?.trim()
  return title ? title : fileStem(result.filePath)
}

export function formatCitations(
  results: SearchResult[],
  vaultName: string,
  maxCitations: number = DEFAULT_MAX_CITATIONS,
): string {
  if (results.length === 0 || vaultName.trim() === '') return ''

  const shown = results.slice(0, Math.max(0, maxCitations))
  const lines = ['Sources:']
  for (const result of shown) {
    lines.push(`- [${citationName(result)}](${buildVaultUri(vaultName, result.filePath)})`)
  }
  const hidden = results.length - shown.length
  if (hidden > 0) lines.push(`+${hidden} more`)

  return lines.join('\n')
}
