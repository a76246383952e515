/**
 * Vault scanner: finds note files under the vault root and reads/hashes them.
 */

import { readFile, stat } from 'node:fs/promises'
import { createHash } from 'node:crypto'
import { isAbsolute, join, relative, sep } from 'node:path'
import { glob } from 'glob'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { VaultError, errorMessage } from '../common/index.js'

export interface ScanOptions {
  include: string
  exclude: string[]
}

export interface NoteFile {
  relativePath: string
  content: string
  contentHash: string
  /** ISO timestamp of the file's mtime. */
  modifiedAt: string
}

export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex')
}

/** Vault-relative, `/`-separated form of a path given absolute or relative to the root. */
export function toVaultPath(root: string, filePath: string): string {
  const rel = isAbsolute(filePath) ? relative(root, filePath) : filePath
  return rel.split(sep).join('/').replace(/^\.\//, '')
}

export async function ensureVaultRoot(root: string): Promise<Result<void, VaultError>> {
  try {
    const rootStat = await stat(root)
    if (!rootStat.isDirectory()) {
      return Err(VaultError.config(`Vault path is not a directory: ${root}`))
    }
    return Ok(undefined)
  } catch {
    return Err(VaultError.config(`Vault path not found: ${root}`))
  }
}

/** Relative paths of every note matching `include` and none of `exclude`, sorted. */
export async function scanVault(root: string, options: ScanOptions): Promise<Result<string[], VaultError>> {
  const rootCheck = await ensureVaultRoot(root)
  if (!rootCheck.ok) return rootCheck

  try {
    const paths = await glob(options.include, {
      cwd: root,
      nodir: true,
      ignore: options.exclude,
      posix: true,
    })
    return Ok(paths.map((p) => p.replace(/^\.\//, '')).sort())
  } catch (err) {
    return Err(VaultError.io(`Failed to scan vault: ${errorMessage(err)}`, err))
  }
}

export async function readNoteFile(root: string, relativePath: string): Promise<NoteFile> {
  const absPath = join(root, relativePath)
  try {
    const content = await readFile(absPath, 'utf-8')
    const fileStat = await stat(absPath)
    return {
      relativePath,
      content,
      contentHash: hashContent(content),
      modifiedAt: fileStat.mtime.toISOString(),
    }
  } catch (err) {
    throw VaultError.io(`Failed to read ${relativePath}: ${errorMessage(err)}`, err)
  }
}
