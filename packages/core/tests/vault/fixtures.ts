import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { tmpdir } from 'node:os'
import { Ok } from '../../src/common/index.js'
import type { Result } from '../../src/common/index.js'
import type { VaultError } from '../../src/common/index.js'
import type { EmbeddingClient, EmbedOptions, EmbedResult } from '../../src/vault/embedding-client.js'

/**
 * 3-d vector from keywords: [animal, reading, bias]. "dog"/"pet" count as
 * animal, "book"/"read" as reading.
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase()
  return [
    /\b(dog|pet)s?\b/.test(lower) ? 1 : 0,
    /\b(book|read)s?\b/.test(lower) ? 1 : 0,
    0.1,
  ]
}

export class KeywordEmbeddingClient implements EmbeddingClient {
  readonly modelName = 'keyword-stub'
  readonly dimensions = 3
  readonly calls: string[][] = []
  /** 1-based call numbers that throw. */
  failOnCalls = new Set<number>()
  onCall?: (callNumber: number) => void

  async embed(texts: string[], _options?: EmbedOptions): Promise<EmbedResult> {
    this.calls.push(texts)
    this.onCall?.(this.calls.length)
    if (this.failOnCalls.has(this.calls.length)) {
      throw new Error(`stub failure on call ${this.calls.length}`)
    }
    return { embeddings: texts.map(keywordVector) }
  }

  async embedOne(text: string, options?: EmbedOptions): Promise<number[]> {
    const { embeddings } = await this.embed([text], options)
    return embeddings[0]
  }

  checkConfiguration(): Result<void, VaultError> {
    return Ok(undefined)
  }

  get embeddedTextCount(): number {
    return this.calls.reduce((sum, batch) => sum + batch.length, 0)
  }
}

export interface TempVault {
  root: string
  write(relativePath: string, content: string): Promise<void>
  remove(relativePath: string): Promise<void>
  cleanup(): Promise<void>
}

export async function createTempVault(): Promise<TempVault> {
  const root = await mkdtemp(join(tmpdir(), 'vault-recall-'))
  return {
    root,
    async write(relativePath, content) {
      const absPath = join(root, relativePath)
      await mkdir(dirname(absPath), { recursive: true })
      await writeFile(absPath, content)
    },
    async remove(relativePath) {
      await rm(join(root, relativePath))
    },
    async cleanup() {
      await rm(root, { recursive: true, force: true })
    },
  }
}
