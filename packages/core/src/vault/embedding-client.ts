/**
 * Embedding client: contract for vector embedding providers plus the OpenAI implementation.
 *
 * The OpenAI client batches inputs, restores provider order from the declared
 * `index` field, retries transient failures with capped exponential backoff and
 * L2-normalizes every vector.
 */

import OpenAI from 'openai'
import { setTimeout as delay } from 'node:timers/promises'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { VaultError, errorMessage } from '../common/index.js'
import { l2Normalize } from './vector-math.js'

export interface EmbedOptions {
  signal?: AbortSignal
}

export interface EmbedResult {
  /** One vector per input, in input order, each already L2-normalized. */
  embeddings: number[][]
}

export interface EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  embed(texts: string[], options?: EmbedOptions): Promise<EmbedResult>
  embedOne(text: string, options?: EmbedOptions): Promise<number[]>
  /** Err when the client cannot make requests at all (missing key or model). */
  checkConfiguration(): Result<void, VaultError>
}

export interface EmbeddingsRequest {
  model: string
  input: string[]
  dimensions?: number
}

export interface EmbeddingsResponse {
  data: Array<{ index: number; embedding: number[] }>
}

/** One provider round-trip. The default goes through the OpenAI SDK. */
export type EmbeddingsTransport = (
  request: EmbeddingsRequest,
  options: { signal?: AbortSignal; timeoutMs: number },
) => Promise<EmbeddingsResponse>

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
}

export const MAX_INPUTS_PER_REQUEST = 2048

export interface OpenAIEmbeddingClientOptions {
  apiKey?: string
  model?: string
  dimensions?: number
  baseUrl?: string
  requestTimeoutMs?: number
  retry?: Partial<RetryPolicy>
  transport?: EmbeddingsTransport
}

/** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs)
}

function errorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return undefined
}

/** Rate limits, server errors and connection failures (timeouts included) are worth retrying. */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) return true
  const status = errorStatus(err)
  return status !== undefined && (status === 429 || status >= 500)
}

function sdkTransport(client: OpenAI): EmbeddingsTransport {
  return async (request, options) => {
    const response = await client.embeddings.create(
      request.dimensions !== undefined
        ? { model: request.model, input: request.input, dimensions: request.dimensions }
        : { model: request.model, input: request.input },
      { signal: options.signal, timeout: options.timeoutMs },
    )
    return { data: response.data.map((item) => ({ index: item.index, embedding: item.embedding })) }
  }
}

/**
 * Restore input order from the provider-declared indices. Every index in
 * 0..expected-1 must appear exactly once.
 */
export function orderByIndex(response: EmbeddingsResponse, expected: number): number[][] {
  if (response.data.length !== expected) {
    throw VaultError.protocol(`Embedding response has ${response.data.length} vectors for ${expected} inputs`)
  }

  const ordered = Array.from({ length: expected }, (): number[] | undefined => undefined)
  for (const item of response.data) {
    if (!Number.isInteger(item.index) || item.index < 0 || item.index >= expected) {
      throw VaultError.protocol(`Embedding response index out of range: ${item.index}`)
    }
    if (ordered[item.index] !== undefined) {
      throw VaultError.protocol(`Duplicate embedding response index: ${item.index}`)
    }
    ordered[item.index] = item.embedding
  }

  return ordered.map((vec, i) => {
    if (vec === undefined) throw VaultError.protocol(`Missing embedding response index: ${i}`)
    return vec
  })
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  private readonly apiKey: string | undefined
  private readonly baseUrl: string | undefined
  private readonly requestTimeoutMs: number
  private readonly retry: RetryPolicy
  private transport: EmbeddingsTransport | null

  constructor(options: OpenAIEmbeddingClientOptions = {}) {
    this.modelName = options.model ?? 'text-embedding-3-small'
    this.dimensions = options.dimensions ?? 1536
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry }
    this.transport = options.transport ?? null
  }

  checkConfiguration(): Result<void, VaultError> {
    if (!this.apiKey || this.apiKey.trim().length === 0) {
      return Err(VaultError.config('OpenAI API key is not configured'))
    }
    if (this.modelName.trim().length === 0) {
      return Err(VaultError.config('Embedding model is not configured'))
    }
    return Ok(undefined)
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<EmbedResult> {
    const config = this.checkConfiguration()
    if (!config.ok) throw config.error

    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    // Process in batches respecting API limit
    for (let i = 0; i < texts.length; i += MAX_INPUTS_PER_REQUEST) {
      const batch = texts.slice(i, i + MAX_INPUTS_PER_REQUEST)
      const response = await this.requestWithRetry(batch, options.signal)

      for (const vec of orderByIndex(response, batch.length)) {
        if (vec.length !== this.dimensions) {
          throw VaultError.protocol(`Expected ${this.dimensions}-dimensional embeddings, got ${vec.length}`)
        }
        allEmbeddings.push(l2Normalize(vec))
      }
    }

    return { embeddings: allEmbeddings }
  }

  async embedOne(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const { embeddings } = await this.embed([text], options)
    return embeddings[0]
  }

  private getTransport(): EmbeddingsTransport {
    if (!this.transport) {
      this.transport = sdkTransport(new OpenAI({
        apiKey: this.apiKey,
        baseURL: this.baseUrl,
        // Retries are handled here so delays stay abortable and bounded.
        maxRetries: 0,
      }))
    }
    return this.transport
  }

  private async requestWithRetry(input: string[], signal?: AbortSignal): Promise<EmbeddingsResponse> {
    const transport = this.getTransport()
    const request: EmbeddingsRequest = { model: this.modelName, input }
    if (this.modelName.startsWith('text-embedding-3')) {
      request.dimensions = this.dimensions
    }

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw VaultError.cancelled()

      try {
        return await transport(request, { signal, timeoutMs: this.requestTimeoutMs })
      } catch (err) {
        if (signal?.aborted) throw VaultError.cancelled()
        if (err instanceof VaultError) throw err

        if (!isRetryableError(err) || attempt >= this.retry.maxAttempts) {
          throw VaultError.provider(`Embedding request failed after ${attempt} attempt(s): ${errorMessage(err)}`, err)
        }

        const waitMs = backoffDelayMs(attempt, this.retry)
        console.warn(`[embedding] attempt ${attempt} failed (${errorMessage(err)}), retrying in ${waitMs}ms`)
        try {
          await delay(waitMs, undefined, { signal })
        } catch (delayErr) {
          throw new VaultError('CANCELLED', 'Operation cancelled', { cause: delayErr })
        }
      }
    }
  }
}
