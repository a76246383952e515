import { basename } from 'node:path'
import { VaultError } from '../common/index.js'
import { VaultRecallConfigSchema } from './schemas.js'
import type { VaultRecallConfig, VaultRecallConfigInput } from './schemas.js'

/** Validate a config object, filling defaults. Throws VALIDATION_ERROR listing every bad field. */
export function parseConfig(input: VaultRecallConfigInput): VaultRecallConfig {
  const parsed = VaultRecallConfigSchema.safeParse(input)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw VaultError.validation(`Invalid configuration: ${details}`)
  }
  return parsed.data
}

/** Vault display name: explicit name, else the vault directory's own name. */
export function vaultDisplayName(config: VaultRecallConfig): string {
  return config.vault.name ?? basename(config.vault.path.replace(/[\\/]+$/, ''))
}

function numberFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw VaultError.validation(`${key} must be a number, got "${raw}"`)
  }
  return value
}

function booleanFromEnv(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return undefined
  if (raw === 'true' || raw === '1' || raw === 'yes') return true
  if (raw === 'false' || raw === '0' || raw === 'no') return false
  throw VaultError.validation(`${key} must be true or false, got "${env[key]}"`)
}

function listFromEnv(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const raw = env[key]
  if (raw === undefined) return undefined
  return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): VaultRecallConfig {
  const vaultPath = env['VAULT_PATH']
  if (!vaultPath) {
    throw VaultError.config('VAULT_PATH is required')
  }

  return parseConfig({
    vault: {
      path: vaultPath,
      name: env['VAULT_NAME'] || undefined,
      exclude: listFromEnv(env, 'VAULT_EXCLUDE'),
    },
    indexer: {
      chunkTargetTokens: numberFromEnv(env, 'CHUNK_TARGET_TOKENS'),
      chunkOverlapTokens: numberFromEnv(env, 'CHUNK_OVERLAP_TOKENS'),
      embeddingBatchSize: numberFromEnv(env, 'EMBEDDING_BATCH_SIZE'),
    },
    embedding: {
      apiKey: env['OPENAI_API_KEY'] || undefined,
      model: env['EMBEDDING_MODEL'] || undefined,
      dimensions: numberFromEnv(env, 'EMBEDDING_DIMENSIONS'),
      requestTimeoutMs: numberFromEnv(env, 'EMBEDDING_REQUEST_TIMEOUT_MS'),
      baseUrl: env['OPENAI_BASE_URL'] || undefined,
    },
    search: {
      enabled: booleanFromEnv(env, 'VAULT_SEARCH_ENABLED'),
      minScore: numberFromEnv(env, 'VAULT_SEARCH_MIN_SCORE'),
      topK: numberFromEnv(env, 'VAULT_SEARCH_TOP_K'),
      maxCitations: numberFromEnv(env, 'VAULT_MAX_CITATIONS'),
      filterByDateRange: booleanFromEnv(env, 'VAULT_SEARCH_FILTER_BY_DATE'),
    },
    databasePath: env['VAULT_DB_PATH'] || undefined,
  })
}
