/**
 * Zod schemas for vault indexing, embedding and search configuration.
 */

import { z } from 'zod'

export const DEFAULT_EXCLUDE_PATTERNS = ['**/templates/**', '**/.obsidian/**']

export const VaultSettingsSchema = z.object({
  path: z.string().min(1, 'Vault path cannot be empty'),
  /** Display name used in citation links. Defaults to the vault directory name. */
  name: z.string().min(1).optional(),
  include: z.string().min(1).default('**/*.md'),
  exclude: z.array(z.string().min(1)).default(DEFAULT_EXCLUDE_PATTERNS),
})

export type VaultSettings = z.infer<typeof VaultSettingsSchema>

export const IndexerSettingsSchema = z.object({
  chunkTargetTokens: z.number().int().positive().default(500),
  chunkOverlapTokens: z.number().int().nonnegative().default(50),
  embeddingBatchSize: z.number().int().positive().max(2048).default(100),
})

export type IndexerSettings = z.infer<typeof IndexerSettingsSchema>

export const EmbeddingSettingsSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().default('text-embedding-3-small'),
  baseUrl: z.string().url().optional(),
  dimensions: z.number().int().positive().default(1536),
  requestTimeoutMs: z.number().int().positive().default(60_000),
})

export type EmbeddingSettings = z.infer<typeof EmbeddingSettingsSchema>

export const SearchSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  minScore: z.number().min(0).max(1).default(0.3),
  topK: z.number().int().positive().default(5),
  maxCitations: z.number().int().positive().default(5),
  filterByDateRange: z.boolean().default(false),
})

export type SearchSettings = z.infer<typeof SearchSettingsSchema>

export const VaultRecallConfigSchema = z.object({
  vault: VaultSettingsSchema,
  indexer: IndexerSettingsSchema.default({}),
  embedding: EmbeddingSettingsSchema.default({}),
  search: SearchSettingsSchema.default({}),
  databasePath: z.string().min(1).default('vault-recall.db'),
})

export type VaultRecallConfig = z.infer<typeof VaultRecallConfigSchema>
export type VaultRecallConfigInput = z.input<typeof VaultRecallConfigSchema>
