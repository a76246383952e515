/**
 * Configuration: schemas, defaults and environment loading.
 */

export {
  VaultRecallConfigSchema,
  VaultSettingsSchema,
  IndexerSettingsSchema,
  EmbeddingSettingsSchema,
  SearchSettingsSchema,
  DEFAULT_EXCLUDE_PATTERNS,
} from './schemas.js'
export type {
  VaultRecallConfig,
  VaultRecallConfigInput,
  VaultSettings,
  IndexerSettings,
  EmbeddingSettings,
  SearchSettings,
} from './schemas.js'
export { parseConfig, loadConfigFromEnv, vaultDisplayName } from './load.js'
