/**
 * @vault-recall/core
 *
 * Indexes a folder of Markdown notes into SQLite and answers natural-language
 * questions about it, with date-aware queries and citation links.
 */

export * from './vault/index.js'
export * from './config/index.js'
export * from './storage/index.js'
export * from './common/index.js'
