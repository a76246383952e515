/**
 * Storage: SQLite database, migrations.
 */

export { openDatabase } from './database.js'
export type { VaultDatabase } from './database.js'
export { runMigrations, migrations } from './migrations.js'
