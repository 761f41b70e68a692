/**
 * Storage: SQLite database handles and schema migrations.
 */

export { openDatabase, IN_MEMORY } from './database.js'
export { runMigrations, LATEST_SCHEMA_VERSION } from './migrations.js'
