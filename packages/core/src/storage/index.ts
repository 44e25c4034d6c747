/**
 * Storage: SQLite database and migrations.
 */

export { openDatabase } from './database.js'
export { runMigrations, migrations } from './migrations.js'
