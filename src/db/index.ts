/**
 * Database Module Export
 */

export { createDatabase, getCollections, TABLES, type Collections, type CreateDatabaseOptions } from './database'
export { schema } from './schema'
export { migrations } from './migrations'

// Models
export * from './models'

// Stores
export * from './stores'

// Import / export
export { importPokedex, type ImportSummary } from './migrations/importPokedex'
export { exportPokedex } from './migrations/exportPokedex'
