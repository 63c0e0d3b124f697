/**
 * WatermelonDB Schema Migrations
 *
 * v1 is the initial schema; nothing to migrate yet.
 *
 * When adding columns or tables:
 * 1. Bump the version in src/db/schema.ts
 * 2. Add a step here with toVersion matching the new schema version
 * 3. Update the Model class in src/db/models/ and the dump format if the
 *    data should survive export/import
 *
 * Never edit or remove a step once released.
 */

import { schemaMigrations } from '@nozbe/watermelondb/Schema/migrations'

export const migrations = schemaMigrations({
  migrations: [],
})
