/**
 * Pokédex Filter Engine
 *
 * Public entry point: database setup, import/export, filtering and comparison.
 */

export {
  createDatabase,
  getCollections,
  TABLES,
  createPokemonStore,
  importPokedex,
  exportPokedex,
  type Collections,
  type CreateDatabaseOptions,
  type ImportSummary,
} from './db';

export * from './program';

export { settingsHelpers, loadSettings, type AppSettings, type LogLevel } from './stores';
