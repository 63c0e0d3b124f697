/**
 * WatermelonDB Database Initialization
 *
 * Under Node there is no IndexedDB, so LokiJS keeps the data in memory
 * whatever the IndexedDB options say.
 * Each call builds an independent database; tests rely on that.
 */

import { Database } from '@nozbe/watermelondb'
import LokiJSAdapter from '@nozbe/watermelondb/adapters/lokijs'
import { schema } from './schema'
import { migrations } from './migrations'
import * as models from './models'
import { settingsHelpers } from '../stores/settingsStore'
import { createLogger } from '../program/utils/logger'

const logger = createLogger('Database')

export const TABLES = {
  pokemon: 'pokemon',
  abilities: 'abilities',
  pokemonTypes: 'pokemon_types',
  pokemonStats: 'pokemon_stats',
  pokemonAbilities: 'pokemon_abilities',
  pokemonSprites: 'pokemon_sprites',
} as const

export interface CreateDatabaseOptions {
  /** LokiJS database name; defaults to settings.database.name */
  dbName?: string
}

export function createDatabase(options: CreateDatabaseOptions = {}): Database {
  const dbName = options.dbName ?? settingsHelpers.getSettings().database.name

  const adapter = new LokiJSAdapter({
    schema,
    migrations,
    useWebWorker: false,
    useIncrementalIndexedDB: true,
    dbName,
    onSetUpError: (error) => {
      logger.error(`Failed to set up database "${dbName}"`, error)
    },
  })

  logger.debug(`Opened database "${dbName}"`)

  return new Database({
    adapter,
    modelClasses: Object.values(models),
  })
}

// Typed collection accessors
export function getCollections(db: Database) {
  return {
    pokemon: db.get<models.Pokemon>(TABLES.pokemon),
    abilities: db.get<models.Ability>(TABLES.abilities),
    pokemonTypes: db.get<models.PokemonTypeSlot>(TABLES.pokemonTypes),
    pokemonStats: db.get<models.PokemonStat>(TABLES.pokemonStats),
    pokemonAbilities: db.get<models.PokemonAbility>(TABLES.pokemonAbilities),
    pokemonSprites: db.get<models.PokemonSprite>(TABLES.pokemonSprites),
  }
}

export type Collections = ReturnType<typeof getCollections>
