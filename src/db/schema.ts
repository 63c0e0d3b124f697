/**
 * WatermelonDB Schema v1
 *
 * Layout:
 * - Entities: pokemon (id = dex number), abilities (id = ability id)
 * - Membership: pokemon_types, pokemon_stats, pokemon_abilities
 * - Display: pokemon_sprites
 *
 * Heights are stored in decimetres and weights in hectograms.
 */

import { appSchema, tableSchema } from '@nozbe/watermelondb'

export const schema = appSchema({
  version: 1,
  tables: [
    // ========================================================================
    // ENTITIES
    // ========================================================================

    tableSchema({
      name: 'pokemon',
      columns: [
        { name: 'name', type: 'string', isIndexed: true },
        { name: 'height', type: 'number' },
        { name: 'weight', type: 'number' },
        { name: 'baseExperience', type: 'number', isOptional: true },
        { name: 'orderIndex', type: 'number' },
        { name: 'isDefault', type: 'boolean' },
        { name: 'generation', type: 'number', isOptional: true, isIndexed: true },
        { name: 'isLegendary', type: 'boolean' },
        { name: 'isMythical', type: 'boolean' },
        { name: 'isBaby', type: 'boolean' },
      ]
    }),

    tableSchema({
      name: 'abilities',
      columns: [
        { name: 'name', type: 'string', isIndexed: true },
        { name: 'shortEffect', type: 'string', isOptional: true },
        { name: 'generation', type: 'number', isOptional: true },
        { name: 'isMainSeries', type: 'boolean' },
      ]
    }),

    // ========================================================================
    // MEMBERSHIP
    // ========================================================================

    // Type slots - typeId follows the fixed type table (normal = 1 ... fairy = 18)
    tableSchema({
      name: 'pokemon_types',
      columns: [
        { name: 'pokemonId', type: 'string', isIndexed: true },
        { name: 'typeId', type: 'number', isIndexed: true },
        { name: 'slot', type: 'number' },  // 1 | 2
      ]
    }),

    tableSchema({
      name: 'pokemon_stats',
      columns: [
        { name: 'pokemonId', type: 'string', isIndexed: true },
        { name: 'statName', type: 'string', isIndexed: true },
        { name: 'baseStat', type: 'number' },
        { name: 'effort', type: 'number' },
      ]
    }),

    tableSchema({
      name: 'pokemon_abilities',
      columns: [
        { name: 'pokemonId', type: 'string', isIndexed: true },
        { name: 'abilityId', type: 'string', isIndexed: true },
        { name: 'slot', type: 'number' },
        { name: 'isHidden', type: 'boolean' },
      ]
    }),

    // ========================================================================
    // DISPLAY
    // ========================================================================

    tableSchema({
      name: 'pokemon_sprites',
      columns: [
        { name: 'pokemonId', type: 'string', isIndexed: true },
        { name: 'frontDefault', type: 'string', isOptional: true },
        { name: 'frontShiny', type: 'string', isOptional: true },
        { name: 'backDefault', type: 'string', isOptional: true },
        { name: 'backShiny', type: 'string', isOptional: true },
        { name: 'officialArtworkDefault', type: 'string', isOptional: true },
        { name: 'officialArtworkShiny', type: 'string', isOptional: true },
      ]
    }),
  ]
})
