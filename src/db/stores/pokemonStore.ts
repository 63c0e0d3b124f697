/**
 * Pokemon Store - WatermelonDB Implementation
 *
 * Hydrates `pokemon` rows into full Pokemon objects by joining the type,
 * stat, ability and sprite tables. The filter and comparison services share
 * the hydrator so every query returns the same shape.
 */

import type { Database } from '@nozbe/watermelondb'
import { Q } from '@nozbe/watermelondb'
import type { IPokemonStore } from '../../program/interfaces/store'
import type { Pokemon, PokemonAbilitySlot, PokemonSprites, PokemonStat, TypeSlot } from '../../program/schemas/pokemon'
import { STAT_NAMES } from '../../program/schemas/pokemon'
import { typeNameFor } from '../../program/reference/typeTable'
import { createLogger } from '../../program/utils/logger'
import { getCollections } from '../database'
import type PokemonModel from '../models/Pokemon'
import type PokemonSpriteModel from '../models/PokemonSprite'

const logger = createLogger('Store')

const EMPTY_SPRITES: PokemonSprites = {
  frontDefault: null,
  frontShiny: null,
  backDefault: null,
  backShiny: null,
  officialArtworkDefault: null,
  officialArtworkShiny: null,
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const row of rows) {
    const k = key(row)
    const group = groups.get(k)
    if (group) {
      group.push(row)
    } else {
      groups.set(k, [row])
    }
  }
  return groups
}

function statOrder(name: string): number {
  const index = STAT_NAMES.findIndex((s) => s === name)
  return index === -1 ? STAT_NAMES.length : index
}

function compareStats(a: PokemonStat, b: PokemonStat): number {
  return statOrder(a.name) - statOrder(b.name) || a.name.localeCompare(b.name)
}

function spritesFrom(model: PokemonSpriteModel | undefined): PokemonSprites {
  if (!model) return EMPTY_SPRITES
  return {
    frontDefault: model.frontDefault ?? null,
    frontShiny: model.frontShiny ?? null,
    backDefault: model.backDefault ?? null,
    backShiny: model.backShiny ?? null,
    officialArtworkDefault: model.officialArtworkDefault ?? null,
    officialArtworkShiny: model.officialArtworkShiny ?? null,
  }
}

export function sortByDexNumber(models: PokemonModel[]): PokemonModel[] {
  return [...models].sort((a, b) => a.dexNumber - b.dexNumber)
}

/**
 * Join each model with its membership and display rows. Output order follows `models`.
 */
export async function hydratePokemon(db: Database, models: PokemonModel[]): Promise<Pokemon[]> {
  if (models.length === 0) return []

  const collections = getCollections(db)
  const ids = models.map((m) => m.id)

  const typeRows = await collections.pokemonTypes.query(Q.where('pokemonId', Q.oneOf(ids))).fetch()
  const statRows = await collections.pokemonStats.query(Q.where('pokemonId', Q.oneOf(ids))).fetch()
  const abilityLinks = await collections.pokemonAbilities.query(Q.where('pokemonId', Q.oneOf(ids))).fetch()
  const spriteRows = await collections.pokemonSprites.query(Q.where('pokemonId', Q.oneOf(ids))).fetch()

  const abilityIds = [...new Set(abilityLinks.map((link) => link.abilityId))]
  const abilities = abilityIds.length > 0
    ? await collections.abilities.query(Q.where('id', Q.oneOf(abilityIds))).fetch()
    : []
  const abilityNames = new Map(abilities.map((a) => [a.id, a.name]))

  const typesByPokemon = groupBy(typeRows, (r) => r.pokemonId)
  const statsByPokemon = groupBy(statRows, (r) => r.pokemonId)
  const abilitiesByPokemon = groupBy(abilityLinks, (r) => r.pokemonId)
  const spriteByPokemon = new Map(spriteRows.map((r) => [r.pokemonId, r]))

  return models.map((model) => {
    const types: TypeSlot[] = []
    for (const row of typesByPokemon.get(model.id) ?? []) {
      const type = typeNameFor(row.typeId)
      if (type === null) {
        logger.warn(`Skipping unknown type id ${row.typeId} on Pokémon ${model.id}`)
        continue
      }
      types.push({ slot: row.slot, type })
    }
    types.sort((a, b) => a.slot - b.slot)

    const stats: PokemonStat[] = (statsByPokemon.get(model.id) ?? [])
      .map((row) => ({ name: row.statName, baseStat: row.baseStat, effort: row.effort }))
      .sort(compareStats)

    const abilitySlots: PokemonAbilitySlot[] = []
    for (const link of abilitiesByPokemon.get(model.id) ?? []) {
      const name = abilityNames.get(link.abilityId)
      if (name === undefined) {
        logger.warn(`Skipping dangling ability ${link.abilityId} on Pokémon ${model.id}`)
        continue
      }
      abilitySlots.push({ name, slot: link.slot, isHidden: link.isHidden })
    }
    abilitySlots.sort((a, b) => a.slot - b.slot)

    return {
      id: model.dexNumber,
      name: model.name,
      height: model.height,
      weight: model.weight,
      baseExperience: model.baseExperience ?? null,
      order: model.orderIndex,
      isDefault: model.isDefault,
      generation: model.generation ?? null,
      isLegendary: model.isLegendary,
      isMythical: model.isMythical,
      isBaby: model.isBaby,
      types,
      stats,
      abilities: abilitySlots,
      sprites: spritesFrom(spriteByPokemon.get(model.id)),
    }
  })
}

export function createPokemonStore(db: Database): IPokemonStore {
  const collection = getCollections(db).pokemon

  return {
    async getById(id: number): Promise<Pokemon | null> {
      const models = await collection.query(Q.where('id', String(id))).fetch()
      const [pokemon] = await hydratePokemon(db, models)
      return pokemon ?? null
    },

    async getByIds(ids: number[]): Promise<Pokemon[]> {
      if (ids.length === 0) return []
      const models = await collection.query(Q.where('id', Q.oneOf(ids.map(String)))).fetch()
      const byId = new Map(models.map((m) => [m.dexNumber, m]))
      const ordered: PokemonModel[] = []
      for (const id of ids) {
        const model = byId.get(id)
        if (model) ordered.push(model)
      }
      return hydratePokemon(db, ordered)
    },

    async getAll(): Promise<Pokemon[]> {
      const models = await collection.query().fetch()
      return hydratePokemon(db, sortByDexNumber(models))
    },

    async count(): Promise<number> {
      return collection.query().fetchCount()
    },
  }
}
