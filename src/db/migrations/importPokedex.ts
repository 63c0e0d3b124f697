/**
 * Pokédex Import Utility
 *
 * Loads a PokedexDump (see program/schemas/pokedexDump) into WatermelonDB,
 * keeping dex numbers and ability ids as record ids.
 */

import type { Database, Model } from '@nozbe/watermelondb'
import { Q } from '@nozbe/watermelondb'
import { PokedexDumpSchema, type DumpAbility, type DumpPokemon } from '../../program/schemas/pokedexDump'
import { InvalidDumpError, PokedexError, withDataAccess } from '../../program/errors'
import { typeIdFor } from '../../program/reference/typeTable'
import { generationForDexNumber } from '../../program/reference/generations'
import { createLogger } from '../../program/utils/logger'
import { getCollections, type Collections } from '../database'

const logger = createLogger('Import')

// Pokémon per write; each brings its type, stat, ability and sprite rows along
const BATCH_SIZE = 500

export interface ImportSummary {
  pokemon: number
  abilities: number
  typeSlots: number
  stats: number
  abilityLinks: number
  sprites: number
}

/**
 * Import a dump. Throws InvalidDumpError when the input does not match the
 * dump schema, and PokedexError when a dex number is already stored or a
 * catalogue ability id is stored under another name. Nothing is written in
 * either case.
 */
export async function importPokedex(db: Database, input: unknown): Promise<ImportSummary> {
  const parsed = PokedexDumpSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidDumpError(parsed.error)
  }
  const dump = parsed.data

  return withDataAccess('importPokedex', async () => {
    const collections = getCollections(db)
    logger.info(`Importing ${dump.pokemon.length} Pokémon and ${dump.abilities.length} catalogued abilities`)

    const ids = dump.pokemon.map((p) => String(p.id))
    const existing = ids.length > 0
      ? await collections.pokemon.query(Q.where('id', Q.oneOf(ids))).fetch()
      : []
    if (existing.length > 0) {
      const taken = existing.map((m) => m.id).sort((a, b) => Number(a) - Number(b))
      throw new PokedexError(`Pokémon already in the store: ${taken.join(', ')}`)
    }

    const summary: ImportSummary = {
      pokemon: 0,
      abilities: 0,
      typeSlots: 0,
      stats: 0,
      abilityLinks: 0,
      sprites: 0,
    }

    const abilityIds = await importAbilities(db, collections, dump.abilities, dump.pokemon, summary)

    for (let i = 0; i < dump.pokemon.length; i += BATCH_SIZE) {
      const batch = dump.pokemon.slice(i, i + BATCH_SIZE)
      const records: Model[] = []
      for (const entry of batch) {
        records.push(...preparePokemon(collections, entry, abilityIds, summary))
      }

      await db.write(async () => {
        await db.batch(records)
      })

      const imported = Math.min(i + BATCH_SIZE, dump.pokemon.length)
      logger.info(`Imported ${imported} / ${dump.pokemon.length} Pokémon`)
    }

    logger.info('Import complete', summary)
    return summary
  })
}

/**
 * Create catalogue abilities plus any ability only referenced by a Pokémon.
 * Names already stored are reused. Returns name -> record id.
 */
async function importAbilities(
  db: Database,
  collections: Collections,
  catalogue: DumpAbility[],
  pokemon: DumpPokemon[],
  summary: ImportSummary
): Promise<Map<string, string>> {
  const stored = await collections.abilities.query().fetch()
  const idsByName = new Map(stored.map((a) => [a.name, a.id]))
  const namesById = new Map(stored.map((a) => [a.id, a.name]))
  const usedIds = new Set(stored.map((a) => Number(a.id)))

  const clashes = catalogue.filter((ability) => {
    if (ability.id === undefined) return false
    const storedName = namesById.get(String(ability.id))
    return storedName !== undefined && storedName !== ability.name
  })
  if (clashes.length > 0) {
    const detail = clashes.map((a) => `${a.id} (${a.name} vs ${namesById.get(String(a.id))})`)
    throw new PokedexError(`Ability ids already in the store under another name: ${detail.join(', ')}`)
  }

  const pending: DumpAbility[] = []
  for (const ability of catalogue) {
    if (idsByName.has(ability.name) || pending.some((p) => p.name === ability.name)) continue
    pending.push(ability)
    if (ability.id !== undefined) usedIds.add(ability.id)
  }
  for (const entry of pokemon) {
    for (const ref of entry.abilities) {
      if (idsByName.has(ref.name) || pending.some((p) => p.name === ref.name)) continue
      pending.push({ name: ref.name, shortEffect: null, generation: null, isMainSeries: true })
    }
  }

  let nextId = usedIds.size > 0 ? Math.max(...usedIds) + 1 : 1
  const records = pending.map((ability) => {
    const id = String(ability.id ?? nextId++)
    idsByName.set(ability.name, id)
    return collections.abilities.prepareCreate((a) => {
      a._raw.id = id
      a.name = ability.name
      a.shortEffect = ability.shortEffect
      a.generation = ability.generation
      a.isMainSeries = ability.isMainSeries
    })
  })

  if (records.length > 0) {
    await db.write(async () => {
      await db.batch(records)
    })
  }
  summary.abilities = records.length
  return idsByName
}

function preparePokemon(
  collections: Collections,
  entry: DumpPokemon,
  abilityIds: Map<string, string>,
  summary: ImportSummary
): Model[] {
  const pokemonId = String(entry.id)
  const records: Model[] = []

  records.push(collections.pokemon.prepareCreate((p) => {
    p._raw.id = pokemonId
    p.name = entry.name
    p.height = entry.height
    p.weight = entry.weight
    p.baseExperience = entry.baseExperience
    p.orderIndex = entry.order ?? entry.id
    p.isDefault = entry.isDefault
    p.generation = entry.generation !== undefined ? entry.generation : generationForDexNumber(entry.id)
    p.isLegendary = entry.isLegendary
    p.isMythical = entry.isMythical
    p.isBaby = entry.isBaby
  }))
  summary.pokemon += 1

  for (const slot of entry.types) {
    records.push(collections.pokemonTypes.prepareCreate((t) => {
      t.pokemonId = pokemonId
      t.typeId = typeIdFor(slot.type)
      t.slot = slot.slot
    }))
    summary.typeSlots += 1
  }

  for (const stat of entry.stats) {
    records.push(collections.pokemonStats.prepareCreate((s) => {
      s.pokemonId = pokemonId
      s.statName = stat.name
      s.baseStat = stat.baseStat
      s.effort = stat.effort
    }))
    summary.stats += 1
  }

  for (const ref of entry.abilities) {
    const abilityId = abilityIds.get(ref.name)
    if (abilityId === undefined) {
      // importAbilities registers every referenced name
      throw new PokedexError(`Ability "${ref.name}" was not registered before linking`)
    }
    records.push(collections.pokemonAbilities.prepareCreate((l) => {
      l.pokemonId = pokemonId
      l.abilityId = abilityId
      l.slot = ref.slot
      l.isHidden = ref.isHidden
    }))
    summary.abilityLinks += 1
  }

  const sprites = entry.sprites
  if (Object.values(sprites).some((url) => url !== null)) {
    records.push(collections.pokemonSprites.prepareCreate((s) => {
      s.pokemonId = pokemonId
      s.frontDefault = sprites.frontDefault
      s.frontShiny = sprites.frontShiny
      s.backDefault = sprites.backDefault
      s.backShiny = sprites.backShiny
      s.officialArtworkDefault = sprites.officialArtworkDefault
      s.officialArtworkShiny = sprites.officialArtworkShiny
    }))
    summary.sprites += 1
  }

  return records
}
