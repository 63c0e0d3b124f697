/**
 * Pokédex Export Utility
 *
 * Reads every table back into a PokedexDump that importPokedex accepts.
 */

import type { Database } from '@nozbe/watermelondb'
import type { DumpAbility, DumpPokemon, PokedexDump } from '../../program/schemas/pokedexDump'
import { withDataAccess } from '../../program/errors'
import { createLogger } from '../../program/utils/logger'
import { getCollections } from '../database'
import { createPokemonStore } from '../stores/pokemonStore'

const logger = createLogger('Export')

export async function exportPokedex(db: Database): Promise<PokedexDump> {
  return withDataAccess('exportPokedex', async () => {
    const abilityModels = await getCollections(db).abilities.query().fetch()
    const abilities: DumpAbility[] = abilityModels
      .map((a) => ({
        id: Number(a.id),
        name: a.name,
        shortEffect: a.shortEffect ?? null,
        generation: a.generation ?? null,
        isMainSeries: a.isMainSeries,
      }))
      .sort((a, b) => a.id - b.id)

    const pokemon: DumpPokemon[] = (await createPokemonStore(db).getAll()).map((p) => ({
      id: p.id,
      name: p.name,
      height: p.height,
      weight: p.weight,
      baseExperience: p.baseExperience,
      order: p.order,
      isDefault: p.isDefault,
      generation: p.generation,
      isLegendary: p.isLegendary,
      isMythical: p.isMythical,
      isBaby: p.isBaby,
      types: p.types,
      stats: p.stats,
      abilities: p.abilities,
      sprites: p.sprites,
    }))

    logger.info(`Exported ${pokemon.length} Pokémon and ${abilities.length} abilities`)

    return {
      version: 1,
      exportedAt: Date.now(),
      abilities,
      pokemon,
    }
  })
}
