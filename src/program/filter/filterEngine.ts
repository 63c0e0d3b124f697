/**
 * Filter Engine
 *
 * Turns FilterCriteria into a WatermelonDB query over `pokemon`.
 * Dimensions narrow conjunctively, in this order:
 *   1. search text      - literal substring of the lowercase name
 *   2. types            - membership in pokemon_types ('any' or 'all')
 *   3. generations
 *   4. stat bounds      - one pass per stat name and bound
 *   5. height / weight  - converted to stored units at query time
 *   6. rarity flags     - legendary / mythical / baby
 *   7. abilities        - membership in pokemon_abilities, any-of
 *
 * Membership dimensions resolve to an id list and narrow with
 * Q.where('id', Q.oneOf(ids)); an empty list matches nothing.
 * Every call re-reads the store and holds no state between calls.
 */

import type { Database } from '@nozbe/watermelondb';
import { Q } from '@nozbe/watermelondb';
import { getCollections, type Collections } from '../../db/database';
import { hydratePokemon, sortByDexNumber } from '../../db/stores/pokemonStore';
import { InvalidCriteriaError, withDataAccess } from '../errors';
import { ALL_TYPES, typeIdFor } from '../reference/typeTable';
import { toStoredUnits } from '../reference/measurements';
import {
  FilterCriteriaSchema,
  type FilterCriteria,
  type FilterCriteriaInput,
  type FilterOptions,
  type StatRange,
} from '../schemas/filter';
import { STAT_NAMES, type Pokemon } from '../schemas/pokemon';
import { createLogger } from '../utils/logger';

const logger = createLogger('FilterEngine');

/**
 * Validate raw criteria. Unknown type names and malformed values throw
 * InvalidCriteriaError; unknown stat or ability names are accepted and
 * match nothing.
 */
export function parseCriteria(input: unknown = {}): FilterCriteria {
  const result = FilterCriteriaSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCriteriaError(result.error);
  }
  return result.data;
}

export class FilterEngine {
  private db: Database;
  private collections: Collections;

  constructor(db: Database) {
    this.db = db;
    this.collections = getCollections(db);
  }

  /**
   * Pokémon matching every constraint in `criteria`, ascending by dex number
   */
  async filterPokemon(criteria: FilterCriteriaInput = {}): Promise<Pokemon[]> {
    const parsed = parseCriteria(criteria);
    return withDataAccess('filterPokemon', async () => {
      const clauses = await this.buildClauses(parsed);
      const models = await this.collections.pokemon.query(...clauses).fetch();
      logger.debug(`filterPokemon matched ${models.length} Pokémon`, { clauses: clauses.length });
      return hydratePokemon(this.db, sortByDexNumber(models));
    });
  }

  /**
   * Same narrowing as filterPokemon, counted in the store without hydration
   */
  async countPokemon(criteria: FilterCriteriaInput = {}): Promise<number> {
    const parsed = parseCriteria(criteria);
    return withDataAccess('countPokemon', async () => {
      const clauses = await this.buildClauses(parsed);
      return this.collections.pokemon.query(...clauses).fetchCount();
    });
  }

  /**
   * Option values for a filter screen, taken from the whole store.
   *
   * `currentCriteria` does not restrict the result: ranges and lists always
   * describe the unfiltered catalogue.
   */
  async getAvailableFilterOptions(currentCriteria?: FilterCriteriaInput): Promise<FilterOptions> {
    if (currentCriteria !== undefined) {
      // Validated, never used to narrow
      parseCriteria(currentCriteria);
    }

    return withDataAccess('getAvailableFilterOptions', async () => {
      const pokemon = await this.collections.pokemon
        .query(Q.where('generation', Q.notEq(null)))
        .fetch();
      const generations = new Set<number>();
      for (const p of pokemon) {
        if (p.generation !== null) generations.add(p.generation);
      }

      const statRanges: Record<string, StatRange> = {};
      for (const stat of STAT_NAMES) {
        const rows = await this.collections.pokemonStats
          .query(Q.where('statName', stat))
          .fetch();
        if (rows.length === 0) continue;
        const values = rows.map((r) => r.baseStat);
        statRanges[stat] = { min: Math.min(...values), max: Math.max(...values) };
      }

      const abilities = await this.collections.abilities.query().fetch();

      return {
        availableTypes: [...ALL_TYPES],
        availableGenerations: [...generations].sort((a, b) => a - b),
        statRanges,
        availableAbilities: [...new Set(abilities.map((a) => a.name))].sort(),
      };
    });
  }

  // ==========================================================================
  // Narrowing
  // ==========================================================================

  private async buildClauses(criteria: FilterCriteria): Promise<Q.Clause[]> {
    const clauses: Q.Clause[] = [];

    // 1. Search text; names are stored lowercase and punctuation matches itself
    if (criteria.searchText !== '') {
      clauses.push(Q.where('name', Q.includes(criteria.searchText.toLowerCase())));
    }

    // 2. Types
    if (criteria.types.length > 0) {
      const typeIds = criteria.types.map(typeIdFor);
      if (criteria.typeLogic === 'all') {
        for (const typeId of typeIds) {
          clauses.push(idsIn(await this.pokemonIdsWithType([typeId])));
        }
      } else {
        clauses.push(idsIn(await this.pokemonIdsWithType(typeIds)));
      }
    }

    // 3. Generations
    if (criteria.generations.length > 0) {
      clauses.push(Q.where('generation', Q.oneOf(criteria.generations)));
    }

    // 4. Stat bounds
    for (const [statName, minValue] of Object.entries(criteria.minStats)) {
      clauses.push(idsIn(await this.pokemonIdsWithStat(statName, Q.gte(minValue))));
    }
    for (const [statName, maxValue] of Object.entries(criteria.maxStats)) {
      clauses.push(idsIn(await this.pokemonIdsWithStat(statName, Q.lte(maxValue))));
    }

    // 5. Height / weight
    if (criteria.minHeight !== undefined) {
      clauses.push(Q.where('height', Q.gte(toStoredUnits(criteria.minHeight))));
    }
    if (criteria.maxHeight !== undefined) {
      clauses.push(Q.where('height', Q.lte(toStoredUnits(criteria.maxHeight))));
    }
    if (criteria.minWeight !== undefined) {
      clauses.push(Q.where('weight', Q.gte(toStoredUnits(criteria.minWeight))));
    }
    if (criteria.maxWeight !== undefined) {
      clauses.push(Q.where('weight', Q.lte(toStoredUnits(criteria.maxWeight))));
    }

    // 6. Rarity flags
    if (criteria.isLegendary !== undefined) {
      clauses.push(Q.where('isLegendary', criteria.isLegendary));
    }
    if (criteria.isMythical !== undefined) {
      clauses.push(Q.where('isMythical', criteria.isMythical));
    }
    if (criteria.isBaby !== undefined) {
      clauses.push(Q.where('isBaby', criteria.isBaby));
    }

    // 7. Abilities (any-of); unknown names resolve to no ids
    if (criteria.abilities.length > 0) {
      const abilities = await this.collections.abilities
        .query(Q.where('name', Q.oneOf(criteria.abilities)))
        .fetch();
      if (abilities.length < criteria.abilities.length) {
        logger.debug('Some requested abilities are not in the catalogue', {
          requested: criteria.abilities,
          found: abilities.map((a) => a.name),
        });
      }
      const links = await this.collections.pokemonAbilities
        .query(Q.where('abilityId', Q.oneOf(abilities.map((a) => a.id))))
        .fetch();
      clauses.push(idsIn(links.map((l) => l.pokemonId)));
    }

    return clauses;
  }

  private async pokemonIdsWithType(typeIds: number[]): Promise<string[]> {
    const rows = await this.collections.pokemonTypes
      .query(Q.where('typeId', Q.oneOf(typeIds)))
      .fetch();
    return rows.map((r) => r.pokemonId);
  }

  private async pokemonIdsWithStat(statName: string, bound: Q.Comparison): Promise<string[]> {
    const rows = await this.collections.pokemonStats
      .query(Q.where('statName', statName), Q.where('baseStat', bound))
      .fetch();
    return rows.map((r) => r.pokemonId);
  }
}

function idsIn(pokemonIds: string[]): Q.Clause {
  return Q.where('id', Q.oneOf([...new Set(pokemonIds)]));
}
