/**
 * Comparison Service
 *
 * Side-by-side comparison of a small set of Pokémon, plus the stat
 * rankings and similarity lookups that feed it.
 */

import type { Database } from '@nozbe/watermelondb';
import { Q } from '@nozbe/watermelondb';
import { getCollections, type Collections } from '../../db/database';
import { createPokemonStore } from '../../db/stores/pokemonStore';
import type { IPokemonStore } from '../interfaces/store';
import { ComparisonError, withDataAccess } from '../errors';
import type {
  ComparisonData,
  PokemonSimilarity,
  PokemonStatRanking,
} from '../schemas/comparison';
import { STAT_NAMES, type Pokemon } from '../schemas/pokemon';
import { createLogger } from '../utils/logger';

const logger = createLogger('Comparison');

export const MIN_COMPARISON_SIZE = 2;
export const MAX_COMPARISON_SIZE = 6;

// Six stats, each at most 255
const MAX_TOTAL_STAT_DIFFERENCE = 1530;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Competition ranking: equal values share a rank and the next rank skips.
 * `entries` must already be sorted best first.
 */
function assignRanks<T>(entries: T[], value: (entry: T) => number): number[] {
  const ranks: number[] = [];
  entries.forEach((entry, index) => {
    const previous = entries[index - 1];
    if (previous !== undefined && value(previous) === value(entry)) {
      ranks.push(ranks[index - 1] ?? index + 1);
    } else {
      ranks.push(index + 1);
    }
  });
  return ranks;
}

export class ComparisonService {
  private collections: Collections;
  private store: IPokemonStore;

  constructor(db: Database) {
    this.collections = getCollections(db);
    this.store = createPokemonStore(db);
  }

  /**
   * Fetch 2-6 Pokémon in the order requested.
   */
  async getPokemonForComparison(ids: number[]): Promise<Pokemon[]> {
    if (ids.length < MIN_COMPARISON_SIZE || ids.length > MAX_COMPARISON_SIZE) {
      throw new ComparisonError('invalid_count', `got ${ids.length}`);
    }

    const pokemon = await withDataAccess('getPokemonForComparison', () => this.store.getByIds(ids));
    const found = new Set(pokemon.map((p) => p.id));
    const missing = ids.filter((id) => !found.has(id));
    if (missing.length > 0) {
      throw new ComparisonError('not_found', `missing ${missing.join(', ')}`);
    }
    return pokemon;
  }

  /**
   * Top Pokémon by one base stat, highest first; ties break on dex number.
   */
  async getRankedByStat(statName: string, limit = 10): Promise<PokemonStatRanking[]> {
    return withDataAccess('getRankedByStat', async () => {
      const rows = await this.collections.pokemonStats
        .query(Q.where('statName', statName))
        .fetch();

      // Stat rows without a pokemon row are not ranked
      const names = await this.namesFor(rows.map((row) => Number(row.pokemonId)));
      const sorted = rows
        .map((row) => ({ id: Number(row.pokemonId), baseStat: row.baseStat }))
        .filter((entry) => names.has(entry.id))
        .sort((a, b) => b.baseStat - a.baseStat || a.id - b.id);
      const ranks = assignRanks(sorted, (entry) => entry.baseStat);
      const top = sorted.slice(0, Math.max(0, limit));

      return top.map((entry, index) => ({
        id: entry.id,
        name: names.get(entry.id) ?? '',
        baseStat: entry.baseStat,
        rank: ranks[index] ?? index + 1,
      }));
    });
  }

  /**
   * Percentage of Pokémon with a strictly lower value of `statName`.
   * 0 when the Pokémon has no such stat.
   */
  async getStatPercentile(pokemonId: number, statName: string): Promise<number> {
    return withDataAccess('getStatPercentile', async () => {
      const rows = await this.collections.pokemonStats
        .query(Q.where('statName', statName))
        .fetch();
      const own = rows.find((row) => row.pokemonId === String(pokemonId));
      if (!own || rows.length === 0) return 0;

      const lower = rows.filter((row) => row.baseStat < own.baseStat).length;
      return round2((lower / rows.length) * 100);
    });
  }

  /**
   * Pokémon whose six base stats are closest to the reference's, by total
   * absolute difference. Candidates must carry every stat the reference has.
   */
  async findSimilar(pokemonId: number, limit = 5): Promise<PokemonSimilarity[]> {
    return withDataAccess('findSimilar', async () => {
      const statRows = await this.collections.pokemonStats.query().fetch();

      const statsByPokemon = new Map<string, Map<string, number>>();
      for (const row of statRows) {
        const stats = statsByPokemon.get(row.pokemonId) ?? new Map<string, number>();
        stats.set(row.statName, row.baseStat);
        statsByPokemon.set(row.pokemonId, stats);
      }

      const reference = statsByPokemon.get(String(pokemonId));
      if (!reference || reference.size !== STAT_NAMES.length) {
        logger.debug(`Pokémon ${pokemonId} lacks a full stat line; no similarity search`);
        return [];
      }

      const candidates: { id: number; totalDifference: number }[] = [];
      for (const [candidateId, stats] of statsByPokemon) {
        if (candidateId === String(pokemonId)) continue;
        let totalDifference = 0;
        let shared = 0;
        for (const [statName, baseStat] of reference) {
          const other = stats.get(statName);
          if (other === undefined) break;
          totalDifference += Math.abs(baseStat - other);
          shared += 1;
        }
        if (shared !== reference.size) continue;
        candidates.push({ id: Number(candidateId), totalDifference });
      }

      const names = await this.namesFor(candidates.map((c) => c.id));
      const top = candidates
        .filter((c) => names.has(c.id))
        .sort((a, b) => a.totalDifference - b.totalDifference || a.id - b.id)
        .slice(0, Math.max(0, limit));

      return top.map((c) => ({
        pokemonId: c.id,
        name: names.get(c.id) ?? '',
        totalDifference: c.totalDifference,
        similarityScore: round2(100 - (c.totalDifference * 100) / MAX_TOTAL_STAT_DIFFERENCE),
      }));
    });
  }

  /**
   * The comparison set plus, per canonical stat, each member's rank within the set.
   */
  async getComparisonData(ids: number[]): Promise<ComparisonData> {
    const pokemon = await this.getPokemonForComparison(ids);

    const statRankings: Record<string, Record<string, number>> = {};
    for (const statName of STAT_NAMES) {
      const entries: { id: number; baseStat: number }[] = [];
      for (const p of pokemon) {
        const stat = p.stats.find((s) => s.name === statName);
        if (stat) entries.push({ id: p.id, baseStat: stat.baseStat });
      }
      entries.sort((a, b) => b.baseStat - a.baseStat || a.id - b.id);
      const ranks = assignRanks(entries, (entry) => entry.baseStat);

      const byId: Record<string, number> = {};
      entries.forEach((entry, index) => {
        byId[String(entry.id)] = ranks[index] ?? index + 1;
      });
      statRankings[statName] = byId;
    }

    return { pokemon, statRankings, comparedAt: Date.now() };
  }

  private async namesFor(ids: number[]): Promise<Map<number, string>> {
    if (ids.length === 0) return new Map();
    const models = await this.collections.pokemon
      .query(Q.where('id', Q.oneOf(ids.map(String))))
      .fetch();
    return new Map(models.map((m) => [m.dexNumber, m.name]));
  }
}
