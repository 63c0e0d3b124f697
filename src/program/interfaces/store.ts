/**
 * Store Interfaces
 *
 * Read access to the Pokédex used by the query services.
 * All methods are async for WatermelonDB compatibility.
 */

import type { Pokemon } from '../schemas/pokemon';

export interface IPokemonStore {
  getById(id: number): Promise<Pokemon | null>;
  /** Pokémon for the given dex numbers, in the order requested; unknown ids are skipped */
  getByIds(ids: number[]): Promise<Pokemon[]>;
  /** Every Pokémon, ascending by dex number */
  getAll(): Promise<Pokemon[]>;
  count(): Promise<number>;
}
