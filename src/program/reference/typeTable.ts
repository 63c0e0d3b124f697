/**
 * Type Table
 *
 * The one mapping between type names and the ids stored in `pokemon_types.typeId`.
 * Narrowing, hydration and import all go through it.
 */

import { PokemonTypeNameSchema, type PokemonTypeName } from '../schemas/pokemon';

// Ids follow the enum order: normal = 1 ... fairy = 18
const TYPE_IDS: ReadonlyMap<PokemonTypeName, number> = new Map(
  PokemonTypeNameSchema.options.map((name, index): [PokemonTypeName, number] => [name, index + 1]),
);

const TYPE_NAMES: ReadonlyMap<number, PokemonTypeName> = new Map(
  [...TYPE_IDS].map(([name, id]): [number, PokemonTypeName] => [id, name]),
);

export const ALL_TYPES: readonly PokemonTypeName[] = PokemonTypeNameSchema.options;

export function typeIdFor(name: PokemonTypeName): number {
  const id = TYPE_IDS.get(name);
  if (id === undefined) {
    throw new RangeError(`Unknown Pokémon type: ${name}`);
  }
  return id;
}

/**
 * Name for a stored type id, or null for ids outside the table.
 */
export function typeNameFor(id: number): PokemonTypeName | null {
  return TYPE_NAMES.get(id) ?? null;
}
