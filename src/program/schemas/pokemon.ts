/**
 * Pokémon Schema
 *
 * The hydrated Pokémon returned by every query: the `pokemon` row joined with
 * its type slots, base stats, abilities and sprites.
 */

import { z } from 'zod';

// Canonical type names, in type-id order (normal = 1 ... fairy = 18)
export const PokemonTypeNameSchema = z.enum([
  'normal',
  'fighting',
  'flying',
  'poison',
  'ground',
  'rock',
  'bug',
  'ghost',
  'steel',
  'fire',
  'water',
  'grass',
  'electric',
  'psychic',
  'ice',
  'dragon',
  'dark',
  'fairy',
]);

export const StatNameSchema = z.enum([
  'hp',
  'attack',
  'defense',
  'special-attack',
  'special-defense',
  'speed',
]);

export const TypeSlotSchema = z.object({
  slot: z.number().int().min(1).max(2),
  type: PokemonTypeNameSchema,
});

export const PokemonStatSchema = z.object({
  name: z.string().min(1),       // usually a StatName; stored as free text
  baseStat: z.number().int().nonnegative(),
  effort: z.number().int().nonnegative(),
});

export const PokemonAbilitySlotSchema = z.object({
  name: z.string().min(1),
  slot: z.number().int().positive(),
  isHidden: z.boolean(),
});

export const PokemonSpritesSchema = z.object({
  frontDefault: z.string().nullable(),
  frontShiny: z.string().nullable(),
  backDefault: z.string().nullable(),
  backShiny: z.string().nullable(),
  officialArtworkDefault: z.string().nullable(),
  officialArtworkShiny: z.string().nullable(),
});

export const PokemonSchema = z.object({
  id: z.number().int().positive(),   // National dex number
  name: z.string(),
  height: z.number().int().nonnegative(),  // decimetres
  weight: z.number().int().nonnegative(),  // hectograms
  baseExperience: z.number().int().nullable(),
  order: z.number().int(),
  isDefault: z.boolean(),
  generation: z.number().int().positive().nullable(),
  isLegendary: z.boolean(),
  isMythical: z.boolean(),
  isBaby: z.boolean(),
  types: z.array(TypeSlotSchema),
  stats: z.array(PokemonStatSchema),
  abilities: z.array(PokemonAbilitySlotSchema),
  sprites: PokemonSpritesSchema,
});

export type PokemonTypeName = z.infer<typeof PokemonTypeNameSchema>;
export type StatName = z.infer<typeof StatNameSchema>;
export type TypeSlot = z.infer<typeof TypeSlotSchema>;
export type PokemonStat = z.infer<typeof PokemonStatSchema>;
export type PokemonAbilitySlot = z.infer<typeof PokemonAbilitySlotSchema>;
export type PokemonSprites = z.infer<typeof PokemonSpritesSchema>;
export type Pokemon = z.infer<typeof PokemonSchema>;

export const STAT_NAMES: readonly StatName[] = StatNameSchema.options;
