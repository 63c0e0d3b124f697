/**
 * Pokédex Dump Schema
 *
 * JSON format read by importPokedex and written by exportPokedex.
 * Pokémon reference abilities by name; the ability catalogue is optional and
 * any name it lacks is created on import.
 */

import { z } from 'zod';
import { TypeSlotSchema } from './pokemon';

export const DumpAbilitySchema = z.object({
  id: z.number().int().positive().optional(),
  name: z.string().min(1),
  shortEffect: z.string().nullable().default(null),
  generation: z.number().int().positive().nullable().default(null),
  isMainSeries: z.boolean().default(true),
});

export const DumpSpritesSchema = z.object({
  frontDefault: z.string().nullable().default(null),
  frontShiny: z.string().nullable().default(null),
  backDefault: z.string().nullable().default(null),
  backShiny: z.string().nullable().default(null),
  officialArtworkDefault: z.string().nullable().default(null),
  officialArtworkShiny: z.string().nullable().default(null),
});

export const DumpPokemonSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1).transform((name) => name.toLowerCase()),
  height: z.number().int().nonnegative(),
  weight: z.number().int().nonnegative(),
  baseExperience: z.number().int().nullable().default(null),
  order: z.number().int().optional(),               // defaults to the dex number
  isDefault: z.boolean().default(true),
  generation: z.number().int().positive().nullable().optional(),  // derived when absent
  isLegendary: z.boolean().default(false),
  isMythical: z.boolean().default(false),
  isBaby: z.boolean().default(false),
  types: z.array(TypeSlotSchema).min(1).max(2),
  stats: z.array(z.object({
    name: z.string().min(1),
    baseStat: z.number().int().nonnegative(),
    effort: z.number().int().nonnegative().default(0),
  })).default([]),
  abilities: z.array(z.object({
    name: z.string().min(1),
    slot: z.number().int().positive(),
    isHidden: z.boolean().default(false),
  })).default([]),
  sprites: DumpSpritesSchema.default({}),
});

export const PokedexDumpSchema = z.object({
  version: z.literal(1),
  exportedAt: z.number().optional(),
  abilities: z.array(DumpAbilitySchema).default([]),
  pokemon: z.array(DumpPokemonSchema),
}).superRefine((dump, ctx) => {
  const seen = new Set<number>();
  dump.pokemon.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pokemon', index, 'id'],
        message: `Duplicate Pokémon id ${entry.id}`,
      });
    }
    seen.add(entry.id);
  });

  const abilityIds = new Set<number>();
  const abilityNames = new Set<string>();
  dump.abilities.forEach((ability, index) => {
    if (ability.id !== undefined) {
      if (abilityIds.has(ability.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['abilities', index, 'id'],
          message: `Duplicate ability id ${ability.id}`,
        });
      }
      abilityIds.add(ability.id);
    }
    if (abilityNames.has(ability.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['abilities', index, 'name'],
        message: `Duplicate ability name ${ability.name}`,
      });
    }
    abilityNames.add(ability.name);
  });
});

export type DumpAbility = z.output<typeof DumpAbilitySchema>;
export type DumpPokemon = z.output<typeof DumpPokemonSchema>;
export type PokedexDump = z.output<typeof PokedexDumpSchema>;
export type PokedexDumpInput = z.input<typeof PokedexDumpSchema>;
