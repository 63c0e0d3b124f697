/**
 * Filter Schema
 *
 * FilterCriteria describes one catalogue query. Every field is optional and an
 * empty field imposes no constraint, so `{}` matches every Pokémon.
 *
 * Only `typeLogic` changes how values inside one dimension combine; all
 * dimensions are ANDed with each other.
 */

import { z } from 'zod';
import { PokemonTypeNameSchema } from './pokemon';

export const TypeFilterLogicSchema = z.enum([
  'any',  // Pokémon has at least one of the selected types
  'all',  // Pokémon has every selected type
]);

// Arrays stand in for sets: parsing drops duplicates and keeps first-seen order
const uniqueArray = <T extends z.ZodTypeAny>(item: T) =>
  z.array(item).default([]).transform((values) => [...new Set(values)]);

const statBoundsSchema = z.record(z.string(), z.number().int()).default({});

const measurementSchema = z.number().nonnegative().optional();

export const FilterCriteriaSchema = z.object({
  types: uniqueArray(PokemonTypeNameSchema),
  typeLogic: TypeFilterLogicSchema.default('any'),
  generations: uniqueArray(z.number().int().positive()),
  minStats: statBoundsSchema,
  maxStats: statBoundsSchema,
  minHeight: measurementSchema,   // metres
  maxHeight: measurementSchema,
  minWeight: measurementSchema,   // kilograms
  maxWeight: measurementSchema,
  isLegendary: z.boolean().optional(),
  isMythical: z.boolean().optional(),
  isBaby: z.boolean().optional(),
  abilities: uniqueArray(z.string()),
  searchText: z.string().default('').transform((text) => text.trim()),
});

export const StatRangeSchema = z.object({
  min: z.number().int(),
  max: z.number().int(),
});

export const FilterOptionsSchema = z.object({
  availableTypes: z.array(PokemonTypeNameSchema),
  availableGenerations: z.array(z.number().int()),
  statRanges: z.record(z.string(), StatRangeSchema),
  availableAbilities: z.array(z.string()),
});

export type TypeFilterLogic = z.infer<typeof TypeFilterLogicSchema>;
export type FilterCriteria = z.output<typeof FilterCriteriaSchema>;
export type FilterCriteriaInput = z.input<typeof FilterCriteriaSchema>;
export type StatRange = z.infer<typeof StatRangeSchema>;
export type FilterOptions = z.infer<typeof FilterOptionsSchema>;
