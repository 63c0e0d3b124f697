/**
 * Comparison Schema
 */

import { z } from 'zod';
import { PokemonSchema } from './pokemon';

export const PokemonStatRankingSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  baseStat: z.number().int(),
  rank: z.number().int().positive(),
});

export const PokemonSimilaritySchema = z.object({
  pokemonId: z.number().int(),
  name: z.string(),
  totalDifference: z.number().int().nonnegative(),
  similarityScore: z.number(),
});

export const ComparisonDataSchema = z.object({
  pokemon: z.array(PokemonSchema),
  // stat name -> Pokémon id -> rank within the compared set
  statRankings: z.record(z.string(), z.record(z.string(), z.number().int())),
  comparedAt: z.number(),
});

export type PokemonStatRanking = z.infer<typeof PokemonStatRankingSchema>;
export type PokemonSimilarity = z.infer<typeof PokemonSimilaritySchema>;
export type ComparisonData = z.infer<typeof ComparisonDataSchema>;
