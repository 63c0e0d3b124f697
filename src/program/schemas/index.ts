/**
 * Pokedex Schemas
 *
 * Re-exports all Zod schemas.
 */

// Hydrated Pokémon
export * from './pokemon';

// Filter criteria and options
export * from './filter';

// Comparison results
export * from './comparison';

// Import / export format
export * from './pokedexDump';
