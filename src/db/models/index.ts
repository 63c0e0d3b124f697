/**
 * WatermelonDB Models Export
 */

// ============================================================================
// ENTITIES
// ============================================================================
export { default as Pokemon } from './Pokemon'
export { default as Ability } from './Ability'

// ============================================================================
// MEMBERSHIP
// ============================================================================
export { default as PokemonTypeSlot } from './PokemonTypeSlot'
export { default as PokemonStat } from './PokemonStat'
export { default as PokemonAbility } from './PokemonAbility'

// ============================================================================
// DISPLAY
// ============================================================================
export { default as PokemonSprite } from './PokemonSprite'
