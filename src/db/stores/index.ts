/**
 * WatermelonDB Store Adapters Export
 */

export { createPokemonStore, hydratePokemon, sortByDexNumber } from './pokemonStore'
