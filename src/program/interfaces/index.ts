export type { IPokemonStore } from './store';
