export { FilterEngine, parseCriteria } from './filterEngine';
export { FilterSession, type FilterSessionOptions, type MatchCountState } from './filterSession';
