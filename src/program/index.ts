/**
 * Program Module Exports
 */

// Querying
export { FilterEngine, FilterSession, parseCriteria } from './filter';
export type { FilterSessionOptions, MatchCountState } from './filter';
export { ComparisonService, MIN_COMPARISON_SIZE, MAX_COMPARISON_SIZE } from './comparison';

// Errors
export {
  PokedexError,
  DataAccessError,
  InvalidCriteriaError,
  InvalidDumpError,
  ComparisonError,
  type ComparisonErrorCode,
} from './errors';

// Schemas and fixed tables
export * from './schemas';
export * from './reference';
export type { IPokemonStore } from './interfaces';

// Utils
export { createLogger, setLogLevel, enableDebugLogging, resetLogging, type Logger, type LogModule } from './utils/logger';
