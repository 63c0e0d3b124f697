export { ComparisonService, MIN_COMPARISON_SIZE, MAX_COMPARISON_SIZE } from './comparisonService';
