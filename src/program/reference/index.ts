export { ALL_TYPES, typeIdFor, typeNameFor } from './typeTable';
export { GENERATION_RANGES, generationForDexNumber } from './generations';
export { MEASUREMENT_SCALE, toStoredUnits } from './measurements';
