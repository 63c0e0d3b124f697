/**
 * Height is stored in decimetres and weight in hectograms; callers speak
 * metres and kilograms.
 */
export const MEASUREMENT_SCALE = 10;

/**
 * Convert an external measurement to stored units. Rounded so that
 * 0.7 m compares equal to a stored 7 rather than 7.000000000000001.
 */
export function toStoredUnits(value: number): number {
  return Math.round(value * MEASUREMENT_SCALE * 1e6) / 1e6;
}
