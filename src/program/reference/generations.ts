/**
 * Generation Table
 *
 * National dex ranges introduced by each main-series generation.
 */

interface GenerationRange {
  generation: number;
  first: number;
  last: number;
}

export const GENERATION_RANGES: readonly GenerationRange[] = [
  { generation: 1, first: 1, last: 151 },
  { generation: 2, first: 152, last: 251 },
  { generation: 3, first: 252, last: 386 },
  { generation: 4, first: 387, last: 493 },
  { generation: 5, first: 494, last: 649 },
  { generation: 6, first: 650, last: 721 },
  { generation: 7, first: 722, last: 809 },
  { generation: 8, first: 810, last: 905 },
  { generation: 9, first: 906, last: 1025 },
];

/**
 * Generation for a dex number; null for alternate-form ids (10001+) and
 * anything past the table.
 */
export function generationForDexNumber(dexNumber: number): number | null {
  const range = GENERATION_RANGES.find((r) => dexNumber >= r.first && dexNumber <= r.last);
  return range ? range.generation : null;
}
