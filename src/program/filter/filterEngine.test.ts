/**
 * Filter Engine Tests
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import type { Database } from '@nozbe/watermelondb';
import { FilterEngine, parseCriteria } from './filterEngine';
import { DataAccessError, InvalidCriteriaError } from '../errors';
import type { FilterCriteriaInput } from '../schemas/filter';
import { createSeededDatabase, dumpEntry } from '../../test/database';

const ALL_IDS = [1, 2, 4, 7, 25, 129, 144, 151, 172];

async function idsFor(engine: FilterEngine, criteria: FilterCriteriaInput): Promise<number[]> {
  return (await engine.filterPokemon(criteria)).map((p) => p.id);
}

// ===========================================================================
// Criteria parsing
// ===========================================================================

describe('parseCriteria', () => {
  it('should fill defaults for empty criteria', () => {
    expect(parseCriteria({})).toEqual({
      types: [],
      typeLogic: 'any',
      generations: [],
      minStats: {},
      maxStats: {},
      abilities: [],
      searchText: '',
    });
  });

  it('should drop duplicate set members and trim search text', () => {
    const parsed = parseCriteria({
      types: ['fire', 'fire', 'water'],
      generations: [1, 1],
      abilities: ['blaze', 'blaze'],
      searchText: '  char ',
    });
    expect(parsed.types).toEqual(['fire', 'water']);
    expect(parsed.generations).toEqual([1]);
    expect(parsed.abilities).toEqual(['blaze']);
    expect(parsed.searchText).toBe('char');
  });

  it('should reject unknown type names', () => {
    expect(() => parseCriteria({ types: ['shadow'] })).toThrow(InvalidCriteriaError);
  });

  it('should reject negative measurements with the offending path', () => {
    expect(() => parseCriteria({ minHeight: -1 })).toThrow(
      'Invalid filter criteria: minHeight: Number must be greater than or equal to 0',
    );
  });
});

// ===========================================================================
// filterPokemon
// ===========================================================================

describe('FilterEngine - filterPokemon', () => {
  let engine: FilterEngine;

  beforeAll(async () => {
    engine = new FilterEngine(await createSeededDatabase());
  });

  it('should return every Pokémon in dex order for empty criteria', async () => {
    expect(await idsFor(engine, {})).toEqual(ALL_IDS);
  });

  it('should hydrate types, stats, abilities and sprites', async () => {
    const [bulbasaur] = await engine.filterPokemon({ searchText: 'bulba' });
    expect(bulbasaur).toEqual({
      id: 1,
      name: 'bulbasaur',
      height: 7,
      weight: 69,
      baseExperience: 64,
      order: 1,
      isDefault: true,
      generation: 1,
      isLegendary: false,
      isMythical: false,
      isBaby: false,
      types: [
        { slot: 1, type: 'grass' },
        { slot: 2, type: 'poison' },
      ],
      stats: [
        { name: 'hp', baseStat: 45, effort: 0 },
        { name: 'attack', baseStat: 49, effort: 0 },
        { name: 'defense', baseStat: 49, effort: 0 },
        { name: 'special-attack', baseStat: 65, effort: 0 },
        { name: 'special-defense', baseStat: 65, effort: 0 },
        { name: 'speed', baseStat: 45, effort: 0 },
      ],
      abilities: [
        { name: 'overgrow', slot: 1, isHidden: false },
        { name: 'chlorophyll', slot: 3, isHidden: true },
      ],
      sprites: {
        frontDefault: 'https://sprites.example.test/pokemon/1.png',
        frontShiny: null,
        backDefault: null,
        backShiny: null,
        officialArtworkDefault: null,
        officialArtworkShiny: null,
      },
    });
  });

  describe('search text', () => {
    it('should match a substring of the name', async () => {
      expect(await idsFor(engine, { searchText: 'char' })).toEqual([4]);
      expect(await idsFor(engine, { searchText: 'saur' })).toEqual([1, 2]);
    });

    it('should ignore case and surrounding whitespace', async () => {
      expect(await idsFor(engine, { searchText: '  PI ' })).toEqual([25, 172]);
    });

    it('should impose no constraint when blank', async () => {
      expect(await idsFor(engine, { searchText: '   ' })).toEqual(ALL_IDS);
    });
  });

  describe('types', () => {
    it('should include a Pokémon with any requested type', async () => {
      expect(await idsFor(engine, { types: ['grass', 'water'], typeLogic: 'any' })).toEqual([1, 2, 7, 129]);
    });

    it('should require every requested type in "all" mode', async () => {
      expect(await idsFor(engine, { types: ['grass', 'poison'], typeLogic: 'all' })).toEqual([1, 2]);
      expect(await idsFor(engine, { types: ['fire', 'water'], typeLogic: 'all' })).toEqual([]);
    });

    it('should include a single-type Pokémon under "any" and exclude it under "all"', async () => {
      expect(await idsFor(engine, { types: ['fire', 'water'], typeLogic: 'any' })).toContain(4);
      expect(await idsFor(engine, { types: ['fire', 'water'], typeLogic: 'all' })).not.toContain(4);
    });

    it('should treat a repeated type as one', async () => {
      expect(await idsFor(engine, { types: ['grass', 'grass'], typeLogic: 'all' })).toEqual([1, 2]);
    });
  });

  it('should narrow by generation', async () => {
    expect(await idsFor(engine, { generations: [2] })).toEqual([172]);
    expect(await idsFor(engine, { generations: [1, 2] })).toEqual(ALL_IDS);
    expect(await idsFor(engine, { generations: [9] })).toEqual([]);
  });

  describe('stat bounds', () => {
    it('should apply inclusive minimums', async () => {
      expect(await idsFor(engine, { minStats: { speed: 85 } })).toEqual([25, 144, 151]);
    });

    it('should apply inclusive maximums', async () => {
      expect(await idsFor(engine, { maxStats: { speed: 45 } })).toEqual([1, 7]);
    });

    it('should evaluate each stat bound independently', async () => {
      expect(await idsFor(engine, { minStats: { attack: 50 }, maxStats: { speed: 70 } })).toEqual([2, 4]);
    });

    it('should match nothing for an unknown stat name', async () => {
      expect(await idsFor(engine, { minStats: { luck: 1 } })).toEqual([]);
    });
  });

  describe('measurements', () => {
    it('should convert metres to decimetres at query time', async () => {
      // ivysaur is stored as 10, magikarp as 9
      expect(await idsFor(engine, { minHeight: 1.0 })).toEqual([2, 144]);
    });

    it('should compare converted fractional bounds exactly', async () => {
      expect(await idsFor(engine, { minHeight: 0.7 })).toEqual([1, 2, 129, 144]);
      expect(await idsFor(engine, { maxHeight: 0.4 })).toEqual([25, 151, 172]);
    });

    it('should convert kilograms to hectograms', async () => {
      expect(await idsFor(engine, { minWeight: 10 })).toEqual([2, 129, 144]);
      expect(await idsFor(engine, { minWeight: 6, maxWeight: 9 })).toEqual([1, 4, 7, 25]);
    });
  });

  describe('rarity flags', () => {
    it('should match flags exactly', async () => {
      expect(await idsFor(engine, { isLegendary: true })).toEqual([144]);
      expect(await idsFor(engine, { isMythical: true })).toEqual([151]);
      expect(await idsFor(engine, { isBaby: true })).toEqual([172]);
    });

    it('should treat false as a constraint', async () => {
      expect(await idsFor(engine, { isLegendary: false })).toEqual([1, 2, 4, 7, 25, 129, 151, 172]);
    });
  });

  describe('abilities', () => {
    it('should include a Pokémon with any requested ability', async () => {
      expect(await idsFor(engine, { abilities: ['static'] })).toEqual([25, 172]);
      expect(await idsFor(engine, { abilities: ['overgrow', 'blaze'] })).toEqual([1, 2, 4]);
    });

    it('should match hidden abilities', async () => {
      expect(await idsFor(engine, { abilities: ['snow-cloak'] })).toEqual([144]);
    });

    it('should fail closed when no requested ability is known', async () => {
      expect(await idsFor(engine, { abilities: ['levitate'] })).toEqual([]);
    });

    it('should ignore unknown names next to known ones', async () => {
      expect(await idsFor(engine, { abilities: ['static', 'levitate'] })).toEqual([25, 172]);
    });
  });

  it('should combine dimensions conjunctively', async () => {
    expect(await idsFor(engine, { types: ['electric'], isBaby: false })).toEqual([25]);
    expect(await idsFor(engine, { types: ['water'], minStats: { speed: 50 }, searchText: 'karp' })).toEqual([129]);
  });

  it('should reject invalid criteria', async () => {
    await expect(engine.filterPokemon({ generations: [0] })).rejects.toBeInstanceOf(InvalidCriteriaError);
  });
});

// ===========================================================================
// Properties
// ===========================================================================

describe('FilterEngine - properties', () => {
  let engine: FilterEngine;

  const samples: FilterCriteriaInput[] = [
    {},
    { types: ['grass', 'water'] },
    { types: ['grass', 'poison'], typeLogic: 'all' },
    { searchText: 'a', minStats: { hp: 40 } },
    { generations: [1], maxHeight: 0.6, isLegendary: false },
    { abilities: ['static', 'torrent'], minWeight: 5 },
    { abilities: ['levitate'] },
  ];

  beforeAll(async () => {
    engine = new FilterEngine(await createSeededDatabase());
  });

  it('should return the same ordered list on repeated calls', async () => {
    for (const criteria of samples) {
      expect(await idsFor(engine, criteria)).toEqual(await idsFor(engine, criteria));
    }
  });

  it('should count exactly what it filters', async () => {
    for (const criteria of samples) {
      const results = await engine.filterPokemon(criteria);
      expect(await engine.countPokemon(criteria)).toBe(results.length);
    }
  });

  it('should only narrow when constraints are added', async () => {
    const broad = await idsFor(engine, { types: ['grass', 'water', 'electric'] });
    const narrower = await idsFor(engine, { types: ['grass', 'water', 'electric'], maxStats: { attack: 50 } });
    const narrowest = await idsFor(engine, {
      types: ['grass', 'water', 'electric'],
      maxStats: { attack: 50 },
      isBaby: false,
    });

    expect(broad).toEqual([1, 2, 7, 25, 129, 172]);
    expect(narrower).toEqual([1, 7, 129, 172]);
    expect(narrowest).toEqual([1, 7, 129]);
    expect(narrower.every((id) => broad.includes(id))).toBe(true);
    expect(narrowest.every((id) => narrower.includes(id))).toBe(true);
  });

  it('should return only Pokémon satisfying every constraint', async () => {
    const results = await engine.filterPokemon({
      types: ['grass', 'water'],
      minStats: { defense: 50 },
      maxWeight: 20,
    });
    expect(results.map((p) => p.id)).toEqual([2, 7, 129]);
    for (const p of results) {
      expect(p.types.some((t) => t.type === 'grass' || t.type === 'water')).toBe(true);
      expect(p.stats.find((s) => s.name === 'defense')?.baseStat).toBeGreaterThanOrEqual(50);
      expect(p.weight).toBeLessThanOrEqual(200);
    }
  });
});

// ===========================================================================
// Starter trio
// ===========================================================================

describe('FilterEngine - starter trio', () => {
  let engine: FilterEngine;

  beforeAll(async () => {
    const db = await createSeededDatabase({
      version: 1,
      pokemon: [
        dumpEntry(1, 'bulbasaur', { types: ['grass', 'poison'], stats: { speed: 45 } }),
        dumpEntry(4, 'charmander', { types: ['fire'], stats: { speed: 65 } }),
        dumpEntry(7, 'squirtle', { types: ['water'], stats: { speed: 100 } }),
      ],
    });
    engine = new FilterEngine(db);
  });

  it('should match grass or water', async () => {
    expect(await idsFor(engine, { types: ['grass', 'water'], typeLogic: 'any' })).toEqual([1, 7]);
  });

  it('should find charmander by search text', async () => {
    expect(await idsFor(engine, { searchText: 'char' })).toEqual([4]);
  });

  it('should include a stat equal to the minimum', async () => {
    expect(await idsFor(engine, { minStats: { speed: 100 } })).toEqual([7]);
  });
});

// ===========================================================================
// Search punctuation
// ===========================================================================

describe('FilterEngine - search punctuation', () => {
  let engine: FilterEngine;

  beforeAll(async () => {
    const db = await createSeededDatabase({
      version: 1,
      pokemon: [
        dumpEntry(137, 'porygon'),
        dumpEntry(250, 'ho-oh', { types: ['fire', 'flying'] }),
        dumpEntry(474, 'porygon-z'),
        dumpEntry(900, 'hooh'),
        dumpEntry(901, 'Mr-Mime', { types: ['psychic', 'fairy'] }),
      ],
    });
    engine = new FilterEngine(db);
  });

  it('should match punctuation literally', async () => {
    expect(await idsFor(engine, { searchText: '-' })).toEqual([250, 474, 901]);
    expect(await idsFor(engine, { searchText: 'o-o' })).toEqual([250]);
    expect(await idsFor(engine, { searchText: 'porygon-' })).toEqual([474]);
    expect(await idsFor(engine, { searchText: '.' })).toEqual([]);
    expect(await idsFor(engine, { searchText: '%' })).toEqual([]);
  });

  it('should only return names containing the search text', async () => {
    for (const searchText of ['-', 'o-', 'h.', '_']) {
      const names = (await engine.filterPokemon({ searchText })).map((p) => p.name);
      expect(names.every((name) => name.includes(searchText))).toBe(true);
    }
  });

  it('should store names lowercase and search them case-insensitively', async () => {
    const [mime] = await engine.filterPokemon({ searchText: 'MR-M' });
    expect(mime?.name).toBe('mr-mime');
  });

  it('should count punctuated searches the same way', async () => {
    expect(await engine.countPokemon({ searchText: '-' })).toBe(3);
  });

  it('should not match hyphens in the seeded catalogue', async () => {
    const seeded = new FilterEngine(await createSeededDatabase());
    expect(await idsFor(seeded, { searchText: '-' })).toEqual([]);
  });
});

// ===========================================================================
// Counting, options and failures
// ===========================================================================

describe('FilterEngine - countPokemon', () => {
  it('should count matches', async () => {
    const engine = new FilterEngine(await createSeededDatabase());
    expect(await engine.countPokemon()).toBe(9);
    expect(await engine.countPokemon({ types: ['electric'] })).toBe(2);
    expect(await engine.countPokemon({ abilities: ['levitate'] })).toBe(0);
  });
});

describe('FilterEngine - getAvailableFilterOptions', () => {
  let engine: FilterEngine;

  beforeAll(async () => {
    engine = new FilterEngine(await createSeededDatabase());
  });

  it('should describe the whole catalogue', async () => {
    const options = await engine.getAvailableFilterOptions();

    expect(options.availableTypes).toHaveLength(18);
    expect(options.availableTypes[0]).toBe('normal');
    expect(options.availableTypes[17]).toBe('fairy');
    expect(options.availableGenerations).toEqual([1, 2]);
    expect(options.statRanges).toEqual({
      hp: { min: 20, max: 100 },
      attack: { min: 10, max: 100 },
      defense: { min: 15, max: 100 },
      'special-attack': { min: 15, max: 100 },
      'special-defense': { min: 20, max: 125 },
      speed: { min: 43, max: 100 },
    });
    expect(options.availableAbilities).toEqual([
      'blaze',
      'chlorophyll',
      'lightning-rod',
      'overgrow',
      'pressure',
      'rain-dish',
      'rattled',
      'snow-cloak',
      'solar-power',
      'static',
      'swift-swim',
      'synchronize',
      'torrent',
    ]);
  });

  it('should ignore the current criteria', async () => {
    const unfiltered = await engine.getAvailableFilterOptions();
    const filtered = await engine.getAvailableFilterOptions({ types: ['fire'], generations: [2] });
    expect(filtered).toEqual(unfiltered);
  });

  it('should still validate the current criteria', async () => {
    await expect(engine.getAvailableFilterOptions({ minWeight: -5 })).rejects.toBeInstanceOf(InvalidCriteriaError);
  });
});

describe('FilterEngine - store failures', () => {
  let db: Database;

  beforeAll(async () => {
    db = await createSeededDatabase();
  });

  it('should wrap store errors in DataAccessError', async () => {
    const engine = new FilterEngine(db);
    const spy = vi.spyOn(db.get('pokemon'), 'query').mockImplementation(() => {
      throw new Error('disk unavailable');
    });

    try {
      const failure = engine.filterPokemon({ searchText: 'char' });
      await expect(failure).rejects.toBeInstanceOf(DataAccessError);
      await expect(failure).rejects.toThrow('Data access failed during filterPokemon: disk unavailable');
      await expect(engine.countPokemon()).rejects.toMatchObject({ operation: 'countPokemon' });
    } finally {
      spy.mockRestore();
    }
  });

  it('should treat an empty result as success', async () => {
    const engine = new FilterEngine(db);
    await expect(engine.filterPokemon({ searchText: 'missingno' })).resolves.toEqual([]);
  });
});
