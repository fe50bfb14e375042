import { describe, expect, it } from 'vitest';

import { NutrientExtractor, toNutrientProfile } from './nutrientExtractor.js';
import { NUTRIENT_KEYS, zeroNutrients } from './nutrients.js';
import { FakeNutrientLookup, payload } from './testing/fakes.js';
import { FoodDataCentralError } from './usdaClient.js';

describe('toNutrientProfile', () => {
  it('maps known ids and ignores unknown ones', () => {
    const profile = toNutrientProfile(
      9,
      [
        { nutrientId: 1003, amount: 20 },
        { nutrientId: 1008, amount: 200 },
        { nutrientId: 1004, amount: 11 },
        { nutrientId: 9999, amount: 3 }
      ],
      'Test food'
    );

    expect(profile).toEqual({
      basis: 'per100g',
      fdcId: 9,
      name: 'Test food',
      nutrients: { ...zeroNutrients(), protein: 20, energy: 200 }
    });
  });

  it('keeps the last amount for a repeated id and skips non-finite amounts', () => {
    const profile = toNutrientProfile(9, [
      { nutrientId: 1093, amount: 100 },
      { nutrientId: 1093, amount: 120 },
      { nutrientId: 1087, amount: Number.NaN }
    ]);

    expect(profile.nutrients.sodium).toBe(120);
    expect(profile.nutrients.calcium).toBe(0);
  });

  it('yields every canonical key at zero when nothing is recognized', () => {
    const profile = toNutrientProfile(9, [{ nutrientId: 1004, amount: 11 }]);

    expect(Object.keys(profile.nutrients).sort()).toEqual([...NUTRIENT_KEYS].sort());
    expect(Object.values(profile.nutrients).every((value) => value === 0)).toBe(true);
  });

  it('returns a frozen profile', () => {
    const profile = toNutrientProfile(9, []);

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.nutrients)).toBe(true);
  });
});

describe('NutrientExtractor', () => {
  const records = new Map([
    [1, payload(1, 'Avocados, raw, all commercial varieties', { energy: 160, fiber: 6.7 })],
    [2, payload(2, 'Fish, salmon, Atlantic, farmed, raw', { energy: 208, protein: 20.4 })]
  ]);

  it('names the profile after the caller or else the record description', async () => {
    const extractor = new NutrientExtractor(new FakeNutrientLookup(records));

    await expect(extractor.extract(1, 'Avocado')).resolves.toMatchObject({ name: 'Avocado' });
    await expect(extractor.extract(1)).resolves.toMatchObject({ name: 'Avocados, raw, all commercial varieties' });
  });

  it('looks each id up once and keeps first-seen order', async () => {
    const lookup = new FakeNutrientLookup(records);
    const extractor = new NutrientExtractor(lookup);

    const results = await extractor.extractAll([1, { fdcId: 2, name: 'Salmon' }, { fdcId: 1, name: 'Avocado' }, 2]);

    expect(lookup.calls.sort()).toEqual([1, 2]);
    expect(results.map((result) => result.fdcId)).toEqual([1, 2]);
    expect(results.map((result) => (result.status === 'ok' ? result.profile.name : undefined))).toEqual([
      'Avocado',
      'Salmon'
    ]);
  });

  it('reports a failed lookup per item and carries on', async () => {
    const extractor = new NutrientExtractor(new FakeNutrientLookup(records));

    const results = await extractor.extractAll([3, 2]);

    expect(results[0]).toEqual({ status: 'failed', fdcId: 3, error: 'FDC ID 3 not found' });
    expect(results[1]).toMatchObject({ status: 'ok', fdcId: 2, profile: { nutrients: { protein: 20.4 } } });
  });

  it('rejects the batch when the credentials are refused', async () => {
    const lookup = new FakeNutrientLookup(
      new Map([[1, new FoodDataCentralError('USDA API key is missing or invalid', { status: 401 })]])
    );

    await expect(new NutrientExtractor(lookup).extractAll([1])).rejects.toThrow('USDA API key is missing or invalid');
  });
});
