import { describe, expect, it } from 'vitest';

import { InvalidPortionError, NormalizationStateError, UndefinedNormalizationError } from './errors.js';
import { aggregate, compareNutrient, normalizePerEnergy } from './nutrientMath.js';
import { NUTRIENT_KEYS, createRawProfile, zeroNutrients, type RawNutrientProfile } from './nutrients.js';

const chicken = createRawProfile(
  171077,
  { ...zeroNutrients(), energy: 200, protein: 20, cholesterol: 85, sodium: 60, vitaminA: 9 },
  'Chicken breast'
);

const rice = createRawProfile(
  169756,
  { ...zeroNutrients(), energy: 130, protein: 2.7, carbohydrates: 28, fiber: 0.4 },
  'Rice, white, cooked'
);

describe('normalizePerEnergy', () => {
  it('divides the per-energy nutrients by kcal', () => {
    const normalized = normalizePerEnergy(chicken);

    expect(normalized.basis).toBe('perKcal');
    expect(normalized.nutrients.protein).toBe(0.1);
    expect(normalized.nutrients.sodium).toBe(0.3);
  });

  it('copies the other nutrients unchanged', () => {
    const normalized = normalizePerEnergy(chicken);

    expect(normalized.nutrients.energy).toBe(200);
    expect(normalized.nutrients.cholesterol).toBe(85);
    expect(normalized.nutrients.vitaminA).toBe(9);
    expect(normalized.name).toBe('Chicken breast');
  });

  it('leaves the input profile untouched', () => {
    normalizePerEnergy(chicken);

    expect(chicken.basis).toBe('per100g');
    expect(chicken.nutrients.protein).toBe(20);
  });

  it('refuses a profile without energy', () => {
    const water = createRawProfile(5, zeroNutrients(), 'Water');

    expect(() => normalizePerEnergy(water)).toThrow(UndefinedNormalizationError);
    expect(() => normalizePerEnergy(water)).toThrow('Cannot normalize FDC 5 per kcal: energy is 0.');
  });

  it('refuses to normalize twice, even when the tag arrives from JSON', () => {
    const fromJson: RawNutrientProfile = JSON.parse(JSON.stringify(normalizePerEnergy(chicken)));

    expect(() => normalizePerEnergy(fromJson)).toThrow(NormalizationStateError);
  });
});

describe('aggregate', () => {
  it('scales each portion by grams / 100 and sums', () => {
    const meal = aggregate([
      { profile: chicken, grams: 150 },
      { profile: rice, grams: 200 }
    ]);

    expect(meal.nutrients.energy).toBeCloseTo(560);
    expect(meal.nutrients.protein).toBeCloseTo(35.4);
    expect(meal.nutrients.carbohydrates).toBeCloseTo(56);
    expect(meal.totalGrams).toBe(350);
    expect(meal.fdcIds).toEqual([171077, 169756]);
  });

  it('is linear in the portion weight', () => {
    const split = aggregate([
      { profile: rice, grams: 50 },
      { profile: rice, grams: 150 }
    ]);
    const whole = aggregate([{ profile: rice, grams: 200 }]);

    for (const key of NUTRIENT_KEYS) {
      expect(split.nutrients[key]).toBeCloseTo(whole.nutrients[key]);
    }
  });

  it('yields all zeros for no portions', () => {
    const empty = aggregate([]);

    expect(empty.nutrients).toEqual(zeroNutrients());
    expect(empty.totalGrams).toBe(0);
    expect(empty.fdcIds).toEqual([]);
    expect(empty.name).toBeUndefined();
  });

  it('joins the ingredient names without their inner commas', () => {
    const meal = aggregate([
      { profile: chicken, grams: 100 },
      { profile: rice, grams: 100 },
      { profile: createRawProfile(1, zeroNutrients()), grams: 10 }
    ]);

    expect(meal.name).toBe('Chicken breast, Rice white cooked');
  });

  it('rejects negative or non-finite weights', () => {
    expect(() => aggregate([{ profile: rice, grams: -1 }])).toThrow(InvalidPortionError);
    expect(() => aggregate([{ profile: rice, grams: Number.POSITIVE_INFINITY }])).toThrow(InvalidPortionError);
  });

  it('rejects a normalized profile that arrives from JSON', () => {
    const fromJson: RawNutrientProfile = JSON.parse(JSON.stringify(normalizePerEnergy(rice)));

    expect(() => aggregate([{ profile: fromJson, grams: 100 }])).toThrow(
      'Portion 1 (FDC 169756) is perKcal; aggregate per-100 g profiles and normalize afterwards.'
    );
  });
});

describe('compareNutrient', () => {
  it('lists one value per profile in input order', () => {
    const meal = aggregate([
      { profile: createRawProfile(1, { ...zeroNutrients(), protein: 10 }), grams: 50 },
      { profile: createRawProfile(2, { ...zeroNutrients(), protein: 4 }), grams: 100 }
    ]);

    expect(compareNutrient([chicken, meal], 'protein')).toEqual([
      { name: 'Chicken breast', fdcIds: [171077], value: 20 },
      { name: 'Unknown', fdcIds: [1, 2], value: 9 }
    ]);
  });
});
