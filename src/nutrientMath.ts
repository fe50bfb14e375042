import { InvalidPortionError, NormalizationStateError, UndefinedNormalizationError } from './errors.js';
import {
  NUTRIENT_KEYS,
  PER_ENERGY_KEYS,
  mapNutrients,
  zeroNutrients,
  type AggregatedNutrientProfile,
  type IngredientPortion,
  type NutrientKey,
  type NutrientProfile,
  type PerEnergyNutrientProfile,
  type RawNutrientProfile
} from './nutrients.js';

/**
 * Divides the PER_ENERGY_KEYS nutrients by the profile's kcal. The result is a
 * new `perKcal` profile; the input is left untouched.
 */
export function normalizePerEnergy(profile: RawNutrientProfile): PerEnergyNutrientProfile {
  assertPer100g(profile, 'Profile', 'only per-100 g profiles can be normalized');

  const energy = profile.nutrients.energy;
  if (!Number.isFinite(energy) || energy <= 0) {
    throw new UndefinedNormalizationError(profile.fdcId, energy);
  }

  const normalized: PerEnergyNutrientProfile = {
    basis: 'perKcal',
    fdcId: profile.fdcId,
    ...(profile.name ? { name: profile.name } : {}),
    nutrients: mapNutrients(profile.nutrients, (value, key) =>
      PER_ENERGY_KEYS.includes(key) ? value / energy : value
    )
  };
  return Object.freeze(normalized);
}

/** Sums `value * grams / 100` across portions for every canonical key. */
export function aggregate(portions: readonly IngredientPortion[]): AggregatedNutrientProfile {
  const totals = zeroNutrients();
  const names: string[] = [];
  const fdcIds: number[] = [];
  let totalGrams = 0;

  for (const [index, portion] of portions.entries()) {
    const { profile, grams } = portion;
    assertPer100g(profile, `Portion ${index + 1}`, 'aggregate per-100 g profiles and normalize afterwards');
    if (!Number.isFinite(grams) || grams < 0) {
      throw new InvalidPortionError(`Portion ${index + 1} (FDC ${profile.fdcId}) has an invalid weight: ${grams} g.`);
    }

    const factor = grams / 100;
    for (const key of NUTRIENT_KEYS) {
      totals[key] += profile.nutrients[key] * factor;
    }

    const name = cleanDisplayName(profile.name);
    if (name) {
      names.push(name);
    }
    fdcIds.push(profile.fdcId);
    totalGrams += grams;
  }

  const combined: AggregatedNutrientProfile = {
    basis: 'aggregate',
    fdcIds: Object.freeze(fdcIds),
    ...(names.length ? { name: names.join(', ') } : {}),
    totalGrams,
    nutrients: Object.freeze(totals)
  };
  return Object.freeze(combined);
}

export type NutrientComparison = {
  name: string;
  fdcIds: readonly number[];
  value: number;
};

export function compareNutrient(profiles: readonly NutrientProfile[], key: NutrientKey): NutrientComparison[] {
  return profiles.map((profile) => ({
    name: profile.name ?? 'Unknown',
    fdcIds: profile.basis === 'aggregate' ? profile.fdcIds : [profile.fdcId],
    value: profile.nutrients[key]
  }));
}

// Profiles also arrive from JSON (tool input), where the tag is the only guard.
function assertPer100g(profile: NutrientProfile, subject: string, hint: string): void {
  if (profile.basis !== 'per100g') {
    throw new NormalizationStateError(`${subject} (FDC ${describeSource(profile)}) is ${profile.basis}; ${hint}.`);
  }
}

function cleanDisplayName(name: string | undefined): string | undefined {
  const cleaned = name?.replace(/,/g, ' ').replace(/\s+/g, ' ').trim();
  return cleaned ? cleaned : undefined;
}

function describeSource(profile: NutrientProfile): string {
  return profile.basis === 'aggregate' ? profile.fdcIds.join('+') : String(profile.fdcId);
}
