export const NUTRIENT_KEYS = [
  'transFat',
  'saturatedFat',
  'cholesterol',
  'sodium',
  'carbohydrates',
  'fiber',
  'sugars',
  'protein',
  'vitaminA',
  'vitaminC',
  'calcium',
  'iron',
  'energy'
] as const;

export type NutrientKey = (typeof NUTRIENT_KEYS)[number];

export type NutrientValues = Readonly<Record<NutrientKey, number>>;

/** FoodData Central nutrient ids (the `nutrient.id` field) for each canonical key. */
export const FDC_NUTRIENT_IDS: ReadonlyMap<number, NutrientKey> = new Map([
  [1257, 'transFat'],
  [1258, 'saturatedFat'],
  [1253, 'cholesterol'],
  [1093, 'sodium'],
  [1005, 'carbohydrates'],
  [1079, 'fiber'],
  [2000, 'sugars'],
  [1003, 'protein'],
  [1104, 'vitaminA'],
  [1162, 'vitaminC'],
  [1087, 'calcium'],
  [1089, 'iron'],
  [1008, 'energy']
]);

/** Keys divided by energy when a profile is expressed per kcal. */
export const PER_ENERGY_KEYS: readonly NutrientKey[] = [
  'protein',
  'fiber',
  'transFat',
  'saturatedFat',
  'sugars',
  'calcium',
  'vitaminC',
  'sodium'
];

/** Amounts per 100 g of the food record. */
export interface RawNutrientProfile {
  readonly basis: 'per100g';
  readonly fdcId: number;
  readonly name?: string;
  readonly nutrients: NutrientValues;
}

/** Selected amounts divided by kcal; see PER_ENERGY_KEYS. */
export interface PerEnergyNutrientProfile {
  readonly basis: 'perKcal';
  readonly fdcId: number;
  readonly name?: string;
  readonly nutrients: NutrientValues;
}

/** Absolute amounts for a meal made of several weighed portions. */
export interface AggregatedNutrientProfile {
  readonly basis: 'aggregate';
  readonly fdcIds: readonly number[];
  readonly name?: string;
  readonly totalGrams: number;
  readonly nutrients: NutrientValues;
}

export type NutrientProfile = RawNutrientProfile | PerEnergyNutrientProfile | AggregatedNutrientProfile;

export interface IngredientPortion {
  readonly profile: RawNutrientProfile;
  readonly grams: number;
}

export function isNutrientKey(value: string): value is NutrientKey {
  return NUTRIENT_KEYS.some((key) => key === value);
}

export function zeroNutrients(): Record<NutrientKey, number> {
  return {
    transFat: 0,
    saturatedFat: 0,
    cholesterol: 0,
    sodium: 0,
    carbohydrates: 0,
    fiber: 0,
    sugars: 0,
    protein: 0,
    vitaminA: 0,
    vitaminC: 0,
    calcium: 0,
    iron: 0,
    energy: 0
  };
}

export function mapNutrients(
  source: NutrientValues,
  transform: (value: number, key: NutrientKey) => number
): NutrientValues {
  const values = zeroNutrients();
  for (const key of NUTRIENT_KEYS) {
    values[key] = transform(source[key], key);
  }
  return Object.freeze(values);
}

export function createRawProfile(fdcId: number, nutrients: NutrientValues, name?: string): RawNutrientProfile {
  const profile: RawNutrientProfile = {
    basis: 'per100g',
    fdcId,
    ...(name ? { name } : {}),
    nutrients: Object.freeze({ ...nutrients })
  };
  return Object.freeze(profile);
}
