import type { AggregatedNutrientProfile, NutrientKey, RawNutrientProfile } from './nutrients.js';

export type LabelUnit = 'g' | 'mg' | 'mcg';

export interface LabelEntry {
  key: NutrientKey;
  name: string;
  amount: string;
  dailyValue?: string;
}

/** Structure handed to the label renderer. */
export interface LabelSchema {
  title: string;
  servingsPerContainer: number;
  servingSize: string;
  calories: number;
  nutrients: LabelEntry[];
  micronutrients: LabelEntry[];
  footer: string[];
}

type LabelLine = {
  key: NutrientKey;
  name: string;
  unit: LabelUnit;
  decimals: number;
  /** FDA reference daily value in `unit`. */
  dailyValue?: number;
};

const MACRONUTRIENT_LINES: readonly LabelLine[] = [
  { key: 'transFat', name: 'Trans Fat', unit: 'g', decimals: 2 },
  { key: 'saturatedFat', name: 'Saturated Fat', unit: 'g', decimals: 2, dailyValue: 20 },
  { key: 'cholesterol', name: 'Cholesterol', unit: 'mg', decimals: 0, dailyValue: 300 },
  { key: 'sodium', name: 'Sodium', unit: 'mg', decimals: 0, dailyValue: 2300 },
  { key: 'carbohydrates', name: 'Total Carbohydrate', unit: 'g', decimals: 2, dailyValue: 275 },
  { key: 'fiber', name: 'Dietary Fiber', unit: 'g', decimals: 2, dailyValue: 28 },
  { key: 'sugars', name: 'Total Sugars', unit: 'g', decimals: 2 },
  { key: 'protein', name: 'Protein', unit: 'g', decimals: 2, dailyValue: 50 }
];

const MICRONUTRIENT_LINES: readonly LabelLine[] = [
  { key: 'vitaminA', name: 'Vit. A', unit: 'mcg', decimals: 2, dailyValue: 900 },
  { key: 'vitaminC', name: 'Vit. C', unit: 'mg', decimals: 2, dailyValue: 90 },
  { key: 'calcium', name: 'Calcium', unit: 'mg', decimals: 2, dailyValue: 1300 },
  { key: 'iron', name: 'Iron', unit: 'mg', decimals: 2, dailyValue: 18 }
];

export const LABEL_FOOTER: readonly string[] = [
  '* The % Daily Value (DV) tells you how much a nutrient in',
  'a serving of food contributes to a daily diet. 2,000 calories',
  'a day is used for general nutrition advice.'
];

export function format(profile: RawNutrientProfile | AggregatedNutrientProfile): LabelSchema {
  const servingGrams = profile.basis === 'aggregate' ? profile.totalGrams : 100;
  return {
    title: profile.name ?? 'Food item',
    servingsPerContainer: 1,
    servingSize: `${formatDecimal(servingGrams, 0)}g`,
    calories: Math.round(profile.nutrients.energy),
    nutrients: MACRONUTRIENT_LINES.map((line) => toEntry(line, profile.nutrients[line.key])),
    micronutrients: MICRONUTRIENT_LINES.map((line) => toEntry(line, profile.nutrients[line.key])),
    footer: [...LABEL_FOOTER]
  };
}

/** Plain-text rendering of a label, one line per entry. */
export function renderLabelText(label: LabelSchema): string {
  const entryLine = (entry: LabelEntry, indent: string): string =>
    `${indent}${entry.name} ${entry.amount}${entry.dailyValue ? ` (${entry.dailyValue} DV)` : ''}`;

  return [
    'Nutrition Facts',
    label.title,
    `${label.servingsPerContainer} serving per container`,
    `Serving size ${label.servingSize}`,
    `Calories ${label.calories}`,
    ...label.nutrients.map((entry) => entryLine(entry, '  ')),
    'Vitamins & Minerals:',
    ...label.micronutrients.map((entry) => entryLine(entry, '  ')),
    ...label.footer
  ].join('\n');
}

function toEntry(line: LabelLine, value: number): LabelEntry {
  return {
    key: line.key,
    name: line.name,
    amount: `${formatDecimal(value, line.decimals)}${line.unit}`,
    ...(line.dailyValue ? { dailyValue: `${Math.round((value / line.dailyValue) * 100)}%` } : {})
  };
}

function formatDecimal(value: number, decimals: number): string {
  const factor = 10 ** decimals;
  return (Math.round(value * factor) / factor).toString();
}
