import { describe, expect, it } from 'vitest';

import { LABEL_FOOTER, format, renderLabelText } from './labelFormatter.js';
import { aggregate } from './nutrientMath.js';
import { createRawProfile, zeroNutrients } from './nutrients.js';

const chicken = createRawProfile(
  171077,
  { ...zeroNutrients(), energy: 200, protein: 20, cholesterol: 85.4, sodium: 60, vitaminA: 9 },
  'Chicken breast'
);

const rice = createRawProfile(
  169756,
  { ...zeroNutrients(), energy: 130, protein: 2.7, carbohydrates: 28, fiber: 0.4, iron: 1.234 },
  'Rice, white, cooked'
);

describe('format', () => {
  it('labels a single food per 100 g', () => {
    const label = format(chicken);

    expect(label.title).toBe('Chicken breast');
    expect(label.servingsPerContainer).toBe(1);
    expect(label.servingSize).toBe('100g');
    expect(label.calories).toBe(200);
    expect(label.footer).toEqual(LABEL_FOOTER);
  });

  it('lists the macronutrients in label order with units and daily values', () => {
    expect(format(chicken).nutrients).toEqual([
      { key: 'transFat', name: 'Trans Fat', amount: '0g' },
      { key: 'saturatedFat', name: 'Saturated Fat', amount: '0g', dailyValue: '0%' },
      { key: 'cholesterol', name: 'Cholesterol', amount: '85mg', dailyValue: '28%' },
      { key: 'sodium', name: 'Sodium', amount: '60mg', dailyValue: '3%' },
      { key: 'carbohydrates', name: 'Total Carbohydrate', amount: '0g', dailyValue: '0%' },
      { key: 'fiber', name: 'Dietary Fiber', amount: '0g', dailyValue: '0%' },
      { key: 'sugars', name: 'Total Sugars', amount: '0g' },
      { key: 'protein', name: 'Protein', amount: '20g', dailyValue: '40%' }
    ]);
  });

  it('rounds grams and micronutrients to two decimals', () => {
    const label = format(rice);

    expect(label.nutrients.find((entry) => entry.key === 'fiber')).toEqual({
      key: 'fiber',
      name: 'Dietary Fiber',
      amount: '0.4g',
      dailyValue: '1%'
    });
    expect(label.micronutrients).toEqual([
      { key: 'vitaminA', name: 'Vit. A', amount: '0mcg', dailyValue: '0%' },
      { key: 'vitaminC', name: 'Vit. C', amount: '0mg', dailyValue: '0%' },
      { key: 'calcium', name: 'Calcium', amount: '0mg', dailyValue: '0%' },
      { key: 'iron', name: 'Iron', amount: '1.23mg', dailyValue: '7%' }
    ]);
  });

  it('labels a meal by its total weight', () => {
    const label = format(
      aggregate([
        { profile: chicken, grams: 150 },
        { profile: rice, grams: 200 }
      ])
    );

    expect(label.title).toBe('Chicken breast, Rice white cooked');
    expect(label.servingSize).toBe('350g');
    expect(label.calories).toBe(560);
  });

  it('falls back to a generic title', () => {
    expect(format(createRawProfile(1, zeroNutrients())).title).toBe('Food item');
  });
});

describe('renderLabelText', () => {
  it('renders one line per entry', () => {
    expect(renderLabelText(format(chicken)).split('\n')).toEqual([
      'Nutrition Facts',
      'Chicken breast',
      '1 serving per container',
      'Serving size 100g',
      'Calories 200',
      '  Trans Fat 0g',
      '  Saturated Fat 0g (0% DV)',
      '  Cholesterol 85mg (28% DV)',
      '  Sodium 60mg (3% DV)',
      '  Total Carbohydrate 0g (0% DV)',
      '  Dietary Fiber 0g (0% DV)',
      '  Total Sugars 0g',
      '  Protein 20g (40% DV)',
      'Vitamins & Minerals:',
      '  Vit. A 9mcg (1% DV)',
      '  Vit. C 0mg (0% DV)',
      '  Calcium 0mg (0% DV)',
      '  Iron 0mg (0% DV)',
      ...LABEL_FOOTER
    ]);
  });
});
