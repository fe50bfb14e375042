import { z } from 'zod';

import type { FoodItem } from './usdaClient.js';

/** One search hit from the food catalog, with its shape settled at ingestion. */
export interface CatalogCandidate {
  fdcId: number;
  description: string;
  brandOwner?: string;
  category?: string;
  dataType?: string;
  raw: FoodItem;
}

export interface NutrientAmount {
  nutrientId: number;
  amount: number;
}

export interface NutrientPayload {
  fdcId: number;
  description?: string;
  nutrients: NutrientAmount[];
}

export interface CatalogSearch {
  search(query: string): Promise<CatalogCandidate[]>;
}

export interface NutrientLookup {
  getNutrients(fdcId: number): Promise<NutrientPayload>;
}

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
  /** One vector per text, in input order. */
  embedMany(texts: readonly string[]): Promise<number[][]>;
}

// FDC sends `foodCategory` as plain text on search hits and as a descriptor
// object on full records.
const categorySchema = z.union([
  z.string().transform((value) => ({ kind: 'text' as const, value })),
  z
    .object({ description: z.string().optional(), name: z.string().optional() })
    .passthrough()
    .transform((value) => ({ kind: 'descriptor' as const, value: value.description ?? value.name }))
]);

export function resolveCategory(value: unknown): string | undefined {
  const parsed = categorySchema.safeParse(value);
  if (!parsed.success) {
    return undefined;
  }
  const text = parsed.data.value?.trim();
  return text ? text : undefined;
}

export function toCatalogCandidate(food: FoodItem): CatalogCandidate | undefined {
  const fdcId = toFdcId(food.fdcId ?? food.fdc_id);
  if (fdcId === undefined) {
    return undefined;
  }

  const description = typeof food.description === 'string' ? food.description : '';
  const brandOwner = nonEmptyString(food.brandOwner);
  const category = resolveCategory(food.foodCategory ?? food.brandedFoodCategory);
  const dataType = nonEmptyString(food.dataType);

  return {
    fdcId,
    description,
    ...(brandOwner ? { brandOwner } : {}),
    ...(category ? { category } : {}),
    ...(dataType ? { dataType } : {}),
    raw: food
  };
}

function toFdcId(value: unknown): number | undefined {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}
