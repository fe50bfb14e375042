import {
  toCatalogCandidate,
  type CatalogCandidate,
  type CatalogSearch,
  type NutrientAmount,
  type NutrientLookup,
  type NutrientPayload
} from './catalog.js';
import type { Logger } from './logging.js';
import {
  FoodDataCentralClient,
  FoodDataCentralError,
  isRecord,
  type FoodDataType,
  type FoodItem
} from './usdaClient.js';

type FdcIdAlias = {
  replacementId: number;
  dataset?: string;
  rationale?: string;
};

const FDC_ID_ALIASES: ReadonlyMap<number, FdcIdAlias> = new Map([
  [
    4053,
    {
      replacementId: 748608,
      dataset: 'Foundation',
      rationale: 'USDA retired the SR Legacy olive oil record; the Foundation entry retains the same nutrient profile.'
    }
  ]
]);

export interface FoodDataCentralCatalogOptions {
  pageSize?: number;
  dataTypes?: FoodDataType[];
  logger?: Logger;
}

/** FoodData Central behind the catalog search and nutrient lookup seams. */
export class FoodDataCentralCatalog implements CatalogSearch, NutrientLookup {
  private readonly pageSize: number;
  private readonly dataTypes?: FoodDataType[];
  private readonly logger?: Logger;

  constructor(
    private readonly client: FoodDataCentralClient,
    options?: FoodDataCentralCatalogOptions
  ) {
    this.pageSize = options?.pageSize ?? 25;
    this.dataTypes = options?.dataTypes;
    this.logger = options?.logger;
  }

  async search(query: string): Promise<CatalogCandidate[]> {
    const response = await this.client.searchFoods({
      query,
      pageSize: this.pageSize,
      ...(this.dataTypes?.length ? { dataType: this.dataTypes } : {})
    });

    const candidates: CatalogCandidate[] = [];
    for (const food of response.foods) {
      const candidate = toCatalogCandidate(food);
      if (candidate) {
        candidates.push(candidate);
      } else {
        this.logger?.(`Skipping search hit without an FDC ID for "${query}".`);
      }
    }
    return candidates;
  }

  async getNutrients(fdcId: number): Promise<NutrientPayload> {
    const food = await this.fetchFoodWithAlias(fdcId);
    return {
      fdcId,
      ...(typeof food.description === 'string' && food.description.trim() !== ''
        ? { description: food.description }
        : {}),
      nutrients: extractNutrientAmounts(food)
    };
  }

  private async fetchFoodWithAlias(fdcId: number): Promise<FoodItem> {
    try {
      return await this.client.getFood(fdcId, { format: 'full' });
    } catch (error) {
      const alias = FDC_ID_ALIASES.get(fdcId);
      if (error instanceof FoodDataCentralError && error.status === 404 && alias) {
        this.logger?.(
          `FDC ${fdcId} not returned by USDA; substituting FDC ${alias.replacementId}${
            alias.dataset ? ` (${alias.dataset})` : ''
          }. ${alias.rationale ?? ''}`.trim()
        );
        return this.client.getFood(alias.replacementId, { format: 'full' });
      }
      throw error;
    }
  }
}

/**
 * Reads `foodNutrients` from a full or abridged FDC record. Entries that carry
 * no nutrient id or no numeric amount are skipped.
 */
export function extractNutrientAmounts(food: FoodItem): NutrientAmount[] {
  const entries = Array.isArray(food.foodNutrients) ? food.foodNutrients : [];
  const amounts: NutrientAmount[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    const nutrient = isRecord(entry.nutrient) ? entry.nutrient : undefined;
    const nutrientId = toFiniteNumber(entry.nutrientId ?? nutrient?.id);
    const amount = toFiniteNumber(entry.amount ?? entry.value);
    if (nutrientId === undefined || amount === undefined) {
      continue;
    }
    amounts.push({ nutrientId, amount });
  }

  return amounts;
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}
