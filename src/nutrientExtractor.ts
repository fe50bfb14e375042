import type { NutrientAmount, NutrientLookup } from './catalog.js';
import { mapWithConcurrency } from './concurrency.js';
import { describeError, isFatalLookupError } from './errors.js';
import type { Logger } from './logging.js';
import { FDC_NUTRIENT_IDS, createRawProfile, zeroNutrients, type RawNutrientProfile } from './nutrients.js';

const DEFAULT_CONCURRENCY = 4;

export type ExtractionRequest = number | { fdcId: number; name?: string };

export type ExtractionResult =
  | { status: 'ok'; fdcId: number; profile: RawNutrientProfile }
  | { status: 'failed'; fdcId: number; error: string };

export interface NutrientExtractorOptions {
  concurrency?: number;
  logger?: Logger;
}

/**
 * Maps (nutrient id, amount) pairs onto the canonical keys. Unknown ids and
 * non-finite amounts are skipped; a repeated id keeps its last amount.
 */
export function toNutrientProfile(fdcId: number, amounts: readonly NutrientAmount[], name?: string): RawNutrientProfile {
  const values = zeroNutrients();
  for (const { nutrientId, amount } of amounts) {
    const key = FDC_NUTRIENT_IDS.get(nutrientId);
    if (key && Number.isFinite(amount)) {
      values[key] = amount;
    }
  }
  return createRawProfile(fdcId, values, name?.trim() || undefined);
}

export class NutrientExtractor {
  private readonly concurrency: number;
  private readonly logger?: Logger;

  constructor(
    private readonly lookup: NutrientLookup,
    options?: NutrientExtractorOptions
  ) {
    this.concurrency = options?.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options?.logger;
  }

  /** One lookup for one record. Lookup errors propagate. */
  async extract(fdcId: number, name?: string): Promise<RawNutrientProfile> {
    const payload = await this.lookup.getNutrients(fdcId);
    return toNutrientProfile(fdcId, payload.nutrients, name ?? payload.description);
  }

  /**
   * Extracts each distinct id once, in first-seen order. A failed lookup is
   * reported in its own result; only fatal errors reject the batch.
   */
  async extractAll(requests: readonly ExtractionRequest[]): Promise<ExtractionResult[]> {
    const unique = new Map<number, string | undefined>();
    for (const request of requests) {
      const { fdcId, name } = typeof request === 'number' ? { fdcId: request, name: undefined } : request;
      if (!unique.has(fdcId)) {
        unique.set(fdcId, name);
      } else if (unique.get(fdcId) === undefined && name) {
        unique.set(fdcId, name);
      }
    }

    return mapWithConcurrency(Array.from(unique), this.concurrency, async ([fdcId, name]): Promise<ExtractionResult> => {
      try {
        return { status: 'ok', fdcId, profile: await this.extract(fdcId, name) };
      } catch (error) {
        if (isFatalLookupError(error)) {
          throw error;
        }
        this.logger?.(`Nutrient lookup failed for FDC ${fdcId}: ${describeError(error)}`);
        return { status: 'failed', fdcId, error: describeError(error) };
      }
    });
  }
}
