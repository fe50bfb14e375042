import { USDA_API_BASE_URL, getApiKey } from './config.js';
import { RequestLimiter, delay } from './concurrency.js';
import type { Logger } from './logging.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 750;
const DEFAULT_MAX_CONCURRENT_REQUESTS = 1;
const DEFAULT_MIN_REQUEST_INTERVAL_MS = 400;

export type FoodDataType =
  | 'Branded'
  | 'Survey (FNDDS)'
  | 'SR Legacy'
  | 'Foundation'
  | 'Experimental';

export interface SearchFoodsRequest {
  query: string;
  dataType?: FoodDataType[];
  pageNumber?: number;
  pageSize?: number;
  brandOwner?: string;
  requireAllWords?: boolean;
}

export interface BulkFoodsRequest {
  fdcIds: number[];
  format?: 'abridged' | 'full';
  nutrients?: number[];
}

export interface FoodQueryOptions {
  format?: 'abridged' | 'full';
  nutrients?: number[];
}

export interface SearchFoodsResponse {
  foods: FoodItem[];
  totalHits?: number;
  currentPage?: number;
  totalPages?: number;
}

export type FoodItem = Record<string, unknown>;

export interface FoodDataCentralClientOptions {
  baseUrl?: string;
  apiKey?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  maxConcurrentRequests?: number;
  minRequestIntervalMs?: number;
  /** Longest server-requested `Retry-After` wait honored; longer waits fail the request. Defaults to the timeout. */
  maxRetryAfterMs?: number;
  logger?: Logger;
}

type RequestInit = {
  method: 'POST';
  body?: string;
};

export class FoodDataCentralError extends Error {
  readonly status?: number;
  readonly responseBody?: string;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options?: { status?: number; responseBody?: string; retryable?: boolean; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message);
    this.name = 'FoodDataCentralError';
    this.status = options?.status;
    this.responseBody = options?.responseBody;
    this.retryable = options?.retryable ?? false;
    this.retryAfterMs = options?.retryAfterMs;
    if (options?.cause !== undefined) {
      (this as { cause?: unknown }).cause = options.cause;
    }
  }
}

export class FoodDataCentralClient {
  private readonly baseUrl: URL;
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetryAfterMs: number;
  private readonly limiter: RequestLimiter;
  private readonly logger?: Logger;

  constructor(options?: FoodDataCentralClientOptions) {
    this.baseUrl = new URL(options?.baseUrl ?? USDA_API_BASE_URL);
    this.apiKey = options?.apiKey ?? getApiKey();
    this.maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetryAfterMs = options?.maxRetryAfterMs ?? this.timeoutMs;
    this.limiter = new RequestLimiter({
      maxConcurrent: options?.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS,
      minDelayMs: options?.minRequestIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL_MS
    });
    this.logger = options?.logger;
  }

  async searchFoods(params: SearchFoodsRequest): Promise<SearchFoodsResponse> {
    const response = await this.post('foods/search', pruneUndefined({ ...params }));
    if (isRecord(response) && Array.isArray(response.foods)) {
      return {
        foods: response.foods.filter(isRecord),
        totalHits: toOptionalNumber(response.totalHits),
        currentPage: toOptionalNumber(response.currentPage),
        totalPages: toOptionalNumber(response.totalPages)
      };
    }
    if (isRecord(response) && response.foods === undefined) {
      return { foods: [] };
    }

    throw new FoodDataCentralError('Unexpected USDA search response format', {
      responseBody: safeSerialize(response),
      retryable: false
    });
  }

  async getFood(fdcId: number, options?: FoodQueryOptions): Promise<FoodItem> {
    const foods = await this.getFoods({
      fdcIds: [fdcId],
      format: options?.format,
      nutrients: options?.nutrients
    });

    const food = foods[0];
    if (!food) {
      throw new FoodDataCentralError(`FDC ID ${fdcId} not found`, {
        status: 404,
        retryable: false
      });
    }

    return food;
  }

  async getFoods(params: BulkFoodsRequest): Promise<FoodItem[]> {
    const payload = pruneUndefined({
      fdcIds: params.fdcIds,
      format: params.format ?? 'abridged',
      nutrients: params.nutrients
    });

    const response = await this.post('foods', payload);
    return normalizeBulkFoodsResponse(response);
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    return this.limiter.schedule(() =>
      this.sendWithRetries(path, { method: 'POST', body: JSON.stringify(body) })
    );
  }

  private async sendWithRetries(path: string, init: RequestInit): Promise<unknown> {
    let attempt = 0;

    while (true) {
      try {
        return await this.sendOnce(path, init);
      } catch (error) {
        if (!this.shouldRetry(error, attempt)) {
          throw error;
        }

        const backoffMs = this.computeBackoffDelay(error, attempt);
        if (backoffMs > this.maxRetryAfterMs) {
          this.logger?.(
            `Not retrying USDA request: server asked to wait ${backoffMs}ms (limit ${this.maxRetryAfterMs}ms).`
          );
          throw error;
        }
        this.logger?.(
          `Retrying USDA request (${attempt + 1}/${this.maxRetries}) after ${backoffMs}ms due to: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
        await delay(backoffMs);
        attempt += 1;
      }
    }
  }

  private async sendOnce(path: string, init: RequestInit): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    url.searchParams.set('api_key', this.apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: init.method,
        headers: init.body ? { 'Content-Type': 'application/json' } : undefined,
        body: init.body,
        signal: controller.signal
      });

      if (!response.ok) {
        const errorText = await safeReadText(response);
        const retryAfterMs = parseRetryAfterMs(response.headers);
        throw new FoodDataCentralError(describeHttpFailure(response.status, response.statusText, errorText), {
          status: response.status,
          responseBody: errorText,
          retryable: isRetryableStatus(response.status),
          retryAfterMs
        });
      }

      const data: unknown = await response.json();
      const bodyError = detectUsdaErrorEnvelope(data, response.status);
      if (bodyError) {
        throw new FoodDataCentralError(bodyError.message, {
          status: bodyError.status,
          responseBody: safeSerialize(data),
          retryable: bodyError.retryable
        });
      }

      return data;
    } catch (error) {
      if (error instanceof FoodDataCentralError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new FoodDataCentralError('FoodData Central request timed out', { retryable: true, cause: error });
      }
      throw new FoodDataCentralError('FoodData Central request failed', { retryable: true, cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  private shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt >= this.maxRetries) {
      return false;
    }
    return error instanceof FoodDataCentralError && error.retryable;
  }

  private computeBackoffDelay(error: unknown, attempt: number): number {
    if (error instanceof FoodDataCentralError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }
    const base = this.retryDelayMs * Math.pow(2, attempt);
    const jitter = 0.5 + Math.random(); // between 0.5x and 1.5x
    return Math.round(base * jitter);
  }
}

async function safeReadText(response: { text: () => Promise<string> }): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

function pruneUndefined<T extends Record<string, unknown>>(value: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined && entry !== null)
  ) as Partial<T>;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

function normalizeBulkFoodsResponse(response: unknown): FoodItem[] {
  if (Array.isArray(response)) {
    return response.filter(isRecord);
  }

  if (isRecord(response)) {
    if (Array.isArray(response.foods)) {
      return response.foods.filter(isRecord);
    }
    if (Object.keys(response).length === 0) {
      return [];
    }
  }

  throw new FoodDataCentralError('Unexpected USDA bulk foods response format', {
    responseBody: safeSerialize(response),
    retryable: false
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toOptionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function safeSerialize(value: unknown): string {
  try {
    const serialized = JSON.stringify(value);
    if (typeof serialized !== 'string') {
      return '';
    }
    return serialized.length > 2000 ? `${serialized.slice(0, 2000)}…` : serialized;
  } catch (error) {
    return error instanceof Error ? error.message : '';
  }
}

function parseRetryAfterMs(headers: { get(name: string): string | null }): number | undefined {
  const header = headers.get('Retry-After');
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }

  return Math.max(0, date - Date.now());
}

function detectUsdaErrorEnvelope(
  payload: unknown,
  fallbackStatus: number
): { message: string; status: number; retryable: boolean } | undefined {
  if (!isRecord(payload) || !isRecord(payload.error)) {
    return undefined;
  }

  const code = typeof payload.error.code === 'string' ? payload.error.code : undefined;
  const message =
    typeof payload.error.message === 'string' ? payload.error.message : 'FoodData Central request failed.';
  const status = typeof payload.error.status === 'number' ? payload.error.status : fallbackStatus;

  return {
    message: code ? `USDA error ${code}: ${message}` : message,
    status,
    retryable: code === 'OVER_RATE_LIMIT' || isRetryableStatus(status)
  };
}

function describeHttpFailure(status: number, statusText: string, body: string): string {
  const parts = [`FoodData Central request failed: ${status} ${statusText}`.trim()];
  const details = parseUsdaErrorBody(body);
  if (details) {
    parts.push(details);
  }
  return parts.join(' — ');
}

function parseUsdaErrorBody(payload: string): string | undefined {
  if (!payload) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(payload);
    if (isRecord(parsed) && isRecord(parsed.error)) {
      const code = typeof parsed.error.code === 'string' ? parsed.error.code : undefined;
      const message = typeof parsed.error.message === 'string' ? parsed.error.message : undefined;
      return [code, message].filter(Boolean).join(': ') || undefined;
    }
  } catch {
    // not JSON; the status line is enough
  }

  return undefined;
}
