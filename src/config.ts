import path from 'node:path';

const API_KEY_ENV_VAR = 'USDA_API_KEY';
const BASE_URL_ENV_VAR = 'USDA_API_BASE_URL';
const OPENAI_KEY_ENV_VAR = 'OPENAI_API_KEY';

const configuredBaseUrl = process.env[BASE_URL_ENV_VAR];

export const USDA_API_BASE_URL = configuredBaseUrl
  ? ensureTrailingSlash(configuredBaseUrl)
  : 'https://api.nal.usda.gov/fdc/v1/';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_RESULT_CACHE_PATH = '.cache/food-search-cache.json';
export const DEFAULT_RESULT_CACHE_MAX_ENTRIES = 1000;
export const DEFAULT_RESULT_CACHE_TTL_HOURS = 720;
export const DEFAULT_RESOLVER_CONCURRENCY = 4;
export const DEFAULT_SEARCH_PAGE_SIZE = 25;

type Environment = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'ConfigurationError';
    if (options?.cause !== undefined) {
      (this as { cause?: unknown }).cause = options.cause;
    }
  }
}

export interface Settings {
  usdaBaseUrl: string;
  embeddingModel: string;
  resultCachePath: string;
  resultCacheMaxEntries: number;
  resultCacheTtlMs: number;
  resolverConcurrency: number;
  searchPageSize: number;
}

export function getApiKey(env: Environment = process.env): string {
  return requireValue(
    env,
    API_KEY_ENV_VAR,
    `Missing USDA API key. Set ${API_KEY_ENV_VAR} in your environment (e.g., via MCP config env.USDA_API_KEY) before starting the server.`
  );
}

export function getOpenAiApiKey(env: Environment = process.env): string {
  return requireValue(
    env,
    OPENAI_KEY_ENV_VAR,
    `Missing OpenAI API key. Set ${OPENAI_KEY_ENV_VAR} so food descriptions can be embedded for semantic matching.`
  );
}

export function loadSettings(env: Environment = process.env, cwd: string = process.cwd()): Settings {
  const baseUrl = env[BASE_URL_ENV_VAR];
  return {
    usdaBaseUrl: baseUrl ? ensureTrailingSlash(baseUrl) : USDA_API_BASE_URL,
    embeddingModel: env.EMBEDDING_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL,
    resultCachePath: path.resolve(cwd, env.RESULT_CACHE_PATH?.trim() || DEFAULT_RESULT_CACHE_PATH),
    resultCacheMaxEntries: readPositiveInt(env, 'RESULT_CACHE_MAX_ENTRIES', DEFAULT_RESULT_CACHE_MAX_ENTRIES),
    resultCacheTtlMs:
      readPositiveInt(env, 'RESULT_CACHE_TTL_HOURS', DEFAULT_RESULT_CACHE_TTL_HOURS) * 60 * 60 * 1000,
    resolverConcurrency: readPositiveInt(env, 'RESOLVER_CONCURRENCY', DEFAULT_RESOLVER_CONCURRENCY),
    searchPageSize: Math.min(readPositiveInt(env, 'SEARCH_PAGE_SIZE', DEFAULT_SEARCH_PAGE_SIZE), 200)
  };
}

export function describeEnvironmentOverride(): string {
  return `Required: set ${API_KEY_ENV_VAR} with your USDA FoodData Central API key and ${OPENAI_KEY_ENV_VAR} for embeddings before starting the MCP server.`;
}

function requireValue(env: Environment, name: string, message: string): string {
  const value = env[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(message);
  }
  return value;
}

function readPositiveInt(env: Environment, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${name} must be a positive integer (received "${raw}").`);
  }
  return parsed;
}

function ensureTrailingSlash(value: string): string {
  return value.endsWith('/') ? value : `${value}/`;
}
