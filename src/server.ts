import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { describeEnvironmentOverride, loadSettings, type Settings } from './config.js';
import { UndefinedNormalizationError, describeError } from './errors.js';
import { format, renderLabelText } from './labelFormatter.js';
import type { Logger } from './logging.js';
import type { NutrientExtractor } from './nutrientExtractor.js';
import { aggregate, compareNutrient, normalizePerEnergy } from './nutrientMath.js';
import {
  NUTRIENT_KEYS,
  PER_ENERGY_KEYS,
  createRawProfile,
  type IngredientPortion,
  type NutrientProfile,
  type RawNutrientProfile
} from './nutrients.js';
import type { MatchResult, Resolver } from './resolver.js';
import type { ResultCache } from './resultCache.js';

export const SERVER_NAME = 'nutrition-label';
export const SERVER_VERSION = '1.0.0';

const MAX_BATCH_SIZE = 50;

const serverInstructions = [
  'Resolves free-text food descriptions to USDA FoodData Central records and builds nutrition labels from them.',
  'Requires USDA_API_KEY and OPENAI_API_KEY in the environment before startup.',
  'Typical flow: resolve-foods → get-nutrients or get-label → build-meal-label for weighed portions.',
  'Search results are cached on disk by exact query text; call clear-search-cache to force fresh searches.',
  'Expect structuredContent payloads for reliable downstream parsing.'
].join('\n');

const fdcIdSchema = z.number().int().positive().describe('FoodData Central (FDC) identifier.');
const nutrientKeySchema = z.enum(NUTRIENT_KEYS);

const nutrientValuesSchema = z
  .object({
    transFat: z.number(),
    saturatedFat: z.number(),
    cholesterol: z.number(),
    sodium: z.number(),
    carbohydrates: z.number(),
    fiber: z.number(),
    sugars: z.number(),
    protein: z.number(),
    vitaminA: z.number(),
    vitaminC: z.number(),
    calcium: z.number(),
    iron: z.number(),
    energy: z.number()
  })
  .strict();

const rawProfileSchema = z
  .object({
    basis: z.literal('per100g'),
    fdcId: z.number().int(),
    name: z.string().optional(),
    nutrients: nutrientValuesSchema
  })
  .strict();

const perEnergyProfileSchema = z
  .object({
    basis: z.literal('perKcal'),
    fdcId: z.number().int(),
    name: z.string().optional(),
    nutrients: nutrientValuesSchema
  })
  .strict();

const aggregateProfileSchema = z
  .object({
    basis: z.literal('aggregate'),
    fdcIds: z.array(z.number().int()),
    name: z.string().optional(),
    totalGrams: z.number(),
    nutrients: nutrientValuesSchema
  })
  .strict();

const labelEntrySchema = z
  .object({
    key: nutrientKeySchema,
    name: z.string(),
    amount: z.string(),
    dailyValue: z.string().optional()
  })
  .strict();

const labelSchema = z
  .object({
    title: z.string(),
    servingsPerContainer: z.number(),
    servingSize: z.string(),
    calories: z.number(),
    nutrients: z.array(labelEntrySchema),
    micronutrients: z.array(labelEntrySchema),
    footer: z.array(z.string())
  })
  .strict();

const matchResultSchema = z.discriminatedUnion('status', [
  z
    .object({
      status: z.literal('matched'),
      query: z.string(),
      fdcId: z.number().int(),
      description: z.string(),
      brandOwner: z.string().optional(),
      category: z.string().optional(),
      dataType: z.string().optional(),
      score: z.number()
    })
    .strict(),
  z.object({ status: z.literal('no-match'), query: z.string(), candidateCount: z.number().int() }).strict(),
  z
    .object({
      status: z.literal('no-candidates'),
      query: z.string(),
      reason: z.enum(['empty', 'lookup-failed']),
      error: z.string().optional()
    })
    .strict(),
  z.object({ status: z.literal('failed'), query: z.string(), error: z.string() }).strict()
]);

const extractionResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok'), fdcId: z.number().int(), profile: rawProfileSchema }).strict(),
  z.object({ status: z.literal('failed'), fdcId: z.number().int(), error: z.string() }).strict()
]);

const lookupFailureSchema = z.object({ fdcId: z.number().int(), error: z.string() }).strict();

const resolveFoodsInputShape = {
  queries: z
    .array(z.string().min(1))
    .min(1)
    .max(MAX_BATCH_SIZE)
    .describe('Free-text food descriptions, e.g. "bob\'s red mill gluten free flour". Matched verbatim.'),
  preferBranded: z
    .boolean()
    .optional()
    .describe('Compare against "brand owner + description" for branded candidates. Defaults to true.'),
  alpha: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe('Weight of semantic similarity; lexical similarity gets 1 - alpha. Defaults to 0.5.')
};

const resolveFoodsOutputShape = {
  results: z.array(matchResultSchema)
};

const getNutrientsInputShape = {
  items: z
    .array(
      z
        .object({
          fdcId: fdcIdSchema,
          name: z.string().optional().describe('Display name; defaults to the FDC description.')
        })
        .strict()
    )
    .min(1)
    .max(MAX_BATCH_SIZE)
};

const getNutrientsOutputShape = {
  results: z.array(extractionResultSchema)
};

const singleFoodInputShape = {
  fdcId: fdcIdSchema,
  name: z.string().optional().describe('Display name; defaults to the FDC description.')
};

const normalizeOutputShape = {
  source: rawProfileSchema,
  profile: perEnergyProfileSchema
};

const compareNutrientsInputShape = {
  fdcIds: z.array(fdcIdSchema).min(1).max(MAX_BATCH_SIZE),
  nutrient: nutrientKeySchema.describe('Canonical nutrient key to compare.'),
  perEnergy: z
    .boolean()
    .optional()
    .describe('Compare per-kcal values instead of per-100 g amounts. Foods without energy are reported as failures.')
};

const compareNutrientsOutputShape = {
  nutrient: nutrientKeySchema,
  basis: z.enum(['per100g', 'perKcal']),
  comparison: z.array(
    z
      .object({
        name: z.string(),
        fdcIds: z.array(z.number().int()),
        value: z.number()
      })
      .strict()
  ),
  failures: z.array(lookupFailureSchema)
};

const getLabelOutputShape = {
  profile: rawProfileSchema,
  label: labelSchema
};

const buildMealLabelInputShape = {
  portions: z
    .array(
      z
        .object({
          fdcId: fdcIdSchema,
          grams: z.number().nonnegative().describe('Portion weight in grams.'),
          name: z.string().optional().describe('Ingredient name shown in the meal title.')
        })
        .strict()
    )
    .min(1)
    .max(MAX_BATCH_SIZE),
  title: z.string().min(1).optional().describe('Label title; defaults to the joined ingredient names.')
};

const buildMealLabelOutputShape = {
  profile: aggregateProfileSchema,
  label: labelSchema
};

const clearCacheOutputShape = {
  cleared: z.boolean()
};

export interface CreateServerOptions {
  resolver: Resolver;
  extractor: NutrientExtractor;
  cache: ResultCache;
  settings?: Settings;
  logger?: Logger;
}

export function createServer(options: CreateServerOptions): McpServer {
  const { resolver, extractor, cache, logger } = options;
  const settings = options.settings ?? loadSettings();

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      instructions: serverInstructions
    }
  );

  server.server.registerCapabilities({
    logging: {},
    tools: {
      listChanged: true
    }
  });

  server.registerTool(
    'resolve-foods',
    {
      title: 'Resolve Foods',
      description:
        'Match free-text food descriptions to FoodData Central records using a blend of token-set and embedding similarity. Returns one result per query, in order.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: resolveFoodsInputShape,
      outputSchema: resolveFoodsOutputShape
    },
    async ({ queries, preferBranded, alpha }) => {
      const results = await resolver.resolveAll(queries, { preferBranded, alpha });
      const matched = results.filter((result) => result.status === 'matched').length;
      logger?.(`resolve-foods: ${matched}/${results.length} queries matched.`);

      const lines = [
        `Resolved ${matched} of ${results.length} queries.`,
        ...results.map((result) => describeMatchResult(result))
      ];
      return toolResult(lines.join('\n'), { results });
    }
  );

  server.registerTool(
    'get-nutrients',
    {
      title: 'Get Nutrient Profiles',
      description:
        'Fetch the canonical per-100 g nutrient profile for each FDC ID. Duplicate IDs are fetched once; a failed lookup is reported per item.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: getNutrientsInputShape,
      outputSchema: getNutrientsOutputShape
    },
    async ({ items }) => {
      const results = await extractor.extractAll(items);
      const lines = results.map((result) =>
        result.status === 'ok'
          ? `FDC ${result.fdcId}: ${describeProfile(result.profile)}`
          : `FDC ${result.fdcId}: lookup failed (${result.error})`
      );
      return toolResult(lines.join('\n'), { results });
    }
  );

  server.registerTool(
    'normalize-per-energy',
    {
      title: 'Normalize Per kcal',
      description:
        'Fetch a food and express protein, fiber, fats, sugars, calcium, vitamin C and sodium per kcal of energy. Fails for foods without energy.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: singleFoodInputShape,
      outputSchema: normalizeOutputShape
    },
    async ({ fdcId, name }) => {
      const source = await extractor.extract(fdcId, name);
      const profile = normalizePerEnergy(source);

      const lines = [
        `${source.name ?? `FDC ${fdcId}`} per kcal (${formatAmount(source.nutrients.energy)} kcal per 100 g):`,
        ...PER_ENERGY_KEYS.map((key) => `- ${key}: ${formatAmount(profile.nutrients[key])}`)
      ];
      return toolResult(lines.join('\n'), { source, profile });
    }
  );

  server.registerTool(
    'compare-nutrients',
    {
      title: 'Compare Nutrient',
      description: 'Compare one canonical nutrient across several FDC records, in the order given.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: compareNutrientsInputShape,
      outputSchema: compareNutrientsOutputShape
    },
    async ({ fdcIds, nutrient, perEnergy }) => {
      const extracted = await extractor.extractAll(fdcIds);
      const profiles: NutrientProfile[] = [];
      const failures: Array<{ fdcId: number; error: string }> = [];

      for (const result of extracted) {
        if (result.status === 'failed') {
          failures.push({ fdcId: result.fdcId, error: result.error });
          continue;
        }
        if (!perEnergy) {
          profiles.push(result.profile);
          continue;
        }
        try {
          profiles.push(normalizePerEnergy(result.profile));
        } catch (error) {
          if (!(error instanceof UndefinedNormalizationError)) {
            throw error;
          }
          failures.push({ fdcId: result.fdcId, error: error.message });
        }
      }

      const comparison = compareNutrient(profiles, nutrient);
      const lines = [
        ...comparison.map((entry) => `${entry.name}: ${formatAmount(entry.value)}`),
        ...failures.map((failure) => `FDC ${failure.fdcId}: ${failure.error}`)
      ];
      return toolResult(lines.join('\n'), {
        nutrient,
        basis: perEnergy ? 'perKcal' : 'per100g',
        comparison,
        failures
      });
    }
  );

  server.registerTool(
    'get-label',
    {
      title: 'Get Nutrition Label',
      description: 'Build the nutrition label schema for 100 g of a single FDC record.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: singleFoodInputShape,
      outputSchema: getLabelOutputShape
    },
    async ({ fdcId, name }) => {
      const profile = await extractor.extract(fdcId, name);
      const label = format(profile);
      return toolResult(renderLabelText(label), { profile, label });
    }
  );

  server.registerTool(
    'build-meal-label',
    {
      title: 'Build Meal Label',
      description:
        'Aggregate weighed portions of FDC records into one meal profile and build its nutrition label. Fails if any portion cannot be looked up.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: true
      },
      inputSchema: buildMealLabelInputShape,
      outputSchema: buildMealLabelOutputShape
    },
    async ({ portions, title }) => {
      const extracted = await extractor.extractAll(portions.map(({ fdcId }) => fdcId));
      const profiles = new Map<number, RawNutrientProfile>();
      const failures: string[] = [];
      for (const result of extracted) {
        if (result.status === 'ok') {
          profiles.set(result.fdcId, result.profile);
        } else {
          failures.push(`FDC ${result.fdcId} (${result.error})`);
        }
      }
      if (failures.length) {
        throw new Error(`Could not load nutrients for ${failures.join(', ')}.`);
      }

      const ingredientPortions: IngredientPortion[] = portions.map((portion) => {
        const profile = profiles.get(portion.fdcId);
        if (!profile) {
          throw new Error(`No nutrient profile loaded for FDC ${portion.fdcId}.`);
        }
        return {
          profile: portion.name ? createRawProfile(profile.fdcId, profile.nutrients, portion.name) : profile,
          grams: portion.grams
        };
      });

      const meal = aggregate(ingredientPortions);
      const profile = title ? { ...meal, name: title } : meal;
      const label = format(profile);
      logger?.(`build-meal-label: ${portions.length} portions, ${formatAmount(profile.totalGrams)} g total.`);
      return toolResult(renderLabelText(label), { profile, label });
    }
  );

  server.registerTool(
    'clear-search-cache',
    {
      title: 'Clear Search Cache',
      description: 'Drop every cached catalog search so the next resolve-foods call searches FoodData Central again.',
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: true
      },
      outputSchema: clearCacheOutputShape
    },
    async () => {
      await cache.clear();
      logger?.('Search cache cleared.');
      return toolResult('Cleared cached search results.', { cleared: true });
    }
  );

  server.registerResource(
    'nutrition-label-environment',
    'config://nutrition-label/environment',
    {
      title: 'Nutrition Label Server Environment',
      description: 'Summarises configuration defaults, overrides, and operational guidance for this MCP server.',
      mimeType: 'text/markdown'
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: buildEnvironmentOverview(settings)
        }
      ]
    })
  );

  return server;
}

/** Logger that forwards messages to the connected client as MCP log notifications. */
export function mcpLogger(server: McpServer): Logger {
  return (message) => {
    server
      .sendLoggingMessage({
        level: 'info',
        logger: SERVER_NAME,
        data: message
      })
      .catch((error: unknown) => {
        console.error(`Failed to forward log message: ${describeError(error)}`);
      });
  };
}

export function buildEnvironmentOverview(settings: Settings, env: NodeJS.ProcessEnv = process.env): string {
  const usdaKeyStatus = env.USDA_API_KEY
    ? 'USDA_API_KEY detected in environment.'
    : 'USDA_API_KEY missing; the server will fail to start until it is provided.';
  const openAiKeyStatus = env.OPENAI_API_KEY
    ? 'OPENAI_API_KEY detected in environment.'
    : 'OPENAI_API_KEY missing; the server will fail to start until it is provided.';
  const ttlHours = Math.round(settings.resultCacheTtlMs / (60 * 60 * 1000));

  return [
    '# Nutrition Label MCP Environment',
    '',
    `- FoodData Central base URL: ${settings.usdaBaseUrl}`,
    `- USDA API key: ${usdaKeyStatus}`,
    `- OpenAI API key: ${openAiKeyStatus}`,
    `- Embedding model: ${settings.embeddingModel}`,
    `- Search cache: ${settings.resultCachePath} (max ${settings.resultCacheMaxEntries} entries, ${ttlHours}h TTL)`,
    `- Resolver concurrency: ${settings.resolverConcurrency} queries at a time`,
    `- Search page size: ${settings.searchPageSize} candidates per query`,
    '- Request policy: up to 1 concurrent USDA call with ≥400ms spacing and up to 2 exponential backoff retries on HTTP 429/5xx or timeouts.',
    '',
    describeEnvironmentOverride()
  ].join('\n');
}

function toolResult(text: string, structuredContent: Record<string, unknown>): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text
      }
    ],
    structuredContent
  };
}

function describeMatchResult(result: MatchResult): string {
  switch (result.status) {
    case 'matched':
      return `"${result.query}" → FDC ${result.fdcId} ${result.description}${
        result.brandOwner ? ` (${result.brandOwner})` : ''
      } score ${result.score.toFixed(3)}`;
    case 'no-match':
      return `"${result.query}" → no match among ${result.candidateCount} candidates`;
    case 'no-candidates':
      return `"${result.query}" → no candidates${result.error ? ` (${result.error})` : ''}`;
    case 'failed':
      return `"${result.query}" → failed (${result.error})`;
  }
}

function describeProfile(profile: RawNutrientProfile): string {
  const { energy, protein, carbohydrates, sodium } = profile.nutrients;
  return `${profile.name ?? 'Unnamed food'}: ${formatAmount(energy)} kcal, ${formatAmount(protein)} g protein, ${formatAmount(
    carbohydrates
  )} g carbohydrate, ${formatAmount(sodium)} mg sodium per 100 g`;
}

function formatAmount(value: number): string {
  return Number(value.toPrecision(4)).toString();
}
