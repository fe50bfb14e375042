#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { getApiKey, getOpenAiApiKey, loadSettings } from './config.js';
import { describeError } from './errors.js';
import { EmbeddingCache, OpenAIEmbeddingService } from './embeddingCache.js';
import { FoodDataCentralCatalog } from './foodDataCentral.js';
import { HybridMatcher } from './hybridMatcher.js';
import { scopedLogger, type Logger } from './logging.js';
import { NutrientExtractor } from './nutrientExtractor.js';
import { Resolver } from './resolver.js';
import { FileResultCache } from './resultCache.js';
import { createServer, mcpLogger } from './server.js';
import { FoodDataCentralClient } from './usdaClient.js';

// Components are built before the server exists; messages are dropped until it does.
let forward: Logger | undefined;
const logger: Logger = (message) => forward?.(message);

let server: McpServer;

try {
  const settings = loadSettings();
  const client = new FoodDataCentralClient({
    baseUrl: settings.usdaBaseUrl,
    apiKey: getApiKey(),
    logger: scopedLogger(logger, 'usda')
  });
  const catalog = new FoodDataCentralCatalog(client, {
    pageSize: settings.searchPageSize,
    logger: scopedLogger(logger, 'catalog')
  });
  const cache = new FileResultCache(settings.resultCachePath, {
    maxEntries: settings.resultCacheMaxEntries,
    ttlMs: settings.resultCacheTtlMs,
    logger: scopedLogger(logger, 'cache')
  });
  const embeddings = new EmbeddingCache(
    new OpenAIEmbeddingService({
      apiKey: getOpenAiApiKey(),
      model: settings.embeddingModel,
      logger: scopedLogger(logger, 'embeddings')
    })
  );
  const resolver = new Resolver({
    catalog,
    cache,
    matcher: new HybridMatcher(embeddings),
    concurrency: settings.resolverConcurrency,
    logger: scopedLogger(logger, 'resolver')
  });
  const extractor = new NutrientExtractor(catalog, {
    concurrency: settings.resolverConcurrency,
    logger: scopedLogger(logger, 'nutrients')
  });

  server = createServer({ resolver, extractor, cache, settings, logger });
  forward = mcpLogger(server);
} catch (error) {
  console.error('Failed to initialize the nutrition label MCP server.');
  console.error(describeError(error));
  process.exit(1);
}

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  process.stdin.resume();
  await waitForShutdown();
}

main().catch((error) => {
  console.error('Nutrition label MCP server crashed.');
  console.error(describeError(error));
  process.exit(1);
});

async function waitForShutdown(): Promise<void> {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  await new Promise<void>((resolve) => {
    let resolved = false;

    const originalOnClose = server.server.onclose;
    const keepAlive = setInterval(() => {
      // Prevent the process from exiting before the client connects.
    }, 1 << 30);

    const cleanup = (): void => {
      clearInterval(keepAlive);
      for (const signal of signals) {
        process.removeListener(signal, handleSignal);
      }
      server.server.onclose = originalOnClose;
    };

    const resolveOnce = (): void => {
      if (resolved) {
        return;
      }
      resolved = true;
      cleanup();
      resolve();
    };

    const handleSignal = (): void => {
      if (resolved) {
        return;
      }

      server
        .close()
        .catch((closeError) => {
          console.error('Failed to close the nutrition label MCP server gracefully.');
          console.error(describeError(closeError));
        })
        .finally(resolveOnce);
    };

    server.server.onclose = () => {
      if (typeof originalOnClose === 'function') {
        originalOnClose();
      }
      resolveOnce();
    };

    for (const signal of signals) {
      process.on(signal, handleSignal);
    }
  });
}
