export * from './catalog.js';
export * from './concurrency.js';
export * from './config.js';
export * from './embeddingCache.js';
export * from './errors.js';
export * from './foodDataCentral.js';
export * from './hybridMatcher.js';
export * from './labelFormatter.js';
export * from './lexical.js';
export * from './logging.js';
export * from './nutrientExtractor.js';
export * from './nutrientMath.js';
export * from './nutrients.js';
export * from './resolver.js';
export * from './resultCache.js';
export * from './server.js';
export * from './usdaClient.js';
