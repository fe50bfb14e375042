import type { CatalogCandidate, CatalogSearch } from './catalog.js';
import { KeyedLock, mapWithConcurrency } from './concurrency.js';
import { describeError, isFatalLookupError } from './errors.js';
import { HybridMatcher, resolveAlpha, type MatchOptions, type MatchOutcome } from './hybridMatcher.js';
import type { Logger } from './logging.js';
import type { ResultCache } from './resultCache.js';

const DEFAULT_CONCURRENCY = 4;

export type MatchResult =
  | {
      status: 'matched';
      query: string;
      fdcId: number;
      description: string;
      brandOwner?: string;
      category?: string;
      dataType?: string;
      score: number;
    }
  | { status: 'no-match'; query: string; candidateCount: number }
  | { status: 'no-candidates'; query: string; reason: 'empty' | 'lookup-failed'; error?: string }
  | { status: 'failed'; query: string; error: string };

export interface ResolverOptions {
  catalog: CatalogSearch;
  cache: ResultCache;
  matcher: HybridMatcher;
  concurrency?: number;
  logger?: Logger;
}

type CandidateFetch =
  | { ok: true; candidates: CatalogCandidate[]; fromCache: boolean }
  | { ok: false; error: string };

export class Resolver {
  private readonly catalog: CatalogSearch;
  private readonly cache: ResultCache;
  private readonly matcher: HybridMatcher;
  private readonly concurrency: number;
  private readonly logger?: Logger;
  private readonly locks = new KeyedLock();

  constructor(options: ResolverOptions) {
    this.catalog = options.catalog;
    this.cache = options.cache;
    this.matcher = options.matcher;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options.logger;
  }

  /** Resolves every query independently; output order follows input order. */
  async resolveAll(queries: readonly string[], options?: MatchOptions): Promise<MatchResult[]> {
    resolveAlpha(options?.alpha);
    return mapWithConcurrency(queries, this.concurrency, (query) => this.resolve(query, options));
  }

  async resolve(query: string, options?: MatchOptions): Promise<MatchResult> {
    resolveAlpha(options?.alpha);
    const fetched = await this.fetchCandidates(query);
    if (!fetched.ok) {
      return { status: 'no-candidates', query, reason: 'lookup-failed', error: fetched.error };
    }
    if (fetched.candidates.length === 0) {
      return { status: 'no-candidates', query, reason: 'empty' };
    }

    let outcome: MatchOutcome;
    try {
      outcome = await this.matcher.match(query, fetched.candidates, options);
    } catch (error) {
      if (isFatalLookupError(error)) {
        throw error;
      }
      this.logger?.(`Matching failed for "${query}": ${describeError(error)}`);
      return { status: 'failed', query, error: describeError(error) };
    }

    if (outcome.status === 'no-match') {
      return { status: 'no-match', query, candidateCount: outcome.candidateCount };
    }

    const { candidate, scores } = outcome;
    this.logger?.(
      `Matched "${query}" to FDC ${candidate.fdcId} (${candidate.description}) score=${scores.hybrid.toFixed(3)}${
        fetched.fromCache ? ' [cached search]' : ''
      }`
    );
    return {
      status: 'matched',
      query,
      fdcId: candidate.fdcId,
      description: candidate.description,
      ...(candidate.brandOwner ? { brandOwner: candidate.brandOwner } : {}),
      ...(candidate.category ? { category: candidate.category } : {}),
      ...(candidate.dataType ? { dataType: candidate.dataType } : {}),
      score: scores.hybrid
    };
  }

  /** Cache check and search run under a per-query lock: one search per query text. */
  private fetchCandidates(query: string): Promise<CandidateFetch> {
    return this.locks.run<CandidateFetch>(query, async () => {
      let cached: CatalogCandidate[] | undefined;
      try {
        cached = await this.cache.get(query);
      } catch (error) {
        this.logger?.(`Could not read cached search results for "${query}": ${describeError(error)}`);
      }
      if (cached) {
        return { ok: true, candidates: cached, fromCache: true };
      }

      let candidates: CatalogCandidate[];
      try {
        candidates = await this.catalog.search(query);
      } catch (error) {
        if (isFatalLookupError(error)) {
          throw error;
        }
        this.logger?.(`Catalog search failed for "${query}": ${describeError(error)}`);
        return { ok: false, error: describeError(error) };
      }

      try {
        await this.cache.put(query, candidates);
      } catch (error) {
        this.logger?.(`Could not cache search results for "${query}": ${describeError(error)}`);
      }
      return { ok: true, candidates, fromCache: false };
    });
  }
}
