import { describe, expect, it, vi } from 'vitest';

import {
  HybridMatcher,
  buildComparisonString,
  cosineSimilarity,
  hybridScore,
  resolveAlpha
} from './hybridMatcher.js';
import { TableEmbeddings, candidate } from './testing/fakes.js';

describe('buildComparisonString', () => {
  const branded = candidate(1, 'Avocado Dip', { brandOwner: 'Brand X' });

  it('prefixes the brand owner when branded matching is preferred', () => {
    expect(buildComparisonString(branded, true)).toBe('Brand X Avocado Dip');
  });

  it('uses the bare description otherwise', () => {
    expect(buildComparisonString(branded, false)).toBe('Avocado Dip');
    expect(buildComparisonString(candidate(2, 'Avocado, raw'), true)).toBe('Avocado, raw');
  });
});

describe('hybridScore', () => {
  it('blends semantic and lexical scores by alpha', () => {
    expect(hybridScore(0.8, 0.4, 0.5)).toBeCloseTo(0.6);
    expect(hybridScore(0.8, 0.4, 0)).toBeCloseTo(0.4);
    expect(hybridScore(0.8, 0.4, 1)).toBeCloseTo(0.8);
  });

  it('stays between the two inputs for every alpha in [0, 1]', () => {
    for (const alpha of [0, 0.1, 0.25, 0.5, 0.75, 0.9, 1]) {
      const score = hybridScore(0.2, 0.9, alpha);
      expect(score).toBeGreaterThanOrEqual(0.2 - 1e-12);
      expect(score).toBeLessThanOrEqual(0.9 + 1e-12);
    }
  });
});

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 for empty, mismatched or zero vectors', () => {
    expect(cosineSimilarity([], [])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe('resolveAlpha', () => {
  it('defaults to 0.5', () => {
    expect(resolveAlpha(undefined)).toBe(0.5);
  });

  it('rejects values outside [0, 1]', () => {
    expect(() => resolveAlpha(1.5)).toThrow(RangeError);
    expect(() => resolveAlpha(-0.1)).toThrow(RangeError);
    expect(() => resolveAlpha(Number.NaN)).toThrow(RangeError);
  });
});

describe('HybridMatcher', () => {
  it('returns no-match for an empty candidate list without embedding anything', async () => {
    const embeddings = new TableEmbeddings();
    const outcome = await new HybridMatcher(embeddings).match('avocado', []);

    expect(outcome).toEqual({ status: 'no-match', candidateCount: 0 });
    expect(embeddings.calls).toEqual([]);
  });

  it('ranks purely lexically at alpha 0 and purely semantically at alpha 1', async () => {
    const lexicalFavourite = candidate(1, 'Greek yogurt, plain');
    const semanticFavourite = candidate(2, 'Strained dairy snack');
    const matcher = new HybridMatcher(
      new TableEmbeddings({
        'greek yogurt': [1, 0],
        'Greek yogurt, plain': [0, 1],
        'Strained dairy snack': [1, 0]
      })
    );

    const lexical = await matcher.match('greek yogurt', [lexicalFavourite, semanticFavourite], { alpha: 0 });
    const semantic = await matcher.match('greek yogurt', [lexicalFavourite, semanticFavourite], { alpha: 1 });

    expect(lexical).toEqual({
      status: 'matched',
      candidate: lexicalFavourite,
      index: 0,
      scores: { lexical: 1, semantic: 0, hybrid: 1 }
    });
    expect(semantic.status === 'matched' && semantic.candidate.fdcId).toBe(2);
  });

  it('picks the unbranded avocado at every alpha when brands are ignored', async () => {
    const candidates = [candidate(1, 'Avocado, raw'), candidate(2, 'Avocado Dip', { brandOwner: 'Brand X' })];
    const matcher = new HybridMatcher(
      new TableEmbeddings({
        avocado: [1, 0],
        'Avocado, raw': [1, 0],
        'Avocado Dip': [0.6, 0.8]
      })
    );

    for (const alpha of [0, 0.25, 0.5, 0.75, 1]) {
      const outcome = await matcher.match('avocado', candidates, { preferBranded: false, alpha });
      expect(outcome.status === 'matched' && outcome.candidate.fdcId).toBe(1);
    }
  });

  it('keeps the earliest candidate on a tie', async () => {
    const first = candidate(10, 'Avocado, raw');
    const second = candidate(20, 'Avocado Dip', { brandOwner: 'Brand X' });
    const matcher = new HybridMatcher(new TableEmbeddings());

    const forward = await matcher.match('avocado', [first, second]);
    const reversed = await matcher.match('avocado', [second, first]);

    expect(forward.status === 'matched' && forward.candidate.fdcId).toBe(10);
    expect(reversed.status === 'matched' && reversed.candidate.fdcId).toBe(20);
  });

  it('embeds the brand-augmented string when branded matching is preferred', async () => {
    const embeddings = new TableEmbeddings();
    await new HybridMatcher(embeddings).match('avocado dip', [
      candidate(2, 'Avocado Dip', { brandOwner: 'Brand X' })
    ]);

    expect(embeddings.calls).toEqual(['avocado dip', 'Brand X Avocado Dip']);
  });

  it('embeds the query and every candidate in one batch', async () => {
    const embeddings = new TableEmbeddings();
    const embedMany = vi.spyOn(embeddings, 'embedMany');

    await new HybridMatcher(embeddings).match('rice', [candidate(1, 'Rice, white'), candidate(2, 'Rice, brown')]);

    expect(embedMany).toHaveBeenCalledTimes(1);
    expect(embedMany).toHaveBeenCalledWith(['rice', 'Rice, white', 'Rice, brown']);
  });

  it('rejects a service that returns the wrong number of vectors', async () => {
    const embeddings = new TableEmbeddings();
    vi.spyOn(embeddings, 'embedMany').mockResolvedValue([[1, 0]]);

    await expect(new HybridMatcher(embeddings).match('rice', [candidate(1, 'Rice, white')])).rejects.toThrow(
      'Expected 2 embeddings for "rice", received 1.'
    );
  });

  it('reports no-match when nothing scores above zero', async () => {
    const matcher = new HybridMatcher(new TableEmbeddings({ zzz: [1, 0], apple: [-1, 0] }));

    const outcome = await matcher.match('zzz', [candidate(5, 'apple')]);

    expect(outcome).toEqual({ status: 'no-match', candidateCount: 1 });
  });

  it('rejects an alpha outside [0, 1]', async () => {
    const matcher = new HybridMatcher(new TableEmbeddings());

    await expect(matcher.match('avocado', [candidate(1, 'Avocado, raw')], { alpha: 2 })).rejects.toBeInstanceOf(
      RangeError
    );
  });
});
