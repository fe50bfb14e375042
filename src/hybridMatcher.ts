import type { CatalogCandidate, EmbeddingService } from './catalog.js';
import { tokenSetRatio } from './lexical.js';

export const DEFAULT_ALPHA = 0.5;

export interface MatchOptions {
  /** Compare against "brand owner + description" when the candidate has a brand. */
  preferBranded?: boolean;
  /** Weight of the semantic score; the lexical score gets `1 - alpha`. */
  alpha?: number;
}

export interface CandidateScore {
  lexical: number;
  semantic: number;
  hybrid: number;
}

export type MatchOutcome =
  | {
      status: 'matched';
      candidate: CatalogCandidate;
      index: number;
      scores: CandidateScore;
    }
  | { status: 'no-match'; candidateCount: number };

export class HybridMatcher {
  constructor(private readonly embeddings: EmbeddingService) {}

  async match(query: string, candidates: readonly CatalogCandidate[], options?: MatchOptions): Promise<MatchOutcome> {
    const preferBranded = options?.preferBranded ?? true;
    const alpha = resolveAlpha(options?.alpha);

    if (candidates.length === 0) {
      return { status: 'no-match', candidateCount: 0 };
    }

    const comparisons = candidates.map((candidate) => buildComparisonString(candidate, preferBranded));
    const vectors = await this.embeddings.embedMany([query, ...comparisons]);
    if (vectors.length !== comparisons.length + 1) {
      throw new Error(`Expected ${comparisons.length + 1} embeddings for "${query}", received ${vectors.length}.`);
    }
    const [queryVector, ...candidateVectors] = vectors;
    let best: { index: number; scores: CandidateScore } | undefined;

    for (let index = 0; index < candidates.length; index += 1) {
      const lexical = tokenSetRatio(query, comparisons[index]);
      const semantic = clampUnit(cosineSimilarity(queryVector, candidateVectors[index]));
      const hybrid = hybridScore(semantic, lexical, alpha);

      // Strict comparison: the earliest candidate keeps a tie.
      if (hybrid > (best?.scores.hybrid ?? 0)) {
        best = { index, scores: { lexical, semantic, hybrid } };
      }
    }

    if (!best) {
      return { status: 'no-match', candidateCount: candidates.length };
    }

    return {
      status: 'matched',
      candidate: candidates[best.index],
      index: best.index,
      scores: best.scores
    };
  }
}

export function buildComparisonString(candidate: CatalogCandidate, preferBranded: boolean): string {
  return preferBranded && candidate.brandOwner
    ? `${candidate.brandOwner} ${candidate.description}`
    : candidate.description;
}

export function hybridScore(semantic: number, lexical: number, alpha: number = DEFAULT_ALPHA): number {
  return alpha * semantic + (1 - alpha) * lexical;
}

export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  if (left.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] * left[index];
    rightNorm += right[index] * right[index];
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Returns the effective alpha, rejecting values outside [0, 1]. */
export function resolveAlpha(alpha: number | undefined): number {
  const value = alpha ?? DEFAULT_ALPHA;
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`alpha must be between 0 and 1 (received ${value}).`);
  }
  return value;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
