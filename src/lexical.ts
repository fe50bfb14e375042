/**
 * Token-set similarity between two strings in [0, 1].
 *
 * Both strings are lower-cased and split into alphanumeric tokens. The shared
 * tokens (sorted) form a common prefix; each side's remaining tokens (sorted)
 * are appended to it, and the best pairwise similarity among the three strings
 * wins. A phrase whose tokens are a subset of the other's scores 1.
 *
 * The result is rounded to two decimals.
 */
export function tokenSetRatio(left: string, right: string): number {
  const leftTokens = tokenize(left);
  const rightTokens = tokenize(right);
  if (leftTokens.size === 0 || rightTokens.size === 0) {
    return 0;
  }

  const shared = [...leftTokens].filter((token) => rightTokens.has(token)).sort();
  const leftOnly = [...leftTokens].filter((token) => !rightTokens.has(token)).sort();
  const rightOnly = [...rightTokens].filter((token) => !leftTokens.has(token)).sort();

  const sharedText = shared.join(' ');
  const leftCombined = [sharedText, leftOnly.join(' ')].join(' ').trim();
  const rightCombined = [sharedText, rightOnly.join(' ')].join(' ').trim();

  const best = Math.max(
    similarity(sharedText, leftCombined),
    similarity(sharedText, rightCombined),
    similarity(leftCombined, rightCombined)
  );
  return Math.round(best * 100) / 100;
}

export function tokenize(value: string): Set<string> {
  const tokens = value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim()
    .split(' ')
    .filter((token) => token.length > 0);
  return new Set(tokens);
}

/** Indel similarity: 2 * LCS / (|a| + |b|). Two empty strings score 0. */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0 || a.length === 0 || b.length === 0) {
    return 0;
  }
  return (2 * longestCommonSubsequence(a, b)) / total;
}

function longestCommonSubsequence(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      current[j] =
        a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}
