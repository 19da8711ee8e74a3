/**
 * Approximate text matching for fuzzy search
 *
 * Scores use the Sørensen–Dice coefficient over character bigrams:
 * 2 * |shared bigrams| / (|bigrams(a)| + |bigrams(b)|), counting repeated
 * bigrams as many times as they occur. Texts are lower-cased and runs of
 * whitespace collapsed before comparison.
 */

export function normalizeForMatch(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function bigrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  const chars = [...text];
  for (let i = 0; i < chars.length - 1; i++) {
    const gram = `${chars[i] ?? ''}${chars[i + 1] ?? ''}`;
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Dice coefficient of two strings in [0, 1]. Identical strings score 1,
 * including single-character ones.
 */
export function diceCoefficient(a: string, b: string): number {
  const left = normalizeForMatch(a);
  const right = normalizeForMatch(b);
  if (left === right) return left === '' ? 0 : 1;

  const leftGrams = bigrams(left);
  const rightGrams = bigrams(right);
  let leftTotal = 0;
  let rightTotal = 0;
  for (const count of leftGrams.values()) leftTotal += count;
  for (const count of rightGrams.values()) rightTotal += count;
  if (leftTotal + rightTotal === 0) return 0;

  let shared = 0;
  for (const [gram, count] of leftGrams) {
    shared += Math.min(count, rightGrams.get(gram) ?? 0);
  }
  return (2 * shared) / (leftTotal + rightTotal);
}

export interface WindowMatch {
  score: number;
  window: string;
}

/**
 * Best score of `needle` against every run of consecutive words in
 * `haystack` that has as many words as the needle
 */
export function bestWindowMatch(needle: string, haystack: string): WindowMatch {
  const needleNorm = normalizeForMatch(needle);
  const words = normalizeForMatch(haystack).split(' ').filter((word) => word !== '');
  const size = Math.max(1, needleNorm.split(' ').length);

  if (words.length <= size) {
    const window = words.join(' ');
    return { score: diceCoefficient(needleNorm, window), window };
  }

  let best: WindowMatch = { score: 0, window: '' };
  for (let i = 0; i + size <= words.length; i++) {
    const window = words.slice(i, i + size).join(' ');
    const score = diceCoefficient(needleNorm, window);
    if (score > best.score) {
      best = { score, window };
      if (score === 1) break;
    }
  }
  return best;
}
