/**
 * Skill Normalizer Module
 *
 * Fuzzy string comparison used to map skill mentions onto canonical taxonomy
 * names. Strings are reduced to a token-sorted key (lowercase, alphanumeric
 * tokens only, sorted) and compared with the Dice coefficient from
 * string-similarity, so word order and punctuation do not affect the score.
 */

import stringSimilarity from 'string-similarity';

export interface FuzzyMatch {
  target: string;
  /** 0-1 */
  rating: number;
}

/**
 * Lowercase, strip non-alphanumerics and sort the remaining tokens.
 * "Machine-Learning" and "learning machine" both become "learning machine".
 */
export function tokenSortKey(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .sort()
    .join(' ');
}

function tokenSet(text: string): Set<string> {
  return new Set(tokenSortKey(text).split(' ').filter(Boolean));
}

function similarity(a: string, b: string): number {
  if (!a || !b) return 0;
  return stringSimilarity.compareTwoStrings(a, b);
}

export function tokenSortSimilarity(a: string, b: string): number {
  return similarity(tokenSortKey(a), tokenSortKey(b));
}

/**
 * Token-set similarity: the shared tokens are compared against the shared
 * tokens plus each side's remainder, and the two such strings against each
 * other; the best of the three wins. A string whose tokens all appear in
 * the other scores 1.
 */
export function tokenSetSimilarity(a: string, b: string): number {
  const left = tokenSet(a);
  const right = tokenSet(b);
  if (left.size === 0 || right.size === 0) return 0;

  const common = [...left].filter((token) => right.has(token)).sort();
  const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
  const onlyRight = [...right].filter((token) => !left.has(token)).sort();

  const shared = common.join(' ');
  const withLeft = [...common, ...onlyLeft].join(' ');
  const withRight = [...common, ...onlyRight].join(' ');

  return Math.max(
    similarity(shared, withLeft),
    similarity(shared, withRight),
    similarity(withLeft, withRight)
  );
}

/**
 * Best token-sort match for `query` among `candidates`.
 *
 * Ties at the best rating go to the candidate equal to the query ignoring
 * case, otherwise to the earliest candidate. Returns null for an empty
 * candidate list.
 */
export function findBestMatch(query: string, candidates: readonly string[]): FuzzyMatch | null {
  const key = tokenSortKey(query);
  const folded = query.toLowerCase();
  let best: FuzzyMatch | null = null;

  for (const candidate of candidates) {
    const rating = similarity(key, tokenSortKey(candidate));
    if (
      best === null ||
      rating > best.rating ||
      (rating === best.rating &&
        candidate.toLowerCase() === folded &&
        best.target.toLowerCase() !== folded)
    ) {
      best = { target: candidate, rating };
    }
  }

  return best;
}
