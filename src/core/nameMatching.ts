/**
 * Person Name Canonicalization
 *
 * Normalizes names read from different documents (ID card caption, bank
 * account holder, letters) so they can be compared independent of case,
 * accents, honorifics, punctuation and token order.
 *
 * @module core/nameMatching
 */

export interface NameMatchResult {
  isMatch: boolean;
  /** Jaccard similarity of the canonical token sets (0-100) */
  similarity: number;
  matchType: 'exact' | 'normalized' | 'token' | 'none';
  reasoning: string;
}

const HONORIFICS = new Set(['MR', 'MRS', 'MS', 'MISS', 'DR', 'SHEIKH', 'SHAIKHA', 'ENG', 'PROF']);

// Connective particles are spelled in many ways ("Bin", "Ibn", "Al-") and carry no identity.
const PARTICLES = new Set(['AL', 'EL', 'BIN', 'BINT', 'IBN', 'ABU']);

export function removeDiacritics(input: string): string {
  return input.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Upper-cased, accent-free tokens without honorifics or particles, sorted.
 */
export function canonicalNameTokens(input: string): string[] {
  return removeDiacritics(input.toUpperCase())
    .replace(/[.,\-_()']/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 1 && !HONORIFICS.has(token) && !PARTICLES.has(token))
    .sort();
}

export function canonicalizeName(input: string): string {
  return canonicalNameTokens(input).join(' ');
}

function jaccardSimilarity(a: string[], b: string[]): number {
  const setA = new Set(a);
  const setB = new Set(b);
  const union = new Set([...setA, ...setB]);
  if (union.size === 0) return 0;
  let shared = 0;
  for (const token of setA) {
    if (setB.has(token)) shared++;
  }
  return (shared / union.size) * 100;
}

function tokenOverlap(a: string[], b: string[]): number {
  const setA = new Set(a);
  const setB = new Set(b);
  const [smaller, larger] = setA.size <= setB.size ? [setA, setB] : [setB, setA];
  if (smaller.size === 0) return 0;
  let shared = 0;
  for (const token of smaller) {
    if (larger.has(token)) shared++;
  }
  return (shared / smaller.size) * 100;
}

/**
 * Compares two person names. A full overlap of the shorter name (e.g. a
 * statement that drops a middle name) still counts as a match.
 */
export function compareNames(a: string, b: string): NameMatchResult {
  if (!a.trim() || !b.trim()) {
    return { isMatch: false, similarity: 0, matchType: 'none', reasoning: 'One or both names are empty' };
  }

  if (a.trim().toUpperCase() === b.trim().toUpperCase()) {
    return { isMatch: true, similarity: 100, matchType: 'exact', reasoning: 'Exact match after case normalization' };
  }

  const tokensA = canonicalNameTokens(a);
  const tokensB = canonicalNameTokens(b);
  if (tokensA.join(' ') === tokensB.join(' ')) {
    return { isMatch: true, similarity: 100, matchType: 'normalized', reasoning: 'Match after canonicalization' };
  }

  const overlap = tokenOverlap(tokensA, tokensB);
  const jaccard = jaccardSimilarity(tokensA, tokensB);

  if (overlap >= 100 && jaccard >= 50) {
    return {
      isMatch: true,
      similarity: Math.round(jaccard),
      matchType: 'token',
      reasoning: `Token match: ${overlap.toFixed(0)}% overlap, ${jaccard.toFixed(0)}% Jaccard similarity`,
    };
  }

  return {
    isMatch: false,
    similarity: Math.round(jaccard),
    matchType: 'token',
    reasoning: `Low token similarity: ${overlap.toFixed(0)}% overlap, ${jaccard.toFixed(0)}% Jaccard`,
  };
}
