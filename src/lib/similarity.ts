/**
 * Name normalization and edit-distance similarity used by the matcher
 */

/**
 * Lowercase, collapse every run of whitespace/punctuation/symbols to a
 * single underscore, trim underscores at both ends.
 * "Ex. 1  Memo" → "ex_1_memo"
 */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[\s\p{P}\p{S}]+/gu, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Case-preserving key: whitespace and underscore runs become one underscore.
 * "1 Memo" and "1_Memo" share the key "1_Memo".
 */
export function spacingKey(name: string): string {
  return name.trim().replace(/[\s_]+/g, '_');
}

/**
 * Levenshtein distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // substitution
        current[j - 1] + 1,     // insertion
        previous[j] + 1         // deletion
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Similarity in [0, 1]: 1 - distance / longer length, rounded to 3 places
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 1;
  const score = 1 - levenshteinDistance(a, b) / maxLength;
  return Math.round(score * 1000) / 1000;
}
