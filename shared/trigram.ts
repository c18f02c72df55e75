/**
 * Trigram similarity with PostgreSQL pg_trgm semantics, so an in-process
 * catalog ranks candidates the same way `similarity()` does in the database.
 *
 * - text is lower-cased and split into words on non-alphanumerics
 * - each word is padded with two spaces in front and one behind
 * - similarity = shared trigrams / distinct trigrams of both strings
 */

const WORD_SPLIT = /[^\p{L}\p{N}]+/u;

export function trigrams(text: string): Set<string> {
  const result = new Set<string>();
  const words = text.toLowerCase().split(WORD_SPLIT).filter(Boolean);

  for (const word of words) {
    const padded = `  ${word} `;
    for (let i = 0; i + 3 <= padded.length; i++) {
      result.add(padded.slice(i, i + 3));
    }
  }

  return result;
}

export function similarity(a: string, b: string): number {
  const left = trigrams(a);
  const right = trigrams(b);
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const gram of left) {
    if (right.has(gram)) shared++;
  }

  return shared / (left.size + right.size - shared);
}
