/**
 * Name normalization shared by the taxonomy index and the matchers.
 * Both sides of every lookup must go through the same function.
 */

const APOSTROPHES = /['’‘ʼ`]/g;
const NON_WORD = /[^\p{L}\p{N}\s]/gu;
const COMBINING_MARKS = /\p{M}/gu;

export function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

/** Case-normalized, whitespace-collapsed key used by exact lookups. */
export function normalizeName(text: string): string {
  return collapseWhitespace(text).toLowerCase();
}

export function stripDiacritics(text: string): string {
  return text.normalize('NFD').replace(COMBINING_MARKS, '').normalize('NFC');
}

/**
 * Drop apostrophes ("cooper's" -> "coopers") and turn every other
 * punctuation mark, hyphens included, into a word break.
 */
export function removePunctuation(text: string): string {
  return collapseWhitespace(text.replace(APOSTROPHES, '').replace(NON_WORD, ' '));
}

/** Key for the loose lookup maps: diacritics and punctuation gone. */
export function looseKey(text: string): string {
  return normalizeName(removePunctuation(stripDiacritics(text)));
}
