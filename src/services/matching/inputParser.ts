/**
 * Turns one raw input line into a ParsedQuery.
 * Never rejects input; the worst case is an empty query.
 */

import { NAME_PAIR_DELIMITER } from '../../config/constants';
import type { OriginalNames, ParsedQuery } from '../../types/taxonomy';
import { collapseWhitespace } from '../../utils/text';

const LATIN_SHAPE = /^[\p{L}]+(?: [\p{L}]+)?$/u;

export function parseInput(line: string): ParsedQuery {
  const rawText = collapseWhitespace(line);
  const parts = rawText
    .split(NAME_PAIR_DELIMITER)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  if (parts.length === 0) {
    return { rawText, shape: 'empty' };
  }

  if (parts.length === 1) {
    return { rawText, shape: 'single', common: parts[0], latin: parts[0] };
  }

  // Only the first two parts carry names; anything after is commentary
  const [first, second] = parts;

  if (isLikelyLatin(first) && !isLikelyLatin(second)) {
    return { rawText, shape: 'pair', latin: first, common: second };
  }

  return { rawText, shape: 'pair', common: first, latin: second };
}

/**
 * Latin names are a genus, or genus plus epithet, in plain letters.
 */
export function isLikelyLatin(text: string): boolean {
  return LATIN_SHAPE.test(collapseWhitespace(text));
}

/**
 * Role assignment used when nothing matched: single names default to common.
 */
export function defaultNames(query: ParsedQuery): OriginalNames {
  switch (query.shape) {
    case 'empty':
      return { originalCommon: '', originalLatin: '' };
    case 'single':
      return { originalCommon: query.common ?? '', originalLatin: '' };
    case 'pair':
      return {
        originalCommon: query.common ?? '',
        originalLatin: query.latin ?? '',
      };
  }
}

/**
 * Split a multi-query string into individual query lines, dropping blanks.
 */
export function splitQueries(text: string, delimiter: string | RegExp = /\r?\n/): string[] {
  return text
    .split(delimiter)
    .map((q) => q.trim())
    .filter((q) => q.length > 0);
}
