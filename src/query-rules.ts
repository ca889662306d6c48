// Rule table for the natural-language query translator.
//
// Each rule pairs a trigger pattern with the predicates it sets. Rules run in
// table order against the normalized query; when two rules set the same key the
// later one wins. Adding a phrase means adding a row here, not touching the
// translator.

import type { StructuredFilter } from './types.js';

export interface QueryRule {
  readonly id: string;
  /** Example phrase, surfaced in tool descriptions */
  readonly example: string;
  readonly pattern: RegExp;
  /** Predicates to set for a match, or null when the match carries no usable value */
  readonly effect: (match: RegExpExecArray) => StructuredFilter | null;
}

const NUMBER_WORDS: ReadonlyMap<string, number> = new Map([
  ['one', 1], ['two', 2], ['three', 3], ['four', 4], ['five', 5],
  ['six', 6], ['seven', 7], ['eight', 8], ['nine', 9], ['ten', 10],
]);

/** Parse a count token: digits or a number word. Null when unusable. */
export function parseCount(token: string | undefined): number | null {
  if (token === undefined) return null;
  if (/^\d+$/.test(token)) {
    const n = Number(token);
    return Number.isSafeInteger(n) ? n : null;
  }
  return NUMBER_WORDS.get(token) ?? null;
}

/** Build an effect that needs the count in capture group 1 */
function withCount(build: (n: number) => StructuredFilter): QueryRule['effect'] {
  return match => {
    const n = parseCount(match[1]);
    return n === null ? null : build(n);
  };
}

const UNIT = String.raw`(?:characters?|chars?|letters?)`;
const COUNT_WORD = String.raw`(\d+|one|two|three|four|five|six|seven|eight|nine|ten)`;
const CHAR = String.raw`['"]?([\p{L}\p{N}])['"]?(?![\p{L}\p{N}])`;

export const QUERY_RULES: readonly QueryRule[] = [
  {
    id: 'palindrome',
    example: 'palindromic strings',
    pattern: /palindrom/u,
    effect: () => ({ is_palindrome: true }),
  },
  {
    id: 'non-palindrome',
    example: 'strings that are not palindromes',
    pattern: /\b(?:not\s+(?:an?\s+)?|non[\s-]?)palindrom/u,
    effect: () => ({ is_palindrome: false }),
  },
  {
    id: 'single-word',
    example: 'single word strings',
    pattern: /\b(?:single|one)[\s-]word\b/u,
    effect: () => ({ word_count: 1 }),
  },
  {
    id: 'n-words',
    example: 'strings with 3 words',
    // comparatives ("more than 2 words") set no exact count
    pattern: new RegExp(String.raw`(?<!(?:more|less|fewer) than |at (?:least|most) )\b${COUNT_WORD}[\s-]words?\b`, 'u'),
    effect: withCount(n => ({ word_count: n })),
  },
  {
    id: 'longer-than',
    example: 'strings longer than 10 characters',
    pattern: /\blonger than (\d+)/u,
    effect: withCount(n => ({ min_length: n + 1 })),
  },
  {
    id: 'more-than-characters',
    example: 'more than 5 characters',
    pattern: new RegExp(String.raw`\bmore than (\d+) ${UNIT}`, 'u'),
    effect: withCount(n => ({ min_length: n + 1 })),
  },
  {
    id: 'shorter-than',
    example: 'strings shorter than 5 characters',
    pattern: /\bshorter than (\d+)/u,
    effect: withCount(n => ({ max_length: n - 1 })),
  },
  {
    id: 'less-than-characters',
    example: 'fewer than 8 characters',
    pattern: new RegExp(String.raw`\b(?:less|fewer) than (\d+) ${UNIT}`, 'u'),
    effect: withCount(n => ({ max_length: n - 1 })),
  },
  {
    id: 'at-least',
    example: 'at least 3 characters',
    pattern: new RegExp(String.raw`\bat least (\d+) ${UNIT}`, 'u'),
    effect: withCount(n => ({ min_length: n })),
  },
  {
    id: 'at-most',
    example: 'at most 12 characters',
    pattern: new RegExp(String.raw`\bat most (\d+) ${UNIT}`, 'u'),
    effect: withCount(n => ({ max_length: n })),
  },
  {
    id: 'exactly',
    example: 'exactly 7 characters',
    pattern: new RegExp(String.raw`\bexactly (\d+) ${UNIT}`, 'u'),
    effect: withCount(n => ({ min_length: n, max_length: n })),
  },
  {
    id: 'contains-character',
    example: "strings containing the letter 'z'",
    pattern: new RegExp(
      String.raw`\bcontain(?:s|ing)?\s+(?:the\s+)?(?:(?:letter|character|char)\s+)?(?!an?\s+['"]?[\p{L}\p{N}]{2})(?:an?\s+)?${CHAR}`,
      'u',
    ),
    effect: match => (match[1] ? { contains_character: match[1] } : null),
  },
  {
    id: 'with-letter',
    example: 'words with the letter e',
    pattern: new RegExp(String.raw`\bwith\s+(?:the\s+|an?\s+)?(?:letter|character|char)\s+${CHAR}`, 'u'),
    effect: match => (match[1] ? { contains_character: match[1] } : null),
  },
  {
    id: 'first-vowel',
    example: 'palindromes that contain the first vowel',
    pattern: /\bfirst vowel\b/u,
    effect: () => ({ contains_character: 'a' }),
  },
];
