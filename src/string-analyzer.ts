// Pure string analysis: computes the property record for a value.
// Stateless: no I/O, no side effects beyond reading the injected clock.
//
// Normalization policy, shared with filter-engine.ts:
//   case-insensitive (both sides lower-cased), whitespace and punctuation significant.
//   "Racecar" is a palindrome, "race car" is not.

import crypto from 'crypto';
import type { AnalyzedString, Clock, Result, StringProperties } from './types.js';
import { fail, ok, realClock } from './types.js';

/** Case folding applied before palindrome and contains-character comparisons */
export function foldCase(text: string): string {
  return text.toLowerCase();
}

/** Split into code points so astral characters count and reverse as one */
function codePoints(text: string): string[] {
  return Array.from(text);
}

export function isPalindrome(value: string): boolean {
  const chars = codePoints(foldCase(value));
  for (let i = 0, j = chars.length - 1; i < j; i++, j--) {
    if (chars[i] !== chars[j]) return false;
  }
  return true;
}

/** Count of non-empty whitespace-delimited tokens */
export function countWords(value: string): number {
  return value.split(/\s+/).filter(w => w.length > 0).length;
}

/** Occurrences per code point. Keys follow JS property order: integer-like keys
 *  (ASCII digits) first in ascending order, then the rest in order of first appearance. */
export function characterFrequency(value: string): Record<string, number> {
  const freq: Record<string, number> = {};
  for (const ch of codePoints(value)) {
    freq[ch] = (freq[ch] ?? 0) + 1;
  }
  return freq;
}

export function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

/** Length in code points, the unit every length filter uses */
export function codePointLength(value: string): number {
  return codePoints(value).length;
}

export function computeProperties(value: string): StringProperties {
  const frequency = characterFrequency(value);
  const hash = sha256Hex(value);
  return {
    length: codePointLength(value),
    is_palindrome: isPalindrome(value),
    unique_characters: Object.keys(frequency).length,
    word_count: countWords(value),
    sha256_hash: hash,
    character_frequency_map: frequency,
  };
}

/** Analyze a value. The empty string is rejected; every other string is accepted. */
export function analyze(value: string, clock: Clock = realClock): Result<AnalyzedString> {
  if (value.length === 0) {
    return fail('validation', 'Value must be a non-empty string');
  }
  const properties = computeProperties(value);
  return ok({
    id: properties.sha256_hash,
    value,
    properties,
    created_at: clock.isoNow(),
  });
}
