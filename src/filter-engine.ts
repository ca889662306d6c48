// Structured predicate matching over analyzed strings.
// Pure: inputs are never mutated, output keeps input order.

import type { AnalyzedString, StructuredFilter } from './types.js';
import { FILTER_KEYS } from './types.js';
import { foldCase } from './string-analyzer.js';

/** True when the filter sets no predicate and therefore matches everything */
export function isEmptyFilter(filter: StructuredFilter): boolean {
  return FILTER_KEYS.every(key => filter[key] === undefined);
}

/** Check one record against every present predicate (logical AND) */
export function matchesFilter(record: AnalyzedString, filter: StructuredFilter): boolean {
  const { properties } = record;

  if (filter.is_palindrome !== undefined && properties.is_palindrome !== filter.is_palindrome) {
    return false;
  }
  if (filter.min_length !== undefined && properties.length < filter.min_length) {
    return false;
  }
  if (filter.max_length !== undefined && properties.length > filter.max_length) {
    return false;
  }
  if (filter.word_count !== undefined && properties.word_count !== filter.word_count) {
    return false;
  }
  if (filter.contains_character !== undefined
      && !foldCase(record.value).includes(foldCase(filter.contains_character))) {
    return false;
  }
  return true;
}

export function applyFilter(
  records: readonly AnalyzedString[],
  filter: StructuredFilter,
): AnalyzedString[] {
  if (isEmptyFilter(filter)) return [...records];
  return records.filter(record => matchesFilter(record, filter));
}

/** Contradictions that make a filter unsatisfiable. The engine still accepts such
 *  filters (they match nothing); the request layer decides whether to reject. */
export function describeFilterConflicts(filter: StructuredFilter): string[] {
  const conflicts: string[] = [];
  if (filter.min_length !== undefined && filter.max_length !== undefined
      && filter.min_length > filter.max_length) {
    conflicts.push(`min_length (${filter.min_length}) cannot be greater than max_length (${filter.max_length})`);
  }
  return conflicts;
}

/** Copy only the present predicates, in canonical key order */
export function compactFilter(filter: StructuredFilter): StructuredFilter {
  const out: { -readonly [K in keyof StructuredFilter]: StructuredFilter[K] } = {};
  if (filter.is_palindrome !== undefined) out.is_palindrome = filter.is_palindrome;
  if (filter.min_length !== undefined) out.min_length = filter.min_length;
  if (filter.max_length !== undefined) out.max_length = filter.max_length;
  if (filter.word_count !== undefined) out.word_count = filter.word_count;
  if (filter.contains_character !== undefined) out.contains_character = filter.contains_character;
  return out;
}
