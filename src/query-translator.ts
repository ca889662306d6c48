// Natural-language query → StructuredFilter.
// Deterministic keyword/pattern matching over the rule table in query-rules.ts.
// Never fails: a query no rule understands yields the empty filter.

import type { StructuredFilter } from './types.js';
import { QUERY_RULES, type QueryRule } from './query-rules.js';
import { compactFilter } from './filter-engine.js';

export interface Interpretation {
  readonly filter: StructuredFilter;
  /** Ids of the rules that fired, in table order */
  readonly matchedRules: readonly string[];
}

/** Lower-case, trim, collapse whitespace runs */
export function normalizeQuery(query: string): string {
  return query.toLowerCase().trim().replace(/\s+/g, ' ');
}

/** Run one rule against an already-normalized query */
export function applyRule(rule: QueryRule, normalized: string): StructuredFilter | null {
  const match = rule.pattern.exec(normalized);
  return match ? rule.effect(match) : null;
}

export function interpretQuery(
  query: string,
  rules: readonly QueryRule[] = QUERY_RULES,
): Interpretation {
  const normalized = normalizeQuery(query);
  let merged: StructuredFilter = {};
  const matchedRules: string[] = [];

  for (const rule of rules) {
    const effect = applyRule(rule, normalized);
    if (!effect) continue;
    merged = { ...merged, ...effect };   // later rule wins on a shared key
    matchedRules.push(rule.id);
  }

  return { filter: compactFilter(merged), matchedRules };
}

export function translateQuery(query: string, rules: readonly QueryRule[] = QUERY_RULES): StructuredFilter {
  return interpretQuery(query, rules).filter;
}
