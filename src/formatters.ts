// Response formatters for MCP tool handlers.
//
// Pure functions — no side effects, no state. Each takes structured data
// and returns the text of a tool response.

import type { AnalyzedString, HealthReport, NaturalLanguageList, ServiceError } from './types.js';
import { VALUE_PREVIEW_CHARS } from './thresholds.js';
import { describeFilterConflicts } from './filter-engine.js';
import { QUERY_RULES } from './query-rules.js';

/** Pretty JSON, non-ASCII kept as-is */
export function formatJson(payload: unknown, indent: number): string {
  return JSON.stringify(payload, null, indent);
}

/** Shorten long values in one-line confirmations, cutting on code points */
export function previewValue(value: string): string {
  const chars = Array.from(value);
  return chars.length > VALUE_PREVIEW_CHARS ? `${chars.slice(0, VALUE_PREVIEW_CHARS).join('')}...` : value;
}

const ERROR_LABELS: Record<ServiceError['kind'], string> = {
  'validation': 'Invalid input',
  'conflict': 'Conflict',
  'not-found': 'Not found',
};

export function formatServiceError(error: ServiceError): string {
  return `${ERROR_LABELS[error.kind]}: ${error.message}`;
}

export function formatDeleted(record: AnalyzedString): string {
  return `Deleted "${previewValue(record.value)}" (id: ${record.id})`;
}

/** NL results as JSON, followed by notes when the query was not understood
 *  or produced contradictory filters */
export function formatNaturalLanguageList(result: NaturalLanguageList, indent: number): string {
  const lines = [formatJson(result, indent)];
  const { interpreted_query: interpreted } = result;

  if (!interpreted.recognized) {
    lines.push('');
    lines.push('Note: no filter phrase was recognized, so every stored string matched. Phrases understood:');
    for (const rule of QUERY_RULES) {
      lines.push(`  - ${rule.example}`);
    }
  }

  const conflicts = describeFilterConflicts(interpreted.parsed_filters);
  if (conflicts.length > 0) {
    lines.push('');
    lines.push(`Note: the query produced contradictory filters (${conflicts.join('; ')}), so nothing can match.`);
  }

  return lines.join('\n');
}

export function formatHealth(report: HealthReport, indent: number, lastCrash?: string): string {
  return formatJson(lastCrash ? { ...report, last_crash: lastCrash } : report, indent);
}
