// Core types for the string analyzer MCP
//
// Design principles:
//   - Make illegal states unrepresentable: discriminated unions over boolean+optional
//   - Validate at boundaries, trust inside: parse functions at system edges
//   - Errors are data: domain failures are returned, never thrown

/** Properties computed once per analyzed string */
export interface StringProperties {
  readonly length: number;              // code points, not UTF-16 units
  readonly is_palindrome: boolean;
  readonly unique_characters: number;
  readonly word_count: number;
  readonly sha256_hash: string;
  readonly character_frequency_map: Readonly<Record<string, number>>;
}

/** A stored analysis result. Identified by its value; id is the content hash. */
export interface AnalyzedString {
  readonly id: string;
  readonly value: string;
  readonly properties: StringProperties;
  readonly created_at: string;          // ISO 8601
}

/** Structured predicates over stored strings. All present keys are ANDed. */
export interface StructuredFilter {
  readonly is_palindrome?: boolean;
  readonly min_length?: number;
  readonly max_length?: number;
  readonly word_count?: number;
  readonly contains_character?: string;
}

export type FilterKey = keyof StructuredFilter;

export const FILTER_KEYS: readonly FilterKey[] = [
  'is_palindrome', 'min_length', 'max_length', 'word_count', 'contains_character',
];

export type ServiceErrorKind = 'validation' | 'conflict' | 'not-found';

export interface ServiceError {
  readonly kind: ServiceErrorKind;
  readonly message: string;
}

/** Result of any fallible core operation */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ServiceError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ServiceErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

/** Injectable clock for deterministic time in tests */
export interface Clock {
  now(): Date;
  isoNow(): string;
}

/** Production clock using real wall time */
export const realClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

/** Response of listFiltered */
export interface FilteredList {
  readonly data: readonly AnalyzedString[];
  readonly count: number;
  readonly filters_applied: StructuredFilter;
}

/** How a natural-language query was understood */
export interface InterpretedQuery {
  readonly original: string;
  readonly parsed_filters: StructuredFilter;
  readonly matched_rules: readonly string[];
  /** False when no rule fired: the filter is empty and matches everything */
  readonly recognized: boolean;
}

/** Response of listByNaturalLanguage */
export interface NaturalLanguageList {
  readonly data: readonly AnalyzedString[];
  readonly count: number;
  readonly interpreted_query: InterpretedQuery;
}

export interface HealthReport {
  readonly status: 'healthy';
  readonly stored_strings: number;
  readonly uptime_seconds: number;
}

/** Configuration for the string analysis service and its MCP surface */
export interface AnalyzerConfig {
  readonly maxValueLength: number;      // code points
  readonly jsonIndent: number;          // spaces in tool responses
  readonly crashDir: string;            // absolute path for crash reports
  readonly clock?: Clock;               // defaults to realClock
}
