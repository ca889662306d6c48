// String analysis service: the one owner of the store.
//
// Constructed once at startup and handed to the request layer. All operations are
// synchronous, so the event loop serializes them: a mutation never interleaves with
// another operation, and list-then-filter always sees one consistent snapshot.

import type {
  AnalyzedString, AnalyzerConfig, Clock, FilteredList, HealthReport,
  NaturalLanguageList, Result, StructuredFilter,
} from './types.js';
import { fail, realClock } from './types.js';
import { analyze, codePointLength } from './string-analyzer.js';
import { InMemoryStringStore } from './store.js';
import { applyFilter, compactFilter } from './filter-engine.js';
import { interpretQuery } from './query-translator.js';

export type ServiceOptions = Pick<AnalyzerConfig, 'maxValueLength' | 'clock'>;

export class StringAnalysisService {
  private readonly store = new InMemoryStringStore();
  private readonly clock: Clock;
  private readonly maxValueLength: number;
  private readonly startedAt: number;

  constructor(options: ServiceOptions) {
    this.clock = options.clock ?? realClock;
    this.maxValueLength = options.maxValueLength;
    this.startedAt = this.clock.now().getTime();
  }

  /** Analyze and store a new value */
  create(value: string): Result<AnalyzedString> {
    if (codePointLength(value) > this.maxValueLength) {
      return fail('validation', `Value exceeds the maximum length of ${this.maxValueLength} characters`);
    }
    const analyzed = analyze(value, this.clock);
    if (!analyzed.ok) return analyzed;
    return this.store.insert(analyzed.value);
  }

  getByValue(value: string): Result<AnalyzedString> {
    return this.store.get(value);
  }

  getById(id: string): Result<AnalyzedString> {
    return this.store.getById(id);
  }

  listFiltered(filter: StructuredFilter = {}): FilteredList {
    const applied = compactFilter(filter);
    const data = applyFilter(this.store.list(), applied);
    return { data, count: data.length, filters_applied: applied };
  }

  listByNaturalLanguage(query: string): NaturalLanguageList {
    const { filter, matchedRules } = interpretQuery(query);
    const { data, count } = this.listFiltered(filter);
    return {
      data,
      count,
      interpreted_query: {
        original: query,
        parsed_filters: filter,
        matched_rules: matchedRules,
        recognized: matchedRules.length > 0,
      },
    };
  }

  delete(value: string): Result<AnalyzedString> {
    return this.store.delete(value);
  }

  health(): HealthReport {
    return {
      status: 'healthy',
      stored_strings: this.store.count(),
      uptime_seconds: Math.round((this.clock.now().getTime() - this.startedAt) / 1000),
    };
  }
}
