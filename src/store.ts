// In-memory store of analyzed strings, keyed by value.
// Process-lifetime state: created empty at startup, discarded at exit.
// Every read and write goes through this class; callers never see the maps.

import type { AnalyzedString, Result } from './types.js';
import { fail, ok } from './types.js';

export class InMemoryStringStore {
  // Map iteration order is insertion order, which list() relies on
  private readonly byValue = new Map<string, AnalyzedString>();
  private readonly valueById = new Map<string, string>();

  /** Add a record. Rejects a value that is already stored. */
  insert(record: AnalyzedString): Result<AnalyzedString> {
    if (this.byValue.has(record.value)) {
      return fail('conflict', 'String already exists in the system');
    }
    this.byValue.set(record.value, record);
    this.valueById.set(record.id, record.value);
    return ok(record);
  }

  get(value: string): Result<AnalyzedString> {
    const record = this.byValue.get(value);
    return record ? ok(record) : fail('not-found', 'String not found in the system');
  }

  getById(id: string): Result<AnalyzedString> {
    const value = this.valueById.get(id);
    return value === undefined ? fail('not-found', `No string with id "${id}"`) : this.get(value);
  }

  delete(value: string): Result<AnalyzedString> {
    const record = this.byValue.get(value);
    if (!record) return fail('not-found', 'String not found in the system');
    this.byValue.delete(value);
    this.valueById.delete(record.id);
    return ok(record);
  }

  /** Snapshot in insertion order; later mutations do not affect the returned array */
  list(): AnalyzedString[] {
    return Array.from(this.byValue.values());
  }

  count(): number {
    return this.byValue.size;
  }
}
