import type { RecordStore } from '../record_store';

/**
 * Options for MemoryRecordStore
 */
export interface MemoryRecordStoreOptions<T> {
  /** Initial data */
  initial?: Map<string, T>;

  /** Clone values on get/put (default: true) */
  clone?: (value: T) => T;
}

function structuredCopy<T>(value: T): T {
  return structuredClone(value);
}

/**
 * MemoryRecordStore<T> - In-memory implementation of RecordStore<T>
 *
 * Used by tests and by sessions that do not persist. Values are copied on
 * get/put so callers cannot mutate stored records.
 *
 * @example
 * const store = new MemoryRecordStore<StoredChange>();
 * await store.put('000000000001', change);
 * expect(store.size()).toBe(1);
 */
export class MemoryRecordStore<T> implements RecordStore<T> {
  private readonly data: Map<string, T>;
  private readonly clone: (value: T) => T;

  constructor(options: MemoryRecordStoreOptions<T> = {}) {
    this.data = options.initial ?? new Map();
    this.clone = options.clone ?? structuredCopy;
  }

  async get(id: string): Promise<T | null> {
    const value = this.data.get(id);
    return value !== undefined ? this.clone(value) : null;
  }

  async put(id: string, value: T): Promise<void> {
    this.data.set(id, this.clone(value));
  }

  async putMany(entries: Array<{ id: string; value: T }>): Promise<void> {
    for (const { id, value } of entries) {
      await this.put(id, value);
    }
  }

  async delete(id: string): Promise<void> {
    this.data.delete(id);
  }

  async list(): Promise<string[]> {
    return Array.from(this.data.keys()).sort();
  }

  async exists(id: string): Promise<boolean> {
    return this.data.has(id);
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of RecordStore<T>)
  // ─────────────────────────────────────────────────────────

  clear(): void {
    this.data.clear();
  }

  size(): number {
    return this.data.size;
  }
}
