/**
 * RecordStore<V> - Generic interface for record persistence
 *
 * Abstracts CRUD operations without assuming a storage backend.
 * Each implementation decides how to persist (fs, memory).
 *
 * @typeParam V - Value type (the record being stored)
 */
export interface RecordStore<V> {
  /**
   * @returns The record or null if it doesn't exist
   */
  get(id: string): Promise<V | null>;

  put(id: string, value: V): Promise<void>;

  /**
   * Persists multiple records, in order.
   */
  putMany(entries: Array<{ id: string; value: V }>): Promise<void>;

  /**
   * Deleting a missing record is a no-op.
   */
  delete(id: string): Promise<void>;

  /**
   * Lists all record IDs in ascending order.
   */
  list(): Promise<string[]>;

  exists(id: string): Promise<boolean>;
}
