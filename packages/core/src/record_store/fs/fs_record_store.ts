import * as fs from 'fs/promises';
import * as path from 'path';
import type { RecordStore } from '../record_store';

/**
 * Options for FsRecordStore
 */
export interface FsRecordStoreOptions<T> {
  /** Base directory for files */
  basePath: string;

  /**
   * Turns parsed JSON back into a record. Throws when the file content is
   * not a valid record.
   */
  decode: (value: unknown, id: string) => T;

  /** File extension (default: ".json") */
  extension?: string;

  /** Create directory if it doesn't exist (default: true) */
  createIfMissing?: boolean;
}

/**
 * Validates that an ID does not contain path traversal.
 * Blocks: `..`, `/`, `\`
 */
function validateId(id: string): void {
  if (!id) {
    throw new Error('ID must be a non-empty string');
  }
  if (id.includes('..') || /[\/\\]/.test(id)) {
    throw new Error(`Invalid ID: "${id}". IDs cannot contain /, \\, or ..`);
  }
}

/**
 * FsRecordStore<T> - Filesystem implementation of RecordStore<T>
 *
 * Persists each record as a JSON file named after its ID.
 *
 * @example
 * const store = new FsRecordStore<StoredChange>({
 *   basePath: '.trustline/changelist/example.com_app',
 *   decode: loadStoredChange,
 * });
 */
export class FsRecordStore<T> implements RecordStore<T> {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly decode: (value: unknown, id: string) => T;
  private readonly createIfMissing: boolean;

  constructor(options: FsRecordStoreOptions<T>) {
    this.basePath = options.basePath;
    this.decode = options.decode;
    this.extension = options.extension ?? '.json';
    this.createIfMissing = options.createIfMissing ?? true;
  }

  private getFilePath(id: string): string {
    validateId(id);
    return path.join(this.basePath, `${id}${this.extension}`);
  }

  async get(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(content);
    return this.decode(parsed, id);
  }

  async put(id: string, value: T): Promise<void> {
    const filePath = this.getFilePath(id);
    if (this.createIfMissing) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    }
    await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
  }

  async putMany(entries: Array<{ id: string; value: T }>): Promise<void> {
    for (const { id, value } of entries) {
      await this.put(id, value);
    }
  }

  async delete(id: string): Promise<void> {
    const filePath = this.getFilePath(id);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.basePath);
      return files
        .filter((f) => f.endsWith(this.extension))
        .map((f) => f.slice(0, -this.extension.length))
        .sort();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  async exists(id: string): Promise<boolean> {
    const filePath = this.getFilePath(id);
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
