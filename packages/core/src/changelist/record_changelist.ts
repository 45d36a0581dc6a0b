import type { Change } from '../trust_types';
import type { RecordStore } from '../record_store/record_store';
import type { Changelist, StoredChange } from './changelist.types';
import { createChange } from './change_factory';
import { assertValid } from '../validation/common';
import { createLogger } from '../logger';

const logger = createLogger('[Changelist] ');

const SEQUENCE_WIDTH = 12;

export function toStoredChange(change: Change): StoredChange {
  return {
    action: change.action,
    scope: change.scope,
    type: change.type,
    path: change.path,
    content: Buffer.from(change.content).toString('base64'),
  };
}

export function fromStoredChange(stored: StoredChange): Change {
  return createChange(stored.action, stored.scope, stored.type, stored.path, Buffer.from(stored.content, 'base64'));
}

/**
 * Validates a StoredChange read from disk.
 */
export function loadStoredChange(data: unknown, id: string): StoredChange {
  return assertValid<StoredChange>('StoredChange', `StoredChange ${id}`, data);
}

function sequenceId(sequence: number): string {
  return String(sequence).padStart(SEQUENCE_WIDTH, '0');
}

/**
 * Changelist over a RecordStore: one record per change, keyed by a
 * zero-padded sequence number so lexical order is append order.
 */
export class RecordChangelist implements Changelist {
  private nextSequence: number | null = null;

  constructor(
    private readonly store: RecordStore<StoredChange>,
    private readonly label: string
  ) {}

  async add(change: Change): Promise<void> {
    const checked = createChange(change.action, change.scope, change.type, change.path, change.content);
    const id = await this.allocateId();
    await this.store.put(id, toStoredChange(checked));
    logger.debug(`Appended ${checked.action} ${checked.type} change ${id} for ${checked.scope}`);
  }

  async list(): Promise<Change[]> {
    const ids = await this.store.list();
    const changes: Change[] = [];
    for (const id of ids) {
      const stored = await this.store.get(id);
      if (stored) {
        changes.push(fromStoredChange(stored));
      }
    }
    return changes;
  }

  async clear(): Promise<void> {
    const ids = await this.store.list();
    for (const id of ids) {
      await this.store.delete(id);
    }
    this.nextSequence = null;
    logger.debug(`Cleared ${ids.length} change(s) from ${this.label}`);
  }

  location(): string {
    return this.label;
  }

  private async allocateId(): Promise<string> {
    if (this.nextSequence === null) {
      const ids = await this.store.list();
      const highest = ids.reduce((max, id) => Math.max(max, Number.parseInt(id, 10) || 0), 0);
      // another add may have initialized the counter while we listed
      if (this.nextSequence === null) {
        this.nextSequence = highest + 1;
      }
    }
    const sequence = this.nextSequence;
    this.nextSequence = sequence + 1;
    return sequenceId(sequence);
  }
}
