import type { Change } from '../../trust_types';
import { MemoryRecordStore } from '../../record_store/memory/memory_record_store';
import { RecordChangelist } from '../record_changelist';
import type { StoredChange } from '../changelist.types';

/**
 * In-memory changelist. Nothing survives the process.
 */
export function createMemoryChangelist(label: string = 'memory'): RecordChangelist {
  return new RecordChangelist(new MemoryRecordStore<StoredChange>(), label);
}

/**
 * Reconstitutes a changelist from changes reported elsewhere (a remote
 * snapshot or another session's list). Every change goes through the
 * same factory used by staging.
 */
export async function changelistFromChanges(changes: Change[], label: string = 'snapshot'): Promise<RecordChangelist> {
  const changelist = createMemoryChangelist(label);
  for (const change of changes) {
    await changelist.add(change);
  }
  return changelist;
}
