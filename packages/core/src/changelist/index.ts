export { createChange } from './change_factory';
export { RecordChangelist, toStoredChange, fromStoredChange, loadStoredChange } from './record_changelist';
export type { Changelist, StoredChange } from './changelist.types';

// NOTE: Backends are exported via subpaths:
// - @trustline/core/fs -> createFsChangelist
// - @trustline/core/memory -> createMemoryChangelist, changelistFromChanges
