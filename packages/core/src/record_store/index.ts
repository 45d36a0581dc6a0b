export type { RecordStore } from './record_store';

// NOTE: Implementations are exported via subpaths:
// - @trustline/core/fs -> FsRecordStore
// - @trustline/core/memory -> MemoryRecordStore
