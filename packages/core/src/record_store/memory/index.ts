export { MemoryRecordStore } from './memory_record_store';
export type { MemoryRecordStoreOptions } from './memory_record_store';
