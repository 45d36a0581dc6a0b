export { createMemoryChangelist, changelistFromChanges } from './memory_changelist';
