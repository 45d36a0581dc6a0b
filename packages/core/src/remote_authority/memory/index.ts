export { MemoryRemoteAuthority } from './memory_remote_authority';
export type { MemoryRemoteAuthorityOptions } from './memory_remote_authority';
