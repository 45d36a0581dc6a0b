/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for hosts that keep trust state elsewhere.
 */

// Store
export { MemoryRecordStore } from './record_store/memory';
export type { MemoryRecordStoreOptions } from './record_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// KeyProvider
export { MockKeyProvider } from './key_provider/memory';
export type { MockKeyProviderOptions } from './key_provider/memory';

// Changelist
export { createMemoryChangelist, changelistFromChanges } from './changelist/memory';

// RemoteAuthority
export { MemoryRemoteAuthority } from './remote_authority/memory';
export type { MemoryRemoteAuthorityOptions } from './remote_authority/memory';

// TrustSession
export { createMemoryTrustSession } from './trust_session/memory';
export type { MemoryTrustSessionOptions } from './trust_session/memory';
