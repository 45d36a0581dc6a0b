/**
 * Filesystem-dependent implementations
 *
 * Use @trustline/core/memory for in-memory alternatives.
 */

// Store
export { FsRecordStore } from './record_store/fs';
export type { FsRecordStoreOptions } from './record_store/fs';

// ConfigStore + ConfigManager factory
export { FsConfigStore, TRUSTLINE_DIR, createConfigManager } from './config_store/fs';

// KeyProvider
export { FsKeyProvider } from './key_provider/fs';
export type { FsKeyProviderOptions } from './key_provider/fs';

// Changelist
export { createFsChangelist, changelistDirName } from './changelist/fs';

// TrustSession
export { createFsTrustSession, getKeysDir, getChangelistRoot } from './trust_session/fs';
export type { FsTrustSessionOptions, FsTrustSessionContext } from './trust_session/fs';
