// Interface and error only. Implementations are exported via subpaths:
// - @trustline/core/fs -> FsKeyProvider
// - @trustline/core/memory -> MockKeyProvider
export { KeyProviderError } from './key_provider';
export type { KeyProvider, KeyProviderErrorCode, StoredKey } from './key_provider';
