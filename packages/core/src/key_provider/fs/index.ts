export { FsKeyProvider } from './fs_key_provider';
export type { FsKeyProviderOptions } from './fs_key_provider';
