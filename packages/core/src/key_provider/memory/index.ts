export { MockKeyProvider } from './mock_key_provider';
export type { MockKeyProviderOptions } from './mock_key_provider';
