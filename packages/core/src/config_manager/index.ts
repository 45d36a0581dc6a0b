export { ConfigManager, DEFAULT_PROTOCOL_VERSION, DEFAULT_KEY_ALGORITHM, DEFAULT_LOG_LEVEL } from './config_manager';
export type { TrustConfig, ResolvedTrustConfig, IConfigManager } from './config_manager.types';
