/**
 * ConfigManager - Trust Configuration Manager
 *
 * Provides typed access to the trust configuration (config.json) of a GUN.
 * Uses the ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import type { BaseRoleName, GUN, KeyAlgorithm } from '../trust_types';
import type { LogLevel } from '../logger';
import { loadTrustConfig } from '../validation/config_validator';
import type { IConfigManager, ResolvedTrustConfig, TrustConfig } from './config_manager.types';

export const DEFAULT_PROTOCOL_VERSION = '1.0';
export const DEFAULT_KEY_ALGORITHM: KeyAlgorithm = 'ed25519';
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@trustline/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@trustline/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ protocolVersion: '1.0', gun: 'example.com/app' });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<TrustConfig | null> {
    return this.configStore.loadConfig();
  }

  async resolveConfig(): Promise<ResolvedTrustConfig | null> {
    const config = await this.loadConfig();
    if (!config) return null;

    return {
      protocolVersion: config.protocolVersion,
      gun: config.gun,
      keyAlgorithm: config.keyAlgorithm ?? DEFAULT_KEY_ALGORITHM,
      serverManagedRoles: config.serverManagedRoles ?? [],
      logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
    };
  }

  async getGun(): Promise<GUN | null> {
    const config = await this.loadConfig();
    return config?.gun ?? null;
  }

  async getKeyAlgorithm(): Promise<KeyAlgorithm> {
    const config = await this.loadConfig();
    return config?.keyAlgorithm ?? DEFAULT_KEY_ALGORITHM;
  }

  async getServerManagedRoles(): Promise<BaseRoleName[]> {
    const config = await this.loadConfig();
    return config?.serverManagedRoles ?? [];
  }

  async getLogLevel(): Promise<LogLevel> {
    const config = await this.loadConfig();
    return config?.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  /**
   * @throws DetailedValidationError when the configuration does not match the schema
   */
  async saveConfig(config: TrustConfig): Promise<void> {
    await this.configStore.saveConfig(loadTrustConfig(config));
  }
}
