/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { TrustConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ protocolVersion: '1.0', gun: 'example.com/app' });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: TrustConfig | null = null;

  constructor(initial?: TrustConfig) {
    this.config = initial ?? null;
  }

  async loadConfig(): Promise<TrustConfig | null> {
    return this.config;
  }

  async saveConfig(config: TrustConfig): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: TrustConfig | null): void {
    this.config = config;
  }

  getConfig(): TrustConfig | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
