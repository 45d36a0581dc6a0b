/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence, so the trust configuration can
 * live on the filesystem or in memory for tests.
 */

import type { TrustConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.trustline/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * @returns TrustConfig or null if not found/invalid
   */
  loadConfig(): Promise<TrustConfig | null>;

  saveConfig(config: TrustConfig): Promise<void>;
}
