/**
 * ConfigManager Types
 */

import type { BaseRoleName, GUN, KeyAlgorithm } from '../trust_types';
import type { LogLevel } from '../logger';

/**
 * Trustline configuration (`.trustline/config.json`).
 */
export type TrustConfig = {
  protocolVersion: string;
  gun: GUN;
  keyAlgorithm?: KeyAlgorithm;
  serverManagedRoles?: BaseRoleName[];
  logLevel?: LogLevel;
  createdAt?: string;
};

/**
 * Configuration with every optional setting resolved to its default.
 */
export type ResolvedTrustConfig = {
  protocolVersion: string;
  gun: GUN;
  keyAlgorithm: KeyAlgorithm;
  serverManagedRoles: BaseRoleName[];
  logLevel: LogLevel;
};

/**
 * IConfigManager interface
 *
 * Typed access to the trust configuration of one GUN.
 */
export interface IConfigManager {
  loadConfig(): Promise<TrustConfig | null>;

  /**
   * Returns the configuration with defaults applied, or null when none is stored.
   */
  resolveConfig(): Promise<ResolvedTrustConfig | null>;

  getGun(): Promise<GUN | null>;

  getKeyAlgorithm(): Promise<KeyAlgorithm>;

  getServerManagedRoles(): Promise<BaseRoleName[]>;

  getLogLevel(): Promise<LogLevel>;

  /**
   * Validates and persists a configuration.
   */
  saveConfig(config: TrustConfig): Promise<void>;
}
