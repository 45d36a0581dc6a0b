/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of config.json to the local filesystem and locates
 * the directory that holds a `.trustline` folder.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { TrustConfig } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import { loadTrustConfig } from '../../validation/config_validator';
import { DetailedValidationError } from '../../trust_errors';
import { createLogger } from '../../logger';

const logger = createLogger('[FsConfigStore] ');

export const TRUSTLINE_DIR = '.trustline';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Stores configuration in .trustline/config.json. Missing or invalid files
 * read as null.
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, TRUSTLINE_DIR, 'config.json');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<TrustConfig | null> {
    let parsed: unknown;
    try {
      const content = await fs.readFile(this.configPath, 'utf-8');
      parsed = JSON.parse(content);
    } catch (error) {
      logger.debug(`No readable config at ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    try {
      return loadTrustConfig(parsed);
    } catch (error) {
      if (error instanceof DetailedValidationError) {
        logger.warn(`Ignoring invalid config at ${this.configPath}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  async saveConfig(config: TrustConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  /**
   * Searches upwards from startPath for a directory containing `.trustline`.
   * @returns Absolute path of that directory, or null if not found
   */
  static findTrustlineRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);
    while (true) {
      if (existsSync(path.join(currentPath, TRUSTLINE_DIR))) {
        return currentPath;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }
}

/**
 * Creates a ConfigManager with an FsConfigStore backend. Auto-detects the
 * root when none is given.
 */
export function createConfigManager(projectRoot?: string): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.findTrustlineRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot));
}
