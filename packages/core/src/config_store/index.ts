/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. Implementations live behind the
 * entry points:
 * - @trustline/core/fs for FsConfigStore
 * - @trustline/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
