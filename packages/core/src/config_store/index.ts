/**
 * ConfigStore - Configuration persistence abstraction
 *
 * Implementations live in the entry points:
 * - @outcheck/core/fs for FsConfigStore and createConfigManager
 * - @outcheck/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
