/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence, so the same ConfigManager runs
 * against the filesystem or an in-memory store in tests.
 */

import type { OutcheckConfig } from '../config_manager';

/**
 * Interface for project configuration persistence.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based (.outcheck/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load project configuration
   *
   * @returns OutcheckConfig or null if not found/invalid
   */
  loadConfig(): Promise<OutcheckConfig | null>;

  /**
   * Save project configuration
   */
  saveConfig(config: OutcheckConfig): Promise<void>;
}
