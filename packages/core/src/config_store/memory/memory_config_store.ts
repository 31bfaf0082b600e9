/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for testing and serverless environments where filesystem
 * access is not available or not desired.
 */

import type { ConfigStore } from '../config_store';
import type { OutcheckConfig } from '../../config_manager';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ outputSchema: { validate: true } });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: OutcheckConfig | null = null;

  /**
   * [EARS-A1] Returns null if no config set
   * [EARS-A2] Returns config set via setConfig or saveConfig
   */
  async loadConfig(): Promise<OutcheckConfig | null> {
    return this.config;
  }

  async saveConfig(config: OutcheckConfig): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: OutcheckConfig | null): void {
    this.config = config;
  }

  getConfig(): OutcheckConfig | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
