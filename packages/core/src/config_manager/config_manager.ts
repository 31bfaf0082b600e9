/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to Outcheck project configuration (config.json).
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import { isJsonObject } from '../types';
import { isLogLevel } from '../logger';
import type { LogLevel } from '../logger';
import type {
  IConfigManager,
  OutcheckConfig,
  OutputSchemaConfig
} from './config_manager.types';

export const DEFAULT_OUTPUT_SCHEMA_CONFIG: OutputSchemaConfig = {
  validateOutputSchema: false,
  maskSecrets: true
};

function isOptionalBoolean(value: unknown): boolean {
  return value === undefined || typeof value === 'boolean';
}

/**
 * Structural check of a parsed config.json document.
 */
export function isOutcheckConfig(value: unknown): value is OutcheckConfig {
  if (!isJsonObject(value)) return false;

  const { protocolVersion, logLevel, outputSchema } = value;
  if (protocolVersion !== undefined && typeof protocolVersion !== 'string') return false;
  if (logLevel !== undefined && !isLogLevel(logLevel)) return false;
  if (outputSchema === undefined) return true;

  return isJsonObject(outputSchema)
    && isOptionalBoolean(outputSchema['validate'])
    && isOptionalBoolean(outputSchema['maskSecrets']);
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@outcheck/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@outcheck/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ outputSchema: { validate: true } });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  async loadConfig(): Promise<OutcheckConfig | null> {
    return this.configStore.loadConfig();
  }

  async getOutputSchemaConfig(): Promise<OutputSchemaConfig> {
    const config = await this.loadConfig();

    return {
      validateOutputSchema: config?.outputSchema?.validate ?? DEFAULT_OUTPUT_SCHEMA_CONFIG.validateOutputSchema,
      maskSecrets: config?.outputSchema?.maskSecrets ?? DEFAULT_OUTPUT_SCHEMA_CONFIG.maskSecrets
    };
  }

  async getLogLevel(): Promise<LogLevel | null> {
    const config = await this.loadConfig();
    return config?.logLevel ?? null;
  }
}
