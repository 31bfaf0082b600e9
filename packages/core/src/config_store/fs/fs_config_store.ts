/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of .outcheck/config.json on the local filesystem.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { OutcheckConfig } from '../../config_manager';
import { ConfigManager, isOutcheckConfig } from '../../config_manager';
import { createLogger } from '../../logger';

const logger = createLogger('[FsConfigStore] ');

export const CONFIG_DIR = '.outcheck';
export const CONFIG_FILE = 'config.json';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Fail-safe: a missing, unparsable or structurally invalid file loads as null.
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, CONFIG_DIR, CONFIG_FILE);
  }

  /**
   * [EARS-A1] Returns the config for valid files
   * [EARS-A2] Returns null for non-existent files
   * [EARS-A3] Returns null for invalid JSON or an invalid document
   */
  async loadConfig(): Promise<OutcheckConfig | null> {
    let parsed: unknown;
    try {
      const configContent = await fs.readFile(this.configPath, 'utf-8');
      parsed = JSON.parse(configContent);
    } catch (error) {
      logger.debug(`No usable config at ${this.configPath}`, error);
      return null;
    }

    if (!isOutcheckConfig(parsed)) {
      logger.warn(`Ignoring invalid config at ${this.configPath}`);
      return null;
    }
    return parsed;
  }

  /**
   * [EARS-A4] Writes the config as indented JSON, creating the directory
   */
  async saveConfig(config: OutcheckConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }
}

/**
 * Create a ConfigManager backed by the filesystem config of a project.
 */
export function createConfigManager(projectRoot: string): ConfigManager {
  return new ConfigManager(new FsConfigStore(projectRoot));
}
