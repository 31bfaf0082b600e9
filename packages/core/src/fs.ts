/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @outcheck/core/memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager Factories
export {
  FsConfigStore,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
  CONFIG_DIR,
  CONFIG_FILE,
} from './config_store/fs';

// ActionMetadataLoader
export { FsActionMetadataLoader } from './action_metadata/fs';
