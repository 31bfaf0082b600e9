/**
 * In-memory implementations (no filesystem required)
 *
 * This module exports all implementations that work without filesystem access.
 * Suitable for serverless environments and testing.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// ActionMetadataLoader
export { MemoryActionMetadataLoader } from './action_metadata/memory';
