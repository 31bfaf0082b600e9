/**
 * MemoryConfigStore Unit Tests
 */

import { MemoryConfigStore } from './memory_config_store';
import type { OutcheckConfig } from '../../config_manager';

describe('MemoryConfigStore', () => {
  let store: MemoryConfigStore;

  const mockConfig: OutcheckConfig = {
    protocolVersion: '1.0',
    outputSchema: { validate: true, maskSecrets: true },
  };

  beforeEach(() => {
    store = new MemoryConfigStore();
  });

  it('[EARS-A1] WHEN loadConfig is invoked without config set, THE SYSTEM SHALL return null', async () => {
    expect(await store.loadConfig()).toBeNull();
  });

  it('[EARS-A2] WHEN loadConfig is invoked after saveConfig, THE SYSTEM SHALL return the config', async () => {
    await store.saveConfig(mockConfig);

    expect(await store.loadConfig()).toEqual(mockConfig);
    expect(store.getConfig()).toEqual(mockConfig);
  });

  it('[EARS-B1] WHEN clear is invoked, THE SYSTEM SHALL reset to no config', async () => {
    store.setConfig(mockConfig);
    store.clear();

    expect(await store.loadConfig()).toBeNull();
  });
});
