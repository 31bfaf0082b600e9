/**
 * FsConfigStore Unit Tests
 *
 * Tests FsConfigStore with mocked filesystem.
 */

import { FsConfigStore, createConfigManager } from './fs_config_store';
import type { OutcheckConfig } from '../../config_manager';

// Mock fs module
jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
    writeFile: jest.fn(),
    mkdir: jest.fn(),
  },
}));

import { promises as fs } from 'fs';

const mockedFs = jest.mocked(fs);

describe('FsConfigStore', () => {
  const projectRoot = '/test/project';

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('loadConfig', () => {
    it('[EARS-A1] should return the config for valid files', async () => {
      const store = new FsConfigStore(projectRoot);
      const mockConfig: OutcheckConfig = {
        protocolVersion: '1.0',
        outputSchema: { validate: true },
      };
      mockedFs.readFile.mockResolvedValue(JSON.stringify(mockConfig));

      const result = await store.loadConfig();

      expect(result).toEqual(mockConfig);
      expect(mockedFs.readFile).toHaveBeenCalledWith('/test/project/.outcheck/config.json', 'utf-8');
    });

    it('[EARS-A2] should return null for non-existent files (fail-safe)', async () => {
      const store = new FsConfigStore(projectRoot);
      mockedFs.readFile.mockRejectedValue(new Error('ENOENT: no such file'));

      expect(await store.loadConfig()).toBeNull();
    });

    it('[EARS-A3] should return null for invalid JSON', async () => {
      const store = new FsConfigStore(projectRoot);
      mockedFs.readFile.mockResolvedValue('{ not json');

      expect(await store.loadConfig()).toBeNull();
    });

    it('[EARS-A3] should return null for a document with invalid settings', async () => {
      const store = new FsConfigStore(projectRoot);
      mockedFs.readFile.mockResolvedValue(JSON.stringify({ outputSchema: { maskSecrets: 'no' } }));

      expect(await store.loadConfig()).toBeNull();
    });
  });

  describe('saveConfig', () => {
    it('[EARS-A4] should create the directory and write indented JSON', async () => {
      const store = new FsConfigStore(projectRoot);
      const config: OutcheckConfig = { outputSchema: { maskSecrets: false } };
      mockedFs.mkdir.mockResolvedValue(undefined);
      mockedFs.writeFile.mockResolvedValue(undefined);

      await store.saveConfig(config);

      expect(mockedFs.mkdir).toHaveBeenCalledWith('/test/project/.outcheck', { recursive: true });
      expect(mockedFs.writeFile).toHaveBeenCalledWith(
        '/test/project/.outcheck/config.json',
        JSON.stringify(config, null, 2),
        'utf-8'
      );
    });
  });

  describe('createConfigManager', () => {
    it('[EARS-C1] should read output schema settings through the filesystem store', async () => {
      mockedFs.readFile.mockResolvedValue(JSON.stringify({ outputSchema: { validate: true } }));

      const manager = createConfigManager(projectRoot);

      expect(await manager.getOutputSchemaConfig()).toEqual({
        validateOutputSchema: true,
        maskSecrets: true,
      });
    });
  });
});
