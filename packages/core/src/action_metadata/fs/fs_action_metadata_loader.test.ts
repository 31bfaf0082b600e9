import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsActionMetadataLoader } from './fs_action_metadata_loader';
import { loadActionExecution } from '../build_execution';
import { MetadataLoadError, MetadataNotFoundError, MetadataValidationError } from '../errors';
import { maskSecretOutput } from '../../output_schema';
import { MASKED_ATTRIBUTE_VALUE } from '../../constants';

describe('FsActionMetadataLoader', () => {
  let rootPath: string;
  let loader: FsActionMetadataLoader;

  const writeDocument = (kind: 'actions' | 'runners', name: string, content: string): void => {
    const directory = path.join(rootPath, kind);
    fs.mkdirSync(directory, { recursive: true });
    fs.writeFileSync(path.join(directory, `${name}.yaml`), content);
  };

  beforeEach(() => {
    rootPath = fs.mkdtempSync(path.join(os.tmpdir(), 'action-metadata-test-'));
    loader = new FsActionMetadataLoader(rootPath);
  });

  afterEach(() => {
    fs.rmSync(rootPath, { recursive: true, force: true });
  });

  describe('loadAction', () => {
    it('[EARS-1] WHEN the action file is valid, THE SYSTEM SHALL return its metadata', async () => {
      writeDocument('actions', 'fetch_user', [
        'name: fetch_user',
        'runner_type: local-shell',
        'output_schema:',
        '  type: object',
        '  properties:',
        '    token:',
        '      type: string',
        '      secret: true',
      ].join('\n'));

      const action = await loader.loadAction('fetch_user');

      expect(action).toEqual({
        name: 'fetch_user',
        runner_type: 'local-shell',
        output_schema: {
          type: 'object',
          properties: { token: { type: 'string', secret: true } },
        },
      });
    });

    it('[EARS-2] WHEN the action file does not exist, THE SYSTEM SHALL throw MetadataNotFoundError', async () => {
      await expect(loader.loadAction('missing')).rejects.toThrow(MetadataNotFoundError);
      await expect(loader.loadAction('missing')).rejects.toThrow('Action not found: missing');
    });

    it('[EARS-3] WHEN the action file is not valid YAML, THE SYSTEM SHALL throw MetadataLoadError', async () => {
      writeDocument('actions', 'broken', 'name: [unclosed');

      await expect(loader.loadAction('broken')).rejects.toThrow(MetadataLoadError);
    });

    it('[EARS-4] WHEN the action file misses required fields, THE SYSTEM SHALL throw MetadataValidationError', async () => {
      writeDocument('actions', 'incomplete', 'name: incomplete');

      await expect(loader.loadAction('incomplete')).rejects.toThrow(MetadataValidationError);
      await expect(loader.loadAction('incomplete')).rejects.toThrow(
        "Invalid ActionMetadata: runner_type: must have required property 'runner_type'"
      );
    });
  });

  describe('metadata names', () => {
    it('[EARS-8] WHEN an action name climbs out of the actions directory, THE SYSTEM SHALL refuse to read it', async () => {
      fs.writeFileSync(path.join(rootPath, 'outside.yaml'), 'name: outside\nrunner_type: local-shell\n');

      await expect(loader.loadAction('../outside')).rejects.toThrow(MetadataLoadError);
      await expect(loader.loadAction('../outside')).rejects.toThrow(
        'Cannot load metadata from ../outside: invalid action name'
      );
    });

    it('[EARS-9] WHEN an action names a runner by path, THE SYSTEM SHALL refuse to read the runner', async () => {
      writeDocument('actions', 'sneaky', 'name: sneaky\nrunner_type: ../actions/sneaky\n');

      await expect(loadActionExecution(loader, 'sneaky')).rejects.toThrow(
        'Cannot load metadata from ../actions/sneaky: invalid runner name'
      );
    });

    it('[EARS-10] WHEN a name contains a backslash or is a dot segment, THE SYSTEM SHALL refuse it', async () => {
      await expect(loader.loadRunner('..\\outside')).rejects.toThrow(MetadataLoadError);
      await expect(loader.loadRunner('..')).rejects.toThrow(MetadataLoadError);
      await expect(loader.loadAction('')).rejects.toThrow(MetadataLoadError);
    });
  });

  describe('loadRunner', () => {
    it('[EARS-5] WHEN the runner file is valid, THE SYSTEM SHALL return its metadata', async () => {
      writeDocument('runners', 'local-shell', 'name: local-shell\noutput_key: stdout\n');

      expect(await loader.loadRunner('local-shell')).toEqual({ name: 'local-shell', output_key: 'stdout' });
    });

    it('[EARS-6] WHEN the runner file does not exist, THE SYSTEM SHALL throw MetadataNotFoundError', async () => {
      await expect(loader.loadRunner('missing')).rejects.toThrow('Runner not found: missing');
    });
  });

  describe('loadActionExecution', () => {
    it('[EARS-7] WHEN action and runner are on disk, THE SYSTEM SHALL build an execution usable for masking', async () => {
      writeDocument('actions', 'fetch_user', [
        'name: fetch_user',
        'runner_type: local-shell',
        'output_schema:',
        '  type: object',
        '  properties:',
        '    user:',
        '      type: string',
        '    token:',
        '      type: string',
        '      secret: true',
      ].join('\n'));
      writeDocument('runners', 'local-shell', [
        'name: local-shell',
        'output_key: stdout',
        'output_schema:',
        '  type: object',
        '  properties:',
        '    stdout:',
        '      type: object',
        '    stderr:',
        '      type: string',
      ].join('\n'));

      const execution = await loadActionExecution(loader, 'fetch_user');
      const masked = maskSecretOutput(execution, {
        stdout: { user: 'admin', token: 'test-secret' },
        stderr: '',
      });

      expect(execution.runner.output_key).toBe('stdout');
      expect(masked).toEqual({
        stdout: { user: 'admin', token: MASKED_ATTRIBUTE_VALUE },
        stderr: '',
      });
    });
  });
});
