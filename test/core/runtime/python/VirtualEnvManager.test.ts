import * as fs from 'fs-extra';
import * as path from 'path';
import {
  ADD_PATH_VAR,
  VIRTUAL_ENV_VAR,
  VirtualEnvManager,
  pythonPath,
} from '../../../../src/core/runtime/python/VirtualEnvManager';
import { ToolVersion } from '../../../../src/types/Runtime';
import { logger } from '../../../../src/utils/Logger';
import { ProcessUtils } from '../../../../src/utils/ProcessUtils';
import { createTempDir, cleanupTempDir, createTestContext } from '../../../setup';

jest.mock('../../../../src/utils/ProcessUtils');

const mockedRun = jest.mocked(ProcessUtils.run);

describe('VirtualEnvManager', () => {
  let tempDir: string;
  let manager: VirtualEnvManager;

  const createToolVersion = (options: Record<string, string> = {}): ToolVersion => ({
    version: '3.12.0',
    installPath: path.join(tempDir, 'data', 'installs', 'python', '3.12.0'),
    options,
  });

  beforeEach(async () => {
    tempDir = await createTempDir();
    manager = new VirtualEnvManager();
    jest.resetAllMocks();
    mockedRun.mockResolvedValue('');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  describe('resolve', () => {
    it('should return null without a virtualenv option', async () => {
      const venv = await manager.resolve(createToolVersion(), createTestContext(tempDir));

      expect(venv).toBeNull();
    });

    it('should use an existing virtualenv', async () => {
      const venvPath = path.join(tempDir, 'envs', 'app');
      await fs.ensureDir(venvPath);

      const venv = await manager.resolve(
        createToolVersion({ virtualenv: venvPath }),
        createTestContext(tempDir, { experimental: true })
      );

      expect(venv).toEqual({ path: venvPath, created: false });
      expect(mockedRun).not.toHaveBeenCalled();
    });

    it('should anchor relative paths at the project root', async () => {
      const projectRoot = path.join(tempDir, 'project');
      await fs.ensureDir(path.join(projectRoot, '.venv'));

      const venv = await manager.resolve(
        createToolVersion({ virtualenv: '.venv' }),
        createTestContext(tempDir, { experimental: true }, { root: projectRoot })
      );

      expect(venv).toEqual({ path: path.join(projectRoot, '.venv'), created: false });
    });

    it('should explain how to create a missing virtualenv when auto-create is off', async () => {
      const warn = jest.spyOn(logger, 'warn');
      const venvPath = path.join(tempDir, '.venv');

      const venv = await manager.resolve(
        createToolVersion({ virtualenv: '.venv' }),
        createTestContext(tempDir, { experimental: true })
      );

      expect(venv).toBeNull();
      expect(mockedRun).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith(
        `no venv found at: ${venvPath}\n\n` +
          'To have pyprov automatically create virtualenvs, run:\n' +
          'pyprov settings set python_venv_auto_create true\n\n' +
          'To create a virtualenv manually, run:\n' +
          `python -m venv ${venvPath}`
      );
    });

    it('should create a missing virtualenv when auto-create is on', async () => {
      const tv = createToolVersion({ virtualenv: '.venv' });
      const venvPath = path.join(tempDir, '.venv');

      const venv = await manager.resolve(
        tv,
        createTestContext(tempDir, { experimental: true, pythonVenvAutoCreate: true }, { env: { PIP_NO_INPUT: '1' } })
      );

      expect(venv).toEqual({ path: venvPath, created: true });
      expect(mockedRun).toHaveBeenCalledWith(pythonPath(tv), ['-m', 'venv', venvPath], {
        env: { PIP_NO_INPUT: '1' },
        onOutput: undefined,
      });
    });

    it('should warn when experimental mode is off', async () => {
      const warn = jest.spyOn(logger, 'warn');
      await fs.ensureDir(path.join(tempDir, '.venv'));

      await manager.resolve(createToolVersion({ virtualenv: '.venv' }), createTestContext(tempDir));

      expect(warn).toHaveBeenCalledWith(
        'please enable experimental mode with `pyprov settings set experimental true` ' +
          'to use python virtualenv activation'
      );
    });

    it('should propagate creation failures', async () => {
      mockedRun.mockRejectedValue(new Error('No module named venv'));

      await expect(
        manager.resolve(
          createToolVersion({ virtualenv: '.venv' }),
          createTestContext(tempDir, { pythonVenvAutoCreate: true })
        )
      ).rejects.toThrow('No module named venv');
    });
  });

  describe('execEnv', () => {
    it('should export the virtualenv and its bin directory', async () => {
      const venvPath = path.join(tempDir, '.venv');
      await fs.ensureDir(venvPath);

      const env = await manager.execEnv(
        createToolVersion({ virtualenv: '.venv' }),
        createTestContext(tempDir, { experimental: true })
      );

      expect(env).toEqual({
        [VIRTUAL_ENV_VAR]: venvPath,
        [ADD_PATH_VAR]: path.join(venvPath, 'bin'),
      });
    });

    it('should return nothing without a virtualenv', async () => {
      const env = await manager.execEnv(createToolVersion(), createTestContext(tempDir));

      expect(env).toEqual({});
    });

    it('should log and return nothing when the virtualenv cannot be created', async () => {
      const failure = new Error('No module named venv');
      mockedRun.mockRejectedValue(failure);
      const warn = jest.spyOn(logger, 'warn');

      const env = await manager.execEnv(
        createToolVersion({ virtualenv: '.venv' }),
        createTestContext(tempDir, { pythonVenvAutoCreate: true })
      );

      expect(env).toEqual({});
      expect(warn).toHaveBeenCalledWith('failed to get virtualenv', failure);
    });
  });
});
