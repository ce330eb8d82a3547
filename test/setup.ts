import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { createDefaultSettings } from '../src/core/ConfigManager';
import { Settings } from '../src/types/Config';
import { ProgressReporter, RuntimeContext } from '../src/types/Runtime';

// Global test configuration
jest.setTimeout(30000);

// Mock console to reduce noise in tests
const originalConsole = console;
beforeAll(() => {
  global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
});

afterAll(() => {
  global.console = originalConsole;
});

export const createTempDir = async (): Promise<string> => {
  return fs.mkdtemp(path.join(os.tmpdir(), 'pyprov-test-'));
};

export const cleanupTempDir = async (dir: string): Promise<void> => {
  await fs.remove(dir);
};

/**
 * Settings rooted in a temp directory, with the network shortcut disabled unless overridden
 */
export const createTestSettings = (tempDir: string, overrides: Partial<Settings> = {}): Settings => ({
  ...createDefaultSettings(tempDir),
  versionsHostUrl: 'https://versions.test',
  pyenvRepo: 'https://git.test/pyenv.git',
  dataDir: path.join(tempDir, 'data'),
  cacheDir: path.join(tempDir, 'cache'),
  defaultPackagesFile: path.join(tempDir, '.default-python-packages'),
  ...overrides,
});

export const createTestContext = (
  tempDir: string,
  overrides: Partial<Settings> = {},
  project: Partial<RuntimeContext['project']> = {}
): RuntimeContext => ({
  settings: createTestSettings(tempDir, overrides),
  project: { root: tempDir, env: {}, tools: {}, ...project },
});

export const createReporter = (): ProgressReporter & { setMessage: jest.Mock } => ({
  setMessage: jest.fn(),
});
