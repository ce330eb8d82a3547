import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import { LogLevelSetting, SettingKey, Settings } from '../types/Config';
import { ProjectContext } from '../types/Runtime';
import { FileSystem } from '../utils/FileSystem';
import { isLogLevel } from '../utils/Logger';

type SettingKind =
  | 'boolean'
  | 'number'
  | 'string'
  | 'optional-string'
  | 'path'
  | 'optional-path'
  | 'log-level';

/** snake_case name used in config.yml, the CLI and (upper-cased) in PYPROV_* variables */
export const SETTINGS_SCHEMA: { [K in SettingKey]: { name: string; kind: SettingKind } } = {
  allCompile: { name: 'all_compile', kind: 'boolean' },
  pythonCompile: { name: 'python_compile', kind: 'boolean' },
  experimental: { name: 'experimental', kind: 'boolean' },
  pythonVenvAutoCreate: { name: 'python_venv_auto_create', kind: 'boolean' },
  verbose: { name: 'verbose', kind: 'boolean' },
  logLevel: { name: 'log_level', kind: 'log-level' },
  fetchRemoteVersionsCache: { name: 'fetch_remote_versions_cache', kind: 'number' },
  fetchRemoteVersionsTimeout: { name: 'fetch_remote_versions_timeout', kind: 'number' },
  useVersionsHost: { name: 'use_versions_host', kind: 'boolean' },
  versionsHostUrl: { name: 'versions_host_url', kind: 'string' },
  pyenvRepo: { name: 'pyenv_repo', kind: 'string' },
  pythonPatchUrl: { name: 'python_patch_url', kind: 'optional-string' },
  pythonPatchesDirectory: { name: 'python_patches_directory', kind: 'optional-path' },
  defaultPackagesFile: { name: 'default_packages_file', kind: 'path' },
  dataDir: { name: 'data_dir', kind: 'path' },
  cacheDir: { name: 'cache_dir', kind: 'path' },
};

export const PROJECT_CONFIG_FILE = '.pyprov.yml';

export function createDefaultSettings(home: string = os.homedir()): Settings {
  return {
    allCompile: false,
    pythonCompile: false,
    experimental: false,
    pythonVenvAutoCreate: false,
    verbose: false,
    logLevel: 'info',
    fetchRemoteVersionsCache: 60 * 60 * 1000,
    fetchRemoteVersionsTimeout: 10 * 1000,
    useVersionsHost: true,
    versionsHostUrl: 'https://mise-versions.jdx.dev',
    pyenvRepo: 'https://github.com/pyenv/pyenv.git',
    defaultPackagesFile: path.join(home, '.default-python-packages'),
    dataDir: path.join(home, '.local', 'share', 'pyprov'),
    cacheDir: path.join(home, '.cache', 'pyprov'),
  };
}

function parseBoolean(value: unknown, name: string): boolean {
  if (typeof value === 'boolean') return value;
  const normalized = String(value).trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  throw new Error(`Invalid boolean for ${name}: ${String(value)}`);
}

function parseNumber(value: unknown, name: string): number {
  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid number for ${name}: ${String(value)}`);
  }
  return parsed;
}

function parseLogLevel(value: unknown, name: string): LogLevelSetting {
  const level = String(value).trim();
  if (!isLogLevel(level)) {
    throw new Error(`Invalid log level for ${name}: ${level}`);
  }
  return level;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(v => typeof v === 'string')
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads global settings and project configuration. Each operation takes one Settings snapshot
 * and passes it down instead of re-reading mid-flight.
 */
export class ConfigManager {
  private static instance: ConfigManager;
  private readonly configDir: string;
  private readonly globalConfigPath: string;

  constructor(configDir: string = path.join(os.homedir(), '.pyprov')) {
    this.configDir = configDir;
    this.globalConfigPath = path.join(this.configDir, 'config.yml');
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(process.env.PYPROV_CONFIG_DIR || undefined);
    }
    return ConfigManager.instance;
  }

  /**
   * Defaults, overridden by config.yml, overridden by PYPROV_* environment variables
   */
  async loadSettings(env: NodeJS.ProcessEnv = process.env): Promise<Readonly<Settings>> {
    const fileSettings = await this.readGlobalSettings();
    const defaults = createDefaultSettings();

    const lookup = (key: SettingKey): unknown => {
      const { name } = SETTINGS_SCHEMA[key];
      const fromEnv = env[`PYPROV_${name.toUpperCase()}`];
      return fromEnv !== undefined ? fromEnv : fileSettings[name];
    };
    const bool = (key: SettingKey, fallback: boolean): boolean => {
      const value = lookup(key);
      return value === undefined ? fallback : parseBoolean(value, SETTINGS_SCHEMA[key].name);
    };
    const num = (key: SettingKey, fallback: number): number => {
      const value = lookup(key);
      return value === undefined ? fallback : parseNumber(value, SETTINGS_SCHEMA[key].name);
    };
    // Only filesystem paths get `~` and `$VAR` expansion; URLs are taken verbatim.
    const text = (key: SettingKey, value: unknown): string => {
      const kind = SETTINGS_SCHEMA[key].kind;
      return kind === 'path' || kind === 'optional-path'
        ? FileSystem.expandPath(String(value), env)
        : String(value);
    };
    const str = (key: SettingKey, fallback: string): string => {
      const value = lookup(key);
      return value === undefined || value === '' ? fallback : text(key, value);
    };
    const optional = (key: SettingKey): string | undefined => {
      const value = lookup(key);
      return value === undefined || value === '' ? undefined : text(key, value);
    };

    const logLevelValue = lookup('logLevel');
    const verbose = bool('verbose', defaults.verbose);

    return Object.freeze({
      allCompile: bool('allCompile', defaults.allCompile),
      pythonCompile: bool('pythonCompile', defaults.pythonCompile),
      experimental: bool('experimental', defaults.experimental),
      pythonVenvAutoCreate: bool('pythonVenvAutoCreate', defaults.pythonVenvAutoCreate),
      verbose,
      logLevel:
        logLevelValue === undefined
          ? verbose
            ? 'debug'
            : defaults.logLevel
          : parseLogLevel(logLevelValue, SETTINGS_SCHEMA.logLevel.name),
      fetchRemoteVersionsCache: num('fetchRemoteVersionsCache', defaults.fetchRemoteVersionsCache),
      fetchRemoteVersionsTimeout: num(
        'fetchRemoteVersionsTimeout',
        defaults.fetchRemoteVersionsTimeout
      ),
      useVersionsHost: bool('useVersionsHost', defaults.useVersionsHost),
      versionsHostUrl: str('versionsHostUrl', defaults.versionsHostUrl),
      pyenvRepo: str('pyenvRepo', defaults.pyenvRepo),
      pythonPatchUrl: optional('pythonPatchUrl'),
      pythonPatchesDirectory: optional('pythonPatchesDirectory'),
      defaultPackagesFile: str('defaultPackagesFile', defaults.defaultPackagesFile),
      dataDir: str('dataDir', defaults.dataDir),
      cacheDir: str('cacheDir', defaults.cacheDir),
    });
  }

  /**
   * Persist one setting by its snake_case name, validating the value for that setting
   */
  async setSetting(name: string, value: string): Promise<void> {
    const entry = Object.values(SETTINGS_SCHEMA).find(definition => definition.name === name);
    if (!entry) {
      const known = Object.values(SETTINGS_SCHEMA)
        .map(definition => definition.name)
        .join(', ');
      throw new Error(`Unknown setting '${name}'. Known settings: ${known}`);
    }

    let stored: string | number | boolean;
    switch (entry.kind) {
      case 'boolean':
        stored = parseBoolean(value, name);
        break;
      case 'number':
        stored = parseNumber(value, name);
        break;
      case 'log-level':
        stored = parseLogLevel(value, name);
        break;
      default:
        stored = value;
    }

    const settings = await this.readGlobalSettings();
    settings[name] = stored;

    const content = yaml.stringify({ settings }, { indent: 2, lineWidth: 100 });
    try {
      await FileSystem.writeFileAtomic(this.globalConfigPath, content);
    } catch (error) {
      throw new Error(
        `Failed to save global config: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Locate the project enclosing `startPath` and read its .pyprov.yml, if any
   */
  async loadProjectContext(startPath: string = process.cwd()): Promise<ProjectContext> {
    const root = await FileSystem.findProjectRoot(startPath);
    const context: ProjectContext = { root, env: {}, tools: {} };
    if (!root) {
      return context;
    }

    const configPath = path.join(root, PROJECT_CONFIG_FILE);
    if (!(await fs.pathExists(configPath))) {
      return context;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(await fs.readFile(configPath, 'utf8'));
    } catch (error) {
      throw new Error(
        `Failed to load project config at ${configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (parsed === null || parsed === undefined) {
      return context;
    }
    if (!isRecord(parsed)) {
      throw new Error(`Project config at ${configPath} must be a mapping`);
    }

    if (parsed.env !== undefined) {
      if (!isStringRecord(parsed.env)) {
        throw new Error(`'env' in ${configPath} must map names to strings`);
      }
      context.env = parsed.env;
    }

    if (parsed.tools !== undefined) {
      if (!isRecord(parsed.tools)) {
        throw new Error(`'tools' in ${configPath} must be a mapping`);
      }
      for (const [tool, options] of Object.entries(parsed.tools)) {
        if (typeof options === 'string') {
          context.tools[tool] = { version: options };
        } else if (isStringRecord(options)) {
          context.tools[tool] = options;
        } else {
          throw new Error(`Options for tool '${tool}' in ${configPath} must be strings`);
        }
      }
    }

    return context;
  }

  private async readGlobalSettings(): Promise<Record<string, unknown>> {
    if (!(await fs.pathExists(this.globalConfigPath))) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(await fs.readFile(this.globalConfigPath, 'utf8'));
    } catch (error) {
      throw new Error(
        `Failed to load global config: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (!isRecord(parsed) || parsed.settings === undefined || parsed.settings === null) {
      return {};
    }
    if (!isRecord(parsed.settings)) {
      throw new Error(`'settings' in ${this.globalConfigPath} must be a mapping`);
    }
    return { ...parsed.settings };
  }
}
