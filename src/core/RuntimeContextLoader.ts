import * as fs from 'fs-extra';
import * as path from 'path';
import { RuntimeContext, RuntimeType } from '../types/Runtime';
import { logger } from '../utils/Logger';
import { ConfigManager } from './ConfigManager';
import { RuntimeManager } from './runtime/RuntimeManager';
import { RuntimeRegistry } from './runtime/RuntimeRegistry';

/**
 * Snapshot settings and project configuration for one command
 */
export async function loadRuntimeContext(cwd: string = process.cwd()): Promise<RuntimeContext> {
  const configManager = ConfigManager.getInstance();
  const settings = await configManager.loadSettings();
  logger.setLevel(settings.logLevel);
  const project = await configManager.loadProjectContext(cwd);
  return { settings, project };
}

export function runtimeFor(type: RuntimeType, context: RuntimeContext): RuntimeManager {
  return RuntimeRegistry.create(type, {
    cacheDir: context.settings.cacheDir,
    freshDuration: context.settings.fetchRemoteVersionsCache,
  });
}

/**
 * The version to act on: the explicit argument, else `tools.<runtime>.version` from .pyprov.yml,
 * else the first line of the first legacy version file found in the project root.
 */
export async function requestedVersion(
  runtime: RuntimeManager,
  context: RuntimeContext,
  explicit?: string
): Promise<string | null> {
  if (explicit) {
    return explicit;
  }

  const configured = context.project.tools[runtime.name]?.version;
  if (configured) {
    return configured;
  }

  const root = context.project.root;
  if (!root) {
    return null;
  }
  for (const filename of runtime.legacyFilenames()) {
    const filePath = path.join(root, filename);
    if (await fs.pathExists(filePath)) {
      const [first] = (await fs.readFile(filePath, 'utf8')).split('\n');
      if (first.trim()) {
        return first.trim();
      }
    }
  }
  return null;
}

/**
 * Tool options from .pyprov.yml, without the version selector itself
 */
export function toolOptions(runtime: RuntimeManager, context: RuntimeContext): Record<string, string> {
  const options = { ...(context.project.tools[runtime.name] ?? {}) };
  delete options.version;
  return options;
}
