import * as path from 'path';
import { Settings } from '../../types/Config';
import {
  InstallOutcome,
  InstallTarget,
  ProgressReporter,
  RuntimeContext,
  RuntimeType,
  ToolVersion,
  VersionRequest,
} from '../../types/Runtime';
import { logger } from '../../utils/Logger';
import { CacheManager } from '../cache/CacheManager';

export interface RuntimeManagerOptions {
  /** Root cache directory; each runtime keeps its files in a subdirectory named after it */
  cacheDir: string;
  /** Freshness window of the remote version caches, in milliseconds */
  freshDuration: number;
}

export function parseStringList(raw: unknown): string[] {
  if (!Array.isArray(raw) || !raw.every((item): item is string => typeof item === 'string')) {
    throw new Error('expected a list of strings');
  }
  return raw;
}

/**
 * Parse a version argument: `ref:<name>` is a reference, a dotted triple is an exact version,
 * anything else is a prefix left to the host to resolve.
 */
export function parseVersionRequest(input: string): VersionRequest {
  const trimmed = input.trim();
  if (trimmed.startsWith('ref:')) {
    return { kind: 'ref', value: trimmed.slice('ref:'.length) };
  }
  if (/^\d+\.\d+\.\d+/.test(trimmed)) {
    return { kind: 'version', value: trimmed };
  }
  return { kind: 'prefix', value: trimmed };
}

/**
 * Abstract base class for runtime managers.
 * The host lists, installs and activates runtimes only through this surface.
 */
export abstract class RuntimeManager {
  protected readonly type: RuntimeType;
  /** Private cache directory of this runtime */
  protected readonly cachePath: string;
  private readonly remoteVersionCache: CacheManager<string[]>;

  constructor(type: RuntimeType, options: RuntimeManagerOptions) {
    this.type = type;
    this.cachePath = path.join(options.cacheDir, type);
    this.remoteVersionCache = new CacheManager(
      path.join(this.cachePath, 'remote_versions.json.gz'),
      { freshDuration: options.freshDuration, parse: parseStringList }
    );
  }

  get name(): RuntimeType {
    return this.type;
  }

  /**
   * Installable versions, cached for the freshness window
   */
  async listRemoteVersions(context: RuntimeContext): Promise<string[]> {
    return this.remoteVersionCache.getOrTryInit(() => this.fetchRemoteVersions(context));
  }

  /**
   * Files the host should read in a project directory to infer the requested version
   */
  abstract legacyFilenames(): string[];

  abstract installVersion(
    target: InstallTarget,
    reporter: ProgressReporter,
    context: RuntimeContext
  ): Promise<InstallOutcome>;

  /**
   * Variables to merge into the environment of commands run under this tool version
   */
  abstract execEnv(tv: ToolVersion, context: RuntimeContext): Promise<Record<string, string>>;

  protected abstract fetchRemoteVersions(context: RuntimeContext): Promise<string[]>;

  createInstallTarget(
    request: VersionRequest,
    options: Record<string, string>,
    settings: Settings
  ): InstallTarget {
    return {
      version: request.value,
      request,
      options,
      installPath: path.join(settings.dataDir, 'installs', this.type, request.value),
      downloadPath: path.join(settings.dataDir, 'downloads', this.type, request.value),
    };
  }

  protected log(level: 'debug' | 'info' | 'warn' | 'error', message: string, meta?: unknown): void {
    logger[level](`[${this.type.toUpperCase()}] ${message}`, meta);
  }
}
