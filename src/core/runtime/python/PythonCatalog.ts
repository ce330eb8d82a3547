import { Settings } from '../../../types/Config';
import { PlatformTag, PrecompiledEntry, StrategyChoice } from '../../../types/Runtime';
import { ProvisionError, errorMessage } from '../../../utils/Errors';
import { HttpClient } from '../../../utils/HttpClient';
import { logger } from '../../../utils/Logger';
import { CacheManager } from '../../cache/CacheManager';
import { detectPlatform, platformSuffix } from '../Platform';
import { fetchVersionsFromHost } from '../VersionsHost';
import { PythonBuild } from './PythonBuild';

const PRECOMPILED_LINE = /^cpython-(\d+\.\d+\.\d+)\+(\d+).*/;

export function parsePrecompiledFeed(raw: string): PrecompiledEntry[] {
  const entries: PrecompiledEntry[] = [];
  for (const line of raw.split('\n')) {
    const match = PRECOMPILED_LINE.exec(line.trim());
    if (match) {
      entries.push({ version: match[1], releaseTag: match[2], filename: match[0] });
    }
  }
  return entries;
}

export function parseCachedEntries(raw: unknown): PrecompiledEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error('expected a list of precompiled entries');
  }
  return raw.map((item: unknown) => {
    if (
      typeof item === 'object' &&
      item !== null &&
      'version' in item &&
      'releaseTag' in item &&
      'filename' in item &&
      typeof item.version === 'string' &&
      typeof item.releaseTag === 'string' &&
      typeof item.filename === 'string'
    ) {
      return { version: item.version, releaseTag: item.releaseTag, filename: item.filename };
    }
    throw new Error('malformed precompiled entry');
  });
}

export function filterForPlatform(entries: PrecompiledEntry[], tag: PlatformTag): PrecompiledEntry[] {
  const suffix = platformSuffix(tag);
  return entries.filter(entry => entry.filename.includes(suffix));
}

/**
 * Unique versions in first-seen order
 */
export function uniqueVersions(entries: PrecompiledEntry[]): string[] {
  return [...new Set(entries.map(entry => entry.version))];
}

/**
 * The last matching entry in feed order wins: the feed lists releases oldest first, so this picks
 * the newest build of the requested version.
 */
export function selectPrecompiled(
  entries: PrecompiledEntry[],
  version: string,
  tag: PlatformTag
): PrecompiledEntry | undefined {
  const candidates = filterForPlatform(entries, tag);
  for (let i = candidates.length - 1; i >= 0; i--) {
    if (candidates[i].version === version) {
      return candidates[i];
    }
  }
  return undefined;
}

/**
 * Resolves installable Python versions from the precompiled feed or from python-build
 */
export class PythonCatalog {
  constructor(
    private readonly precompiledCache: CacheManager<PrecompiledEntry[]>,
    private readonly pythonBuild: PythonBuild,
    private readonly platform?: PlatformTag
  ) {}

  platformTag(): PlatformTag {
    return this.platform ?? detectPlatform();
  }

  /**
   * The whole precompiled feed, fetched at most once per freshness window
   */
  async precompiledEntries(settings: Settings): Promise<PrecompiledEntry[]> {
    return this.precompiledCache.getOrTryInit(async () => {
      const url = `${settings.versionsHostUrl.replace(/\/+$/, '')}/python-precompiled`;
      try {
        return parsePrecompiledFeed(await HttpClient.getText(url));
      } catch (error) {
        throw new ProvisionError(
          'catalog',
          `Failed to fetch precompiled python versions from ${url}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    });
  }

  async select(version: string, settings: Settings): Promise<PrecompiledEntry | undefined> {
    return selectPrecompiled(await this.precompiledEntries(settings), version, this.platformTag());
  }

  async listVersions(strategy: StrategyChoice, settings: Settings): Promise<string[]> {
    if (strategy === 'precompiled') {
      const entries = await this.precompiledEntries(settings);
      return uniqueVersions(filterForPlatform(entries, this.platformTag()));
    }

    try {
      const versions = await fetchVersionsFromHost('python', settings);
      if (versions) {
        return [...new Set(versions)];
      }
    } catch (error) {
      logger.warn(`failed to fetch remote versions: ${errorMessage(error)}`);
    }

    return [...new Set(await this.pythonBuild.listDefinitions(settings))];
  }
}
