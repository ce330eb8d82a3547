import * as fs from 'fs-extra';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export interface CacheOptions<T> {
  /** How long a stored value stays fresh, in milliseconds */
  freshDuration: number;
  /** Validates a decoded value; throws when it does not have the expected shape */
  parse: (raw: unknown) => T;
  now?: () => number;
}

interface CacheEnvelope {
  fetchedAt: number;
  value: unknown;
}

function isEnvelope(raw: unknown): raw is CacheEnvelope {
  return (
    typeof raw === 'object' &&
    raw !== null &&
    'fetchedAt' in raw &&
    typeof raw.fetchedAt === 'number' &&
    'value' in raw
  );
}

/**
 * A single value persisted as gzip-compressed JSON with a freshness window.
 *
 * Within one instance the computation runs at most once per window: concurrent callers share the
 * in-flight promise. Across processes the file is replaced atomically, so a reader sees either the
 * previous value or the new one.
 */
export class CacheManager<T> {
  private pending: Promise<T> | null = null;
  private pendingSince = 0;
  private readonly now: () => number;

  constructor(
    readonly cachePath: string,
    private readonly options: CacheOptions<T>
  ) {
    this.now = options.now ?? Date.now;
  }

  async getOrTryInit(compute: () => Promise<T>): Promise<T> {
    if (this.pending && this.now() - this.pendingSince < this.options.freshDuration) {
      return this.pending;
    }

    const pending: Promise<T> = this.load(compute).then(loaded => {
      // The window runs from when the value was fetched, not from when it was read back.
      if (this.pending === pending) {
        this.pendingSince = loaded.fetchedAt;
      }
      return loaded.value;
    });
    this.pending = pending;
    this.pendingSince = this.now();
    try {
      return await pending;
    } catch (error) {
      // A failed computation must not be served to later callers.
      if (this.pending === pending) {
        this.pending = null;
      }
      throw error;
    }
  }

  async clear(): Promise<void> {
    this.pending = null;
    await fs.remove(this.cachePath);
  }

  private async load(compute: () => Promise<T>): Promise<{ value: T; fetchedAt: number }> {
    const cached = await this.readFresh();
    if (cached !== undefined) {
      return cached;
    }

    const value = await compute();
    const fetchedAt = this.now();
    try {
      await this.write(value, fetchedAt);
    } catch (error) {
      logger.warn(`failed to write cache file: ${this.cachePath}`, error);
    }
    return { value, fetchedAt };
  }

  private async readFresh(): Promise<{ value: T; fetchedAt: number } | undefined> {
    if (!(await fs.pathExists(this.cachePath))) {
      return undefined;
    }

    try {
      const compressed = await fs.readFile(this.cachePath);
      const raw: unknown = JSON.parse((await gunzipAsync(compressed)).toString('utf8'));
      if (!isEnvelope(raw)) {
        throw new Error('missing cache envelope');
      }
      const age = this.now() - raw.fetchedAt;
      if (age < 0 || age >= this.options.freshDuration) {
        logger.debug(`cache ${this.cachePath} is stale`);
        return undefined;
      }
      logger.debug(`using cache ${this.cachePath}`);
      return { value: this.options.parse(raw.value), fetchedAt: raw.fetchedAt };
    } catch (error) {
      logger.debug(`ignoring unreadable cache ${this.cachePath}`, error);
      return undefined;
    }
  }

  private async write(value: T, fetchedAt: number): Promise<void> {
    const envelope: CacheEnvelope = { fetchedAt, value };
    const compressed = await gzipAsync(Buffer.from(JSON.stringify(envelope), 'utf8'));
    await FileSystem.writeFileAtomic(this.cachePath, compressed);
  }
}
