import { CacheManager } from '../../../src/core/cache/CacheManager';
import { parseStringList } from '../../../src/core/runtime/RuntimeManager';
import { logger } from '../../../src/utils/Logger';
import { createTempDir, cleanupTempDir } from '../../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

const HOUR = 60 * 60 * 1000;

describe('CacheManager', () => {
  let tempDir: string;
  let cachePath: string;
  let clock: number;

  const createCache = (freshDuration = HOUR): CacheManager<string[]> =>
    new CacheManager(cachePath, { freshDuration, parse: parseStringList, now: () => clock });

  beforeEach(async () => {
    tempDir = await createTempDir();
    cachePath = path.join(tempDir, 'python', 'remote_versions.json.gz');
    clock = 1_700_000_000_000;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  it('should compute once and persist the value', async () => {
    const compute = jest.fn().mockResolvedValue(['3.11.4', '3.12.0']);
    const cache = createCache();

    expect(await cache.getOrTryInit(compute)).toEqual(['3.11.4', '3.12.0']);
    expect(await cache.getOrTryInit(compute)).toEqual(['3.11.4', '3.12.0']);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(await fs.pathExists(cachePath)).toBe(true);
  });

  it('should serve a fresh file to a new instance without recomputing', async () => {
    await createCache().getOrTryInit(async () => ['3.12.0']);

    clock += HOUR - 1;
    const compute = jest.fn().mockResolvedValue(['changed']);
    const value = await createCache().getOrTryInit(compute);

    expect(value).toEqual(['3.12.0']);
    expect(compute).not.toHaveBeenCalled();
  });

  it('should recompute once the freshness window has passed', async () => {
    await createCache().getOrTryInit(async () => ['3.12.0']);

    clock += HOUR;
    const compute = jest.fn().mockResolvedValue(['3.12.0', '3.12.1']);
    const value = await createCache().getOrTryInit(compute);

    expect(value).toEqual(['3.12.0', '3.12.1']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should expire the in-memory value after the freshness window', async () => {
    const cache = createCache();
    const compute = jest.fn().mockResolvedValueOnce(['a']).mockResolvedValueOnce(['b']);

    expect(await cache.getOrTryInit(compute)).toEqual(['a']);
    clock += HOUR;
    expect(await cache.getOrTryInit(compute)).toEqual(['b']);
  });

  it('should measure the in-memory window from when the value was fetched', async () => {
    await createCache().getOrTryInit(async () => ['3.12.0']);

    clock += HOUR - 1;
    const cache = createCache();
    const compute = jest.fn().mockResolvedValue(['3.12.0', '3.12.1']);
    expect(await cache.getOrTryInit(compute)).toEqual(['3.12.0']);

    clock += 1;
    expect(await cache.getOrTryInit(compute)).toEqual(['3.12.0', '3.12.1']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should return the computed value when the cache file cannot be written', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, '');
    cachePath = path.join(blocker, 'python', 'remote_versions.json.gz');
    const warn = jest.spyOn(logger, 'warn');
    const compute = jest.fn().mockResolvedValue(['3.12.0']);
    const cache = createCache();

    expect(await cache.getOrTryInit(compute)).toEqual(['3.12.0']);
    expect(await cache.getOrTryInit(compute)).toEqual(['3.12.0']);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(`failed to write cache file: ${cachePath}`, expect.any(Error));
  });

  it('should share one computation between concurrent callers', async () => {
    const cache = createCache();
    const compute = jest.fn(async () => {
      await new Promise(resolve => setTimeout(resolve, 20));
      return ['3.10.13'];
    });

    const [first, second] = await Promise.all([
      cache.getOrTryInit(compute),
      cache.getOrTryInit(compute),
    ]);

    expect(first).toEqual(['3.10.13']);
    expect(second).toEqual(['3.10.13']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should not remember a failed computation', async () => {
    const cache = createCache();
    const compute = jest
      .fn()
      .mockRejectedValueOnce(new Error('network down'))
      .mockResolvedValueOnce(['3.12.0']);

    await expect(cache.getOrTryInit(compute)).rejects.toThrow('network down');
    expect(await cache.getOrTryInit(compute)).toEqual(['3.12.0']);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it('should recompute when the file is corrupt', async () => {
    await fs.ensureDir(path.dirname(cachePath));
    await fs.writeFile(cachePath, 'not gzip');

    const value = await createCache().getOrTryInit(async () => ['3.9.18']);

    expect(value).toEqual(['3.9.18']);
  });

  it('should recompute when the stored value has the wrong shape', async () => {
    const numbers = new CacheManager<number[]>(cachePath, {
      freshDuration: HOUR,
      parse: raw => {
        if (!Array.isArray(raw)) throw new Error('not a list');
        return raw.map(Number);
      },
      now: () => clock,
    });
    await numbers.getOrTryInit(async () => [1, 2]);

    const compute = jest.fn().mockResolvedValue(['3.8.18']);
    // [1, 2] is not a list of strings
    expect(await createCache().getOrTryInit(compute)).toEqual(['3.8.18']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should leave only the cache file behind after writing', async () => {
    await createCache().getOrTryInit(async () => ['3.12.0']);

    expect(await fs.readdir(path.dirname(cachePath))).toEqual(['remote_versions.json.gz']);
  });

  it('should remove the file on clear', async () => {
    const cache = createCache();
    await cache.getOrTryInit(async () => ['3.12.0']);

    await cache.clear();

    expect(await fs.pathExists(cachePath)).toBe(false);
  });
});
