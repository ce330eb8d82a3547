import * as fs from 'fs-extra';
import * as path from 'path';
import { ProcessUtils } from './ProcessUtils';
import { logger } from './Logger';

/**
 * Minimal git mirror client for repositories this tool keeps in its cache directory
 */
export class Git {
  constructor(private readonly dir: string) {}

  async clone(url: string): Promise<void> {
    logger.debug(`cloning ${url} to ${this.dir}`);
    await fs.ensureDir(path.dirname(this.dir));
    await ProcessUtils.run('git', ['clone', '-q', '--depth', '1', url, this.dir]);
  }

  /**
   * Fetch and check out `ref`, or the remote's default branch when omitted
   */
  async update(ref?: string, options: { timeout?: number } = {}): Promise<void> {
    const target = ref ?? 'origin/HEAD';
    logger.debug(`updating ${this.dir} to ${target}`);
    await ProcessUtils.run(
      'git',
      ['-C', this.dir, 'fetch', '-q', '--prune', '--update-head-ok', 'origin', ...(ref ? [`${ref}:${ref}`] : [])],
      { timeout: options.timeout }
    );
    await ProcessUtils.run(
      'git',
      ['-C', this.dir, '-c', 'advice.detachedHead=false', 'checkout', '-q', '--force', target],
      { timeout: options.timeout }
    );
  }
}
