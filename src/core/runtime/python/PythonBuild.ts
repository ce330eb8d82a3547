import * as fs from 'fs-extra';
import * as path from 'path';
import { Settings } from '../../../types/Config';
import { InstallTarget, ProgressReporter, RuntimeContext } from '../../../types/Runtime';
import { ProvisionError, errorMessage } from '../../../utils/Errors';
import { Git } from '../../../utils/Git';
import { HttpClient } from '../../../utils/HttpClient';
import { logger } from '../../../utils/Logger';
import { ProcessUtils } from '../../../utils/ProcessUtils';

/**
 * Stable partition: definitions starting with a digit keep their order and come first,
 * named builds (anaconda-, pypy-, ...) follow in their original order.
 */
export function sortDefinitions(definitions: string[]): string[] {
  const numeric = definitions.filter(d => /^\d/.test(d));
  const named = definitions.filter(d => !/^\d/.test(d));
  return [...numeric, ...named];
}

/**
 * Drives pyenv's python-build from a clone kept in the cache directory
 */
export class PythonBuild {
  constructor(readonly root: string) {}

  get binPath(): string {
    return path.join(this.root, 'plugins', 'python-build', 'bin', 'python-build');
  }

  /**
   * Clone the repository when absent, otherwise refresh it. A failed clone is fatal; a failed
   * refresh only means building from the definitions already on disk.
   */
  async ensureInstalled(settings: Settings): Promise<void> {
    const git = new Git(this.root);

    if (!(await fs.pathExists(this.root))) {
      logger.debug(`Installing python-build to ${this.root}`);
      try {
        await git.clone(settings.pyenvRepo);
      } catch (error) {
        await fs.remove(this.root);
        throw new ProvisionError(
          'catalog',
          `Failed to clone python-build from ${settings.pyenvRepo}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      return;
    }

    // TODO: skip the refresh when the clone was updated recently
    logger.debug(`Updating python-build in ${this.root}`);
    try {
      await git.update(undefined, { timeout: settings.fetchRemoteVersionsTimeout });
    } catch (error) {
      logger.warn(`failed to update python-build in ${this.root}`, error);
    }
  }

  async listDefinitions(settings: Settings): Promise<string[]> {
    await this.ensureInstalled(settings);

    let output: string;
    try {
      output = await ProcessUtils.run(this.binPath, ['--definitions'], {
        timeout: settings.fetchRemoteVersionsTimeout,
      });
    } catch (error) {
      throw new ProvisionError(
        'catalog',
        `Failed to list python-build definitions: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return sortDefinitions(
      output
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0)
    );
  }

  async install(
    target: InstallTarget,
    reporter: ProgressReporter,
    context: RuntimeContext
  ): Promise<void> {
    if (target.request.kind === 'ref') {
      throw new ProvisionError(
        'configuration',
        `Ref versions not supported for python (requested ref:${target.request.value})`
      );
    }

    const { settings } = context;
    await this.ensureInstalled(settings);

    const args = [target.version, target.installPath];
    if (settings.verbose) {
      args.push('--verbose');
    }

    const patch = await this.readPatches(target.version, reporter, settings);
    if (patch !== undefined) {
      args.push('--patch');
    }

    reporter.setMessage('Running python-build');
    try {
      await ProcessUtils.run(this.binPath, args, {
        env: context.project.env,
        input: patch,
        onOutput: line => reporter.setMessage(line),
      });
    } catch (error) {
      throw new ProvisionError(
        'process',
        `python-build failed to install python@${target.version} into ${target.installPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Patch text for python-build's stdin, from the configured URL and/or `<dir>/<version>.patch`.
   * Both sources are concatenated when both are configured.
   */
  private async readPatches(
    version: string,
    reporter: ProgressReporter,
    settings: Settings
  ): Promise<string | undefined> {
    const patches: string[] = [];

    if (settings.pythonPatchUrl) {
      reporter.setMessage(`with patch file from: ${settings.pythonPatchUrl}`);
      try {
        patches.push(await HttpClient.getText(settings.pythonPatchUrl));
      } catch (error) {
        throw new ProvisionError(
          'configuration',
          `Failed to fetch patch for python@${version} from ${settings.pythonPatchUrl}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }

    if (settings.pythonPatchesDirectory) {
      const patchFile = path.join(settings.pythonPatchesDirectory, `${version}.patch`);
      if (await fs.pathExists(patchFile)) {
        reporter.setMessage(`with patch file: ${patchFile}`);
        patches.push(await fs.readFile(patchFile, 'utf8'));
      } else {
        logger.warn(`patch file not found: ${patchFile}`);
      }
    }

    return patches.length > 0 ? patches.join('\n') : undefined;
  }
}
