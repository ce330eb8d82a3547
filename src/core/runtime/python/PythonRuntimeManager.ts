// src/core/runtime/python/PythonRuntimeManager.ts - Python install orchestration
import * as fs from 'fs-extra';
import * as path from 'path';
import { Settings } from '../../../types/Config';
import {
  InstallOutcome,
  InstallState,
  InstallTarget,
  PlatformTag,
  PrecompiledEntry,
  ProgressReporter,
  RuntimeContext,
  StrategyChoice,
  ToolVersion,
} from '../../../types/Runtime';
import { ProvisionError, StepResult, attempt, downgrade, errorMessage } from '../../../utils/Errors';
import { ProcessUtils } from '../../../utils/ProcessUtils';
import { CacheManager } from '../../cache/CacheManager';
import { RuntimeManager, RuntimeManagerOptions } from '../RuntimeManager';
import { PrecompiledInstaller } from './PrecompiledInstaller';
import { PythonBuild } from './PythonBuild';
import { PythonCatalog, parseCachedEntries } from './PythonCatalog';
import { VirtualEnvManager, pythonPath } from './VirtualEnvManager';

export interface PythonRuntimeOptions extends RuntimeManagerOptions {
  /** Overrides host detection when filtering precompiled builds */
  platform?: PlatformTag;
}

/**
 * Precompiled builds are used only when neither compile override is set and experimental
 * features are enabled.
 */
export function selectStrategy(settings: Settings): StrategyChoice {
  return !settings.allCompile && !settings.pythonCompile && settings.experimental
    ? 'precompiled'
    : 'source-build';
}

export class PythonRuntimeManager extends RuntimeManager {
  private static readonly PYTHON_VERSION_FILE = '.python-version';

  readonly catalog: PythonCatalog;
  readonly pythonBuild: PythonBuild;
  private readonly precompiled: PrecompiledInstaller;
  private readonly virtualEnvs = new VirtualEnvManager();

  constructor(options: PythonRuntimeOptions) {
    super('python', options);
    this.pythonBuild = new PythonBuild(path.join(this.cachePath, 'pyenv'));
    const precompiledCache = new CacheManager<PrecompiledEntry[]>(
      path.join(this.cachePath, 'precompiled.json.gz'),
      { freshDuration: options.freshDuration, parse: parseCachedEntries }
    );
    this.catalog = new PythonCatalog(precompiledCache, this.pythonBuild, options.platform);
    this.precompiled = new PrecompiledInstaller(this.catalog);
  }

  legacyFilenames(): string[] {
    return [PythonRuntimeManager.PYTHON_VERSION_FILE];
  }

  async installVersion(
    target: InstallTarget,
    reporter: ProgressReporter,
    context: RuntimeContext
  ): Promise<InstallOutcome> {
    let state: InstallState = 'start';
    const transition = (next: InstallState): void => {
      this.log('debug', `install python@${target.version}: ${state} -> ${next}`);
      state = next;
    };

    const strategy = selectStrategy(context.settings);
    transition('strategy-selected');

    const executed = await attempt(() =>
      strategy === 'precompiled'
        ? this.precompiled.install(target, reporter, context.settings)
        : this.pythonBuild.install(target, reporter, context)
    );
    if (!executed.ok) {
      transition('failed');
      throw executed.error;
    }
    transition('strategy-executed');

    const validated = await attempt(() => this.smokeTest(target, reporter, context));
    if (!validated.ok) {
      transition('failed');
      throw validated.error;
    }
    transition('validated');

    const warnings: string[] = [];
    const venv = this.recover(
      'failed to get virtualenv',
      warnings,
      downgrade(await attempt(() => this.virtualEnvs.resolve(target, context, reporter)))
    );
    this.recover(
      'failed to install default packages',
      warnings,
      downgrade(await attempt(() => this.installDefaultPackages(target, reporter, context)))
    );
    transition('post-install-complete');

    return {
      state: 'post-install-complete',
      strategy,
      virtualenv: venv.ok ? venv.value : null,
      warnings,
    };
  }

  async execEnv(tv: ToolVersion, context: RuntimeContext): Promise<Record<string, string>> {
    return this.virtualEnvs.execEnv(tv, context);
  }

  protected async fetchRemoteVersions(context: RuntimeContext): Promise<string[]> {
    return this.catalog.listVersions(selectStrategy(context.settings), context.settings);
  }

  private async smokeTest(
    tv: ToolVersion,
    reporter: ProgressReporter,
    context: RuntimeContext
  ): Promise<void> {
    reporter.setMessage('python --version');
    try {
      const output = await ProcessUtils.run(pythonPath(tv), ['--version'], {
        env: context.project.env,
      });
      this.log('debug', output);
    } catch (error) {
      throw new ProvisionError(
        'validation',
        `python@${tv.version} was installed to ${tv.installPath} but \`python --version\` failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async installDefaultPackages(
    tv: ToolVersion,
    reporter: ProgressReporter,
    context: RuntimeContext
  ): Promise<void> {
    const packagesFile = context.settings.defaultPackagesFile;
    if (!(await fs.pathExists(packagesFile))) {
      return;
    }

    reporter.setMessage('installing default packages');
    await ProcessUtils.run(
      pythonPath(tv),
      ['-m', 'pip', 'install', '--upgrade', '-r', packagesFile],
      { env: context.project.env, onOutput: line => reporter.setMessage(line) }
    );
  }

  /**
   * Log a soft failure as a warning; a hard one is rethrown
   */
  private recover<T>(label: string, warnings: string[], result: StepResult<T>): StepResult<T> {
    if (result.ok) {
      return result;
    }
    if (result.severity === 'hard') {
      throw result.error;
    }
    const message = `${label}: ${errorMessage(result.error)}`;
    this.log('warn', message);
    warnings.push(message);
    return result;
  }
}
