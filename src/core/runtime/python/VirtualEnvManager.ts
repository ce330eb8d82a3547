import * as fs from 'fs-extra';
import * as path from 'path';
import { ProgressReporter, RuntimeContext, ToolVersion, VirtualEnvDescriptor } from '../../../types/Runtime';
import { FileSystem } from '../../../utils/FileSystem';
import { logger } from '../../../utils/Logger';
import { ProcessUtils } from '../../../utils/ProcessUtils';

export const VIRTUAL_ENV_VAR = 'VIRTUAL_ENV';
export const ADD_PATH_VAR = 'PYPROV_ADD_PATH';

export function pythonPath(tv: ToolVersion): string {
  return path.join(tv.installPath, 'bin', 'python');
}

export class VirtualEnvManager {
  /**
   * Resolve the `virtualenv` option of a tool version, creating the environment when
   * auto-creation is on. Returns null when no option is set or when the environment is missing
   * and may not be created. Creation failures propagate; the caller decides whether they matter.
   */
  async resolve(
    tv: ToolVersion,
    context: RuntimeContext,
    reporter?: ProgressReporter
  ): Promise<VirtualEnvDescriptor | null> {
    const option = tv.options.virtualenv;
    if (!option) {
      return null;
    }

    const { settings, project } = context;
    if (!settings.experimental) {
      logger.warn(
        'please enable experimental mode with `pyprov settings set experimental true` ' +
          'to use python virtualenv activation'
      );
    }

    let virtualenv = FileSystem.expandPath(option);
    if (!path.isAbsolute(virtualenv)) {
      // TODO: anchor at the directory of the config file that requested python, not the top-level project root
      if (project.root) {
        virtualenv = path.join(project.root, virtualenv);
      } else {
        virtualenv = path.resolve(virtualenv);
      }
    }

    if (await fs.pathExists(virtualenv)) {
      return { path: virtualenv, created: false };
    }

    const display = FileSystem.displayPath(virtualenv);
    if (!settings.pythonVenvAutoCreate) {
      logger.warn(
        `no venv found at: ${display}\n\n` +
          'To have pyprov automatically create virtualenvs, run:\n' +
          'pyprov settings set python_venv_auto_create true\n\n' +
          'To create a virtualenv manually, run:\n' +
          `python -m venv ${display}`
      );
      return null;
    }

    logger.info(`setting up virtualenv at: ${display}`);
    reporter?.setMessage(`python -m venv ${display}`);
    await ProcessUtils.run(pythonPath(tv), ['-m', 'venv', virtualenv], {
      env: project.env,
      onOutput: reporter ? line => reporter.setMessage(line) : undefined,
    });
    return { path: virtualenv, created: true };
  }

  async execEnv(tv: ToolVersion, context: RuntimeContext): Promise<Record<string, string>> {
    try {
      const venv = await this.resolve(tv, context);
      if (!venv) {
        return {};
      }
      return {
        [VIRTUAL_ENV_VAR]: venv.path,
        [ADD_PATH_VAR]: path.join(venv.path, 'bin'),
      };
    } catch (error) {
      logger.warn('failed to get virtualenv', error);
      return {};
    }
  }
}
