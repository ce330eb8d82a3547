import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import {
  loadRuntimeContext,
  requestedVersion,
  runtimeFor,
  toolOptions,
} from '../core/RuntimeContextLoader';
import { parseVersionRequest } from '../core/runtime/RuntimeManager';
import { logger } from '../utils/Logger';
import { SpinnerReporter } from '../utils/ProgressReporter';

export default class Install extends Command {
  static override description = 'Install a Python version';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 3.12.4',
    '<%= config.bin %> <%= command.id %>',
  ];

  static override args = {
    version: Args.string({
      description: 'Version to install; defaults to the project configuration or .python-version',
      required: false,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Install);

    const context = await loadRuntimeContext();
    const runtime = runtimeFor('python', context);
    const version = await requestedVersion(runtime, context, args.version);
    if (!version) {
      this.error(
        `No version given and none configured. Run ${chalk.white('pyprov install <version>')}.`
      );
    }

    const target = runtime.createInstallTarget(
      parseVersionRequest(version),
      toolOptions(runtime, context),
      context.settings
    );
    const reporter = new SpinnerReporter(`python@${target.version}`).start();

    try {
      const outcome = await runtime.installVersion(target, reporter, context);
      reporter.succeed(`installed to ${target.installPath}`);
      if (outcome.virtualenv) {
        this.log(chalk.gray(`   virtualenv: ${outcome.virtualenv.path}`));
      }
      for (const warning of outcome.warnings) {
        this.log(chalk.yellow(`   ${warning}`));
      }
    } catch (error) {
      reporter.fail('install failed');
      logger.error(`Failed to install python@${target.version}`, error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }
}
