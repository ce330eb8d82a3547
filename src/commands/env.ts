import { Args, Command, Flags } from '@oclif/core';
import {
  loadRuntimeContext,
  requestedVersion,
  runtimeFor,
  toolOptions,
} from '../core/RuntimeContextLoader';
import { parseVersionRequest } from '../core/runtime/RuntimeManager';
import { logger } from '../utils/Logger';

export default class Env extends Command {
  static override description = 'Print the environment variables that activate a Python version';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> 3.12.4 --json',
  ];

  static override args = {
    version: Args.string({
      description: 'Installed version; defaults to the project configuration or .python-version',
      required: false,
    }),
  };

  static override flags = {
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Env);

    const context = await loadRuntimeContext();
    const runtime = runtimeFor('python', context);
    const version = await requestedVersion(runtime, context, args.version);
    if (!version) {
      this.error('No version given and none configured.');
    }

    const tv = runtime.createInstallTarget(
      parseVersionRequest(version),
      toolOptions(runtime, context),
      context.settings
    );

    let vars: Record<string, string>;
    try {
      vars = await runtime.execEnv(tv, context);
    } catch (error) {
      logger.error('Failed to compute environment', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }

    if (flags.json) {
      this.log(JSON.stringify(vars, null, 2));
      return;
    }
    for (const [name, value] of Object.entries(vars)) {
      this.log(`export ${name}=${JSON.stringify(value)}`);
    }
  }
}
