import { Args, Command } from '@oclif/core';
import { loadRuntimeContext, runtimeFor } from '../core/RuntimeContextLoader';
import { logger } from '../utils/Logger';

export default class LsRemote extends Command {
  static override description = 'List Python versions available to install';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> 3.12',
  ];

  static override args = {
    prefix: Args.string({
      description: 'Only show versions starting with this prefix',
      required: false,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(LsRemote);

    try {
      const context = await loadRuntimeContext();
      const runtime = runtimeFor('python', context);
      const versions = await runtime.listRemoteVersions(context);

      for (const version of versions) {
        if (!args.prefix || version.startsWith(args.prefix)) {
          this.log(version);
        }
      }
    } catch (error) {
      logger.error('Failed to list remote versions', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }
}
