import { Args, Command } from '@oclif/core';
import chalk from 'chalk';
import { ConfigManager } from '../../core/ConfigManager';
import { logger } from '../../utils/Logger';

export default class SettingsSet extends Command {
  static override description = 'Persist a setting in the global configuration';

  static override examples = [
    '<%= config.bin %> <%= command.id %> experimental true',
    '<%= config.bin %> <%= command.id %> python_compile 1',
  ];

  static override args = {
    key: Args.string({ description: 'Setting name, e.g. python_venv_auto_create', required: true }),
    value: Args.string({ description: 'New value', required: true }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(SettingsSet);

    try {
      await ConfigManager.getInstance().setSetting(args.key, args.value);
      this.log(chalk.green(`✅ ${args.key} = ${args.value}`));
    } catch (error) {
      logger.error('Failed to save setting', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }
}
