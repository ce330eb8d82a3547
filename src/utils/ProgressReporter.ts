import ora, { Ora } from 'ora';
import { ProgressReporter } from '../types/Runtime';

/**
 * Terminal spinner whose text follows the latest progress message
 */
export class SpinnerReporter implements ProgressReporter {
  private readonly spinner: Ora;

  constructor(
    private readonly prefix: string,
    enabled: boolean = process.stderr.isTTY === true
  ) {
    this.spinner = ora({ text: prefix, isEnabled: enabled });
  }

  start(): this {
    this.spinner.start();
    return this;
  }

  setMessage(message: string): void {
    this.spinner.text = `${this.prefix} ${message}`;
  }

  succeed(message: string): void {
    this.spinner.succeed(`${this.prefix} ${message}`);
  }

  fail(message: string): void {
    this.spinner.fail(`${this.prefix} ${message}`);
  }
}
