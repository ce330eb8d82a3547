import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';
import { ProcessError } from './Errors';
import { logger } from './Logger';

export interface ProcessOptions {
  cwd?: string;
  /** Overlay applied on top of the current process environment */
  env?: Record<string, string>;
  /** Text written to the child's stdin, which is then closed */
  input?: string;
  /** Milliseconds before the child and its descendants are killed */
  timeout?: number;
  /** Receives each non-empty output line as it arrives */
  onOutput?: (line: string) => void;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export class ProcessUtils {
  /**
   * Run a command to completion and report its exit code without judging it
   */
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    logger.debug(`$ ${[command, ...args].join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeout !== undefined && child.pid !== undefined) {
        const pid = child.pid;
        timer = setTimeout(() => {
          timedOut = true;
          kill(pid, 'SIGTERM');
        }, options.timeout);
      }

      const forward = (chunk: string): void => {
        if (!options.onOutput) return;
        for (const line of chunk.split('\n')) {
          if (line.trim()) options.onOutput(line.trim());
        }
      };

      child.stdout?.on('data', (data: Buffer) => {
        const text = data.toString();
        stdout += text;
        forward(text);
      });

      child.stderr?.on('data', (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        forward(text);
      });

      child.on('close', (code: number | null) => {
        if (timer) clearTimeout(timer);
        if (timedOut) {
          reject(
            new Error(`${command} timed out after ${options.timeout}ms and was terminated`)
          );
          return;
        }
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code,
        });
      });

      child.on('error', (error: Error) => {
        if (timer) clearTimeout(timer);
        reject(new Error(`Process execution failed: ${error.message}`));
      });

      if (child.stdin) {
        // A child that exits before reading its input closes the pipe; its exit code tells the story.
        child.stdin.on('error', (error: Error) => {
          logger.debug(`stdin of ${command} closed early`, error);
        });
        child.stdin.end(options.input ?? '');
      }
    });
  }

  /**
   * Run a command and reject with a ProcessError unless it exits with code 0
   */
  static async run(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<string> {
    const result = await this.execute(command, args, options);
    if (result.exitCode !== 0) {
      throw new ProcessError(command, args, result.exitCode, result.stderr);
    }
    return result.stdout;
  }
}
