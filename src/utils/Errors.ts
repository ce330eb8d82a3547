export type ProvisionErrorKind =
  | 'configuration'
  | 'catalog'
  | 'selection'
  | 'validation'
  | 'post-install'
  | 'process';

export class ProvisionError extends Error {
  readonly kind: ProvisionErrorKind;

  constructor(kind: ProvisionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisionError';
    this.kind = kind;
  }
}

export class ProcessError extends Error {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, args: string[], exitCode: number | null, stderr: string) {
    const tail = stderr.split('\n').slice(-5).join('\n').trim();
    super(
      `${[command, ...args].join(' ')} exited with ${exitCode === null ? 'a signal' : `code ${exitCode}`}` +
        (tail ? `\n${tail}` : '')
    );
    this.name = 'ProcessError';
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Outcome of a step that may fail either fatally or recoverably
 */
export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; severity: 'hard' | 'soft'; error: Error };

export async function attempt<T>(step: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, severity: 'hard', error: toError(error) };
  }
}

/**
 * Mark a failed step as recoverable
 */
export function downgrade<T>(result: StepResult<T>): StepResult<T> {
  return result.ok ? result : { ...result, severity: 'soft' };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
