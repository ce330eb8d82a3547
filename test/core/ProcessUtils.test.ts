import { ProcessUtils } from '../../src/utils/ProcessUtils';
import { ProcessError } from '../../src/utils/Errors';

describe('ProcessUtils', () => {
  describe('run', () => {
    it('should return trimmed stdout', async () => {
      const output = await ProcessUtils.run('sh', ['-c', 'echo hello; echo world']);

      expect(output).toBe('hello\nworld');
    });

    it('should stream output lines to the callback', async () => {
      const lines: string[] = [];

      await ProcessUtils.run('sh', ['-c', 'echo configuring; echo building >&2'], {
        onOutput: line => lines.push(line),
      });

      expect(lines).toContain('configuring');
      expect(lines).toContain('building');
    });

    it('should write input to the child stdin', async () => {
      const output = await ProcessUtils.run('sh', ['-c', 'cat'], { input: 'diff --git a/x b/x\n' });

      expect(output).toBe('diff --git a/x b/x');
    });

    it('should overlay the environment', async () => {
      const output = await ProcessUtils.run('sh', ['-c', 'echo $PYPROV_TEST_VALUE'], {
        env: { PYPROV_TEST_VALUE: 'overlay' },
      });

      expect(output).toBe('overlay');
    });

    it('should reject a non-zero exit with the stderr tail', async () => {
      const script = 'echo first >&2; echo boom >&2; exit 3';

      const error = await ProcessUtils.run('sh', ['-c', script]).then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ProcessError);
      expect(error).toHaveProperty('exitCode', 3);
      expect(error).toHaveProperty('stderr', 'first\nboom');
      expect(error).toHaveProperty('message', `sh -c ${script} exited with code 3\nfirst\nboom`);
    });
  });

  describe('execute', () => {
    it('should kill the process tree when the timeout expires', async () => {
      const started = Date.now();

      await expect(ProcessUtils.execute('sh', ['-c', 'sleep 5'], { timeout: 300 })).rejects.toThrow(
        'sh timed out after 300ms and was terminated'
      );

      expect(Date.now() - started).toBeLessThan(3000);
    });

    it('should report the exit code without throwing', async () => {
      const result = await ProcessUtils.execute('sh', ['-c', 'exit 2']);

      expect(result).toEqual({ stdout: '', stderr: '', exitCode: 2 });
    });

    it('should reject when the command cannot be started', async () => {
      await expect(ProcessUtils.execute('pyprov-test-missing-command')).rejects.toThrow(
        'Process execution failed'
      );
    });
  });
});
