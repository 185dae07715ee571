import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from '../types';

/**
 * Creates a spawn-based execCommand. A command that outlives
 * `options.timeout` is killed and reported with `timedOut: true`.
 */
export function createExecCommand(defaultCwd: string): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions): Promise<ExecResult> => {
    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd ?? defaultCwd,
        env: { ...process.env, ...options?.env },
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      const timer = options?.timeout
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGKILL');
          }, options.timeout)
        : undefined;

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code: number | null) => {
        if (timer) clearTimeout(timer);
        resolve({ exitCode: code ?? 1, stdout, stderr, timedOut });
      });

      proc.on('error', (error: Error) => {
        if (timer) clearTimeout(timer);
        resolve({ exitCode: 1, stdout, stderr: error.message, timedOut });
      });
    });
  };
}
