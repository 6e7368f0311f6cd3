import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from './types';

/**
 * execCommand backed by child_process.spawn. Never rejects: spawn errors
 * resolve with exit code 1 and the error message on stderr. A process
 * killed by `timeout` resolves with exit code 1 and a timeout note on stderr.
 */
export function createExecCommand(defaultCwd?: string): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd || process.cwd(),
        env: { ...process.env, ...options?.env },
        timeout: options?.timeout,
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === null && signal !== null && options?.timeout !== undefined) {
          stderr += `${stderr && !stderr.endsWith('\n') ? '\n' : ''}Timed out after ${options.timeout}ms (${signal})`;
        }
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout, stderr: error.message });
      });
    });
  };
}
