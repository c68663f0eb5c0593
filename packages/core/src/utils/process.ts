import { execFile } from 'child_process';
import { CommandTimeoutError } from '../errors.js';

export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
  maxBuffer?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** null when the process was terminated by a signal */
  exitCode: number | null;
}

/**
 * Runs an executable without a shell. Non-zero exits resolve normally with
 * their exit code; only spawn failures and timeouts reject.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024;

export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        cwd: options.cwd,
        encoding: 'utf8',
        timeout: options.timeoutMs,
        maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }

        if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
          reject(error);
          return;
        }

        if (error.killed && options.timeoutMs > 0) {
          reject(new CommandTimeoutError(`${command} ${args[0] ?? ''}`.trim(), options.timeoutMs));
          return;
        }

        if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitCode: error.code });
          return;
        }

        if (error.signal) {
          resolve({ stdout, stderr, exitCode: null });
          return;
        }

        reject(error);
      }
    );
  });
};
