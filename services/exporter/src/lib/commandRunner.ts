import { execFile } from 'child_process';

// cf curl prints whole result pages; 5000 audit events easily exceed the 1 MiB default
const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program to completion. Implementations reject with
 * `CommandFailedError` when the program cannot start, exits non-zero or
 * times out.
 */
export interface CommandRunner {
  run(file: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly stderr: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommandFailedError';
  }
}

export function createExecFileRunner(): CommandRunner {
  return {
    run(file, args, options = {}) {
      const command = [file, ...args].join(' ');

      return new Promise<CommandResult>((resolve, reject) => {
        execFile(
          file,
          [...args],
          {
            env: options.env,
            timeout: options.timeoutMs,
            maxBuffer: MAX_OUTPUT_BYTES,
            encoding: 'utf8',
            windowsHide: true,
          },
          (error, stdout, stderr) => {
            if (error) {
              const reason = error.killed
                ? `timed out after ${options.timeoutMs}ms`
                : stderr.trim() || error.message;
              reject(
                new CommandFailedError(command, stderr, `Command "${command}" failed: ${reason}`, {
                  cause: error,
                })
              );
              return;
            }
            resolve({ stdout, stderr });
          }
        );
      });
    },
  };
}
