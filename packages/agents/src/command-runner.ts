/**
 * Command Runner
 *
 * Spawns a local command and collects its output, with a timeout, an output
 * cap and cancellation through an AbortSignal.
 */

import { spawn } from 'child_process';
import { createLogger } from '@waypost/core';

const logger = createLogger('command-runner');

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  signal?: AbortSignal;
  /** Stop reading and kill the process once stdout grows past this many characters */
  maxOutputChars?: number;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  truncated: boolean;
  timedOut: boolean;
  duration: number;
}

export type CommandRunner = (
  binary: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export class CommandError extends Error {
  constructor(
    message: string,
    public binary: string,
    public code: string | null = null
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

function errorCode(err: Error): string | null {
  return 'code' in err && typeof err.code === 'string' ? err.code : null;
}

export const runCommand: CommandRunner = (binary, args, options = {}) => {
  const startTime = Date.now();

  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(options.signal.reason);
      return;
    }

    const child = spawn(binary, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let truncated = false;
    let timedOut = false;
    let settled = false;

    const kill = () => {
      if (!child.killed) {
        child.kill('SIGTERM');
      }
    };

    const onAbort = () => {
      logger.debug({ binary }, 'Command cancelled, killing process');
      kill();
      finish(() => reject(options.signal?.reason));
    };

    const timer = options.timeout
      ? setTimeout(() => {
          logger.warn({ binary, timeout: options.timeout }, 'Command timeout, killing process');
          timedOut = true;
          kill();
        }, options.timeout)
      : null;

    function finish(settle: () => void) {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      settle();
    }

    options.signal?.addEventListener('abort', onAbort, { once: true });

    // Decode across chunk boundaries so split multi-byte characters survive
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (data: string) => {
      if (truncated) return;
      stdout += data;

      if (options.maxOutputChars !== undefined && stdout.length > options.maxOutputChars) {
        truncated = true;
        logger.debug({ binary, length: stdout.length }, 'Output cap reached, killing process');
        kill();
      }
    });

    child.stderr?.on('data', (data: string) => {
      stderr += data;
    });

    child.on('error', (err) => {
      logger.error({ err, binary }, 'Command process error');
      finish(() => reject(new CommandError(`Failed to run ${binary}: ${err.message}`, binary, errorCode(err))));
    });

    child.on('close', (code) => {
      finish(() =>
        resolve({
          exitCode: code,
          stdout,
          stderr,
          truncated,
          timedOut,
          duration: Date.now() - startTime,
        })
      );
    });
  });
};
