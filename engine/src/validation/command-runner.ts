/**
 * Command Runner - Run shell commands with timeout and output capture
 *
 * A timed-out or cancelled command is killed through its abort signal and
 * resolves with `timedOut` / `cancelled` set; the runner never rejects.
 */

import { exec } from 'child_process';
import { createLogger } from '../logging/log';

const log = createLogger('command-runner');

/**
 * Command execution result
 */
export interface CommandResult {
  /** Command that was executed */
  command: string;
  /** Exit code (0 = success) */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Execution duration in milliseconds */
  duration: number;
  timedOut: boolean;
  cancelled: boolean;
}

/**
 * Command executor options
 */
export interface CommandOptions {
  /** Working directory */
  cwd: string;
  /** Timeout in milliseconds (default: 60000 = 1 minute) */
  timeout?: number;
  /** Maximum buffer size for output (default: 10MB) */
  maxBuffer?: number;
  /** Environment variables to pass to command */
  env?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * CommandRunner namespace
 */
export namespace CommandRunner {
  /**
   * Execute a command with timeout
   */
  export async function execute(command: string, options: CommandOptions): Promise<CommandResult> {
    const {
      cwd,
      timeout = 60000,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      env = {},
      signal,
    } = options;

    const startTime = Date.now();

    if (signal?.aborted) {
      return {
        command,
        exitCode: -1,
        stdout: '',
        stderr: 'Command cancelled before start',
        duration: 0,
        timedOut: false,
        cancelled: true,
      };
    }

    log.debug('Executing command', { command, cwd, timeout });

    return new Promise(resolve => {
      const controller = new AbortController();
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        log.warn('Command timed out', { command, timeout });
        controller.abort();
      }, timeout);
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      exec(
        command,
        {
          cwd,
          maxBuffer,
          env: { ...process.env, ...env },
          signal: controller.signal,
        },
        (error, stdout, stderr) => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);

          const duration = Date.now() - startTime;
          const cancelled = !timedOut && signal?.aborted === true;
          const exitCode = error ? (typeof error.code === 'number' ? error.code : -1) : 0;
          let stderrText = stderr.toString();
          if (timedOut) {
            stderrText = `${stderrText}\nCommand timed out after ${timeout}ms`.trimStart();
          } else if (error && !stderrText && !cancelled) {
            stderrText = error.message;
          }

          log.debug('Command finished', { command, exitCode, duration, timedOut, cancelled });

          resolve({
            command,
            exitCode,
            stdout: stdout.toString(),
            stderr: stderrText,
            duration,
            timedOut,
            cancelled,
          });
        }
      );
    });
  }
}
