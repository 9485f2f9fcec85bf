import { spawn } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  timeout?: number;
  cwd?: string;
  signal?: AbortSignal;
}

/**
 * Non-zero exit, spawn failure or timeout of an external command
 */
export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    message?: string,
  ) {
    super(
      message ??
        `Command failed with exit code ${exitCode ?? 'unknown'}: ${command}`,
    );
    this.name = 'CommandFailedError';
    Object.setPrototypeOf(this, CommandFailedError.prototype);
  }
}

/**
 * Raised when the caller's signal aborts a running command
 */
export class CommandAbortedError extends Error {
  constructor(public readonly command: string) {
    super(`Command aborted: ${command}`);
    this.name = 'CommandAbortedError';
    Object.setPrototypeOf(this, CommandAbortedError.prototype);
  }
}

const STDERR_TAIL_LENGTH = 2000;

/**
 * Run an external command without a shell.
 * Resolves with the exit code whatever it is; rejects only when the process
 * cannot be started, times out or is aborted.
 */
export function runCommand(
  bin: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const { timeout = 300000, cwd, signal } = options;
  const command = [bin, ...args].join(' ');

  return new Promise<CommandResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CommandAbortedError(command));
      return;
    }

    const proc = spawn(bin, args, {
      cwd,
      signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');
    proc.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk;
      if (stderr.length > STDERR_TAIL_LENGTH * 2) {
        stderr = stderr.slice(-STDERR_TAIL_LENGTH);
      }
    });

    const timer =
      timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGKILL');
          }, timeout)
        : null;

    proc.on('error', (error) => {
      if (timer) clearTimeout(timer);
      if (signal?.aborted) {
        reject(new CommandAbortedError(command));
        return;
      }
      reject(
        new CommandFailedError(
          command,
          null,
          stderr,
          `Failed to start ${bin}: ${error.message}`,
        ),
      );
    });

    proc.on('close', (code) => {
      if (timer) clearTimeout(timer);
      if (signal?.aborted) {
        reject(new CommandAbortedError(command));
        return;
      }
      if (timedOut) {
        reject(
          new CommandFailedError(
            command,
            code,
            stderr,
            `Command timed out after ${timeout}ms: ${command}`,
          ),
        );
        return;
      }
      resolve({ stdout, stderr, exitCode: code ?? -1 });
    });
  });
}

/**
 * Same as runCommand, but a non-zero exit code rejects with CommandFailedError
 */
export async function runCommandOrThrow(
  bin: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const result = await runCommand(bin, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(
      [bin, ...args].join(' '),
      result.exitCode,
      result.stderr.slice(-STDERR_TAIL_LENGTH),
    );
  }
  return result;
}
