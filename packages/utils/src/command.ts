/**
 * Command Execution Wrapper
 * 
 * Spawns an external command with:
 * - Optional stdin payload
 * - Binary stdout capture, text stderr capture
 * - Hard timeout (SIGKILL)
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
  duration: number;
  timedOut: boolean;
  /** Error raised while writing `input` to the child's stdin, if any */
  stdinError?: NodeJS.ErrnoException;
}

export interface CommandOptions {
  input?: Buffer;
  timeout?: number; // milliseconds
}

/**
 * Execute an external command without a shell.
 *
 * Resolves once the process has exited and its streams are closed, whatever
 * the exit code. Rejects only when the process could not be spawned.
 */
export async function executeCommand(
  command: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { input, timeout = 300000 } = options;

  const startTime = Date.now();
  let timedOut = false;
  let stdinError: NodeJS.ErrnoException | undefined;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: [input ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeout);

    child.stdout?.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderrChunks.push(data);
    });

    if (input && child.stdin) {
      // The child may stop reading before the payload is consumed
      child.stdin.on('error', (error: NodeJS.ErrnoException) => {
        stdinError = error;
      });
      child.stdin.end(input);
    }

    child.on('close', (code, signal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(stdoutChunks),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        duration: Date.now() - startTime,
        timedOut,
        stdinError,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * True for the error a pipe write raises once the reader has gone away
 */
export function isBrokenPipe(error: NodeJS.ErrnoException): boolean {
  return error.code === 'EPIPE' || error.code === 'ERR_STREAM_DESTROYED';
}
