/**
 * Process Runner
 * 
 * The single gateway between the engine and external binaries. Every
 * invocation is logged, bounded by a timeout and classified:
 * - non-zero exit      -> ExternalToolError
 * - deadline exceeded  -> TimeoutError (process killed)
 * - spawn/pipe failure -> ExecutionError
 *
 * Nothing is retried here; callers decide whether a failure is fatal.
 */

import { executeCommand, isBrokenPipe, createLogger, type CommandResult } from '@mediakit/utils';
import { ExecutionError, ExternalToolError, TimeoutError } from '../errors/index.js';

export interface ToolInvocation {
  executable: string;
  args: readonly string[];
  /** Piped to stdin; stdin is closed when absent */
  input?: Buffer;
  timeoutMs: number;
  /** Short label used in logs and errors, e.g. "ffprobe:sample-rate" */
  operation: string;
}

export interface ToolOutput {
  stdout: Buffer;
  stderr: string;
  elapsedMs: number;
}

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolOutput>;
}

const logger = createLogger({ component: 'process-runner' });

export class ProcessRunner implements ToolRunner {
  async run(invocation: ToolInvocation): Promise<ToolOutput> {
    const { executable, args, input, timeoutMs, operation } = invocation;
    const log = logger.child({ operation });

    log.debug({ executable, args, bytesIn: input?.length ?? 0 }, 'Starting external tool');

    let result: CommandResult;
    try {
      result = await executeCommand(executable, args, { input, timeout: timeoutMs });
    } catch (error) {
      log.error({ err: error, executable }, 'External tool could not be started');
      throw new ExecutionError(operation, error);
    }

    if (result.timedOut) {
      log.error({ timeoutMs, elapsedMs: result.duration }, 'External tool timed out');
      throw new TimeoutError(operation, timeoutMs);
    }

    if (result.exitCode !== 0) {
      log.error({ exitCode: result.exitCode, stderr: result.stderr.slice(-2000) }, 'External tool failed');
      throw new ExternalToolError(operation, result.exitCode, result.stderr);
    }

    // A clean exit after the tool stopped reading early is still a success
    if (result.stdinError && !isBrokenPipe(result.stdinError)) {
      log.error({ err: result.stdinError }, 'Writing to external tool failed');
      throw new ExecutionError(operation, result.stdinError);
    }

    log.info({
      exitCode: result.exitCode,
      bytesIn: input?.length ?? 0,
      bytesOut: result.stdout.length,
      elapsedMs: result.duration,
    }, 'External tool finished');
    if (result.stderr.length > 0) {
      log.debug({ stderr: result.stderr.slice(-2000) }, 'External tool diagnostics');
    }

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      elapsedMs: result.duration,
    };
  }
}
