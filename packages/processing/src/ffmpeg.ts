/**
 * FFmpeg Wrapper
 * 
 * Runs FFmpeg through the process runner with the engine's transcode
 * timeout. All I/O is stdin/stdout or scratch files.
 */

import { DEFAULT_ENGINE_CONFIG, MediaKitError, type ToolRunner } from '@mediakit/core';
import { buildCommand, type CommandPlan } from './commandBuilder.js';

export interface FFmpegRunOptions {
  input?: Buffer;
  /** Label used in logs and errors, prefixed with "ffmpeg:" */
  operation: string;
  timeoutMs?: number;
}

export class FFmpeg {
  constructor(
    private readonly runner: ToolRunner,
    private readonly ffmpegPath: string = 'ffmpeg',
    private readonly timeoutMs: number = DEFAULT_ENGINE_CONFIG.transcodeTimeoutMs
  ) {}

  /**
   * Execute raw FFmpeg arguments and return stdout
   */
  async execute(args: readonly string[], options: FFmpegRunOptions): Promise<Buffer> {
    const output = await this.runner.run({
      executable: this.ffmpegPath,
      args: ['-hide_banner', '-y', ...args],
      input: options.input,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      operation: `ffmpeg:${options.operation}`,
    });
    return output.stdout;
  }

  /**
   * Build and execute an operation plan
   */
  async run(plan: CommandPlan, options: FFmpegRunOptions): Promise<Buffer> {
    return this.execute(buildCommand(plan), options);
  }

  /**
   * Version string from `ffmpeg -version`, or undefined when FFmpeg cannot run
   */
  async version(): Promise<string | undefined> {
    try {
      const output = await this.runner.run({
        executable: this.ffmpegPath,
        args: ['-version'],
        timeoutMs: 5000,
        operation: 'ffmpeg:version',
      });
      const match = output.stdout.toString('utf8').match(/version\s+(\S+)/);
      return match?.[1] ?? 'unknown';
    } catch (error) {
      if (error instanceof MediaKitError) {
        return undefined;
      }
      throw error;
    }
  }
}
