/**
 * FFProbe Wrapper
 * 
 * Single-entry ffprobe queries against a blob piped to stdin.
 */

import type { ToolRunner } from '@mediakit/core';

export interface ProbeQuery {
  /** Stream specifier, e.g. "a:0"; omitted for container-level entries */
  selectStreams?: string;
  /** -show_entries value, e.g. "stream=sample_rate" */
  entries: string;
  /** -of value; bare values one per line by default */
  outputFormat?: string;
  operation: string;
  timeoutMs: number;
}

export class FFProbe {
  constructor(
    private readonly runner: ToolRunner,
    private readonly ffprobePath: string = 'ffprobe'
  ) {}

  /**
   * Argument vector for a query, input read from stdin
   */
  static buildArgs(query: Omit<ProbeQuery, 'operation' | 'timeoutMs'>): string[] {
    const args = ['-v', 'error'];
    if (query.selectStreams) {
      args.push('-select_streams', query.selectStreams);
    }
    args.push(
      '-show_entries', query.entries,
      '-of', query.outputFormat ?? 'default=noprint_wrappers=1:nokey=1',
      '-i', 'pipe:0',
    );
    return args;
  }

  /**
   * Run a query and return its stdout as text
   */
  async query(input: Buffer, query: ProbeQuery): Promise<string> {
    const output = await this.runner.run({
      executable: this.ffprobePath,
      args: FFProbe.buildArgs(query),
      input,
      timeoutMs: query.timeoutMs,
      operation: query.operation,
    });
    return output.stdout.toString('utf8');
  }
}
