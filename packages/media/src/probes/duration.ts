/**
 * Duration Strategies
 *
 * Ordered tiers, cheapest first:
 * 1. container duration
 * 2. first audio stream duration
 * 3. last audio packet timestamp
 * 4. full decode, last progress stamp
 *
 * The first tier yielding a finite positive number wins.
 */

import { DurationUnknownError, MediaKitError, type ToolRunner } from '@mediakit/core';
import { createLogger } from '@mediakit/utils';
import { FFProbe } from './ffprobe.js';
import { firstLine, lastLine, parseLastClockTime, parsePositiveNumber } from '../parsers.js';
import type { ProbeTimeouts } from '../types.js';

const logger = createLogger({ component: 'duration-probe' });

export interface DurationStrategy {
  readonly name: string;
  measure(input: Buffer): Promise<number | undefined>;
}

export interface DurationStrategyDeps {
  runner: ToolRunner;
  ffprobe: FFProbe;
  ffmpegPath: string;
  timeouts: ProbeTimeouts;
}

export function createDurationStrategies(deps: DurationStrategyDeps): DurationStrategy[] {
  const { runner, ffprobe, ffmpegPath, timeouts } = deps;

  return [
    {
      name: 'container',
      measure: async (input) => parsePositiveNumber(firstLine(await ffprobe.query(input, {
        entries: 'format=duration',
        operation: 'ffprobe:duration-container',
        timeoutMs: timeouts.probeTimeoutMs,
      }))),
    },
    {
      name: 'stream',
      measure: async (input) => parsePositiveNumber(firstLine(await ffprobe.query(input, {
        selectStreams: 'a:0',
        entries: 'stream=duration',
        operation: 'ffprobe:duration-stream',
        timeoutMs: timeouts.probeTimeoutMs,
      }))),
    },
    {
      name: 'packets',
      measure: async (input) => parsePositiveNumber(lastLine(await ffprobe.query(input, {
        selectStreams: 'a:0',
        entries: 'packet=pts_time',
        outputFormat: 'csv=p=0',
        operation: 'ffprobe:duration-packets',
        timeoutMs: timeouts.decodeProbeTimeoutMs,
      }))),
    },
    {
      name: 'decode',
      measure: async (input) => {
        const output = await runner.run({
          executable: ffmpegPath,
          args: ['-i', 'pipe:0', '-f', 'null', '-v', 'error', '-stats', '-'],
          input,
          timeoutMs: timeouts.decodeProbeTimeoutMs,
          operation: 'ffmpeg:duration-decode',
        });
        return parseLastClockTime(output.stderr);
      },
    },
  ];
}

/**
 * Run the tiers in order; tool failures move on to the next tier
 */
export async function measureDuration(
  strategies: readonly DurationStrategy[],
  input: Buffer
): Promise<number> {
  const attempted: string[] = [];

  for (const strategy of strategies) {
    attempted.push(strategy.name);
    try {
      const value = await strategy.measure(input);
      if (value !== undefined && Number.isFinite(value) && value > 0) {
        logger.debug({ strategy: strategy.name, durationSeconds: value }, 'Duration resolved');
        return value;
      }
      logger.debug({ strategy: strategy.name }, 'Duration tier gave no usable value');
    } catch (error) {
      if (!(error instanceof MediaKitError)) throw error;
      logger.debug({ strategy: strategy.name, err: error }, 'Duration tier failed');
    }
  }

  logger.warn({ attempted }, 'All duration tiers failed');
  throw new DurationUnknownError(attempted);
}
