/**
 * Pipeline Orchestrator
 *
 * Multi-step operations built from single FFmpeg invocations:
 * - merge: probe rates -> normalise each input to WAV -> concat manifest -> encode
 * - split by time / by explicit segments: one stream-copy cut per segment
 *
 * Steps run one after another. A failing item aborts the pipeline with a
 * PipelineStepError naming the item; scratch files are removed either way.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PipelineStepError, ValidationError, type SegmentSpec } from '@mediakit/core';
import type { MediaProbe } from '@mediakit/media';
import { createLogger } from '@mediakit/utils';
import type { FFmpeg } from './ffmpeg.js';
import type { ScratchSpaceManager } from './scratch.js';

const logger = createLogger({ component: 'pipeline' });

/** Channel count every merge input is normalised to */
const MERGE_CHANNELS = 2;

export interface TimeRange {
  start: number;
  end: number;
}

export interface SplitPart extends TimeRange {
  /** Position in the requested segment list (or in the time plan) */
  index: number;
  name: string;
  data: Buffer;
}

export type InvalidSegmentPolicy = 'skip' | 'reject';

export interface PipelineDeps {
  ffmpeg: FFmpeg;
  probe: MediaProbe;
  scratch: ScratchSpaceManager;
}

/**
 * Fixed-interval plan: ceil(D / I) ranges, the last one ending exactly at D.
 * The ratio is rounded before the ceiling so that e.g. 2.1 / 0.7 plans three
 * ranges, not four.
 */
export function planTimeSegments(durationSeconds: number, intervalSeconds: number): TimeRange[] {
  if (!(intervalSeconds > 0)) {
    throw new ValidationError('intervalSeconds', 'must be positive', 'INVALID_TIME_RANGE');
  }

  const count = Math.ceil(Number((durationSeconds / intervalSeconds).toFixed(9)));
  const ranges: TimeRange[] = [];
  for (let i = 0; i < count; i++) {
    ranges.push({
      start: i * intervalSeconds,
      end: i === count - 1 ? durationSeconds : Math.min((i + 1) * intervalSeconds, durationSeconds),
    });
  }
  return ranges;
}

/** Width as ffmpeg sees it: argv seconds carry millisecond precision */
function isEmptyRange(range: TimeRange): boolean {
  return Number((range.end - range.start).toFixed(3)) <= 0;
}

export function isValidSegment(segment: SegmentSpec): boolean {
  return Number.isFinite(segment.start)
    && Number.isFinite(segment.end)
    && segment.start >= 0
    && segment.end > segment.start;
}

/**
 * One line of an ffmpeg concat manifest
 */
export function manifestLine(path: string): string {
  return `file '${path.replace(/'/g, "'\\''")}'`;
}

export class PipelineOrchestrator {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Concatenate inputs in order into one output of `outputFormat`
   */
  async merge(inputs: readonly Buffer[], outputFormat: string): Promise<Buffer> {
    if (inputs.length < 2) {
      throw new ValidationError('inputs', `at least 2 inputs are required, got ${inputs.length}`, 'INVALID_FILE_COUNT');
    }

    const { ffmpeg, probe, scratch } = this.deps;

    const rates: number[] = [];
    for (const input of inputs) {
      rates.push(await probe.sampleRate(input));
    }
    const sampleRate = Math.max(...rates);
    logger.info({ inputs: inputs.length, rates, sampleRate }, 'Merging inputs');

    return scratch.withScratchDirectory(async (directory) => {
      const parts: string[] = [];

      for (const [index, input] of inputs.entries()) {
        const output = join(directory, `input_${index}.wav`);
        try {
          await ffmpeg.run(
            { kind: 'normalize', sampleRate, channels: MERGE_CHANNELS, output },
            { input, operation: 'merge-normalize' }
          );
        } catch (error) {
          throw new PipelineStepError('merge', index, error);
        }
        parts.push(output);
      }

      const manifest = join(directory, 'concat_list.txt');
      await writeFile(manifest, parts.map(manifestLine).join('\n') + '\n', 'utf8');

      return ffmpeg.run(
        { kind: 'concat', manifest, target: outputFormat },
        { operation: 'merge-concat' }
      );
    });
  }

  /**
   * Cut the input into fixed-length parts
   */
  async splitByTime(input: Buffer, format: string, intervalSeconds: number): Promise<SplitPart[]> {
    const duration = await this.deps.probe.duration(input);
    const plan = planTimeSegments(duration, intervalSeconds);
    logger.info({ durationSeconds: duration, intervalSeconds, segments: plan.length }, 'Splitting by time');

    const parts: SplitPart[] = [];
    for (const [index, range] of plan.entries()) {
      if (isEmptyRange(range)) {
        logger.warn({ index, ...range }, 'Skipping empty segment');
        continue;
      }
      parts.push(await this.cut(input, format, index, range, `segment_${index + 1}`, 'splitByTime'));
    }
    return parts;
  }

  /**
   * Cut the requested ranges, each independently, in request order
   */
  async splitBySegments(
    input: Buffer,
    format: string,
    segments: readonly SegmentSpec[],
    policy: InvalidSegmentPolicy = 'skip'
  ): Promise<SplitPart[]> {
    const accepted: { index: number; segment: SegmentSpec }[] = [];

    for (const [index, segment] of segments.entries()) {
      if (isValidSegment(segment)) {
        accepted.push({ index, segment });
        continue;
      }
      if (policy === 'reject') {
        throw new ValidationError(
          `segments.${index}`,
          `invalid range ${segment.start}-${segment.end}`,
          'INVALID_TIME_RANGE'
        );
      }
      logger.warn({ index, start: segment.start, end: segment.end }, 'Skipping invalid segment');
    }

    if (accepted.length === 0) {
      throw new ValidationError('segments', 'no valid segments', 'INVALID_TIME_RANGE');
    }

    const parts: SplitPart[] = [];
    for (const { index, segment } of accepted) {
      const name = segment.name ?? `segment_${index + 1}`;
      parts.push(await this.cut(input, format, index, segment, name, 'splitBySegments'));
    }
    return parts;
  }

  private async cut(
    input: Buffer,
    format: string,
    index: number,
    range: TimeRange,
    name: string,
    operation: string
  ): Promise<SplitPart> {
    try {
      const data = await this.deps.ffmpeg.run(
        { kind: 'cut', format, start: range.start, duration: range.end - range.start },
        { input, operation: `${operation}-segment` }
      );
      return { index, name, start: range.start, end: range.end, data };
    } catch (error) {
      throw new PipelineStepError(operation, index, error);
    }
  }
}
