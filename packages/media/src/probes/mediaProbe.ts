/**
 * Media Probe
 * 
 * Answers the questions the pipelines ask before transcoding: sample rate,
 * bitrate, presence of an audio track and duration. Each call is a fresh
 * probe of the given blob.
 */

import {
  DEFAULT_ENGINE_CONFIG,
  DurationUnknownError,
  ExternalToolError,
  MediaKitError,
  NoAudioTrackError,
  type ToolRunner,
} from '@mediakit/core';
import { createLogger } from '@mediakit/utils';
import { FFProbe } from './ffprobe.js';
import { createDurationStrategies, measureDuration, type DurationStrategy } from './duration.js';
import { firstLine, parsePositiveNumber } from '../parsers.js';
import type { ProbeBinaries, ProbeResult, ProbeTimeouts } from '../types.js';

const logger = createLogger({ component: 'media-probe' });

export interface MediaProbeOptions extends Partial<ProbeBinaries>, Partial<ProbeTimeouts> {
  defaultSampleRate?: number;
  /** Replaces the built-in duration tiers */
  durationStrategies?: readonly DurationStrategy[];
}

export class MediaProbe {
  private readonly ffprobe: FFProbe;
  private readonly timeouts: ProbeTimeouts;
  private readonly defaultSampleRate: number;
  private readonly durationStrategies: readonly DurationStrategy[];

  constructor(runner: ToolRunner, options: MediaProbeOptions = {}) {
    this.ffprobe = new FFProbe(runner, options.ffprobePath ?? 'ffprobe');
    this.timeouts = {
      probeTimeoutMs: options.probeTimeoutMs ?? DEFAULT_ENGINE_CONFIG.probeTimeoutMs,
      decodeProbeTimeoutMs: options.decodeProbeTimeoutMs ?? DEFAULT_ENGINE_CONFIG.decodeProbeTimeoutMs,
    };
    this.defaultSampleRate = options.defaultSampleRate ?? DEFAULT_ENGINE_CONFIG.defaultSampleRate;
    this.durationStrategies = options.durationStrategies ?? createDurationStrategies({
      runner,
      ffprobe: this.ffprobe,
      ffmpegPath: options.ffmpegPath ?? 'ffmpeg',
      timeouts: this.timeouts,
    });
  }

  /**
   * Sample rate of the first audio stream; the default rate when unknown
   */
  async sampleRate(input: Buffer): Promise<number> {
    try {
      const output = await this.ffprobe.query(input, {
        selectStreams: 'a:0',
        entries: 'stream=sample_rate',
        operation: 'ffprobe:sample-rate',
        timeoutMs: this.timeouts.probeTimeoutMs,
      });
      const rate = parsePositiveNumber(firstLine(output));
      if (rate !== undefined && Number.isInteger(rate)) {
        return rate;
      }
      logger.warn({ output: output.slice(0, 100) }, 'Unparsable sample rate, using default');
    } catch (error) {
      if (!(error instanceof MediaKitError)) throw error;
      logger.warn({ err: error }, 'Sample rate probe failed, using default');
    }
    return this.defaultSampleRate;
  }

  /**
   * Bitrate of the first audio stream in kbps (floored); undefined when the
   * stream does not report one
   */
  async bitrateKbps(input: Buffer): Promise<number | undefined> {
    try {
      const output = await this.ffprobe.query(input, {
        selectStreams: 'a:0',
        entries: 'stream=bit_rate',
        operation: 'ffprobe:bitrate',
        timeoutMs: this.timeouts.probeTimeoutMs,
      });
      const bitsPerSecond = parsePositiveNumber(firstLine(output));
      if (bitsPerSecond === undefined) return undefined;
      const kbps = Math.floor(bitsPerSecond / 1000);
      return kbps > 0 ? kbps : undefined;
    } catch (error) {
      if (!(error instanceof MediaKitError)) throw error;
      logger.warn({ err: error }, 'Bitrate probe failed');
      return undefined;
    }
  }

  /**
   * Whether the first stream selected as audio really is audio.
   * A probe that exits non-zero counts as "no audio".
   */
  async hasAudioTrack(input: Buffer): Promise<boolean> {
    try {
      const output = await this.ffprobe.query(input, {
        selectStreams: 'a:0',
        entries: 'stream=codec_type',
        operation: 'ffprobe:audio-track',
        timeoutMs: this.timeouts.probeTimeoutMs,
      });
      return firstLine(output) === 'audio';
    } catch (error) {
      if (error instanceof ExternalToolError) {
        logger.debug({ err: error }, 'Audio track probe exited non-zero');
        return false;
      }
      throw error;
    }
  }

  async requireAudioTrack(input: Buffer): Promise<void> {
    if (!(await this.hasAudioTrack(input))) {
      throw new NoAudioTrackError();
    }
  }

  /**
   * Duration in seconds via the tiered fallback; DurationUnknownError when
   * every tier fails
   */
  async duration(input: Buffer): Promise<number> {
    return measureDuration(this.durationStrategies, input);
  }

  /**
   * All probe facts at once. Unknown duration is reported, not thrown.
   */
  async inspect(input: Buffer): Promise<ProbeResult> {
    const hasAudioTrack = await this.hasAudioTrack(input);
    const sampleRate = await this.sampleRate(input);
    const bitrateKbps = await this.bitrateKbps(input);

    let durationSeconds: number | undefined;
    try {
      durationSeconds = await this.duration(input);
    } catch (error) {
      if (!(error instanceof DurationUnknownError)) throw error;
      logger.warn('Duration unknown');
    }

    return { sampleRate, bitrateKbps, durationSeconds, hasAudioTrack };
  }
}
