/**
 * FFmpeg Command Builder
 *
 * Fluent API for building FFmpeg argument vectors, plus `buildCommand`, the
 * pure mapping from an operation plan to arguments.
 *
 * Every command reads stdin (`pipe:0`) unless it is a concat, and writes
 * stdout (`pipe:1`) unless it normalises into a scratch file.
 */

import type { AudioFormat, VolumeAdjustment } from '@mediakit/core';
import { formatSeconds, logger } from '@mediakit/utils';
import { audioPreset, FRAGMENTED_MOVFLAGS, type AudioFormatPreset, type CompressionEncoding } from './formats.js';

export const PIPE_INPUT = 'pipe:0';
export const PIPE_OUTPUT = 'pipe:1';

export interface InputOptions {
  format?: string;        // -f format
  extraArgs?: string[];   // Additional input args
}

export interface OutputOptions {
  format?: string;        // -f format
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];   // Additional output args
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'a:0'
}

export interface AudioCodecOptions {
  args: readonly string[];
  sampleRate?: number;
  channels?: number;
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private audioCodec: AudioCodecOptions | 'copy' | null = null;
  private audioFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private mapMetadata: number | null = null;
  private dropVideo = false;
  private range: { start: number; duration?: number } | null = null;

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  /**
   * Drop every video stream (-vn)
   */
  disableVideo(): this {
    this.dropVideo = true;
    return this;
  }

  /**
   * Output-side seek and length (-ss / -t after the input)
   */
  setRange(startSeconds: number, durationSeconds?: number): this {
    this.range = { start: startSeconds, duration: durationSeconds };
    return this;
  }

  /**
   * Set audio encoding; 'copy' copies every stream without re-encoding
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options;
    return this;
  }

  /**
   * Add audio filter
   */
  addAudioFilter(filter: string): this {
    this.audioFilters.push(filter);
    return this;
  }

  /**
   * Add atempo filter for speed adjustment
   */
  addAudioTempo(factor: number): this {
    // atempo only supports 0.5-2.0, chain for larger adjustments
    const filters: string[] = [];
    let remaining = factor;

    while (remaining > 2.0) {
      filters.push('atempo=2');
      remaining /= 2.0;
    }
    while (remaining < 0.5) {
      filters.push('atempo=0.5');
      remaining /= 0.5;
    }
    filters.push(`atempo=${formatFactor(remaining)}`);

    return this.addAudioFilter(filters.join(','));
  }

  /**
   * Add loudnorm filter for audio normalization
   */
  addLoudnessNorm(integratedLoudness: number): this {
    return this.addAudioFilter(`loudnorm=I=${integratedLoudness}`);
  }

  /**
   * Copy metadata from input
   */
  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  /**
   * Set output options
   */
  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  /**
   * Container arguments for writing a preset to stdout
   */
  toPipe(target: Readonly<AudioFormatPreset>): this {
    return this
      .setOutputOptions({
        format: target.container,
        movflags: target.fragmented ? FRAGMENTED_MOVFLAGS : undefined,
      })
      .setOutput(PIPE_OUTPUT);
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Inputs
    for (const input of this.inputs) {
      if (input.options.format) {
        args.push('-f', input.options.format);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    // Mappings
    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}`);
    }

    if (this.dropVideo) {
      args.push('-vn');
    }

    if (this.range) {
      args.push('-ss', formatSeconds(this.range.start));
      if (this.range.duration !== undefined) {
        args.push('-t', formatSeconds(this.range.duration));
      }
    }

    // Metadata
    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }

    // Audio filters (only if not copying)
    if (this.audioFilters.length > 0) {
      if (this.audioCodec === 'copy') {
        logger.warn('Audio filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-af', this.audioFilters.join(','));
      }
    }

    // Audio codec
    if (this.audioCodec === 'copy') {
      args.push('-c', 'copy');
    } else if (this.audioCodec) {
      args.push(...this.audioCodec.args);
      if (this.audioCodec.sampleRate) args.push('-ar', this.audioCodec.sampleRate.toString());
      if (this.audioCodec.channels) args.push('-ac', this.audioCodec.channels.toString());
    }

    // Output options
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

function formatFactor(value: number): string {
  return String(Number(value.toFixed(6)));
}

// ============================================
// Operation plans
// ============================================

export type CommandPlan =
  | { kind: 'convert'; target: AudioFormat; preserveMetadata: boolean }
  | { kind: 'cut'; format: string; start: number; duration: number }
  | { kind: 'compress'; encoding: CompressionEncoding }
  | { kind: 'extract'; target: AudioFormat }
  | { kind: 'volume'; format: string; adjustment: VolumeAdjustment }
  | { kind: 'speed'; format: string; speed: number; preservePitch: boolean; sampleRate: number }
  | { kind: 'normalize'; sampleRate: number; channels: number; output: string }
  | { kind: 'concat'; manifest: string; target: string };

/**
 * Map a plan to ffmpeg arguments. Pure: no probing, no I/O.
 */
export function buildCommand(plan: CommandPlan): string[] {
  const builder = new FFmpegCommandBuilder();

  switch (plan.kind) {
    case 'convert': {
      const target = audioPreset(plan.target);
      builder.addInput(PIPE_INPUT);
      if (plan.preserveMetadata) {
        builder.copyMetadata(0);
        if (target.format === 'mp3') {
          builder.setOutputOptions({ extraArgs: ['-id3v2_version', '3'] });
        }
      }
      return builder.setAudioCodec({ args: target.codecArgs }).toPipe(target).build();
    }

    case 'cut': {
      return builder
        .addInput(PIPE_INPUT)
        .setRange(plan.start, plan.duration)
        .setAudioCodec('copy')
        .toPipe(audioPreset(plan.format))
        .build();
    }

    case 'compress': {
      return builder
        .addInput(PIPE_INPUT)
        .setAudioCodec({ args: plan.encoding.codecArgs })
        .toPipe(audioPreset(plan.encoding.format))
        .build();
    }

    case 'extract': {
      const target = audioPreset(plan.target);
      return builder
        .addInput(PIPE_INPUT)
        .map(0, 'a:0')
        .disableVideo()
        .setAudioCodec({ args: target.codecArgs })
        .toPipe(target)
        .build();
    }

    case 'volume': {
      const target = audioPreset(plan.format);
      builder.addInput(PIPE_INPUT);
      const { adjustment } = plan;
      switch (adjustment.mode) {
        case 'percentage':
          builder.addAudioFilter(`volume=${formatFactor(adjustment.value / 100)}`);
          break;
        case 'decibels':
          builder.addAudioFilter(`volume=${adjustment.value}dB`);
          break;
        case 'normalize':
          builder.addLoudnessNorm(adjustment.value);
          break;
        default:
          return assertNever(adjustment);
      }
      return builder.setAudioCodec({ args: target.codecArgs }).toPipe(target).build();
    }

    case 'speed': {
      const target = audioPreset(plan.format);
      builder.addInput(PIPE_INPUT);
      if (plan.preservePitch) {
        builder.addAudioTempo(plan.speed);
      } else {
        builder.addAudioFilter(`asetrate=${Math.round(plan.sampleRate * plan.speed)}`);
        builder.addAudioFilter(`aresample=${plan.sampleRate}`);
      }
      return builder.setAudioCodec({ args: target.codecArgs }).toPipe(target).build();
    }

    case 'normalize': {
      return builder
        .addInput(PIPE_INPUT)
        .setAudioCodec({ args: [], sampleRate: plan.sampleRate, channels: plan.channels })
        .setOutputOptions({ format: 'wav' })
        .setOutput(plan.output)
        .build();
    }

    case 'concat': {
      const target = audioPreset(plan.target);
      builder.addInput(plan.manifest, { format: 'concat', extraArgs: ['-safe', '0'] });
      // Normalised parts are already WAV; only other targets need encoding
      builder.setAudioCodec(target.format === 'wav' ? 'copy' : { args: target.codecArgs });
      return builder.toPipe(target).build();
    }

    default:
      return assertNever(plan);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled command plan: ${JSON.stringify(value)}`);
}
