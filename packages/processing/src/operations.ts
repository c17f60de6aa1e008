/**
 * Media Operations
 *
 * The engine's single entry point. Each method validates its request,
 * probes where the plan needs facts about the input, runs the plan and
 * reports the output format with its MIME type.
 */

import {
  binaries,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  ProcessRunner,
  validateOperation,
  type AudioFormat,
  type EngineConfig,
  type SegmentSpec,
  type ToolRunner,
  type VolumeAdjustment,
} from '@mediakit/core';
import { MediaProbe, type ProbeResult } from '@mediakit/media';
import { createLogger } from '@mediakit/utils';
import { FFmpeg } from './ffmpeg.js';
import { audioPreset, COMPRESSION_BITRATES_KBPS, compressionEncoding } from './formats.js';
import { PipelineOrchestrator, type InvalidSegmentPolicy, type SplitPart } from './pipeline.js';
import { ScratchSpaceManager } from './scratch.js';
import { AudioDownloader, type DownloadResult } from './downloader.js';

const logger = createLogger({ component: 'media-operations' });

export interface OperationResult {
  data: Buffer;
  format: AudioFormat;
  mimeType: string;
}

export interface CompressionResult extends OperationResult {
  /** True when the input was already at or below the target and is returned as-is */
  bypassed: boolean;
  sourceBitrateKbps?: number;
  targetBitrateKbps: number;
}

export interface SegmentResult extends SplitPart {
  format: AudioFormat;
  mimeType: string;
}

export interface ToolStatus {
  ffmpegAvailable: boolean;
  ffmpegVersion?: string;
}

export interface MediaOperationsOptions {
  runner?: ToolRunner;
  ffmpegPath?: string;
  ffprobePath?: string;
  ytDlpPath?: string;
  engine?: Partial<EngineConfig>;
  scratch?: ScratchSpaceManager;
}

export class MediaOperations {
  readonly probe: MediaProbe;
  readonly ffmpeg: FFmpeg;
  readonly pipelines: PipelineOrchestrator;
  readonly scratch: ScratchSpaceManager;
  readonly downloader: AudioDownloader;
  readonly engine: Readonly<EngineConfig>;

  constructor(options: MediaOperationsOptions = {}) {
    const runner = options.runner ?? new ProcessRunner();
    this.engine = { ...DEFAULT_ENGINE_CONFIG, ...options.engine };

    this.probe = new MediaProbe(runner, {
      ffprobePath: options.ffprobePath,
      ffmpegPath: options.ffmpegPath,
      probeTimeoutMs: this.engine.probeTimeoutMs,
      decodeProbeTimeoutMs: this.engine.decodeProbeTimeoutMs,
      defaultSampleRate: this.engine.defaultSampleRate,
    });
    this.ffmpeg = new FFmpeg(runner, options.ffmpegPath, this.engine.transcodeTimeoutMs);
    this.scratch = options.scratch ?? new ScratchSpaceManager();
    this.pipelines = new PipelineOrchestrator({ ffmpeg: this.ffmpeg, probe: this.probe, scratch: this.scratch });
    this.downloader = new AudioDownloader(runner, this.ffmpeg, {
      ytDlpPath: options.ytDlpPath,
      metadataTimeoutMs: this.engine.decodeProbeTimeoutMs,
      downloadTimeoutMs: this.engine.transcodeTimeoutMs,
    });
  }

  /**
   * Operations wired to the resolved binaries and the environment's settings
   */
  static fromEnvironment(): MediaOperations {
    const resolved = binaries();
    return new MediaOperations({
      ffmpegPath: resolved.ffmpeg.resolvedPath,
      ffprobePath: resolved.ffprobe.resolvedPath,
      ytDlpPath: resolved.ytDlp.resolvedPath,
      engine: loadEngineConfig(),
    });
  }

  async convert(
    input: Buffer,
    params: { targetFormat: string; preserveMetadata?: boolean }
  ): Promise<OperationResult> {
    const op = validateOperation('convert', params);
    const data = await this.ffmpeg.run(
      { kind: 'convert', target: op.targetFormat, preserveMetadata: op.preserveMetadata },
      { input, operation: 'convert' }
    );
    return this.result(data, op.targetFormat);
  }

  async trim(
    input: Buffer,
    params: { format: string; start: number; end: number }
  ): Promise<OperationResult> {
    const op = validateOperation('trim', params);
    // Ends past the input are clipped by ffmpeg itself
    const data = await this.ffmpeg.run(
      { kind: 'cut', format: op.format, start: op.start, duration: op.end - op.start },
      { input, operation: 'trim' }
    );
    return this.result(data, op.format);
  }

  async merge(
    inputs: readonly Buffer[],
    params: { outputFormat: string }
  ): Promise<OperationResult> {
    const op = validateOperation('merge', { ...params, inputCount: inputs.length });
    const data = await this.pipelines.merge(inputs, op.outputFormat);
    return this.result(data, op.outputFormat);
  }

  async compress(
    input: Buffer,
    params: { format: string; level: string }
  ): Promise<CompressionResult> {
    const op = validateOperation('compress', params);
    const targetBitrateKbps = COMPRESSION_BITRATES_KBPS[op.level];
    const sourceBitrateKbps = await this.probe.bitrateKbps(input);

    if (sourceBitrateKbps !== undefined && sourceBitrateKbps <= targetBitrateKbps) {
      logger.info({ sourceBitrateKbps, targetBitrateKbps }, 'Input already at or below target bitrate');
      return {
        ...this.result(input, op.format),
        bypassed: true,
        sourceBitrateKbps,
        targetBitrateKbps,
      };
    }

    const encoding = compressionEncoding(op.format, targetBitrateKbps);
    const data = await this.ffmpeg.run({ kind: 'compress', encoding }, { input, operation: 'compress' });
    return {
      ...this.result(data, encoding.format),
      bypassed: false,
      sourceBitrateKbps,
      targetBitrateKbps,
    };
  }

  async extract(
    input: Buffer,
    params: { outputFormat: string }
  ): Promise<OperationResult> {
    const op = validateOperation('extract', params);
    await this.probe.requireAudioTrack(input);
    const data = await this.ffmpeg.run({ kind: 'extract', target: op.outputFormat }, { input, operation: 'extract' });
    return this.result(data, op.outputFormat);
  }

  async splitByTime(
    input: Buffer,
    params: { format: string; intervalSeconds: number }
  ): Promise<SegmentResult[]> {
    const op = validateOperation('splitByTime', params);
    const parts = await this.pipelines.splitByTime(input, op.format, op.intervalSeconds);
    return parts.map(part => this.segment(part, op.format));
  }

  async splitBySegments(
    input: Buffer,
    params: { format: string; segments: readonly SegmentSpec[]; invalidSegments?: InvalidSegmentPolicy }
  ): Promise<SegmentResult[]> {
    const op = validateOperation('splitBySegments', params);
    const parts = await this.pipelines.splitBySegments(input, op.format, op.segments, op.invalidSegments);
    return parts.map(part => this.segment(part, op.format));
  }

  async adjustVolume(
    input: Buffer,
    params: { format: string; adjustment: VolumeAdjustment }
  ): Promise<OperationResult> {
    const op = validateOperation('volume', params);
    const data = await this.ffmpeg.run(
      { kind: 'volume', format: op.format, adjustment: op.adjustment },
      { input, operation: 'volume' }
    );
    return this.result(data, op.format);
  }

  async changeSpeed(
    input: Buffer,
    params: { format: string; speed: number; preservePitch?: boolean }
  ): Promise<OperationResult> {
    const op = validateOperation('speed', params);
    // Only resampling needs the source rate
    const sampleRate = op.preservePitch ? this.engine.defaultSampleRate : await this.probe.sampleRate(input);
    const data = await this.ffmpeg.run(
      { kind: 'speed', format: op.format, speed: op.speed, preservePitch: op.preservePitch, sampleRate },
      { input, operation: 'speed' }
    );
    return this.result(data, op.format);
  }

  async inspect(input: Buffer): Promise<ProbeResult> {
    return this.probe.inspect(input);
  }

  async downloadAudio(url: string): Promise<DownloadResult> {
    return this.downloader.download(url);
  }

  async toolStatus(): Promise<ToolStatus> {
    const ffmpegVersion = await this.ffmpeg.version();
    return { ffmpegAvailable: ffmpegVersion !== undefined, ffmpegVersion };
  }

  private result(data: Buffer, format: string): OperationResult {
    const preset = audioPreset(format);
    return { data, format: preset.format, mimeType: preset.mimeType };
  }

  private segment(part: SplitPart, format: string): SegmentResult {
    const preset = audioPreset(format);
    return { ...part, format: preset.format, mimeType: preset.mimeType };
  }
}
