/**
 * Audio Downloader
 *
 * Fetches the best audio track behind a URL with yt-dlp and returns it
 * as MP3. Sources already in MP3 pass through; other audio containers are
 * transcoded at 192 kbps.
 */

import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, ExecutionError, ValidationError, type ToolRunner } from '@mediakit/core';
import { createLogger, sanitizeFilename } from '@mediakit/utils';
import type { FFmpeg } from './ffmpeg.js';
import { AUDIO_PRESETS, compressionEncoding } from './formats.js';

const logger = createLogger({ component: 'audio-downloader' });

/** Source containers we know how to transcode to MP3 */
const TRANSCODABLE_SOURCES = new Set(['webm', 'm4a', 'flac', 'ogg']);
const DOWNLOAD_BITRATE_KBPS = 192;

const urlSchema = z.string().url().refine(
  value => /^https?:\/\//i.test(value),
  'only http(s) URLs are supported'
);

const metadataSchema = z.object({
  ext: z.string().default(''),
  title: z.string().default('audio_file'),
});

export interface DownloadResult {
  data: Buffer;
  format: 'mp3';
  mimeType: string;
  title: string;
  /** Extension yt-dlp reported for the source */
  sourceFormat: string;
}

export interface AudioDownloaderOptions {
  ytDlpPath?: string;
  metadataTimeoutMs?: number;
  downloadTimeoutMs?: number;
}

export class AudioDownloader {
  private readonly ytDlpPath: string;
  private readonly metadataTimeoutMs: number;
  private readonly downloadTimeoutMs: number;

  constructor(
    private readonly runner: ToolRunner,
    private readonly ffmpeg: FFmpeg,
    options: AudioDownloaderOptions = {}
  ) {
    this.ytDlpPath = options.ytDlpPath ?? 'yt-dlp';
    this.metadataTimeoutMs = options.metadataTimeoutMs ?? DEFAULT_ENGINE_CONFIG.decodeProbeTimeoutMs;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_ENGINE_CONFIG.transcodeTimeoutMs;
  }

  async download(url: string): Promise<DownloadResult> {
    const parsedUrl = urlSchema.safeParse(url);
    if (!parsedUrl.success) {
      throw new ValidationError('url', parsedUrl.error.issues[0]?.message ?? 'invalid URL');
    }

    const metadata = await this.fetchMetadata(parsedUrl.data);
    const sourceFormat = metadata.ext.toLowerCase();
    const title = sanitizeFilename(metadata.title);
    logger.info({ sourceFormat, title }, 'Resolved download source');

    if (sourceFormat !== 'mp3' && !TRANSCODABLE_SOURCES.has(sourceFormat)) {
      throw new ValidationError('url', `unsupported source format: ${sourceFormat || 'unknown'}`, 'UNSUPPORTED_FORMAT');
    }

    const source = await this.fetchAudio(parsedUrl.data);
    const data = sourceFormat === 'mp3'
      ? source
      : await this.ffmpeg.run(
        { kind: 'compress', encoding: compressionEncoding('mp3', DOWNLOAD_BITRATE_KBPS) },
        { input: source, operation: 'download-transcode' }
      );

    return { data, format: 'mp3', mimeType: AUDIO_PRESETS.mp3.mimeType, title, sourceFormat };
  }

  private async fetchMetadata(url: string): Promise<z.infer<typeof metadataSchema>> {
    const output = await this.runner.run({
      executable: this.ytDlpPath,
      args: ['-j', '--skip-download', '--no-playlist', url],
      timeoutMs: this.metadataTimeoutMs,
      operation: 'yt-dlp:metadata',
    });

    let json: unknown;
    try {
      json = JSON.parse(output.stdout.toString('utf8'));
    } catch (error) {
      throw new ExecutionError('yt-dlp:metadata', error);
    }

    const parsed = metadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExecutionError('yt-dlp:metadata', parsed.error);
    }
    return parsed.data;
  }

  private async fetchAudio(url: string): Promise<Buffer> {
    const output = await this.runner.run({
      executable: this.ytDlpPath,
      args: ['--format', 'bestaudio/best', '--no-playlist', '--output', '-', url],
      timeoutMs: this.downloadTimeoutMs,
      operation: 'yt-dlp:download',
    });
    return output.stdout;
  }
}
