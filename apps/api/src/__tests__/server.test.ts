import { describe, it, expect, afterEach } from 'vitest';
import { readdirSync } from 'node:fs';
import { ExternalToolError, type ToolInvocation, type ToolOutput } from '@mediakit/core';
import { toolOutput } from '@mediakit/core/testing';
import type { UploadLimits } from '../config/index.js';
import {
  buildTestApp,
  defaultTools,
  multipartBody,
  samples,
  zipEntryNames,
  type FormPart,
  type TestApp,
} from './helpers.js';

const opened: TestApp[] = [];

async function app(
  handler: (invocation: ToolInvocation) => ToolOutput = defaultTools,
  limits?: Partial<UploadLimits>
): Promise<TestApp> {
  const created = await buildTestApp(handler, limits);
  opened.push(created);
  return created;
}

function argAfter(invocation: ToolInvocation | undefined, flag: string): string | undefined {
  if (!invocation) return undefined;
  const index = invocation.args.indexOf(flag);
  return index === -1 ? undefined : invocation.args[index + 1];
}

async function post(target: TestApp, url: string, parts: readonly FormPart[]) {
  const { payload, headers } = multipartBody(parts);
  return target.server.inject({ method: 'POST', url, payload, headers });
}

const wavFile = { name: 'file', filename: 'voice.wav', data: samples.wav, contentType: 'audio/wav' };

afterEach(async () => {
  while (opened.length > 0) {
    await opened.pop()?.close();
  }
});

describe('GET /api/health', () => {
  it('reports ffmpeg availability and version', async () => {
    const target = await app();

    const response = await target.server.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({ status: 'healthy', ffmpegAvailable: true, ffmpegVersion: '6.1.1' });
    expect(typeof body.responseTimeMs).toBe('number');
    expect(typeof body.version).toBe('string');
  });

  it('is unhealthy when ffmpeg cannot run', async () => {
    const target = await app((invocation) => {
      throw new ExternalToolError(invocation.operation, 127, 'not found');
    });

    const response = await target.server.inject({ method: 'GET', url: '/api/health' });

    expect(response.json()).toMatchObject({ status: 'unhealthy', ffmpegAvailable: false });
  });
});

describe('POST /api/convert', () => {
  it('returns the converted file as an attachment', async () => {
    const target = await app();

    const response = await post(target, '/api/convert', [wavFile, { name: 'target_format', value: 'mp3' }]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('audio/mpeg');
    expect(response.headers['content-disposition']).toBe('attachment; filename="voice.mp3"');
    expect(response.body).toBe('out:ffmpeg:convert');
    expect(target.runner.calls[0]?.input?.equals(samples.wav)).toBe(true);
  });

  it('rejects an unsupported target with a suggestion', async () => {
    const target = await app();

    const response = await post(target, '/api/convert', [wavFile, { name: 'target_format', value: 'wma' }]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      statusCode: 400,
      error: 'Unsupported format',
      code: 'UNSUPPORTED_FORMAT',
    });
    expect(response.json().suggestion).toContain('MP3, WAV, FLAC');
    expect(target.runner.calls).toHaveLength(0);
  });

  it('rejects content that does not match its extension', async () => {
    const target = await app();

    const response = await post(target, '/api/convert', [
      { name: 'file', filename: 'voice.mp3', data: Buffer.from('plain text, not audio') },
      { name: 'target_format', value: 'wav' },
    ]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'CORRUPTED_FILE', error: 'File appears to be corrupted' });
  });

  it('requires the target format field', async () => {
    const target = await app();

    const response = await post(target, '/api/convert', [wavFile]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Request validation failed' });
  });

  it('requires a multipart body', async () => {
    const target = await app();

    const response = await target.server.inject({ method: 'POST', url: '/api/convert', payload: { target_format: 'mp3' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('maps a failing ffmpeg run to a 500 with the tool message', async () => {
    const target = await app((invocation) => {
      if (invocation.operation === 'ffmpeg:convert') {
        throw new ExternalToolError(invocation.operation, 1, 'pipe:0: Invalid argument\nConversion failed!\n');
      }
      return defaultTools(invocation);
    });

    const response = await post(target, '/api/convert', [wavFile, { name: 'target_format', value: 'flac' }]);

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({
      code: 'EXTERNAL_TOOL_ERROR',
      error: 'Audio processing error',
      message: 'Conversion failed!',
    });
  });

  it('rejects uploads over the size limit', async () => {
    const target = await app(defaultTools, { maxUploadBytes: 16 });

    const response = await post(target, '/api/convert', [wavFile, { name: 'target_format', value: 'mp3' }]);

    expect(response.statusCode).toBe(413);
    expect(response.json()).toMatchObject({ code: 'FILE_TOO_LARGE', error: 'File too large' });
  });
});

describe('POST /api/trim', () => {
  it('accepts MM:SS timestamps', async () => {
    const target = await app();

    const response = await post(target, '/api/trim', [
      wavFile,
      { name: 'start_time', value: '0:30' },
      { name: 'end_time', value: '1:00' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="voice_trimmed.wav"');
    expect(response.headers['content-type']).toBe('audio/wav');
    expect(argAfter(target.runner.calls[0], '-ss')).toBe('30');
    expect(argAfter(target.runner.calls[0], '-t')).toBe('30');
  });

  it('rejects an end before the start', async () => {
    const target = await app();

    const response = await post(target, '/api/trim', [
      wavFile,
      { name: 'start_time', value: '40' },
      { name: 'end_time', value: '10' },
    ]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'INVALID_TIME_RANGE', error: 'Invalid time range' });
  });
});

describe('POST /api/merge', () => {
  it('merges the uploads in order', async () => {
    const target = await app();

    const response = await post(target, '/api/merge', [
      { name: 'files', filename: 'a.wav', data: samples.wav },
      { name: 'files', filename: 'b.mp3', data: samples.mp3 },
      { name: 'output_format', value: 'wav' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="merged_audio.wav"');
    const normalized = target.runner.calls.filter(call => call.operation === 'ffmpeg:merge-normalize');
    expect(normalized.map(call => call.input)).toEqual([samples.wav, samples.mp3]);
    expect(readdirSync(target.scratchRoot)).toEqual([]);
  });

  it('needs at least two files', async () => {
    const target = await app();

    const response = await post(target, '/api/merge', [
      { name: 'files', filename: 'a.wav', data: samples.wav },
      { name: 'output_format', value: 'mp3' },
    ]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      code: 'INVALID_FILE_COUNT',
      message: 'Validation failed for files: at least 2 files required for merging',
    });
  });
});

describe('POST /api/compress', () => {
  it('returns the upload unchanged when it is already at the target bitrate', async () => {
    const target = await app();

    const response = await post(target, '/api/compress', [
      { name: 'file', filename: 'song.mp3', data: samples.mp3 },
      { name: 'level', value: 'low' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['x-compression-bypassed']).toBe('true');
    expect(response.headers['content-disposition']).toBe('attachment; filename="song_compressed.mp3"');
    expect(response.rawPayload.equals(samples.mp3)).toBe(true);
  });

  it('rejects an unknown level', async () => {
    const target = await app();

    const response = await post(target, '/api/compress', [
      { name: 'file', filename: 'song.mp3', data: samples.mp3 },
      { name: 'level', value: 'extreme' },
    ]);

    expect(response.json()).toMatchObject({ code: 'INVALID_COMPRESSION_LEVEL' });
  });
});

describe('POST /api/extract', () => {
  it('extracts audio from a video upload', async () => {
    const target = await app();

    const response = await post(target, '/api/extract', [
      { name: 'file', filename: 'clip.mp4', data: samples.mp4 },
      { name: 'output_format', value: 'm4a' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('audio/mp4');
    expect(response.headers['content-disposition']).toBe('attachment; filename="clip_audio.m4a"');
  });

  it('reports a video without audio', async () => {
    const target = await app((invocation) =>
      invocation.operation === 'ffprobe:audio-track' ? toolOutput('') : defaultTools(invocation));

    const response = await post(target, '/api/extract', [
      { name: 'file', filename: 'clip.mp4', data: samples.mp4 },
      { name: 'output_format', value: 'mp3' },
    ]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'NO_AUDIO_TRACK', error: 'No audio track found' });
  });
});

describe('POST /api/split-audio', () => {
  it('zips fixed-length segments', async () => {
    const target = await app();

    const response = await post(target, '/api/split-audio', [
      wavFile,
      { name: 'split_mode', value: 'time' },
      { name: 'interval_duration', value: '7' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/zip');
    expect(response.headers['content-disposition']).toBe('attachment; filename="split_audio_segments.zip"');
    expect(response.rawPayload.subarray(0, 4)).toEqual(Buffer.from([0x50, 0x4b, 0x03, 0x04]));
    const listing = response.rawPayload.toString('latin1');
    expect(listing).toContain('segment_1.wav');
    expect(listing).toContain('segment_3.wav');
    expect(listing).not.toContain('segment_4.wav');
  });

  it('uses segment names from the request', async () => {
    const target = await app();

    const response = await post(target, '/api/split-audio', [
      wavFile,
      { name: 'split_mode', value: 'segments' },
      { name: 'segments', value: JSON.stringify([{ start: 0, end: 4, name: 'intro' }, { start: 4, end: 9 }]) },
    ]);

    expect(response.statusCode).toBe(200);
    const listing = response.rawPayload.toString('latin1');
    expect(listing).toContain('intro.wav');
    expect(listing).toContain('segment_2.wav');
  });

  it('keeps client segment names inside the archive and unique', async () => {
    const target = await app();

    const response = await post(target, '/api/split-audio', [
      wavFile,
      { name: 'split_mode', value: 'segments' },
      {
        name: 'segments',
        value: JSON.stringify([
          { start: 0, end: 4, name: 'a/../../evil' },
          { start: 4, end: 8, name: 'intro' },
          { start: 8, end: 12, name: 'intro' },
        ]),
      },
    ]);

    expect(response.statusCode).toBe(200);
    expect(zipEntryNames(response.rawPayload)).toEqual(['evil.wav', 'intro.wav', 'intro_2.wav']);
  });

  it('rejects malformed segment JSON', async () => {
    const target = await app();

    const response = await post(target, '/api/split-audio', [
      wavFile,
      { name: 'split_mode', value: 'segments' },
      { name: 'segments', value: '[{start: 0' },
    ]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'INVALID_TIME_RANGE' });
  });
});

describe('POST /api/adjust-volume', () => {
  it('applies a percentage', async () => {
    const target = await app();

    const response = await post(target, '/api/adjust-volume', [
      wavFile,
      { name: 'adjustment_mode', value: 'percentage' },
      { name: 'volume_percentage', value: '150' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="voice_volume_adjusted.wav"');
    expect(argAfter(target.runner.calls[0], '-af')).toBe('volume=1.5');
  });

  it('needs the value field of the chosen mode', async () => {
    const target = await app();

    const response = await post(target, '/api/adjust-volume', [
      wavFile,
      { name: 'adjustment_mode', value: 'decibels' },
      { name: 'volume_percentage', value: '150' },
    ]);

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
  });
});

describe('POST /api/change-speed', () => {
  it('resamples at the probed rate and names the speed', async () => {
    const target = await app();

    const response = await post(target, '/api/change-speed', [
      wavFile,
      { name: 'speed', value: '1.5' },
      { name: 'preserve_pitch', value: 'false' },
    ]);

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="voice_speed_1_50x.wav"');
    const run = target.runner.calls.find(call => call.operation === 'ffmpeg:speed');
    expect(argAfter(run, '-af')).toBe('asetrate=66150,aresample=44100');
  });
});

describe('POST /api/probe', () => {
  it('returns the probe facts', async () => {
    const target = await app();

    const response = await post(target, '/api/probe', [wavFile]);

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      filename: 'voice.wav',
      format: 'wav',
      sampleRate: 44100,
      bitrateKbps: 320,
      durationSeconds: 20,
      hasAudioTrack: true,
    });
  });
});

describe('GET /api/download-audio', () => {
  it('rejects non-http URLs', async () => {
    const target = await app();

    const response = await target.server.inject({
      method: 'GET',
      url: '/api/download-audio?url=ftp%3A%2F%2Fmedia.example.com%2Fa.mp3',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(target.runner.calls).toHaveLength(0);
  });

  it('downloads mp3 sources', async () => {
    const target = await app((invocation) => {
      if (invocation.operation === 'yt-dlp:metadata') return toolOutput('{"ext":"mp3","title":"Evening Set"}');
      return toolOutput('mp3-bytes');
    });

    const response = await target.server.inject({
      method: 'GET',
      url: '/api/download-audio?url=https%3A%2F%2Fmedia.example.com%2Fwatch%3Fv%3D1',
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-disposition']).toBe('attachment; filename="Evening Set.mp3"');
    expect(response.body).toBe('mp3-bytes');
  });
});

describe('unknown routes', () => {
  it('returns a 404 body', async () => {
    const target = await app();

    const response = await target.server.inject({ method: 'GET', url: '/api/nothing-here' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ code: 'NOT_FOUND', message: 'Route GET /api/nothing-here not found' });
  });
});
