/**
 * Audio Routes
 * 
 * One multipart endpoint per media operation. Uploads are checked before
 * the engine sees them; results come back as attachments.
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { segmentSchema, ValidationError, type MediaKind } from '@mediakit/core';
import { parseTimestamp, validateFileCount, validateUpload, type ValidatedUpload } from '@mediakit/validation';
import { readMultipart, type UploadedFile } from '../lib/multipart.js';
import { sendAttachment } from '../lib/reply.js';
import { zipEntries } from '../lib/archive.js';

const convertFields = z.object({
  target_format: z.string().min(1),
});

const trimFields = z.object({
  start_time: z.string().min(1),
  end_time: z.string().min(1),
});

const mergeFields = z.object({
  output_format: z.string().min(1),
});

const compressFields = z.object({
  level: z.string().min(1),
});

const extractFields = z.object({
  output_format: z.string().min(1),
});

const splitFields = z.discriminatedUnion('split_mode', [
  z.object({
    split_mode: z.literal('time'),
    interval_duration: z.coerce.number(),
  }),
  z.object({
    split_mode: z.literal('segments'),
    segments: z.string().min(1),
    invalid_segments: z.enum(['skip', 'reject']).optional(),
  }),
]);

const volumeFields = z.discriminatedUnion('adjustment_mode', [
  z.object({ adjustment_mode: z.literal('percentage'), volume_percentage: z.coerce.number() }),
  z.object({ adjustment_mode: z.literal('decibels'), decibel_change: z.coerce.number() }),
  z.object({ adjustment_mode: z.literal('normalize'), normalize_target: z.coerce.number() }),
]);

const speedFields = z.object({
  speed: z.coerce.number(),
  preserve_pitch: z.enum(['true', 'false']).default('true').transform(v => v === 'true'),
});

function accept(fastify: FastifyInstance, file: UploadedFile, kind: MediaKind = 'audio'): ValidatedUpload {
  return validateUpload({
    filename: file.filename,
    data: file.data,
    kind,
    maxBytes: fastify.uploadLimits.maxUploadBytes,
    field: file.fieldname,
  });
}

function parseSegments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError('segments', 'invalid segments JSON format', 'INVALID_TIME_RANGE');
  }
}

/** "1.5" -> "1_50x" */
function speedSuffix(speed: number): string {
  return `${speed.toFixed(2)}x`.replace('.', '_');
}

export const audioRoutes: FastifyPluginAsync = async (fastify) => {
  const { media } = fastify;

  fastify.post('/convert', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'));
    const fields = convertFields.parse(form.fields);

    const result = await media.convert(upload.data, { targetFormat: fields.target_format });
    return sendAttachment(reply, { ...result, filename: `${upload.stem}.${result.format}` });
  });

  fastify.post('/trim', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'));
    const fields = trimFields.parse(form.fields);

    const result = await media.trim(upload.data, {
      format: upload.format,
      start: parseTimestamp(fields.start_time, 'start_time'),
      end: parseTimestamp(fields.end_time, 'end_time'),
    });
    return sendAttachment(reply, { ...result, filename: `${upload.stem}_trimmed.${result.format}` });
  });

  fastify.post('/merge', async (request, reply) => {
    const form = await readMultipart(request);
    const files = form.filesNamed('files');
    validateFileCount(files.length, fastify.uploadLimits.minMergeFiles, fastify.uploadLimits.maxMergeFiles);
    const uploads = files.map(file => accept(fastify, file));
    const fields = mergeFields.parse(form.fields);

    const result = await media.merge(uploads.map(upload => upload.data), { outputFormat: fields.output_format });
    return sendAttachment(reply, { ...result, filename: `merged_audio.${result.format}` });
  });

  fastify.post('/compress', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'));
    const fields = compressFields.parse(form.fields);

    const result = await media.compress(upload.data, { format: upload.format, level: fields.level });
    reply.header('X-Compression-Bypassed', String(result.bypassed));
    return sendAttachment(reply, { ...result, filename: `${upload.stem}_compressed.${result.format}` });
  });

  fastify.post('/extract', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'), 'video');
    const fields = extractFields.parse(form.fields);

    const result = await media.extract(upload.data, { outputFormat: fields.output_format });
    return sendAttachment(reply, { ...result, filename: `${upload.stem}_audio.${result.format}` });
  });

  fastify.post('/split-audio', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'));
    const fields = splitFields.parse(form.fields);

    const parts = fields.split_mode === 'time'
      ? await media.splitByTime(upload.data, { format: upload.format, intervalSeconds: fields.interval_duration })
      : await media.splitBySegments(upload.data, {
        format: upload.format,
        segments: z.array(segmentSchema).parse(parseSegments(fields.segments)),
        invalidSegments: fields.invalid_segments,
      });

    const archive = await zipEntries(parts.map(part => ({
      name: `${part.name}.${part.format}`,
      data: part.data,
    })));

    request.log.info({ segments: parts.length }, 'Split complete');
    return sendAttachment(reply, {
      data: archive,
      filename: 'split_audio_segments.zip',
      mimeType: 'application/zip',
    });
  });

  fastify.post('/adjust-volume', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'));
    const fields = volumeFields.parse(form.fields);

    const adjustment = fields.adjustment_mode === 'percentage'
      ? { mode: 'percentage' as const, value: fields.volume_percentage }
      : fields.adjustment_mode === 'decibels'
        ? { mode: 'decibels' as const, value: fields.decibel_change }
        : { mode: 'normalize' as const, value: fields.normalize_target };

    const result = await media.adjustVolume(upload.data, { format: upload.format, adjustment });
    return sendAttachment(reply, { ...result, filename: `${upload.stem}_volume_adjusted.${result.format}` });
  });

  fastify.post('/change-speed', async (request, reply) => {
    const form = await readMultipart(request);
    const upload = accept(fastify, form.file('file'));
    const fields = speedFields.parse(form.fields);

    const result = await media.changeSpeed(upload.data, {
      format: upload.format,
      speed: fields.speed,
      preservePitch: fields.preserve_pitch,
    });
    return sendAttachment(reply, {
      ...result,
      filename: `${upload.stem}_speed_${speedSuffix(fields.speed)}.${result.format}`,
    });
  });
};
