/**
 * Operation Requests
 *
 * One variant per operation kind. Every request is checked here before any
 * subprocess is started.
 */

import { z } from 'zod';
import { ValidationError, type ValidationCode } from '../errors/index.js';
import { AUDIO_FORMATS, COMPRESSION_LEVELS } from './formats.js';

// Source formats are free-form: unknown tokens use the default output settings
const formatToken = z.string().trim().min(1).transform(value => value.toLowerCase());
const audioFormat = z.enum(AUDIO_FORMATS);
const seconds = z.number().finite();

export const segmentSchema = z.object({
  start: seconds,
  end: seconds,
  name: z.string().min(1).optional(),
});

export type SegmentSpec = z.infer<typeof segmentSchema>;

export const volumeAdjustmentSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('percentage'), value: z.number().min(0).max(500) }),
  z.object({ mode: z.literal('decibels'), value: z.number().min(-30).max(30) }),
  z.object({ mode: z.literal('normalize'), value: z.number().min(-20).max(0) }),
]);

export type VolumeAdjustment = z.infer<typeof volumeAdjustmentSchema>;

export const operationSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('convert'),
    targetFormat: audioFormat,
    preserveMetadata: z.boolean().default(true),
  }),
  z.object({
    kind: z.literal('trim'),
    format: formatToken,
    start: seconds.min(0),
    end: seconds.min(0),
  }),
  z.object({
    kind: z.literal('merge'),
    inputCount: z.number().int().min(2),
    outputFormat: audioFormat,
  }),
  z.object({
    kind: z.literal('compress'),
    format: formatToken,
    level: z.enum(COMPRESSION_LEVELS),
  }),
  z.object({
    kind: z.literal('extract'),
    outputFormat: audioFormat,
  }),
  z.object({
    kind: z.literal('splitByTime'),
    format: formatToken,
    intervalSeconds: seconds.positive(),
  }),
  z.object({
    kind: z.literal('splitBySegments'),
    format: formatToken,
    segments: z.array(segmentSchema).min(1),
    invalidSegments: z.enum(['skip', 'reject']).default('skip'),
  }),
  z.object({
    kind: z.literal('volume'),
    format: formatToken,
    adjustment: volumeAdjustmentSchema,
  }),
  z.object({
    kind: z.literal('speed'),
    format: formatToken,
    speed: z.number().min(0.25).max(4),
    preservePitch: z.boolean().default(true),
  }),
]).superRefine((op, ctx) => {
  if (op.kind === 'trim' && op.end <= op.start) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['end'],
      message: 'end must be greater than start',
    });
  }
});

export type OperationSpec = z.infer<typeof operationSchema>;
export type OperationKind = OperationSpec['kind'];
export type OperationOf<K extends OperationKind> = Extract<OperationSpec, { kind: K }>;

const FIELD_CODES: Readonly<Record<string, ValidationCode>> = {
  targetFormat: 'UNSUPPORTED_FORMAT',
  outputFormat: 'UNSUPPORTED_FORMAT',
  format: 'UNSUPPORTED_FORMAT',
  start: 'INVALID_TIME_RANGE',
  end: 'INVALID_TIME_RANGE',
  segments: 'INVALID_TIME_RANGE',
  intervalSeconds: 'INVALID_TIME_RANGE',
  level: 'INVALID_COMPRESSION_LEVEL',
  inputCount: 'INVALID_FILE_COUNT',
};

/**
 * Parse an operation request, throwing ValidationError on the first issue
 */
export function validateOperation<K extends OperationKind>(
  kind: K,
  input: Readonly<Record<string, unknown>>
): OperationOf<K> {
  const result = operationSchema.safeParse({ ...input, kind });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.map(String).join('.') || kind;
    const root = String(issue?.path[0] ?? '');
    throw new ValidationError(field, issue?.message ?? 'invalid value', FIELD_CODES[root] ?? 'VALIDATION_ERROR');
  }

  const op = result.data;
  if (!isKind(op, kind)) {
    throw new ValidationError('kind', `expected ${kind}, got ${op.kind}`);
  }
  return op;
}

function isKind<K extends OperationKind>(op: OperationSpec, kind: K): op is OperationOf<K> {
  return op.kind === kind;
}
