/**
 * Upload Validation
 *
 * Checks a client upload against its declared extension before any tool
 * sees it, and parses the form values the routes accept.
 */

import {
  AUDIO_FORMATS,
  FileTooLargeError,
  isAudioFormat,
  isVideoFormat,
  ValidationError,
  VIDEO_FORMATS,
  type AudioFormat,
  type MediaKind,
  type VideoFormat,
} from '@mediakit/core';
import { createLogger, getBasename, getExtension, sanitizeFilename } from '@mediakit/utils';
import { matchesSignature } from './signatures.js';

const logger = createLogger({ component: 'upload-validation' });

export const DEFAULT_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

export interface UploadCandidate {
  /** Name as sent by the client */
  filename: string;
  data: Buffer;
  kind: MediaKind;
  maxBytes?: number;
  /** Form field reported in errors */
  field?: string;
}

export interface ValidatedUpload {
  format: AudioFormat | VideoFormat;
  /** Sanitised client filename */
  filename: string;
  /** Sanitised filename without its extension */
  stem: string;
  data: Buffer;
}

export function validateUpload(candidate: UploadCandidate): ValidatedUpload {
  const { data, kind } = candidate;
  const field = candidate.field ?? 'file';
  const maxBytes = candidate.maxBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  const filename = sanitizeFilename(candidate.filename);
  const extension = getExtension(filename);

  const format = kind === 'audio'
    ? (isAudioFormat(extension) ? extension : undefined)
    : (isVideoFormat(extension) ? extension : undefined);

  if (!format) {
    const supported = kind === 'audio' ? AUDIO_FORMATS : VIDEO_FORMATS;
    throw new ValidationError(
      field,
      `unsupported ${kind} format: ${extension || 'none'}. Supported formats: ${supported.join(', ')}`,
      'UNSUPPORTED_FORMAT'
    );
  }

  if (data.length > maxBytes) {
    throw new FileTooLargeError(data.length, maxBytes);
  }

  if (data.length === 0) {
    throw new ValidationError(field, 'file is empty', 'CORRUPTED_FILE');
  }

  if (!matchesSignature(data, format, kind)) {
    logger.warn({ filename, format, head: data.subarray(0, 16).toString('hex') }, 'Signature mismatch');
    throw new ValidationError(field, `file does not match declared format: ${format}`, 'CORRUPTED_FILE');
  }

  logger.debug({ filename, format, bytes: data.length }, 'Upload validated');
  return { format, filename, stem: getBasename(filename) || 'file', data };
}

const MINUTES_SECONDS = /^(\d+):(\d{2})$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Seconds from "90", "90.5" or "1:30"
 */
export function parseTimestamp(value: string, field: string = 'time'): number {
  const text = value.trim();

  if (DECIMAL.test(text)) {
    return Number(text);
  }

  const match = MINUTES_SECONDS.exec(text);
  if (match) {
    return Number(match[1]) * 60 + Number(match[2]);
  }

  throw new ValidationError(
    field,
    `invalid timestamp format: ${value}. Use seconds (e.g. '90') or MM:SS (e.g. '1:30')`,
    'INVALID_TIME_RANGE'
  );
}

export function validateFileCount(count: number, min: number = 2, max: number = 10): void {
  if (count < min) {
    throw new ValidationError('files', `at least ${min} files required for merging`, 'INVALID_FILE_COUNT');
  }
  if (count > max) {
    throw new ValidationError('files', `maximum ${max} files allowed for merging`, 'INVALID_FILE_COUNT');
  }
}
