/**
 * @mediakit/validation
 * 
 * Upload checks done before a request reaches the engine:
 * - Extension allow-list and magic-byte sniffing
 * - Size limit
 * - Timestamp and file-count parsing
 */

export {
  validateUpload,
  parseTimestamp,
  validateFileCount,
  DEFAULT_MAX_UPLOAD_BYTES,
  type UploadCandidate,
  type ValidatedUpload,
} from './upload.js';

export {
  matchesSignature,
  looksLikeMp3,
  AUDIO_SIGNATURES,
  VIDEO_SIGNATURES,
  SIGNATURE_WINDOW,
} from './signatures.js';

export { sanitizeFilename } from '@mediakit/utils';
