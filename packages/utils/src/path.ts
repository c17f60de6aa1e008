/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Sanitize a client-supplied filename.
 *
 * Any directory part is dropped, characters outside word/space/dash/dot
 * become "_", runs of dots collapse, and an empty result becomes "file".
 */
export function sanitizeFilename(filename: string): string {
  const name = basename(filename.replace(/\\/g, '/'));
  const cleaned = name
    .replace(/[^\w\s\-.]/g, '_')
    .replace(/\s+/g, ' ')
    .replace(/\.{2,}/g, '.')
    .replace(/^[\s.]+|[\s.]+$/g, '')
    .substring(0, 200);

  return cleaned.length > 0 ? cleaned : 'file';
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}
