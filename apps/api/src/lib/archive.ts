/**
 * ZIP Archive Builder
 */

import { extname } from 'node:path';
import archiver from 'archiver';
import { sanitizeFilename } from '@mediakit/utils';

export interface ArchiveEntry {
  name: string;
  data: Buffer;
}

/**
 * Flat, unique entry names: directory parts and unsafe characters are
 * stripped, repeats get `_2`, `_3`, ... before the extension.
 */
export function entryNames(names: readonly string[]): string[] {
  const used = new Set<string>();
  return names.map((raw) => {
    const name = sanitizeFilename(raw);
    const extension = extname(name);
    const stem = name.slice(0, name.length - extension.length);

    let candidate = name;
    for (let n = 2; used.has(candidate); n++) {
      candidate = `${stem}_${n}${extension}`;
    }
    used.add(candidate);
    return candidate;
  });
}

/**
 * Build a deflated ZIP in memory
 */
export function zipEntries(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const archive = archiver('zip', { zlib: { level: 6 } });
    const chunks: Buffer[] = [];

    archive.on('data', (chunk: Buffer) => chunks.push(chunk));
    archive.on('end', () => resolve(Buffer.concat(chunks)));
    archive.on('error', reject);
    archive.on('warning', reject);

    const names = entryNames(entries.map(entry => entry.name));
    entries.forEach((entry, index) => {
      archive.append(entry.data, { name: names[index] ?? `entry_${index + 1}` });
    });

    archive.finalize().catch(reject);
  });
}
