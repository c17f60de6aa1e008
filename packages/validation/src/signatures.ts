/**
 * Container Signatures
 *
 * Magic bytes searched for in the head of an upload. A file matches its
 * declared format when any of the format's signatures occurs within the
 * first SIGNATURE_WINDOW bytes.
 */

import type { AudioFormat, MediaKind, VideoFormat } from '@mediakit/core';

export const SIGNATURE_WINDOW = 512;

const bytes = (...values: number[]): Buffer => Buffer.from(values);
const ascii = (text: string): Buffer => Buffer.from(text, 'latin1');

const EBML = bytes(0x1a, 0x45, 0xdf, 0xa3);

export const AUDIO_SIGNATURES: Readonly<Record<AudioFormat, readonly Buffer[]>> = {
  mp3: [bytes(0xff, 0xfb), bytes(0xff, 0xf3), bytes(0xff, 0xf2), bytes(0xff, 0xfa), ascii('ID3')],
  wav: [ascii('RIFF')],
  flac: [ascii('fLaC')],
  aac: [bytes(0xff, 0xf1), bytes(0xff, 0xf9)],
  ogg: [ascii('OggS')],
  m4a: [ascii('ftyp')],
};

export const VIDEO_SIGNATURES: Readonly<Record<VideoFormat, readonly Buffer[]>> = {
  mp4: [ascii('ftyp'), ascii('moov')],
  avi: [ascii('RIFF')],
  mkv: [EBML],
  mov: [ascii('ftyp'), ascii('moov')],
  webm: [EBML],
};

/**
 * MP3 has no fixed header: an ID3 tag at offset 0, or any MPEG frame sync
 * (eleven set bits) inside the window
 */
export function looksLikeMp3(head: Buffer): boolean {
  if (head.subarray(0, 3).equals(ascii('ID3'))) {
    return true;
  }

  const end = Math.min(SIGNATURE_WINDOW, head.length - 1);
  for (let i = 0; i < end; i++) {
    const next = head[i + 1] ?? 0;
    if (head[i] === 0xff && (next & 0xe0) === 0xe0) {
      return true;
    }
  }
  return false;
}

function signaturesFor(format: string, kind: MediaKind): readonly Buffer[] | undefined {
  const table: Readonly<Record<string, readonly Buffer[]>> = kind === 'audio' ? AUDIO_SIGNATURES : VIDEO_SIGNATURES;
  return Object.hasOwn(table, format) ? table[format] : undefined;
}

/**
 * Does the head of `data` carry a signature of `format`?
 */
export function matchesSignature(data: Buffer, format: string, kind: MediaKind): boolean {
  if (kind === 'audio' && format === 'mp3') {
    return looksLikeMp3(data);
  }

  const signatures = signaturesFor(format, kind);
  if (!signatures) return false;

  const head = data.subarray(0, SIGNATURE_WINDOW);
  return signatures.some(signature => head.includes(signature));
}
