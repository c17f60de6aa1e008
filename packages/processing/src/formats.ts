/**
 * Audio Format Presets
 * 
 * Per-token container, encoder and MIME settings. Tables are frozen;
 * tokens without an entry use the mp3 preset.
 */

import {
  DEFAULT_AUDIO_FORMAT,
  isAudioFormat,
  type AudioFormat,
  type CompressionLevel,
} from '@mediakit/core';

export interface AudioFormatPreset {
  /** Token written to the output (may differ from the input token) */
  format: AudioFormat;
  /** ffmpeg muxer name passed to -f */
  container: string;
  /** Encoder arguments for a re-encode into this format */
  codecArgs: readonly string[];
  mimeType: string;
  /** MP4-family containers need fragmenting to be written to a pipe */
  fragmented: boolean;
}

export const FRAGMENTED_MOVFLAGS = 'frag_keyframe+empty_moov';

function preset(
  format: AudioFormat,
  container: string,
  codecArgs: readonly string[],
  mimeType: string
): Readonly<AudioFormatPreset> {
  return Object.freeze({
    format,
    container,
    codecArgs: Object.freeze([...codecArgs]),
    mimeType,
    fragmented: container === 'mp4',
  });
}

export const AUDIO_PRESETS: Readonly<Record<AudioFormat, Readonly<AudioFormatPreset>>> = Object.freeze({
  mp3: preset('mp3', 'mp3', ['-codec:a', 'libmp3lame', '-q:a', '0'], 'audio/mpeg'),
  wav: preset('wav', 'wav', ['-codec:a', 'pcm_s16le'], 'audio/wav'),
  flac: preset('flac', 'flac', ['-codec:a', 'flac', '-compression_level', '5'], 'audio/flac'),
  aac: preset('aac', 'adts', ['-codec:a', 'aac', '-b:a', '256k'], 'audio/aac'),
  ogg: preset('ogg', 'ogg', ['-codec:a', 'libvorbis', '-q:a', '8'], 'audio/ogg'),
  m4a: preset('m4a', 'mp4', ['-codec:a', 'aac', '-b:a', '256k'], 'audio/mp4'),
});

/**
 * Preset for a token, falling back to the default format
 */
export function audioPreset(format: string): Readonly<AudioFormatPreset> {
  const token = format.toLowerCase();
  return AUDIO_PRESETS[isAudioFormat(token) ? token : DEFAULT_AUDIO_FORMAT];
}

// ============================================
// Compression
// ============================================

export const COMPRESSION_BITRATES_KBPS: Readonly<Record<CompressionLevel, number>> = Object.freeze({
  low: 320,
  medium: 192,
  high: 128,
});

/** libvorbis -q:a for each target bitrate */
const VORBIS_QUALITY: Readonly<Record<number, number>> = Object.freeze({
  320: 8,
  192: 6,
  128: 4,
});

const DEFAULT_VORBIS_QUALITY = 6;

export interface CompressionEncoding {
  /** Format of the compressed output; lossless inputs become mp3 */
  format: AudioFormat;
  codecArgs: string[];
}

/**
 * Encoder choice for compressing a source format to a target bitrate
 */
export function compressionEncoding(sourceFormat: string, targetKbps: number): CompressionEncoding {
  const bitrate = `${targetKbps}k`;

  switch (sourceFormat.toLowerCase()) {
    case 'aac':
      return { format: 'aac', codecArgs: ['-codec:a', 'aac', '-b:a', bitrate] };
    case 'm4a':
      return { format: 'm4a', codecArgs: ['-codec:a', 'aac', '-b:a', bitrate] };
    case 'ogg':
      return {
        format: 'ogg',
        codecArgs: ['-codec:a', 'libvorbis', '-q:a', String(VORBIS_QUALITY[targetKbps] ?? DEFAULT_VORBIS_QUALITY)],
      };
    default:
      // mp3, the lossless formats and anything unknown
      return { format: 'mp3', codecArgs: ['-codec:a', 'libmp3lame', '-b:a', bitrate] };
  }
}
