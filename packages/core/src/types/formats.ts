/**
 * Format Tokens
 *
 * Lowercase identifiers for the container/codec families the engine
 * accepts as input and produces as output.
 */

export const AUDIO_FORMATS = ['mp3', 'wav', 'flac', 'aac', 'ogg', 'm4a'] as const;
export const VIDEO_FORMATS = ['mp4', 'avi', 'mkv', 'mov', 'webm'] as const;

export type AudioFormat = typeof AUDIO_FORMATS[number];
export type VideoFormat = typeof VIDEO_FORMATS[number];
export type MediaKind = 'audio' | 'video';

/** Output settings for tokens without their own table entry */
export const DEFAULT_AUDIO_FORMAT: AudioFormat = 'mp3';

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some(format => format === value);
}

export function isVideoFormat(value: string): value is VideoFormat {
  return VIDEO_FORMATS.some(format => format === value);
}

export const COMPRESSION_LEVELS = ['low', 'medium', 'high'] as const;
export type CompressionLevel = typeof COMPRESSION_LEVELS[number];
