/**
 * Error Codes
 * 
 * Short title and a suggestion for the user, per error code.
 */

export interface ErrorDescription {
  title: string;
  suggestion: string;
}

const ERROR_DESCRIPTIONS: Readonly<Record<string, ErrorDescription>> = {
  FILE_TOO_LARGE: {
    title: 'File too large',
    suggestion: 'File exceeds the upload limit. Please use a smaller file or compress it first.',
  },
  UNSUPPORTED_FORMAT: {
    title: 'Unsupported format',
    suggestion: 'Please use MP3, WAV, FLAC, AAC, OGG, or M4A for audio, or MP4, AVI, MKV, MOV, WEBM for video.',
  },
  INVALID_TIME_RANGE: {
    title: 'Invalid time range',
    suggestion: 'End time must be greater than start time. Please check your timestamps.',
  },
  INVALID_COMPRESSION_LEVEL: {
    title: 'Invalid compression level',
    suggestion: 'Please select a valid compression level: low (320kbps), medium (192kbps), or high (128kbps).',
  },
  CORRUPTED_FILE: {
    title: 'File appears to be corrupted',
    suggestion: 'File appears to be corrupted or incomplete. Please try a different file.',
  },
  NO_AUDIO_TRACK: {
    title: 'No audio track found',
    suggestion: 'The file contains no audio track to extract. Please use a video with audio.',
  },
  INVALID_FILE_COUNT: {
    title: 'Invalid number of files',
    suggestion: 'Please provide between 2 and 10 files for merging.',
  },
  VALIDATION_ERROR: {
    title: 'Malformed request',
    suggestion: 'Request parameters are invalid. Please check your input and try again.',
  },
  DURATION_UNKNOWN: {
    title: 'Duration unknown',
    suggestion: 'The length of the file could not be determined. Please try a different file.',
  },
  PROCESSING_FAILED: {
    title: 'Processing failed',
    suggestion: 'Processing failed. Please try again or use a different file.',
  },
  EXTERNAL_TOOL_ERROR: {
    title: 'Audio processing error',
    suggestion: 'An error occurred during audio processing. Please try again with a different file.',
  },
  EXECUTION_ERROR: {
    title: 'Processing unavailable',
    suggestion: 'The media tools could not be started. Please try again later.',
  },
  TIMEOUT: {
    title: 'Processing timeout',
    suggestion: 'Processing took too long. Please try a smaller file or simpler operation.',
  },
  RATE_LIMIT: {
    title: 'Too many requests',
    suggestion: 'Too many requests. Please wait a moment and try again.',
  },
  NOT_FOUND: {
    title: 'Not found',
    suggestion: 'The requested resource was not found.',
  },
};

const FALLBACK: ErrorDescription = {
  title: 'Processing failed',
  suggestion: 'Please try again.',
};

export function describeError(code: string): ErrorDescription {
  return ERROR_DESCRIPTIONS[code] ?? FALLBACK;
}
