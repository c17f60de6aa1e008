/**
 * Probe Output Parsers
 *
 * Pure helpers turning ffprobe/ffmpeg text output into numbers.
 */

import { parseTimecode } from '@mediakit/utils';

export function firstLine(text: string): string | undefined {
  return text.split(/\r?\n/).map(line => line.trim()).find(line => line.length > 0);
}

export function lastLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
  return lines[lines.length - 1];
}

/**
 * Finite number strictly greater than zero, or undefined ("N/A", "", "0", "nan")
 */
export function parsePositiveNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value.trim().replace(/,$/, ''));
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

const CLOCK_PATTERN = /time=\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/g;

/**
 * Last "time=HH:MM:SS.ss" progress stamp in ffmpeg's stderr, in seconds
 */
export function parseLastClockTime(stderr: string): number | undefined {
  let last: string | undefined;
  for (const match of stderr.matchAll(CLOCK_PATTERN)) {
    last = match[1];
  }
  return last === undefined ? undefined : parseTimecode(last) / 1000;
}
