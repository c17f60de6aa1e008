/**
 * Time Utilities
 */

/**
 * Parse a timecode string (HH:MM:SS or HH:MM:SS.fff) to milliseconds
 */
export function parseTimecode(timecode: string): number {
  const parts = timecode.split(':');
  if (parts.length !== 3) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }
  
  const hours = parseInt(parts[0] ?? '0', 10);
  const minutes = parseInt(parts[1] ?? '0', 10);
  const secondsParts = (parts[2] ?? '0').split('.');
  const seconds = parseInt(secondsParts[0] ?? '0', 10);
  const milliseconds = parseInt((secondsParts[1] ?? '0').padEnd(3, '0').substring(0, 3), 10);
  
  return (hours * 3600 + minutes * 60 + seconds) * 1000 + milliseconds;
}

/**
 * Render seconds for a command line: at most millisecond precision, no
 * trailing zeros ("7", "12.5", "0.333")
 */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}
