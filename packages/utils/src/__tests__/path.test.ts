import { describe, it, expect } from 'vitest';
import { sanitizeFilename, getExtension, getBasename } from '../path.js';

describe('sanitizeFilename', () => {
  it('drops directory components', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFilename('C:\\Users\\me\\song.mp3')).toBe('song.mp3');
  });

  it('replaces unsafe characters with underscores', () => {
    expect(sanitizeFilename('my song!.mp3')).toBe('my song_.mp3');
  });

  it('collapses repeated dots and whitespace', () => {
    expect(sanitizeFilename('a..b   c.wav')).toBe('a.b c.wav');
  });

  it('strips leading and trailing dots and spaces', () => {
    expect(sanitizeFilename('  ..hidden.flac. ')).toBe('hidden.flac');
  });

  it('falls back to "file" when nothing is left', () => {
    expect(sanitizeFilename('...')).toBe('file');
    expect(sanitizeFilename('')).toBe('file');
  });
});

describe('getExtension / getBasename', () => {
  it('lowercases the extension without its dot', () => {
    expect(getExtension('Track.MP3')).toBe('mp3');
    expect(getExtension('noext')).toBe('');
  });

  it('returns the stem', () => {
    expect(getBasename('podcast.episode.m4a')).toBe('podcast.episode');
  });
});
