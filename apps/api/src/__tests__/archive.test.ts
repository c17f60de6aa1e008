import { describe, it, expect } from 'vitest';
import { entryNames, zipEntries } from '../lib/archive.js';
import { zipEntryNames } from './helpers.js';

describe('entryNames', () => {
  it('drops directory parts from names', () => {
    expect(entryNames(['a/../../evil.mp3', '..\\up.wav'])).toEqual(['evil.mp3', 'up.wav']);
  });

  it('suffixes repeated names before the extension', () => {
    expect(entryNames(['intro.mp3', 'intro.mp3', 'intro.mp3', 'outro'])).toEqual([
      'intro.mp3',
      'intro_2.mp3',
      'intro_3.mp3',
      'outro',
    ]);
  });
});

describe('zipEntries', () => {
  it('writes flat unique names to the central directory', async () => {
    const zip = await zipEntries([
      { name: 'a/../../evil.mp3', data: Buffer.from('one') },
      { name: 'intro.mp3', data: Buffer.from('two') },
      { name: 'intro.mp3', data: Buffer.from('three') },
    ]);

    expect(zipEntryNames(zip)).toEqual(['evil.mp3', 'intro.mp3', 'intro_2.mp3']);
  });
});
