import { describe, it, expect } from 'vitest';
import { looksLikeMp3, matchesSignature } from '../signatures.js';

describe('looksLikeMp3', () => {
  it('accepts a leading ID3 tag', () => {
    expect(looksLikeMp3(Buffer.from('ID3\x04\x00'))).toBe(true);
  });

  it('accepts a frame sync after padding', () => {
    expect(looksLikeMp3(Buffer.from([0, 0, 0, 0xff, 0xe3, 0x18]))).toBe(true);
  });

  it('ignores a sync beyond the first 512 bytes', () => {
    const data = Buffer.concat([Buffer.alloc(600), Buffer.from([0xff, 0xfb])]);
    expect(looksLikeMp3(data)).toBe(false);
  });

  it('rejects text', () => {
    expect(looksLikeMp3(Buffer.from('hello world'))).toBe(false);
  });
});

describe('matchesSignature', () => {
  it('finds the signature anywhere in the window', () => {
    const m4a = Buffer.concat([Buffer.from([0, 0, 0, 0x18]), Buffer.from('ftypM4A ')]);
    expect(matchesSignature(m4a, 'm4a', 'audio')).toBe(true);
  });

  it('recognises ADTS and Ogg headers', () => {
    expect(matchesSignature(Buffer.from([0xff, 0xf1, 0x50, 0x80]), 'aac', 'audio')).toBe(true);
    expect(matchesSignature(Buffer.from('OggS\x00\x02'), 'ogg', 'audio')).toBe(true);
  });

  it('shares the EBML header between mkv and webm', () => {
    const ebml = Buffer.from([0x1a, 0x45, 0xdf, 0xa3, 0x9f]);
    expect(matchesSignature(ebml, 'mkv', 'video')).toBe(true);
    expect(matchesSignature(ebml, 'webm', 'video')).toBe(true);
    expect(matchesSignature(ebml, 'mp4', 'video')).toBe(false);
  });

  it('rejects formats without a table entry', () => {
    expect(matchesSignature(Buffer.from('RIFF'), 'toString', 'audio')).toBe(false);
    expect(matchesSignature(Buffer.from('RIFF'), 'wav', 'video')).toBe(false);
  });
});
