import { describe, it, expect } from 'vitest';
import { sanitizeFilename, chapterFilename, getExtension } from './path.js';

describe('sanitizeFilename', () => {
  it('replaces reserved characters with underscores', () => {
    expect(sanitizeFilename('Q&A: what/why?')).toBe('Q&A_ what_why_');
  });

  it('removes links and collapses whitespace', () => {
    expect(sanitizeFilename('Intro   see https://example.com/x  now')).toBe('Intro see now');
  });

  it('drops quotes and commas but keeps parentheses', () => {
    expect(sanitizeFilename(`Artist, 'Song' (Live)`)).toBe('Artist Song (Live)');
  });

  it('turns double quotes into underscores like other reserved characters', () => {
    expect(sanitizeFilename('Say "hi"')).toBe('Say _hi_');
  });

  it('replaces braces, brackets and semicolons', () => {
    expect(sanitizeFilename('a{b}[c];d')).toBe('a_b__c__d');
  });

  it('limits the name to 100 characters', () => {
    expect(sanitizeFilename('x'.repeat(150))).toHaveLength(100);
  });

  it('falls back to untitled', () => {
    expect(sanitizeFilename('   ')).toBe('untitled');
    expect(sanitizeFilename("'`,")).toBe('untitled');
  });
});

describe('chapterFilename', () => {
  it('prefixes a zero-padded position', () => {
    expect(chapterFilename(3, 'Finale')).toBe('03_Finale.mp4');
    expect(chapterFilename(12, 'Part Two', 'mkv')).toBe('12_Part Two.mkv');
  });
});

describe('getExtension', () => {
  it('returns the lowercase extension without dot', () => {
    expect(getExtension('/tmp/video.MP4')).toBe('mp4');
    expect(getExtension('noext')).toBe('');
  });
});
