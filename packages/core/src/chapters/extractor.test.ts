import { describe, it, expect } from 'vitest';
import { extractChapters, extractLine, dedupeChapters } from './extractor.js';
import { chapterIdentity } from './identity.js';
import type { ChapterList } from '../types/chapter.js';

function plain(chapters: ChapterList): Array<[number, string]> {
  return chapters.map((marker) => [marker.timecode.toSeconds(), marker.title]);
}

describe('extractChapters', () => {
  it('parses the common leading-timecode convention', () => {
    const chapters = extractChapters('00:00 Intro\n05:30 Chapter Two\n1:10:00 Finale\n');
    expect(plain(chapters)).toEqual([
      [0, 'Intro'],
      [330, 'Chapter Two'],
      [4200, 'Finale'],
    ]);
  });

  it('recovers looser conventions through the fallback pass', () => {
    const chapters = extractChapters('Intro - 0:12\n[1:45] Second part\n');
    expect(plain(chapters)).toEqual([
      [12, 'Intro'],
      [105, 'Second part'],
    ]);
  });

  it('handles CRLF line endings and surrounding prose', () => {
    const description = [
      'Thanks for watching! Chapters below.',
      '',
      '0:00 Welcome',
      '2:15 Setup',
      'Follow me for more',
    ].join('\r\n');
    expect(plain(extractChapters(description))).toEqual([
      [0, 'Welcome'],
      [135, 'Setup'],
    ]);
  });

  it('does not rescan a line the strict pass accepted', () => {
    expect(plain(extractChapters('0:00 Intro 5:00 Outro'))).toEqual([[0, 'Intro 5:00 Outro']]);
  });

  it('lets the fallback pass handle a line the strict pass rejected', () => {
    expect(plain(extractChapters('0:00 https://example.com 1:00 Real title'))).toEqual([
      [60, 'Real title'],
    ]);
  });

  it('yields nothing for lines with link or numeric titles', () => {
    expect(extractChapters('5:00 12345')).toEqual([]);
    expect(extractChapters('https://example.com 9:00')).toEqual([]);
    expect(extractChapters('Sponsor segment 4:20 - ')).toEqual([]);
  });

  it('returns an empty list for absent or chapterless descriptions', () => {
    expect(extractChapters(undefined)).toEqual([]);
    expect(extractChapters(null)).toEqual([]);
    expect(extractChapters('')).toEqual([]);
    expect(extractChapters('Just a video about cats.\nNo chapters here.')).toEqual([]);
  });

  it('sorts by time', () => {
    const chapters = extractChapters('3:00 Third\n0:00 First\n1:30 Second');
    expect(plain(chapters)).toEqual([
      [0, 'First'],
      [90, 'Second'],
      [180, 'Third'],
    ]);
  });

  it('deduplicates on time plus the first three words, keeping the first', () => {
    const description = [
      '0:00 Intro part one',
      '00:00 intro PART one extended',
      '0:00 Something else',
      '0:30 Intro part one',
    ].join('\n');
    expect(plain(extractChapters(description))).toEqual([
      [0, 'Intro part one'],
      [0, 'Something else'],
      [30, 'Intro part one'],
    ]);
  });

  it('caps the number of chapters after sorting', () => {
    const chapters = extractChapters('9:00 Late\n0:00 Early\n4:00 Middle', { maxChapters: 2 });
    expect(plain(chapters)).toEqual([
      [0, 'Early'],
      [240, 'Middle'],
    ]);
  });

  it('only considers the first maxLines lines', () => {
    const chapters = extractChapters('0:00 One\n1:00 Two\n2:00 Three', { maxLines: 2 });
    expect(plain(chapters)).toEqual([
      [0, 'One'],
      [60, 'Two'],
    ]);
  });

  it('ignores descriptions over the length limit', () => {
    const description = '0:00 Intro\n' + 'x'.repeat(100);
    expect(extractChapters(description, { maxDescriptionLength: 50 })).toEqual([]);
    expect(extractChapters(description, { maxDescriptionLength: 500 })).toHaveLength(1);
  });

  it('is idempotent', () => {
    const description = 'Intro - 0:12\n00:00 Start\n[1:45] Second part\n0:00 start again';
    expect(plain(extractChapters(description))).toEqual(plain(extractChapters(description)));
  });

  it('always returns sorted, unique chapters', () => {
    const description = [
      '10:00 Ten',
      'Recap 2:00 Two',
      '[0:30] Half',
      '10:00 ten',
      'Outro - 12:00',
      '0:30 Half',
    ].join('\n');
    const chapters = extractChapters(description);
    const seconds = chapters.map((marker) => marker.timecode.toSeconds());
    expect(seconds).toEqual([...seconds].sort((a, b) => a - b));
    const identities = chapters.map(chapterIdentity);
    expect(new Set(identities).size).toBe(identities.length);
  });
});

describe('extractLine', () => {
  it('skips lines shorter than four characters', () => {
    expect(extractLine('1:0')).toEqual([]);
    expect(extractLine('   ')).toEqual([]);
  });
});

describe('dedupeChapters', () => {
  it('keeps order of first occurrences', () => {
    const markers = [...extractLine('0:00 Hello World Again'), ...extractLine('0:00 hello WORLD again and more')];
    expect(dedupeChapters(markers)).toHaveLength(1);
  });
});
