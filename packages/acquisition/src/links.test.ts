import { describe, it, expect } from 'vitest';
import { MetadataError } from '@chaptercut/core';
import { detectVideoId, isSupportedReference, parseVideoReference } from './links.js';

describe('detectVideoId', () => {
  it.each([
    ['https://www.youtube.com/watch?v=abc123XYZ_-', 'abc123XYZ_-'],
    ['youtube.com/watch?v=abc123XYZ_-', 'abc123XYZ_-'],
    ['https://m.youtube.com/watch?feature=share&v=abc123XYZ_-', 'abc123XYZ_-'],
    ['https://youtu.be/abc123XYZ_-?t=42', 'abc123XYZ_-'],
    ['https://www.youtube.com/shorts/abc123XYZ_-', 'abc123XYZ_-'],
    ['  https://www.youtube.com/watch?v=abc123XYZ_-&t=10s  ', 'abc123XYZ_-'],
  ])('finds the id in %s', (input, expected) => {
    expect(detectVideoId(input)).toBe(expected);
  });

  it.each([
    '',
    'not a url',
    'https://vimeo.com/123456',
    'https://www.youtube.com/channel/someone',
    'https://example.com/?next=https://youtu.be/abc123XYZ_-',
  ])('rejects %j', (input) => {
    expect(detectVideoId(input)).toBeNull();
    expect(isSupportedReference(input)).toBe(false);
  });
});

describe('parseVideoReference', () => {
  it('canonicalises short links', () => {
    expect(parseVideoReference('https://youtu.be/abc123XYZ_-')).toEqual({
      url: 'https://www.youtube.com/watch?v=abc123XYZ_-',
      videoId: 'abc123XYZ_-',
    });
  });

  it('throws an invalid-reference MetadataError', () => {
    try {
      parseVideoReference('https://example.com/video');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MetadataError);
      expect(error).toMatchObject({ kind: 'invalid-reference' });
    }
  });
});
