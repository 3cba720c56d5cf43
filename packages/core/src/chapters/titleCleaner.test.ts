import { describe, it, expect } from 'vitest';
import { cleanTitle } from './titleCleaner.js';

describe('cleanTitle', () => {
  it('strips leading separators', () => {
    expect(cleanTitle('- Intro')).toBe('Intro');
    expect(cleanTitle('— Intro')).toBe('Intro');
    expect(cleanTitle(': Intro')).toBe('Intro');
    expect(cleanTitle('] Intro')).toBe('Intro');
    expect(cleanTitle('• Intro')).toBe('Intro');
  });

  it('strips trailing separators', () => {
    expect(cleanTitle('Intro,')).toBe('Intro');
    expect(cleanTitle('(Intro)')).toBe('Intro');
    expect(cleanTitle('Intro ]  ')).toBe('Intro');
  });

  it('keeps trailing punctuation that is not a separator', () => {
    expect(cleanTitle('Why? -')).toBe('Why? -');
    expect(cleanTitle('The End.')).toBe('The End.');
  });

  it('rejects titles that are too short', () => {
    expect(cleanTitle('')).toBeNull();
    expect(cleanTitle('A')).toBeNull();
    expect(cleanTitle('- A')).toBeNull();
    expect(cleanTitle(' -- ')).toBeNull();
  });

  it('rejects links', () => {
    expect(cleanTitle('https://example.com/page')).toBeNull();
    expect(cleanTitle('- http://example.com')).toBeNull();
  });

  it('rejects purely numeric titles', () => {
    expect(cleanTitle('12345')).toBeNull();
    expect(cleanTitle('(2024)')).toBeNull();
  });

  it('accepts titles that merely contain digits or mention http', () => {
    expect(cleanTitle('Top 10')).toBe('Top 10');
    expect(cleanTitle('httpd configuration')).toBe('httpd configuration');
  });
});
