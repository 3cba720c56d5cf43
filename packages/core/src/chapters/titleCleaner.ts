/**
 * Title Cleaning
 * 
 * Shared by both line passes: a candidate title is only a chapter title
 * once it survives these rules.
 */

const LEADING_SEPARATORS = /^[-–—:\s[\]()•]+/;
const TRAILING_SEPARATORS = /[,\s[\]()]+$/;
const URL_SCHEME = /^https?:\/\//i;
const ONLY_DIGITS = /^\d+$/;

/**
 * Strip separator glyphs from both ends of a candidate title.
 * Returns null when what remains is not usable as a title.
 */
export function cleanTitle(candidate: string): string | null {
  const title = candidate
    .trim()
    .replace(LEADING_SEPARATORS, '')
    .replace(TRAILING_SEPARATORS, '');

  if (title.length <= 1) return null;
  if (URL_SCHEME.test(title)) return null;
  if (ONLY_DIGITS.test(title)) return null;

  return title;
}
