/**
 * Path Utilities
 */

import { extname } from 'node:path';

const MAX_FILENAME_LENGTH = 100;

/**
 * Turn a chapter or video title into a safe file name stem.
 * 
 * Keeps parentheses (they often carry artist / part info) but drops
 * anything a filesystem or shell would choke on.
 */
export function sanitizeFilename(title: string): string {
  const cleaned = title
    .substring(0, MAX_FILENAME_LENGTH)
    .replace(/https?:\/\/\S+/g, '')
    // Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Control characters
    .replace(/[\x00-\x1f\x7f]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/["'`,]/g, '')
    .replace(/[{}[\];]/g, '_');

  return cleaned.length > 0 ? cleaned : 'untitled';
}

/**
 * File name for the n-th extracted chapter (1-based), e.g. `03_Finale.mp4`
 */
export function chapterFilename(position: number, title: string, extension = 'mp4'): string {
  return `${String(position).padStart(2, '0')}_${sanitizeFilename(title)}.${extension}`;
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}
