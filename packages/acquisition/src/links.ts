/**
 * Video Reference Detection
 * 
 * Recognises the YouTube URL shapes users paste and reduces them to a
 * canonical watch URL.
 */

import { MetadataError } from '@chaptercut/core';

export interface VideoReference {
  /** Canonical watch URL handed to yt-dlp */
  url: string;
  videoId: string;
}

const VIDEO_ID_PATTERNS = [
  /^(?:https?:\/\/)?(?:www\.|m\.|music\.)?youtube\.com\/watch\?(?:[^#]*&)?v=([a-zA-Z0-9_-]{6,})/,
  /^(?:https?:\/\/)?(?:www\.)?youtu\.be\/([a-zA-Z0-9_-]{6,})/,
  /^(?:https?:\/\/)?(?:www\.|m\.)?youtube\.com\/(?:shorts|live|embed)\/([a-zA-Z0-9_-]{6,})/,
];

/**
 * Video id of a supported URL, or null
 */
export function detectVideoId(input: string): string | null {
  const trimmed = input.trim();
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

export function isSupportedReference(input: string): boolean {
  return detectVideoId(input) !== null;
}

/**
 * Throws MetadataError('invalid-reference') for anything unrecognised
 */
export function parseVideoReference(input: string): VideoReference {
  const videoId = detectVideoId(input);
  if (!videoId) {
    throw new MetadataError(
      'invalid-reference',
      input,
      'Please provide a valid YouTube URL'
    );
  }
  return {
    url: `https://www.youtube.com/watch?v=${videoId}`,
    videoId,
  };
}
