/**
 * @chaptercut/acquisition
 * 
 * Video metadata and media download via yt-dlp.
 */

export {
  YtDlpClient,
  classifyMetadataFailure,
  DEFAULT_FORMAT,
  type YtDlpConfig,
  type VideoInfo,
} from './ytdlp.js';

export {
  parseVideoReference,
  detectVideoId,
  isSupportedReference,
  type VideoReference,
} from './links.js';

export { parseDownloadProgress, parseSize } from './downloadProgress.js';
