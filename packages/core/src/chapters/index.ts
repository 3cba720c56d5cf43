export {
  extractChapters,
  extractLine,
  dedupeChapters,
  LINE_PASSES,
  type LinePass,
  type ExtractOptions,
} from './extractor.js';
export { matchStrict } from './strictPass.js';
export { scanFallback } from './fallbackPass.js';
export { cleanTitle } from './titleCleaner.js';
export { chapterIdentity } from './identity.js';
