/**
 * Line Signals
 * 
 * Classifies one free-text encoder log line. Stage markers drive the
 * coarse transitions; progress signals drive updates inside a stage.
 */

export type StageSignal = 'building' | 'writing-audio' | 'writing-video' | 'done';

export type ProgressSignal =
  | { kind: 'chunk'; current: number; total: number }
  | { kind: 'frame'; current: number; total: number }
  | { kind: 'percent'; value: number }
  | { kind: 'activity' }
  | { kind: 'idle' };

const STAGE_MARKERS: ReadonlyArray<[StageSignal, string]> = [
  ['writing-audio', 'writing audio'],
  ['writing-video', 'writing video'],
  ['building', 'building'],
  ['done', 'done'],
];

const CHUNK_PATTERNS = [
  /chunk[:\s]*(\d+)\s*\/\s*(\d+)/i,
  /(\d+)\s*\/\s*(\d+)\s*chunk/i,
];

const FRAME_PATTERNS = [
  /frame[:\s]*(\d+)\s*\/\s*(\d+)/i,
  /(\d+)\s*\/\s*(\d+)\s*frame/i,
];

const PERCENT_PATTERN = /(\d+(?:\.\d+)?)%/;

// Numbers that show the encoder is alive without saying how far along it is
const ACTIVITY_PATTERNS = [
  /\d+\s*\/\s*\d+/,
  /t:\s*\d+(?:\.\d+)?s/i,
  /\d+(?:\.\d+)?\s*fps/i,
];

export function detectStageSignal(line: string): StageSignal | null {
  const lower = line.toLowerCase();
  for (const [signal, marker] of STAGE_MARKERS) {
    if (lower.includes(marker)) {
      return signal;
    }
  }
  return null;
}

function matchRatio(line: string, patterns: RegExp[]): { current: number; total: number } | null {
  for (const pattern of patterns) {
    const match = pattern.exec(line);
    if (!match) continue;

    const current = parseInt(match[1] ?? '', 10);
    const total = parseInt(match[2] ?? '', 10);
    if (Number.isFinite(current) && Number.isFinite(total) && total > 0) {
      return { current, total };
    }
  }
  return null;
}

/**
 * First explicit signal wins: chunk, frame, percentage, then any sign of
 * activity.
 */
export function detectProgressSignal(line: string): ProgressSignal {
  const chunk = matchRatio(line, CHUNK_PATTERNS);
  if (chunk) return { kind: 'chunk', ...chunk };

  const frame = matchRatio(line, FRAME_PATTERNS);
  if (frame) return { kind: 'frame', ...frame };

  const percent = PERCENT_PATTERN.exec(line);
  if (percent?.[1]) return { kind: 'percent', value: parseFloat(percent[1]) };

  if (ACTIVITY_PATTERNS.some((pattern) => pattern.test(line))) {
    return { kind: 'activity' };
  }
  return { kind: 'idle' };
}
