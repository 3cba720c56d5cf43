/**
 * Stage Projection
 * 
 * Each working stage owns a slice of the overall bar, expressed as
 * offsets from the machine's base percent.
 */

export type WorkingStage = 'audio' | 'video';

export interface StageProfile {
  /** Offsets from the base percent */
  from: number;
  to: number;
  /** Prefix for explicit progress messages */
  label: string;
  /** Prefix for time-based estimates */
  estimateLabel: string;
  /** Estimated percent per second when the line shows activity */
  activityRate: number;
  /** Estimated percent per second when the line carries nothing */
  idleRate: number;
}

export const ACTIVITY_ESTIMATE_CAP = 90;
export const IDLE_ESTIMATE_CAP = 85;

export const STAGE_PROFILES: Readonly<Record<WorkingStage, StageProfile>> = {
  audio: {
    from: 1,
    to: 3,
    label: 'Processing audio',
    estimateLabel: 'Processing audio track',
    activityRate: 15,
    idleRate: 12,
  },
  video: {
    from: 4,
    to: 10,
    label: 'Writing video',
    estimateLabel: 'Writing video data',
    activityRate: 8,
    idleRate: 6,
  },
};

/**
 * Map a 0-100 stage-local percent onto the overall scale
 */
export function projectIntoStage(stage: WorkingStage, rawPercent: number, basePercent: number): number {
  const { from, to } = STAGE_PROFILES[stage];
  const clamped = Math.min(100, Math.max(0, rawPercent));
  return basePercent + from + (clamped / 100) * (to - from);
}

/**
 * Linear estimate from time spent in the stage, capped below 100
 */
export function estimateFromElapsed(elapsedSeconds: number, ratePerSecond: number, cap: number): number {
  return Math.min(cap, Math.max(0, elapsedSeconds) * ratePerSecond);
}
