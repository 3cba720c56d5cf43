/**
 * Progress Estimation State Machine
 * 
 * Scrapes the free-text log of an external encode into a bounded,
 * never-decreasing percentage plus a status message.
 * 
 * Stage flow:
 * init → building → audio → video_prep → video → complete
 *   (building may go straight to video when there is no audio pass)
 * 
 * Rules:
 * - Coarse transitions come from the table below, keyed by current
 *   stage and stage marker
 * - Inside audio/video, explicit chunk / frame / percent tokens are
 *   projected into the stage's slice; otherwise time in stage is used
 * - An update lower than the last one emitted is dropped
 * - One instance per encode invocation
 */

import { EventEmitter } from 'node:events';
import {
  detectProgressSignal,
  detectStageSignal,
  type ProgressSignal,
  type StageSignal,
} from './signals.js';
import {
  ACTIVITY_ESTIMATE_CAP,
  IDLE_ESTIMATE_CAP,
  STAGE_PROFILES,
  estimateFromElapsed,
  projectIntoStage,
  type WorkingStage,
} from './projection.js';

export type ProgressStage = 'init' | 'building' | 'audio' | 'video_prep' | 'video' | 'complete';

export interface ProgressState {
  stage: ProgressStage;
  stageStartedAt?: number;
  basePercent: number;
  lastReportedPercent: number;
}

export interface ProgressUpdate {
  percent: number;
  message: string;
  stage: ProgressStage;
}

export type ProgressSink = (update: ProgressUpdate) => void;

export interface ProgressStateMachineOptions {
  /** Overall percent at which the encode starts */
  basePercent?: number;
  sink?: ProgressSink;
  /** Millisecond clock, injectable for tests */
  now?: () => number;
  /** Idle lines only produce estimates after this long in a stage */
  idleThresholdMs?: number;
}

interface Transition {
  to: ProgressStage;
  /** Offset from the base percent */
  offset: number;
  /** Whether entering the target stage restarts the stage clock */
  startsClock: boolean;
  message: (elapsedSeconds: number) => string;
}

const startAudio: Transition = {
  to: 'audio',
  offset: 1,
  startsClock: true,
  message: () => 'Processing audio track...',
};

const startVideo: Transition = {
  to: 'video',
  offset: 4,
  startsClock: true,
  message: () => 'Writing video data...',
};

export const TRANSITIONS: Readonly<
  Record<ProgressStage, Partial<Record<StageSignal, Transition>>>
> = {
  init: {
    building: {
      to: 'building',
      offset: 0,
      startsClock: false,
      message: () => 'Building video structure...',
    },
    'writing-audio': startAudio,
  },
  building: {
    'writing-audio': startAudio,
    'writing-video': startVideo,
  },
  audio: {
    done: {
      to: 'video_prep',
      offset: 3,
      startsClock: false,
      message: (elapsed) => `Audio processing completed (${elapsed.toFixed(1)}s)`,
    },
  },
  video_prep: {
    'writing-video': startVideo,
  },
  video: {
    done: {
      to: 'complete',
      offset: 10,
      startsClock: false,
      message: (elapsed) => `Video processing completed (${elapsed.toFixed(1)}s)`,
    },
  },
  complete: {},
};

const DEFAULT_BASE_PERCENT = 75;
const DEFAULT_IDLE_THRESHOLD_MS = 500;

function isWorkingStage(stage: ProgressStage): stage is WorkingStage {
  return stage === 'audio' || stage === 'video';
}

export class ProgressStateMachine extends EventEmitter {
  private state: ProgressState;
  private readonly now: () => number;
  private readonly idleThresholdMs: number;

  constructor(options: ProgressStateMachineOptions = {}) {
    super();
    const basePercent = options.basePercent ?? DEFAULT_BASE_PERCENT;

    this.now = options.now ?? Date.now;
    this.idleThresholdMs = options.idleThresholdMs ?? DEFAULT_IDLE_THRESHOLD_MS;
    this.state = {
      stage: 'init',
      basePercent,
      lastReportedPercent: 0,
    };

    if (options.sink) {
      this.on('progress', options.sink);
    }
  }

  /**
   * Feed one log line. Returns the update emitted for it, if any.
   */
  consume(line: string): ProgressUpdate | null {
    const text = line.trim();
    if (!text) return null;

    const signal = detectStageSignal(text);
    const transition = signal ? TRANSITIONS[this.state.stage][signal] : undefined;
    if (transition) {
      return this.applyTransition(transition);
    }

    const stage = this.state.stage;
    if (isWorkingStage(stage)) {
      return this.updateWithinStage(stage, detectProgressSignal(text));
    }

    return null;
  }

  /**
   * Feed a batch of lines in order, returning every update emitted
   */
  consumeAll(lines: Iterable<string>): ProgressUpdate[] {
    const updates: ProgressUpdate[] = [];
    for (const line of lines) {
      const update = this.consume(line);
      if (update) updates.push(update);
    }
    return updates;
  }

  snapshot(): Readonly<ProgressState> {
    return { ...this.state };
  }

  getStage(): ProgressStage {
    return this.state.stage;
  }

  isComplete(): boolean {
    return this.state.stage === 'complete';
  }

  private applyTransition(transition: Transition): ProgressUpdate | null {
    const elapsedSeconds = this.elapsedInStage();

    this.state.stage = transition.to;
    if (transition.startsClock) {
      this.state.stageStartedAt = this.now();
    }

    return this.emitProgress(
      this.state.basePercent + transition.offset,
      transition.message(elapsedSeconds)
    );
  }

  private updateWithinStage(stage: WorkingStage, signal: ProgressSignal): ProgressUpdate | null {
    const profile = STAGE_PROFILES[stage];
    const base = this.state.basePercent;

    switch (signal.kind) {
      case 'chunk':
      case 'frame': {
        const ratio = (signal.current / signal.total) * 100;
        return this.emitProgress(
          projectIntoStage(stage, ratio, base),
          `${profile.label}: ${signal.kind} ${signal.current}/${signal.total} (${ratio.toFixed(0)}%)`
        );
      }

      case 'percent':
        return this.emitProgress(
          projectIntoStage(stage, signal.value, base),
          `${profile.label}: ${signal.value.toFixed(0)}%`
        );

      case 'activity': {
        const estimate = estimateFromElapsed(
          this.elapsedInStage(),
          profile.activityRate,
          ACTIVITY_ESTIMATE_CAP
        );
        return this.emitEstimate(stage, estimate);
      }

      case 'idle': {
        const elapsedSeconds = this.elapsedInStage();
        if (elapsedSeconds * 1000 <= this.idleThresholdMs) {
          return null;
        }
        const estimate = estimateFromElapsed(elapsedSeconds, profile.idleRate, IDLE_ESTIMATE_CAP);
        return this.emitEstimate(stage, estimate);
      }
    }
  }

  private emitEstimate(stage: WorkingStage, estimate: number): ProgressUpdate | null {
    return this.emitProgress(
      projectIntoStage(stage, estimate, this.state.basePercent),
      `${STAGE_PROFILES[stage].estimateLabel} (${estimate.toFixed(0)}%)...`
    );
  }

  private emitProgress(percent: number, message: string): ProgressUpdate | null {
    if (percent < this.state.lastReportedPercent) {
      return null;
    }

    this.state.lastReportedPercent = percent;
    const update: ProgressUpdate = { percent, message, stage: this.state.stage };
    this.emit('progress', update);
    return update;
  }

  private elapsedInStage(): number {
    if (this.state.stageStartedAt === undefined) return 0;
    return (this.now() - this.state.stageStartedAt) / 1000;
  }
}
