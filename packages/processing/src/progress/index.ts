export {
  ProgressStateMachine,
  TRANSITIONS,
  type ProgressStage,
  type ProgressState,
  type ProgressUpdate,
  type ProgressSink,
  type ProgressStateMachineOptions,
} from './stateMachine.js';
export {
  detectStageSignal,
  detectProgressSignal,
  type StageSignal,
  type ProgressSignal,
} from './signals.js';
export {
  projectIntoStage,
  estimateFromElapsed,
  STAGE_PROFILES,
  ACTIVITY_ESTIMATE_CAP,
  IDLE_ESTIMATE_CAP,
  type WorkingStage,
  type StageProfile,
} from './projection.js';
