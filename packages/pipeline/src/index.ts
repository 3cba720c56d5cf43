/**
 * @chaptercut/pipeline
 * 
 * Session orchestration: analyse, extract chapters, download whole
 * videos, and per-session workspaces.
 */

export { ExtractionOrchestrator } from './orchestrator.js';

export {
  SessionWorkspace,
  pruneStaleWorkspaces,
  DEFAULT_RETENTION_MS,
} from './workspace.js';

export type {
  PipelineProgress,
  ProgressReporter,
  OrchestratorDeps,
  OrchestratorOptions,
  AnalyzedVideo,
  AnalysisResult,
  ChapterOutcome,
  BatchSummary,
  FullDownloadResult,
  RunOptions,
} from './types.js';
