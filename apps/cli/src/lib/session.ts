/**
 * Session Wiring
 * 
 * Builds the real collaborators and a fresh workspace for one command
 * run.
 */

import { YtDlpClient, isSupportedReference } from '@chaptercut/acquisition';
import { FFmpegSegmentEncoder } from '@chaptercut/processing';
import { ExtractionOrchestrator, SessionWorkspace } from '@chaptercut/pipeline';
import type { AppConfig } from '../config/index.js';

export interface CliSession {
  orchestrator: ExtractionOrchestrator;
  workspace: SessionWorkspace;
}

export async function openSession(config: AppConfig, outputDir?: string): Promise<CliSession> {
  const workspace = await SessionWorkspace.create(config.workDir);

  const ytdlp = new YtDlpClient({
    binaryPath: config.tools.ytdlp,
    maxFileSizeMb: config.limits.maxFileSizeMb,
    minFreeDiskMb: config.minFreeDiskMb,
  });
  const encoder = new FFmpegSegmentEncoder({
    ffmpegPath: config.tools.ffmpeg,
    maxOutputSizeMb: config.limits.maxFileSizeMb,
  });

  const orchestrator = new ExtractionOrchestrator(
    { metadata: ytdlp, acquirer: ytdlp, encoder, isSupportedReference },
    {
      mediaDir: workspace.mediaDir,
      outputDir: outputDir ?? config.outputDir,
      limits: config.limits,
    }
  );

  return { orchestrator, workspace };
}

/**
 * Run `fn` against a fresh session, disposing the workspace afterwards
 */
export async function withSession<T>(
  config: AppConfig,
  outputDir: string | undefined,
  fn: (session: CliSession) => Promise<T>
): Promise<T> {
  const session = await openSession(config, outputDir);
  try {
    return await fn(session);
  } finally {
    await session.workspace.dispose();
  }
}
