/**
 * Cleanup Command
 * 
 * Prune session workspaces left behind by interrupted runs.
 */

import { pruneStaleWorkspaces } from '@chaptercut/pipeline';
import type { AppConfig } from '../config/index.js';
import { printInfo, printSuccess } from '../lib/output.js';

export async function cleanupCommand(config: AppConfig): Promise<void> {
  const removed = await pruneStaleWorkspaces(config.workDir, config.workspaceRetentionMs);

  if (removed.length === 0) {
    printInfo(`Nothing to clean up in ${config.workDir}`);
    return;
  }
  printSuccess(`Removed ${removed.length} stale workspace(s) from ${config.workDir}`);
}
