/**
 * Session Workspaces
 * 
 * Every session gets its own directory tree:
 * 
 *   <root>/<uuid>/media    downloads, removed after each operation
 * 
 * Finished files go to the configured output directory, not here.
 * Abandoned trees are pruned once they are older than the retention
 * window.
 */

import { randomUUID } from 'node:crypto';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, ensureDir, pathExists, removePath } from '@chaptercut/utils';

const log = createLogger({ module: 'workspace' });

export const DEFAULT_RETENTION_MS = 30 * 60 * 1000;

export class SessionWorkspace {
  private constructor(
    readonly id: string,
    readonly root: string,
    readonly mediaDir: string
  ) {}

  static async create(root: string): Promise<SessionWorkspace> {
    const id = randomUUID();
    const base = join(root, id);
    const workspace = new SessionWorkspace(id, base, join(base, 'media'));

    await ensureDir(workspace.mediaDir);
    log.debug({ sessionId: id, root: base }, 'Workspace created');

    return workspace;
  }

  async dispose(): Promise<void> {
    await removePath(this.root);
    log.debug({ sessionId: this.id }, 'Workspace removed');
  }
}

/**
 * Remove session directories under `root` not modified within
 * `retentionMs`. Returns the removed paths.
 */
export async function pruneStaleWorkspaces(
  root: string,
  retentionMs: number = DEFAULT_RETENTION_MS,
  now: number = Date.now()
): Promise<string[]> {
  if (!(await pathExists(root))) {
    return [];
  }

  const removed: string[] = [];
  const entries = await readdir(root, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const path = join(root, entry.name);
    const stats = await stat(path);
    if (now - stats.mtimeMs > retentionMs && (await removePath(path))) {
      removed.push(path);
    }
  }

  if (removed.length > 0) {
    log.info({ root, count: removed.length }, 'Pruned stale workspaces');
  }
  return removed;
}
