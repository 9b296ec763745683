import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { logger } from '@kustomize-sync/shared';
import { SyncStageError, errorMessage } from './errors.js';

const log = logger.child({ module: 'workspace' });

export interface Workspace {
  /** Absolute path of the attempt's private directory. */
  readonly root: string;
}

/**
 * Hands out one private temporary directory per sync attempt and removes it
 * when the attempt's callback settles, whichever way it settles.
 */
export class WorkspaceManager {
  private active = 0;

  constructor(private readonly baseDir: string = tmpdir()) {}

  /** Number of workspaces currently allocated. */
  get activeCount(): number {
    return this.active;
  }

  async withWorkspace<T>(label: string, fn: (ws: Workspace) => Promise<T>): Promise<T> {
    let root: string;
    try {
      root = await mkdtemp(join(this.baseDir, `${sanitize(label)}-`));
    } catch (err) {
      throw new SyncStageError('StorageOperationFailed', `tmp dir error: ${errorMessage(err)}`, { cause: err });
    }

    this.active++;
    log.debug({ root }, 'workspace created');
    try {
      return await fn({ root });
    } finally {
      this.active--;
      try {
        await rm(root, { recursive: true, force: true });
        log.debug({ root }, 'workspace removed');
      } catch (err) {
        log.error({ err, root }, 'failed to remove workspace');
      }
    }
  }
}

function sanitize(label: string): string {
  return label.replace(/[^a-zA-Z0-9.-]+/g, '-').slice(0, 64) || 'workspace';
}
