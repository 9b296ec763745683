import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { logger, keyOf, withSpan, type Kustomization, type SourceObject } from '@kustomize-sync/shared';
import { resolveArtifact } from './artifact.js';
import { SyncStageError, errorMessage } from './errors.js';
import type { WorkspaceManager } from './workspace.js';
import type {
  ArtifactFetcher,
  KustomizationSyncer,
  ManifestApplier,
  ManifestRenderer,
  SyncFailureReason,
  SyncResult,
} from './types.js';

const log = logger.child({ module: 'sync' });

export interface SyncPipelineDeps {
  workspaces: WorkspaceManager;
  fetcher: ArtifactFetcher;
  renderer: ManifestRenderer;
  applier: ManifestApplier;
}

/** File the rendered manifests are written to, at the workspace root. */
export function manifestFileName(k: Kustomization): string {
  return `${k.metadata.name}.yaml`;
}

/**
 * Run `fn` as one stage. A stage never starts after the deadline, and any
 * error it raises is pinned to `reason` unless it already names a stage.
 */
async function stage<T>(reason: SyncFailureReason, signal: AbortSignal, fn: () => Promise<T>): Promise<T> {
  if (signal.aborted) {
    throw new SyncStageError(reason, 'deadline exceeded before stage started');
  }
  try {
    return await fn();
  } catch (err) {
    if (err instanceof SyncStageError) throw err;
    throw new SyncStageError(reason, errorMessage(err), { cause: err });
  }
}

/**
 * One sync attempt: resolve artifact, fetch, render, apply.
 * Never throws for stage failures; they come back as a failed SyncResult.
 */
export class SyncPipeline implements KustomizationSyncer {
  constructor(private readonly deps: SyncPipelineDeps) {}

  async sync(k: Kustomization, source: SourceObject, signal: AbortSignal): Promise<SyncResult> {
    const key = keyOf(k.metadata);
    const attributes = { kustomization: key, source: source.metadata.name };
    return withSpan<SyncResult>('kustomization.sync', attributes, async (span) => {
      try {
        const result = await this.attempt(k, source, signal);
        span.setAttribute('sync.result', 'succeeded');
        return result;
      } catch (err) {
        if (!(err instanceof SyncStageError)) throw err;
        log.error({ kustomization: key, reason: err.reason, err }, 'Kustomization sync failed');
        span.setAttribute('sync.result', err.reason);
        return { status: 'failed', reason: err.reason, message: err.message };
      }
    });
  }

  private async attempt(k: Kustomization, source: SourceObject, signal: AbortSignal): Promise<SyncResult> {
    const artifact = resolveArtifact(source);
    const { workspaces, fetcher, renderer, applier } = this.deps;

    return workspaces.withWorkspace<SyncResult>(source.metadata.name, async ({ root }) => {
      await stage('FetchFailed', signal, () => fetcher.fetch(artifact, root, signal));

      const manifestPath = join(root, manifestFileName(k));
      await stage('RenderFailed', signal, async () => {
        const manifests = await renderer.render(root, k.spec.path, signal);
        await writeFile(manifestPath, manifests, { signal });
      });

      const output = await stage('ApplyFailed', signal, () => applier.apply(manifestPath, k.spec.prune, signal));

      return { status: 'succeeded', revision: artifact.revision ?? artifact.url, output };
    });
  }
}
