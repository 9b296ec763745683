import type { Artifact, Kustomization, SourceObject } from '@kustomize-sync/shared';

export type SyncFailureReason =
  | 'ArtifactMissing'
  | 'FetchFailed'
  | 'StorageOperationFailed'
  | 'RenderFailed'
  | 'ApplyFailed';

export type SyncResult =
  | { status: 'succeeded'; revision: string; output: string }
  | { status: 'failed'; reason: SyncFailureReason; message: string };

/** Downloads an artifact and unpacks it into `dir`, dropping the archive's top-level directory. */
export interface ArtifactFetcher {
  fetch(artifact: Artifact, dir: string, signal: AbortSignal): Promise<void>;
}

/** Renders the kustomization at `path` (relative to `dir`) and returns the manifest text. */
export interface ManifestRenderer {
  render(dir: string, path: string, signal: AbortSignal): Promise<string>;
}

/** Applies a manifest file; a non-empty `prune` selector enables pruning. Returns tool output. */
export interface ManifestApplier {
  apply(manifestPath: string, prune: string, signal: AbortSignal): Promise<string>;
}

/** Runs one sync attempt. Stage failures are returned, not thrown. */
export interface KustomizationSyncer {
  sync(k: Kustomization, source: SourceObject, signal: AbortSignal): Promise<SyncResult>;
}

/** Read and status-write access to the custom resources the loop works on. */
export interface KustomizationStore {
  /** Returns null when the object no longer exists. */
  getKustomization(namespace: string, name: string): Promise<Kustomization | null>;
  /** Throws DependencyNotFoundError when the source cannot be loaded. */
  getSource(namespace: string, kind: string, name: string): Promise<SourceObject>;
  /** Throws StatusWriteError on failure; uses the object's resourceVersion. */
  updateStatus(kustomization: Kustomization): Promise<void>;
}

export interface ReconcileResult {
  /** Schedule the next reconcile after this many ms; absent means no periodic requeue. */
  requeueAfterMs?: number;
}
