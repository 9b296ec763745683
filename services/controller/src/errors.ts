import type { NamespacedName } from '@kustomize-sync/shared';
import type { SyncFailureReason } from './types.js';

/** A failure inside one stage of a sync attempt. Becomes a NotReady condition. */
export class SyncStageError extends Error {
  constructor(
    readonly reason: SyncFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SyncStageError';
  }
}

/** The source object a Kustomization refers to could not be loaded. */
export class DependencyNotFoundError extends Error {
  constructor(
    readonly source: NamespacedName & { kind: string },
    options?: { cause?: unknown },
  ) {
    super(`${source.kind} ${source.namespace}/${source.name} not found`, options);
    this.name = 'DependencyNotFoundError';
  }
}

/** Persisting the status subresource failed. `conflict` marks a stale resourceVersion. */
export class StatusWriteError extends Error {
  constructor(
    readonly key: string,
    readonly conflict: boolean,
    options?: { cause?: unknown },
  ) {
    super(
      conflict
        ? `status update conflict for ${key}, object was modified`
        : `unable to update status for ${key}`,
      options,
    );
    this.name = 'StatusWriteError';
  }
}

/** An external tool exited non-zero, or was killed. `output` holds stdout and stderr. */
export class ToolError extends Error {
  constructor(
    message: string,
    readonly output: string,
    readonly aborted: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Tool error message followed by the tool's own output, for condition messages. */
export function toolDiagnostic(err: ToolError): string {
  return err.output ? `${err.message}\n${err.output}` : err.message;
}
