import {
  READY_CONDITION,
  readyCondition,
  type Condition,
  type Kustomization,
  type KustomizationStatus,
} from '@kustomize-sync/shared';
import type { KustomizationStore, SyncResult } from './types.js';

export const APPLY_SUCCEEDED_REASON = 'ApplySucceeded';
export const APPLY_SUCCEEDED_MESSAGE = 'kustomization was successfully applied';
export const INVALID_INTERVAL_REASON = 'InvalidInterval';

/** What the Ready condition should say after an attempt. */
export interface ReadyUpdate {
  ready: boolean;
  reason: string;
  message: string;
  /** Artifact revision that was applied; only set on success. */
  revision?: string;
}

export function readyUpdateFor(result: SyncResult): ReadyUpdate {
  if (result.status === 'succeeded') {
    return {
      ready: true,
      reason: APPLY_SUCCEEDED_REASON,
      message: APPLY_SUCCEEDED_MESSAGE,
      revision: result.revision,
    };
  }
  return { ready: false, reason: result.reason, message: result.message };
}

/**
 * Compute the status to persist. Other condition types are left alone and
 * lastTransitionTime only moves when the Ready status flips.
 */
export function buildStatus(
  previous: KustomizationStatus | undefined,
  update: ReadyUpdate,
  generation: number | undefined,
  now: Date,
): KustomizationStatus {
  const prior = readyCondition(previous);
  const status: Condition['status'] = update.ready ? 'True' : 'False';
  const ready: Condition = {
    type: READY_CONDITION,
    status,
    reason: update.reason,
    message: update.message,
    lastTransitionTime: prior && prior.status === status ? prior.lastTransitionTime : now.toISOString(),
  };

  const next: KustomizationStatus = {
    conditions: [...(previous?.conditions ?? []).filter((c) => c.type !== READY_CONDITION), ready],
  };
  if (generation !== undefined) {
    next.observedGeneration = generation;
  }
  const revision = update.revision ?? previous?.lastAppliedRevision;
  if (revision !== undefined) {
    next.lastAppliedRevision = revision;
  }
  return next;
}

/** One-line summary of the Ready condition, for logs. */
export function readyMessage(k: Kustomization): string {
  const cond = readyCondition(k.status);
  if (!cond) return 'unknown';
  return cond.status === 'True' ? cond.message : `${cond.reason}: ${cond.message}`;
}

/** Writes the Ready condition onto a Kustomization and persists it. */
export class StatusReporter {
  constructor(
    private readonly store: KustomizationStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async report(k: Kustomization, update: ReadyUpdate): Promise<Kustomization> {
    k.status = buildStatus(k.status, update, k.metadata.generation, this.clock());
    await this.store.updateStatus(k);
    return k;
  }
}
