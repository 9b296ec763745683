import { SYNC_AT_ANNOTATION } from '@kustomize-sync/shared';

/** The slice of object metadata the predicate looks at. */
export interface MetaLike {
  metadata?: {
    generation?: number;
    annotations?: Record<string, string>;
  };
}

/**
 * Decide whether an update event should trigger a reconcile.
 *
 * Passes spec changes (generation bump) and a new or changed sync-at
 * annotation. Everything else, including the controller's own status
 * writes, is dropped. Events missing metadata on either side are dropped.
 */
export function syncAtPredicate(oldObj: MetaLike | undefined, newObj: MetaLike | undefined): boolean {
  const oldMeta = oldObj?.metadata;
  const newMeta = newObj?.metadata;
  if (!oldMeta || !newMeta) {
    return false;
  }

  if (newMeta.generation !== oldMeta.generation) {
    return true;
  }

  const next = newMeta.annotations?.[SYNC_AT_ANNOTATION];
  if (next === undefined) {
    return false;
  }
  return oldMeta.annotations?.[SYNC_AT_ANNOTATION] !== next;
}
