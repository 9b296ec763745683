import { logger, keyOf, parseKey, type NamespacedName } from '@kustomize-sync/shared';
import { syncAtPredicate, type MetaLike } from './predicate.js';
import { WorkQueue, type WorkQueueOptions } from './work-queue.js';
import type { ReconcileResult } from './types.js';

const log = logger.child({ module: 'controller' });

/** Object shape delivered by the watch. client-node's KubernetesObject satisfies it. */
export interface WatchedObject {
  metadata?: {
    name?: string;
    namespace?: string;
    generation?: number;
    annotations?: Record<string, string>;
  };
}

export interface Reconcilable {
  reconcile(req: NamespacedName): Promise<ReconcileResult>;
}

function identity(obj: WatchedObject): string | undefined {
  const name = obj.metadata?.name;
  const namespace = obj.metadata?.namespace;
  if (!name || !namespace) return undefined;
  return keyOf({ namespace, name });
}

function snapshot(obj: WatchedObject): MetaLike {
  return {
    metadata: {
      generation: obj.metadata?.generation,
      annotations: { ...obj.metadata?.annotations },
    },
  };
}

/**
 * Connects watch events and periodic requeues to the reconciler through one
 * keyed queue. Triggers for the same Kustomization collapse into a single
 * pending reconcile.
 */
export class KustomizationController {
  private readonly queue: WorkQueue;
  private readonly lastSeen = new Map<string, MetaLike>();

  constructor(
    private readonly reconciler: Reconcilable,
    queueOpts: WorkQueueOptions,
  ) {
    this.queue = new WorkQueue((key) => this.reconcileHandler(key), queueOpts);
  }

  get pending(): number {
    return this.queue.length;
  }

  handleAdd(obj: WatchedObject): void {
    const key = identity(obj);
    if (!key) return;
    this.lastSeen.set(key, snapshot(obj));
    this.queue.add(key);
  }

  handleUpdate(obj: WatchedObject): void {
    const key = identity(obj);
    if (!key) return;
    const previous = this.lastSeen.get(key);
    this.lastSeen.set(key, snapshot(obj));
    if (syncAtPredicate(previous, obj)) {
      log.debug({ kustomization: key }, 'change detected');
      this.queue.add(key);
    }
  }

  handleDelete(obj: WatchedObject): void {
    const key = identity(obj);
    if (!key) return;
    this.lastSeen.delete(key);
    this.queue.cancel(key);
    // Reconciling a deleted object is a no-op; it also settles a run that raced the delete.
    this.queue.add(key);
  }

  /** Wait until no reconcile is queued or running. */
  async idle(): Promise<void> {
    await this.queue.drained();
  }

  async stop(): Promise<void> {
    await this.queue.shutDown();
    this.lastSeen.clear();
  }

  private async reconcileHandler(key: string): Promise<void> {
    let result: ReconcileResult;
    try {
      result = await this.reconciler.reconcile(parseKey(key));
    } catch (err) {
      const delayMs = this.queue.addRateLimited(key);
      log.error({ err, kustomization: key, retryInMs: delayMs }, 'reconcile failed, requeueing');
      return;
    }

    this.queue.forget(key);
    if (result.requeueAfterMs !== undefined) {
      this.queue.addAfter(key, result.requeueAfterMs);
    }
  }
}
