import {
  logger,
  keyOf,
  parseDuration,
  withSpan,
  type Kustomization,
  type NamespacedName,
  type SourceObject,
} from '@kustomize-sync/shared';
import { errorMessage } from './errors.js';
import { INVALID_INTERVAL_REASON, StatusReporter, readyUpdateFor, readyMessage } from './status.js';
import type { KustomizationStore, KustomizationSyncer, ReconcileResult, SyncResult } from './types.js';

const log = logger.child({ module: 'reconciler' });

export interface ReconcilerOptions {
  /** Ceiling for one sync attempt, independent of the Kustomization's interval. */
  syncTimeoutMs: number;
  clock?: () => Date;
}

/**
 * Level-triggered reconcile loop for Kustomizations. Each call converges one
 * object and asks to be called again after its interval, whether or not the
 * sync succeeded.
 *
 * DependencyNotFoundError and StatusWriteError propagate to the caller, which
 * requeues them sooner than the interval.
 */
export class Reconciler {
  private readonly reporter: StatusReporter;

  constructor(
    private readonly store: KustomizationStore,
    private readonly pipeline: KustomizationSyncer,
    private readonly opts: ReconcilerOptions,
  ) {
    this.reporter = new StatusReporter(store, opts.clock);
  }

  async reconcile(req: NamespacedName): Promise<ReconcileResult> {
    const key = keyOf(req);
    return withSpan<ReconcileResult>('kustomization.reconcile', { kustomization: key }, async () => {
      const kustomization = await this.store.getKustomization(req.namespace, req.name);
      if (!kustomization) {
        log.debug({ kustomization: key }, 'Kustomization not found, nothing to reconcile');
        return {};
      }

      let intervalMs: number;
      try {
        intervalMs = parseDuration(kustomization.spec.interval);
        if (intervalMs <= 0) {
          throw new Error(`interval must be greater than zero, got "${kustomization.spec.interval}"`);
        }
      } catch (err) {
        log.warn({ kustomization: key, interval: kustomization.spec.interval }, 'invalid interval');
        await this.reporter.report(structuredClone(kustomization), {
          ready: false,
          reason: INVALID_INTERVAL_REASON,
          message: errorMessage(err),
        });
        return {};
      }

      const { sourceRef } = kustomization.spec;
      const source = await this.store.getSource(req.namespace, sourceRef.kind, sourceRef.name);

      const result = await this.sync(structuredClone(kustomization), source);
      const synced = await this.reporter.report(structuredClone(kustomization), readyUpdateFor(result));

      log.info({ kustomization: key, status: readyMessage(synced) }, 'Kustomization sync finished');
      return { requeueAfterMs: intervalMs };
    });
  }

  private async sync(kustomization: Kustomization, source: SourceObject): Promise<SyncResult> {
    const signal = AbortSignal.timeout(this.opts.syncTimeoutMs);
    return this.pipeline.sync(kustomization, source, signal);
  }
}
