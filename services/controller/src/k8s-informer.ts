import * as k8s from '@kubernetes/client-node';
import { KustomizationApi, logger } from '@kustomize-sync/shared';
import type { KustomizationController } from './controller.js';

const log = logger.child({ module: 'k8s-informer' });

const RESTART_DELAY_MS = 5_000;

export interface KustomizationWatch {
  /** True once the initial list has been delivered. */
  readonly synced: boolean;
  stop(): Promise<void>;
}

/**
 * Watch Kustomizations (cluster-wide, or in one namespace) and forward
 * add/update/delete events to the controller. The watch restarts itself
 * after errors.
 */
export async function watchKustomizations(
  kc: k8s.KubeConfig,
  controller: KustomizationController,
  namespace?: string,
): Promise<KustomizationWatch> {
  const { group, version, plural } = KustomizationApi;
  const api = kc.makeApiClient(k8s.CustomObjectsApi);

  const path = namespace
    ? `/apis/${group}/${version}/namespaces/${namespace}/${plural}`
    : `/apis/${group}/${version}/${plural}`;
  const list = () =>
    namespace
      ? api.listNamespacedCustomObject({ group, version, namespace, plural })
      : api.listClusterCustomObject({ group, version, plural });

  const informer = k8s.makeInformer<k8s.KubernetesObject>(kc, path, list);
  let synced = false;
  let stopped = false;
  let restartTimer: NodeJS.Timeout | undefined;

  // At most one restart is pending at a time.
  const scheduleRestart = () => {
    if (stopped || restartTimer) return;
    restartTimer = setTimeout(() => {
      restartTimer = undefined;
      if (stopped) return;
      informer.start().catch((err: unknown) => {
        log.error({ err, path }, 'watch restart failed');
        scheduleRestart();
      });
    }, RESTART_DELAY_MS);
  };

  informer.on(k8s.ADD, (obj: k8s.KubernetesObject) => controller.handleAdd(obj));
  informer.on(k8s.UPDATE, (obj: k8s.KubernetesObject) => controller.handleUpdate(obj));
  informer.on(k8s.DELETE, (obj: k8s.KubernetesObject) => controller.handleDelete(obj));
  informer.on(k8s.ERROR, (err: unknown) => {
    if (stopped) return;
    log.error({ err, path }, 'watch failed, restarting');
    scheduleRestart();
  });

  await informer.start();
  synced = true;
  log.info({ path }, 'watching Kustomizations');

  return {
    get synced() {
      return synced;
    },
    async stop() {
      stopped = true;
      if (restartTimer) clearTimeout(restartTimer);
      restartTimer = undefined;
      await informer.stop();
    },
  };
}
