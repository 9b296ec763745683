import * as k8s from '@kubernetes/client-node';
import { logger } from '@kustomize-sync/shared';
import { HttpArtifactFetcher } from './artifact.js';
import { KubectlApplier } from './applier.js';
import { loadConfig } from './config.js';
import { KustomizationController } from './controller.js';
import { createHealthServer, listen } from './health.js';
import { watchKustomizations, type KustomizationWatch } from './k8s-informer.js';
import { K8sKustomizationStore } from './k8s-store.js';
import { Reconciler } from './reconciler.js';
import { KustomizeRenderer } from './renderer.js';
import { SyncPipeline } from './sync.js';
import { WorkspaceManager } from './workspace.js';

const log = logger.child({ module: 'controller-main' });

async function main(): Promise<void> {
  const config = loadConfig();
  log.info('starting kustomize controller');

  const kc = new k8s.KubeConfig();
  kc.loadFromDefault();

  const pipeline = new SyncPipeline({
    workspaces: new WorkspaceManager(config.workspaceRoot),
    fetcher: new HttpArtifactFetcher({ tarBin: config.tarBin }),
    renderer: new KustomizeRenderer({ kustomizeBin: config.kustomizeBin }),
    applier: new KubectlApplier({ kubectlBin: config.kubectlBin }),
  });
  const reconciler = new Reconciler(new K8sKustomizationStore(kc), pipeline, {
    syncTimeoutMs: config.syncTimeoutMs,
  });
  const controller = new KustomizationController(reconciler, {
    concurrency: config.maxConcurrentReconciles,
    backoffBaseMs: config.errorBackoffBaseMs,
    backoffMaxMs: config.errorBackoffMaxMs,
  });

  let watch: KustomizationWatch | undefined;
  const healthServer = createHealthServer(() => watch?.synced ?? false);
  await listen(healthServer, config.healthPort);

  watch = await watchKustomizations(kc, controller, config.watchNamespace);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('shutting down');
    await watch?.stop();
    await controller.stop();
    healthServer.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      log.fatal({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  log.fatal({ err }, 'controller failed to start');
  process.exit(1);
});
