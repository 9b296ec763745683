import { tmpdir } from 'node:os';
import { logger } from '@kustomize-sync/shared';

const log = logger.child({ module: 'config' });

export interface ControllerConfig {
  /** Namespace to watch; undefined watches all namespaces. */
  watchNamespace?: string;
  syncTimeoutMs: number;
  maxConcurrentReconciles: number;
  errorBackoffBaseMs: number;
  errorBackoffMaxMs: number;
  workspaceRoot: string;
  kustomizeBin: string;
  kubectlBin: string;
  tarBin: string;
  healthPort: number;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn({ [name]: raw, using: fallback }, `invalid ${name}, falling back to default`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  const config: ControllerConfig = {
    watchNamespace: env.WATCH_NAMESPACE || undefined,
    syncTimeoutMs: positiveInt(env, 'SYNC_TIMEOUT_MS', 15_000),
    maxConcurrentReconciles: positiveInt(env, 'MAX_CONCURRENT_RECONCILES', 4),
    errorBackoffBaseMs: positiveInt(env, 'ERROR_BACKOFF_BASE_MS', 1_000),
    errorBackoffMaxMs: positiveInt(env, 'ERROR_BACKOFF_MAX_MS', 5 * 60_000),
    workspaceRoot: env.WORKSPACE_ROOT || tmpdir(),
    kustomizeBin: env.KUSTOMIZE_BIN || 'kustomize',
    kubectlBin: env.KUBECTL_BIN || 'kubectl',
    tarBin: env.TAR_BIN || 'tar',
    healthPort: positiveInt(env, 'HEALTH_PORT', 9440),
  };

  if (config.healthPort > 65_535) {
    throw new Error(`HEALTH_PORT must be a valid port, got ${config.healthPort}`);
  }
  if (config.errorBackoffMaxMs < config.errorBackoffBaseMs) {
    throw new Error('ERROR_BACKOFF_MAX_MS must not be lower than ERROR_BACKOFF_BASE_MS');
  }

  log.info(
    {
      watchNamespace: config.watchNamespace ?? 'all',
      syncTimeoutMs: config.syncTimeoutMs,
      maxConcurrentReconciles: config.maxConcurrentReconciles,
    },
    'controller configuration loaded',
  );

  return config;
}
