import type { Kustomization, KustomizationSpec, SourceObject } from '@kustomize-sync/shared';

export function makeKustomization(
  overrides: { name?: string; generation?: number; spec?: Partial<KustomizationSpec> } = {},
): Kustomization {
  return {
    apiVersion: 'kustomize.sync.dev/v1alpha1',
    kind: 'Kustomization',
    metadata: {
      name: overrides.name ?? 'podinfo',
      namespace: 'apps',
      generation: overrides.generation ?? 1,
      resourceVersion: '1000',
    },
    spec: {
      sourceRef: { kind: 'GitRepository', name: 'podinfo-repo' },
      path: './',
      prune: '',
      interval: '5m',
      ...overrides.spec,
    },
  };
}

export function makeSource(url = 'https://x/artifact.tar.gz', revision = 'main/6a2f1b9'): SourceObject {
  return {
    apiVersion: 'source.sync.dev/v1alpha1',
    kind: 'GitRepository',
    metadata: { name: 'podinfo-repo', namespace: 'apps' },
    status: { artifact: { url, revision } },
  };
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
