import * as k8s from '@kubernetes/client-node';
import {
  GitRepositoryApi,
  KustomizationApi,
  keyOf,
  parseKustomization,
  parseSource,
  type Kustomization,
  type SourceObject,
} from '@kustomize-sync/shared';
import { DependencyNotFoundError, StatusWriteError } from './errors.js';
import type { KustomizationStore } from './types.js';

/** HTTP status carried by a client-node ApiException, if any. */
export function statusCodeOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'number' ? code : undefined;
}

const SOURCE_APIS: Record<string, { group: string; version: string; plural: string }> = {
  [GitRepositoryApi.kind]: GitRepositoryApi,
};

/** KustomizationStore backed by the Kubernetes API through CustomObjectsApi. */
export class K8sKustomizationStore implements KustomizationStore {
  private readonly api: k8s.CustomObjectsApi;

  constructor(kc: k8s.KubeConfig) {
    this.api = kc.makeApiClient(k8s.CustomObjectsApi);
  }

  async getKustomization(namespace: string, name: string): Promise<Kustomization | null> {
    const { group, version, plural } = KustomizationApi;
    let raw: unknown;
    try {
      raw = await this.api.getNamespacedCustomObject({ group, version, namespace, plural, name });
    } catch (err) {
      if (statusCodeOf(err) === 404) return null;
      throw err;
    }
    return parseKustomization(raw);
  }

  async getSource(namespace: string, kind: string, name: string): Promise<SourceObject> {
    const ref = { kind, namespace, name };
    const api = SOURCE_APIS[kind];
    if (!api) {
      throw new DependencyNotFoundError(ref, { cause: new Error(`unsupported source kind ${kind}`) });
    }

    try {
      const raw: unknown = await this.api.getNamespacedCustomObject({ ...api, namespace, name });
      return parseSource(raw);
    } catch (err) {
      throw new DependencyNotFoundError(ref, { cause: err });
    }
  }

  async updateStatus(k: Kustomization): Promise<void> {
    const { group, version, plural, kind } = KustomizationApi;
    const { namespace, name } = k.metadata;
    try {
      await this.api.replaceNamespacedCustomObjectStatus({
        group,
        version,
        namespace,
        plural,
        name,
        body: {
          apiVersion: `${group}/${version}`,
          kind,
          metadata: k.metadata,
          spec: k.spec,
          status: k.status,
        },
      });
    } catch (err) {
      throw new StatusWriteError(keyOf(k.metadata), statusCodeOf(err) === 409, { cause: err });
    }
  }
}
