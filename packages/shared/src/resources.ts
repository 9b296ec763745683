import { z } from 'zod';

// ---------------------------------------------------------------------------
// API coordinates
// ---------------------------------------------------------------------------

export const KustomizationApi = {
  group: 'kustomize.sync.dev',
  version: 'v1alpha1',
  plural: 'kustomizations',
  kind: 'Kustomization',
} as const;

export const GitRepositoryApi = {
  group: 'source.sync.dev',
  version: 'v1alpha1',
  plural: 'gitrepositories',
  kind: 'GitRepository',
} as const;

/** Setting or changing this annotation forces a sync outside the interval. */
export const SYNC_AT_ANNOTATION = 'kustomize.sync.dev/syncAt';

export const READY_CONDITION = 'Ready';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ObjectMetaSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
  generation: z.number().int().optional(),
  resourceVersion: z.string().optional(),
  uid: z.string().optional(),
  labels: z.record(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
});

export const ConditionSchema = z.object({
  type: z.string(),
  status: z.enum(['True', 'False', 'Unknown']),
  reason: z.string(),
  message: z.string(),
  lastTransitionTime: z.string(),
});

export const KustomizationStatusSchema = z.object({
  conditions: z.array(ConditionSchema).default([]),
  observedGeneration: z.number().int().optional(),
  lastAppliedRevision: z.string().optional(),
});

export const KustomizationSpecSchema = z.object({
  sourceRef: z.object({
    kind: z.string().default(GitRepositoryApi.kind),
    name: z.string().min(1),
  }),
  path: z.string().default('./'),
  prune: z.string().default(''),
  interval: z.string().min(1),
});

export const KustomizationSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: ObjectMetaSchema,
  spec: KustomizationSpecSchema,
  status: KustomizationStatusSchema.optional(),
});

export const ArtifactSchema = z.object({
  url: z.string(),
  revision: z.string().optional(),
  checksum: z.string().optional(),
  lastUpdateTime: z.string().optional(),
});

export const SourceSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: ObjectMetaSchema,
  status: z
    .object({
      artifact: ArtifactSchema.nullish(),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObjectMeta = z.infer<typeof ObjectMetaSchema>;
export type Condition = z.infer<typeof ConditionSchema>;
export type ConditionStatus = Condition['status'];
export type KustomizationStatus = z.infer<typeof KustomizationStatusSchema>;
export type KustomizationSpec = z.infer<typeof KustomizationSpecSchema>;
export type Kustomization = z.infer<typeof KustomizationSchema>;
export type Artifact = z.infer<typeof ArtifactSchema>;
export type SourceObject = z.infer<typeof SourceSchema>;

/** Identity of a namespaced object. */
export interface NamespacedName {
  namespace: string;
  name: string;
}

export function keyOf(ref: NamespacedName): string {
  return `${ref.namespace}/${ref.name}`;
}

export function parseKey(key: string): NamespacedName {
  const idx = key.indexOf('/');
  if (idx <= 0 || idx === key.length - 1) {
    throw new Error(`invalid object key "${key}", expected <namespace>/<name>`);
  }
  return { namespace: key.slice(0, idx), name: key.slice(idx + 1) };
}

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

/** Validate an object returned by the API server as a Kustomization. */
export function parseKustomization(raw: unknown): Kustomization {
  const result = KustomizationSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`invalid ${KustomizationApi.kind}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Validate an object returned by the API server as a source object. */
export function parseSource(raw: unknown): SourceObject {
  const result = SourceSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`invalid source object: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Find the Ready condition, if the object has one. */
export function readyCondition(status: KustomizationStatus | undefined): Condition | undefined {
  return status?.conditions.find((c) => c.type === READY_CONDITION);
}
