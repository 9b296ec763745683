import { isAbsolute, normalize, relative, resolve, sep } from 'node:path';
import { logger } from '@kustomize-sync/shared';
import { SyncStageError, ToolError, errorMessage, toolDiagnostic } from './errors.js';
import { runTool } from './exec.js';
import type { ManifestRenderer } from './types.js';

const log = logger.child({ module: 'renderer' });

/**
 * Resolve a Kustomization `spec.path` against the workspace root.
 * "", "/", "./" all name the root itself. Paths leaving the root are rejected.
 */
export function buildPath(root: string, path: string): string {
  const trimmed = normalize(path.replace(/^\/+/, '') || '.');
  const target = resolve(root, trimmed);
  const rel = relative(root, target);
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new SyncStageError('RenderFailed', `path ${path} points outside the artifact`);
  }
  return rel || '.';
}

export interface KustomizeRendererOptions {
  kustomizeBin?: string;
}

/** Renders manifests with `kustomize build`. */
export class KustomizeRenderer implements ManifestRenderer {
  private readonly bin: string;

  constructor(opts: KustomizeRendererOptions = {}) {
    this.bin = opts.kustomizeBin ?? 'kustomize';
  }

  async render(dir: string, path: string, signal: AbortSignal): Promise<string> {
    const buildDir = buildPath(dir, path);
    try {
      const { stdout } = await runTool(this.bin, ['build', buildDir], { cwd: dir, signal });
      return stdout;
    } catch (err) {
      if (err instanceof ToolError) {
        log.warn({ buildDir, output: err.output }, 'kustomize build failed');
        throw new SyncStageError(
          'RenderFailed',
          `kustomize build error: ${toolDiagnostic(err)}`,
          { cause: err },
        );
      }
      throw new SyncStageError('RenderFailed', `kustomize build error: ${errorMessage(err)}`, { cause: err });
    }
  }
}
