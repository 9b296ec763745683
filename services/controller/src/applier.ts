import { dirname } from 'node:path';
import { logger } from '@kustomize-sync/shared';
import { SyncStageError, ToolError, errorMessage, toolDiagnostic } from './errors.js';
import { combinedOutput, runTool } from './exec.js';
import type { ManifestApplier } from './types.js';

const log = logger.child({ module: 'applier' });

export interface KubectlApplierOptions {
  kubectlBin?: string;
}

/** `kubectl apply` arguments for a manifest, with pruning scoped to `prune` when set. */
export function applyArgs(manifestPath: string, prune: string): string[] {
  const args = ['apply', '-f', manifestPath];
  if (prune !== '') {
    args.push('--prune', '-l', prune);
  }
  return args;
}

/** Applies rendered manifests with `kubectl apply`. */
export class KubectlApplier implements ManifestApplier {
  private readonly bin: string;

  constructor(opts: KubectlApplierOptions = {}) {
    this.bin = opts.kubectlBin ?? 'kubectl';
  }

  async apply(manifestPath: string, prune: string, signal: AbortSignal): Promise<string> {
    try {
      const { stdout, stderr } = await runTool(this.bin, applyArgs(manifestPath, prune), {
        cwd: dirname(manifestPath),
        signal,
      });
      const output = combinedOutput(stdout, stderr);
      log.info({ manifest: manifestPath, prune: prune || undefined, output }, 'kubectl apply succeeded');
      return output;
    } catch (err) {
      if (err instanceof ToolError) {
        throw new SyncStageError(
          'ApplyFailed',
          `kubectl apply error: ${toolDiagnostic(err)}`,
          { cause: err },
        );
      }
      throw new SyncStageError('ApplyFailed', `kubectl apply error: ${errorMessage(err)}`, { cause: err });
    }
  }
}
