import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { logger, type Artifact, type SourceObject } from '@kustomize-sync/shared';
import { SyncStageError, ToolError, errorMessage, toolDiagnostic } from './errors.js';
import { runTool } from './exec.js';
import type { ArtifactFetcher } from './types.js';

const log = logger.child({ module: 'artifact' });

/**
 * Return the source's artifact, or fail with ArtifactMissing when the source
 * has not published one yet. Runs before any workspace is allocated.
 */
export function resolveArtifact(source: SourceObject): Artifact {
  const artifact = source.status?.artifact;
  if (!artifact || artifact.url === '') {
    throw new SyncStageError('ArtifactMissing', `artifact not found in ${source.metadata.name}`);
  }
  return artifact;
}

export interface HttpArtifactFetcherOptions {
  tarBin?: string;
}

/** Downloads a tarball over HTTP and unpacks it with `tar --strip-components=1`. */
export class HttpArtifactFetcher implements ArtifactFetcher {
  private readonly tarBin: string;

  constructor(opts: HttpArtifactFetcherOptions = {}) {
    this.tarBin = opts.tarBin ?? 'tar';
  }

  async fetch(artifact: Artifact, dir: string, signal: AbortSignal): Promise<void> {
    const { url } = artifact;

    let res: Response;
    try {
      res = await fetch(url, { signal });
    } catch (err) {
      const reason = signal.aborted ? 'deadline exceeded' : errorMessage(err);
      throw new SyncStageError('FetchFailed', `artifact download ${url} failed: ${reason}`, { cause: err });
    }
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new SyncStageError(
        'FetchFailed',
        `artifact download ${url} failed: HTTP ${res.status}${body ? `: ${body.slice(0, 1024)}` : ''}`,
      );
    }

    const archive = join(dir, `.artifact-${randomUUID()}.tar.gz`);
    try {
      await this.download(url, res, archive, signal);
      await runTool(this.tarBin, ['-xzf', archive, '--strip-components=1', '-C', dir], { cwd: dir, signal });
    } catch (err) {
      if (err instanceof SyncStageError) throw err;
      if (err instanceof ToolError) {
        throw new SyncStageError(
          'FetchFailed',
          `artifact acquisition failed: ${toolDiagnostic(err)}`,
          { cause: err },
        );
      }
      throw new SyncStageError('FetchFailed', `artifact acquisition failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      await rm(archive, { force: true });
    }

    log.debug({ url, revision: artifact.revision, dir }, 'artifact unpacked');
  }

  /** Stream the response body to `archive`. */
  private async download(url: string, res: Response, archive: string, signal: AbortSignal): Promise<void> {
    if (!res.body) {
      throw new SyncStageError('FetchFailed', `artifact download ${url} failed: empty response body`);
    }
    try {
      await pipeline(Readable.fromWeb(res.body), createWriteStream(archive), { signal });
    } catch (err) {
      const reason = signal.aborted ? 'deadline exceeded' : errorMessage(err);
      throw new SyncStageError('FetchFailed', `artifact download ${url} failed: ${reason}`, { cause: err });
    }
  }
}
