import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const { mockExecFileAsync } = vi.hoisted(() => ({
  mockExecFileAsync: vi.fn(),
}));

vi.mock('@kustomize-sync/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@kustomize-sync/shared')>();
  return {
    ...actual,
    logger: {
      child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
    },
  };
});

vi.mock('node:child_process', async () => {
  const { promisify } = await import('node:util');
  const execFile = Object.assign(vi.fn(), {
    [promisify.custom]: mockExecFileAsync,
  });
  return { execFile };
});

import { HttpArtifactFetcher, resolveArtifact } from '../artifact.js';
import { SyncStageError } from '../errors.js';
import { makeSource } from './fixtures.js';

const ARTIFACT_URL = 'https://x/artifact.tar.gz';
const originalFetch = globalThis.fetch;
let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'artifact-test-'));
});

afterEach(async () => {
  vi.clearAllMocks();
  globalThis.fetch = originalFetch;
  await rm(dir, { recursive: true, force: true });
});

describe('resolveArtifact', () => {
  it('returns the published artifact', () => {
    expect(resolveArtifact(makeSource(ARTIFACT_URL, 'main/6a2f1b9'))).toEqual({ url: ARTIFACT_URL, revision: 'main/6a2f1b9' });
  });

  it('fails with ArtifactMissing when the source has no status', () => {
    const source = makeSource();
    source.status = undefined;

    expect(() => resolveArtifact(source)).toThrow(SyncStageError);
    expect(() => resolveArtifact(source)).toThrow('artifact not found in podinfo-repo');
  });

  it('fails with ArtifactMissing when the artifact is null', () => {
    const source = makeSource();
    source.status = { artifact: null };

    expect(() => resolveArtifact(source)).toThrow('artifact not found in podinfo-repo');
  });

  it('fails with ArtifactMissing when the URL is empty', () => {
    let caught: unknown;
    try {
      resolveArtifact(makeSource(''));
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ reason: 'ArtifactMissing', message: 'artifact not found in podinfo-repo' });
  });
});

describe('HttpArtifactFetcher', () => {
  it('downloads the archive and unpacks it with one component stripped', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('fake-tarball', { status: 200 }));
    globalThis.fetch = fetchMock;
    let archiveContent = '';
    mockExecFileAsync.mockImplementationOnce(async (_bin: string, args: string[]) => {
      archiveContent = await readFile(args[1], 'utf-8');
      return { stdout: '', stderr: '' };
    });
    const signal = new AbortController().signal;

    await new HttpArtifactFetcher().fetch({ url: ARTIFACT_URL }, dir, signal);

    expect(fetchMock).toHaveBeenCalledWith(ARTIFACT_URL, { signal });
    expect(mockExecFileAsync).toHaveBeenCalledWith(
      'tar',
      ['-xzf', expect.stringMatching(/\/\.artifact-[0-9a-f-]+\.tar\.gz$/), '--strip-components=1', '-C', dir],
      expect.objectContaining({ cwd: dir, signal }),
    );
    expect(archiveContent).toBe('fake-tarball');
    // the downloaded archive does not stay in the workspace
    expect(await readdir(dir)).toEqual([]);
  });

  it('fails with FetchFailed on a non-2xx response', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('artifact not found', { status: 404 }));

    await expect(
      new HttpArtifactFetcher().fetch({ url: ARTIFACT_URL }, dir, new AbortController().signal),
    ).rejects.toMatchObject({
      reason: 'FetchFailed',
      message: 'artifact download https://x/artifact.tar.gz failed: HTTP 404: artifact not found',
    });
    expect(mockExecFileAsync).not.toHaveBeenCalled();
  });

  it('fails with FetchFailed on a network error', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      new HttpArtifactFetcher().fetch({ url: ARTIFACT_URL }, dir, new AbortController().signal),
    ).rejects.toMatchObject({
      reason: 'FetchFailed',
      message: 'artifact download https://x/artifact.tar.gz failed: fetch failed',
    });
  });

  it('reports an aborted download as deadline exceeded', async () => {
    const controller = new AbortController();
    controller.abort();
    globalThis.fetch = vi.fn().mockRejectedValue(new DOMException('This operation was aborted', 'AbortError'));

    await expect(new HttpArtifactFetcher().fetch({ url: ARTIFACT_URL }, dir, controller.signal)).rejects.toMatchObject({
      reason: 'FetchFailed',
      message: 'artifact download https://x/artifact.tar.gz failed: deadline exceeded',
    });
  });

  it('reports a deadline hit while reading the body as deadline exceeded', async () => {
    const controller = new AbortController();
    const body = new ReadableStream<Uint8Array>({
      start(c) {
        c.enqueue(new TextEncoder().encode('partial-tarball'));
      },
      pull() {
        controller.abort();
      },
    });
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));

    await expect(new HttpArtifactFetcher().fetch({ url: ARTIFACT_URL }, dir, controller.signal)).rejects.toMatchObject({
      reason: 'FetchFailed',
      message: 'artifact download https://x/artifact.tar.gz failed: deadline exceeded',
    });
    expect(mockExecFileAsync).not.toHaveBeenCalled();
  });

  it('fails with FetchFailed on an empty response body', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));

    await expect(
      new HttpArtifactFetcher().fetch({ url: ARTIFACT_URL }, dir, new AbortController().signal),
    ).rejects.toMatchObject({
      reason: 'FetchFailed',
      message: 'artifact download https://x/artifact.tar.gz failed: empty response body',
    });
    expect(mockExecFileAsync).not.toHaveBeenCalled();
  });

  it('fails with FetchFailed carrying tar output and cleans up the archive', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('not-a-tarball', { status: 200 }));
    mockExecFileAsync.mockRejectedValueOnce(
      Object.assign(new Error('Command failed'), {
        code: 2,
        stdout: '',
        stderr: 'gzip: stdin: not in gzip format\ntar: Child returned status 1\n',
      }),
    );

    await expect(
      new HttpArtifactFetcher({ tarBin: 'gtar' }).fetch({ url: ARTIFACT_URL }, dir, new AbortController().signal),
    ).rejects.toMatchObject({
      reason: 'FetchFailed',
      message:
        'artifact acquisition failed: gtar: exit status 2\ngzip: stdin: not in gzip format\ntar: Child returned status 1',
    });
    expect(await readdir(dir)).toEqual([]);
  });
});
