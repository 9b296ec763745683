import { describe, it, expect } from 'vitest';
import {
  APPLY_SUCCEEDED_MESSAGE,
  APPLY_SUCCEEDED_REASON,
  StatusReporter,
  buildStatus,
  readyMessage,
  readyUpdateFor,
} from '../status.js';
import type { KustomizationStore } from '../types.js';
import { makeKustomization } from './fixtures.js';

const T0 = new Date('2026-03-01T12:00:00.000Z');
const T1 = new Date('2026-03-01T12:05:00.000Z');

describe('readyUpdateFor', () => {
  it('maps success to ApplySucceeded with the revision', () => {
    expect(readyUpdateFor({ status: 'succeeded', revision: 'main/6a2f1b9', output: '' })).toEqual({
      ready: true,
      reason: 'ApplySucceeded',
      message: 'kustomization was successfully applied',
      revision: 'main/6a2f1b9',
    });
  });

  it.each(['ArtifactMissing', 'FetchFailed', 'StorageOperationFailed', 'RenderFailed', 'ApplyFailed'] as const)(
    'maps %s to a NotReady update with the diagnostic',
    (reason) => {
      expect(readyUpdateFor({ status: 'failed', reason, message: 'boom' })).toEqual({
        ready: false,
        reason,
        message: 'boom',
      });
    },
  );
});

describe('buildStatus', () => {
  it('creates the Ready condition on first sync', () => {
    const status = buildStatus(
      undefined,
      { ready: true, reason: APPLY_SUCCEEDED_REASON, message: APPLY_SUCCEEDED_MESSAGE, revision: 'r1' },
      4,
      T0,
    );

    expect(status).toEqual({
      conditions: [
        {
          type: 'Ready',
          status: 'True',
          reason: 'ApplySucceeded',
          message: 'kustomization was successfully applied',
          lastTransitionTime: '2026-03-01T12:00:00.000Z',
        },
      ],
      observedGeneration: 4,
      lastAppliedRevision: 'r1',
    });
  });

  it('keeps the transition time while the status does not flip', () => {
    const first = buildStatus(undefined, { ready: false, reason: 'RenderFailed', message: 'a' }, 1, T0);
    const second = buildStatus(first, { ready: false, reason: 'ApplyFailed', message: 'b' }, 1, T1);

    expect(second.conditions).toHaveLength(1);
    expect(second.conditions[0]).toMatchObject({
      status: 'False',
      reason: 'ApplyFailed',
      message: 'b',
      lastTransitionTime: '2026-03-01T12:00:00.000Z',
    });
  });

  it('moves the transition time when the status flips', () => {
    const first = buildStatus(undefined, { ready: false, reason: 'RenderFailed', message: 'a' }, 1, T0);
    const second = buildStatus(first, { ready: true, reason: 'ApplySucceeded', message: 'ok', revision: 'r2' }, 2, T1);

    expect(second.conditions[0].lastTransitionTime).toBe('2026-03-01T12:05:00.000Z');
    expect(second.observedGeneration).toBe(2);
  });

  it('keeps the last applied revision across failures', () => {
    const ok = buildStatus(undefined, { ready: true, reason: 'ApplySucceeded', message: 'ok', revision: 'r1' }, 1, T0);
    const failed = buildStatus(ok, { ready: false, reason: 'FetchFailed', message: 'x' }, 2, T1);

    expect(failed.lastAppliedRevision).toBe('r1');
  });

  it('leaves other condition types untouched', () => {
    const other = {
      type: 'Reconciling',
      status: 'True' as const,
      reason: 'Progressing',
      message: '',
      lastTransitionTime: '2026-01-01T00:00:00.000Z',
    };
    const status = buildStatus({ conditions: [other] }, { ready: false, reason: 'ApplyFailed', message: 'x' }, 1, T0);

    expect(status.conditions.map((c) => c.type)).toEqual(['Reconciling', 'Ready']);
    expect(status.conditions[0]).toBe(other);
  });
});

describe('readyMessage', () => {
  it('summarises the Ready condition', () => {
    const k = makeKustomization();
    expect(readyMessage(k)).toBe('unknown');

    k.status = buildStatus(undefined, { ready: false, reason: 'RenderFailed', message: 'bad path' }, 1, T0);
    expect(readyMessage(k)).toBe('RenderFailed: bad path');

    k.status = buildStatus(undefined, { ready: true, reason: 'ApplySucceeded', message: 'applied' }, 1, T0);
    expect(readyMessage(k)).toBe('applied');
  });
});

describe('StatusReporter', () => {
  it('writes the computed status through the store', async () => {
    const written: unknown[] = [];
    const store: KustomizationStore = {
      getKustomization: async () => null,
      getSource: async () => {
        throw new Error('unused');
      },
      updateStatus: async (k) => {
        written.push(structuredClone(k.status));
      },
    };
    const reporter = new StatusReporter(store, () => T0);
    const k = makeKustomization({ generation: 7 });

    await reporter.report(k, { ready: false, reason: 'ApplyFailed', message: 'denied' });

    expect(written).toEqual([
      {
        conditions: [
          {
            type: 'Ready',
            status: 'False',
            reason: 'ApplyFailed',
            message: 'denied',
            lastTransitionTime: '2026-03-01T12:00:00.000Z',
          },
        ],
        observedGeneration: 7,
      },
    ]);
  });
});
