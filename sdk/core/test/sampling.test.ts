import type { Event, SamplingContext } from '@lantern-monitor/types';
import { SamplingConfigurationError } from '@lantern-monitor/utils';
import { describe, expect, it, vi } from 'vitest';

import { Hub } from '../src/hub';
import { sampleTransaction, validateSampleRate } from '../src/tracing/sampling';
import { hasTracingEnabled } from '../src/utils/hasTracingEnabled';
import { parseSampleRate } from '../src/utils/parseSampleRate';
import {
  getDefaultTestClientOptions,
  makeTestClient,
  TestClient,
} from './mocks/client';

function context(overrides: Partial<SamplingContext> = {}): SamplingContext {
  return {
    transactionContext: { name: 'checkout', op: 'task' },
    ...overrides,
  };
}

describe('sampleTransaction', () => {
  it('samples everything at rate 1', () => {
    expect(sampleTransaction({ tracesSampleRate: 1 }, context())).toEqual([
      true,
      1,
    ]);
  });

  it('samples nothing at rate 0', () => {
    expect(sampleTransaction({ tracesSampleRate: 0 }, context())).toEqual([
      false,
      0,
    ]);
  });

  it('does not sample when tracing is not configured', () => {
    expect(sampleTransaction({}, context())).toEqual([false]);
  });

  it('compares the rate against a random number', () => {
    const random = vi.spyOn(Math, 'random');

    random.mockReturnValueOnce(0.4);
    expect(sampleTransaction({ tracesSampleRate: 0.5 }, context())).toEqual([
      true,
      0.5,
    ]);

    random.mockReturnValueOnce(0.5);
    expect(sampleTransaction({ tracesSampleRate: 0.5 }, context())).toEqual([
      false,
      0.5,
    ]);
  });

  it('keeps the upstream decision over the local rate', () => {
    expect(
      sampleTransaction(
        { tracesSampleRate: 0 },
        context({ parentSampled: true }),
      ),
    ).toEqual([true]);
    expect(
      sampleTransaction(
        { tracesSampleRate: 1 },
        context({ parentSampled: false }),
      ),
    ).toEqual([false]);
  });

  it('prefers an explicit decision on the transaction context', () => {
    const sampler = vi.fn(() => true);

    expect(
      sampleTransaction(
        { tracesSampler: sampler },
        context({
          transactionContext: { name: 'checkout', op: 'task', sampled: false },
          parentSampled: true,
        }),
      ),
    ).toEqual([false]);
    expect(sampler).not.toHaveBeenCalled();
  });

  it('lets a sampler decide with a boolean', () => {
    expect(
      sampleTransaction(
        { tracesSampler: () => true, tracesSampleRate: 0 },
        context(),
      ),
    ).toEqual([true]);
    expect(
      sampleTransaction(
        { tracesSampler: () => false, tracesSampleRate: 1 },
        context(),
      ),
    ).toEqual([false]);
  });

  it('uses a rate returned by the sampler', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.3);

    expect(
      sampleTransaction(
        { tracesSampler: () => 0.25, tracesSampleRate: 1 },
        context(),
      ),
    ).toEqual([false, 0.25]);
  });

  it('falls back to tracesSampleRate when the sampler has no opinion', () => {
    expect(
      sampleTransaction(
        { tracesSampler: () => undefined, tracesSampleRate: 1 },
        context(),
      ),
    ).toEqual([true, 1]);
    expect(
      sampleTransaction({ tracesSampler: () => undefined }, context()),
    ).toEqual([false]);
  });

  it('passes the custom sampling context to the sampler', () => {
    const sampler = vi.fn((samplingContext: SamplingContext) =>
      samplingContext['tenant'] === 'internal',
    );

    expect(
      sampleTransaction(
        { tracesSampler: sampler },
        context({ tenant: 'internal' }),
      ),
    ).toEqual([true]);
    expect(sampler).toHaveBeenCalledWith({
      transactionContext: { name: 'checkout', op: 'task' },
      tenant: 'internal',
    });
  });

  it('does not sample when the sampler throws', () => {
    expect(
      sampleTransaction(
        {
          tracesSampler: () => {
            throw new Error('sampler failed');
          },
          tracesSampleRate: 1,
        },
        context(),
      ),
    ).toEqual([false]);
  });

  it('does not sample when the sampler returns an invalid rate', () => {
    expect(
      sampleTransaction(
        { tracesSampler: () => 2, tracesSampleRate: 1 },
        context(),
      ),
    ).toEqual([false]);
  });
});

describe('validateSampleRate', () => {
  it.each([undefined, 0, 0.25, 1])('accepts %s', (rate) => {
    expect(() => validateSampleRate(rate)).not.toThrow();
  });

  it.each([-0.1, 1.5, Number.NaN, Number.POSITIVE_INFINITY, '0.5', true])(
    'rejects %s',
    (rate) => {
      expect(() => validateSampleRate(rate)).toThrow(
        SamplingConfigurationError,
      );
    },
  );

  it('names the option in the message', () => {
    expect(() => validateSampleRate(2)).toThrow(
      'Invalid tracesSampleRate: expected a number between 0 and 1, got 2.',
    );
  });

  it('is raised when the client is created', () => {
    expect(
      () =>
        new TestClient(getDefaultTestClientOptions({ tracesSampleRate: 1.5 })),
    ).toThrow(SamplingConfigurationError);
  });
});

describe('parseSampleRate', () => {
  it('accepts numbers, numeric strings and booleans', () => {
    expect(parseSampleRate(0.5)).toBe(0.5);
    expect(parseSampleRate('0.1')).toBe(0.1);
    expect(parseSampleRate(true)).toBe(1);
    expect(parseSampleRate(false)).toBe(0);
  });

  it('returns undefined for anything else', () => {
    expect(parseSampleRate('abc')).toBeUndefined();
    expect(parseSampleRate(-1)).toBeUndefined();
    expect(parseSampleRate(null)).toBeUndefined();
  });
});

describe('hasTracingEnabled', () => {
  it('needs a rate or a sampler', () => {
    expect(hasTracingEnabled(undefined)).toBe(false);
    expect(hasTracingEnabled({})).toBe(false);
    expect(hasTracingEnabled({ tracesSampleRate: 0 })).toBe(true);
    expect(hasTracingEnabled({ tracesSampler: () => undefined })).toBe(true);
  });
});

describe('unsampled transactions', () => {
  it('are still reported, flagged as not sampled', () => {
    const sent: Event[] = [];
    const hub = new Hub(makeTestClient(sent, { tracesSampleRate: 0 }));

    const transaction = hub.startTransaction('checkout', 'task');
    transaction.startChild('db.query').finish();
    transaction.finish();

    expect(transaction.spanContext().sampled).toBe(false);
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      type: 'transaction',
      contexts: { trace: { sampled: false } },
      sample_rate: 0,
    });
    expect(transaction.getSpans()[0]?.spanContext().sampled).toBe(false);
  });

  it('are reported when tracing is not configured at all', () => {
    const sent: Event[] = [];
    const hub = new Hub(makeTestClient(sent));

    hub.startTransaction('checkout', 'task').finish();

    expect(sent[0]).toMatchObject({ contexts: { trace: { sampled: false } } });
  });
});
