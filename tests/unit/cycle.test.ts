import { describe, expect, it } from 'vitest';
import { runConversionCycle, type CycleDependencies } from '@/rates/cycle';
import { HistorySeriesBuilder } from '@/rates/history';
import { SnapshotFetcher } from '@/rates/snapshot';
import { FakeRateSource, failure, fixedClock, rates, type RateHandler } from '../helpers/fake_rate_source';

function makeDeps(handler: RateHandler) {
  const source = new FakeRateSource(handler);
  const deps: CycleDependencies = {
    snapshots: new SnapshotFetcher(source),
    history: new HistorySeriesBuilder(source, { clock: fixedClock }),
  };
  return { source, deps };
}

describe('runConversionCycle', () => {
  it('converts, reports missing currencies and builds the trend', async () => {
    const { source, deps } = makeDeps((base, when) =>
      when === 'latest'
        ? rates(base, when, { EUR: 0.9, JPY: 150 })
        : rates(base, when, { EUR: 0.9, JPY: 149 })
    );

    const outcome = await runConversionCycle(
      { base: 'USD', targets: ['EUR', 'NGN'], amount: 10 },
      deps
    );

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;

    expect(outcome.snapshot.available).toEqual({ EUR: 0.9 });
    expect(outcome.snapshot.missing).toEqual(['NGN']);
    expect(outcome.conversions).toHaveLength(1);
    expect(outcome.conversions[0].target).toBe('EUR');
    expect(outcome.conversions[0].converted).toBeCloseTo(9, 10);
    expect(outcome.conversions[0].value).toBe('9.00');

    expect(Object.keys(outcome.history?.series ?? {})).toEqual(['EUR']);
    expect(outcome.history?.series.EUR).toHaveLength(31);
    expect(outcome.table).toHaveLength(31);
    expect(outcome.table?.[0]).toEqual({ date: '2026-09-18', rates: { EUR: 0.9 } });
    // 1 latest + 31 historical
    expect(source.calls).toHaveLength(32);
  });

  it('applies the swap before fetching', async () => {
    const { source, deps } = makeDeps((base, when) => rates(base, when, { USD: 1.1, GBP: 0.85 }));

    const outcome = await runConversionCycle(
      { base: 'USD', targets: ['EUR', 'GBP'], amount: 3 },
      deps,
      { swap: true, windowDays: 1 }
    );

    expect(source.calls[0]).toEqual({ base: 'EUR', when: 'latest' });
    expect(source.calls.every((call) => call.base === 'EUR')).toBe(true);
    expect(outcome.request).toEqual({ base: 'EUR', targets: ['USD', 'GBP'], amount: 3 });
  });

  it('stops the cycle when the latest snapshot fails', async () => {
    const { source, deps } = makeDeps((base, when) =>
      failure('Unreachable', base, when, 'fetch failed')
    );

    const outcome = await runConversionCycle(
      { base: 'USD', targets: ['EUR'], amount: 1 },
      deps
    );

    expect(outcome).toEqual({
      status: 'error',
      request: { base: 'USD', targets: ['EUR'], amount: 1 },
      error: { kind: 'Unreachable', message: 'fetch failed' },
    });
    expect(source.calls).toHaveLength(1);
  });

  it('rejects invalid input without any request', async () => {
    const { source, deps } = makeDeps((base, when) => rates(base, when, { EUR: 0.9 }));

    const outcome = await runConversionCycle({ base: 'USD', targets: ['EUR'], amount: -2 }, deps);

    expect(outcome.status).toBe('error');
    if (outcome.status === 'error') {
      expect(outcome.error.kind).toBe('InvalidRequest');
      expect(outcome.request).toBeNull();
    }
    expect(source.calls).toHaveLength(0);
  });

  it('skips the trend when no target is available', async () => {
    const { source, deps } = makeDeps((base, when) => rates(base, when, { EUR: 0.9 }));

    const outcome = await runConversionCycle({ base: 'USD', targets: ['NGN'], amount: 1 }, deps);

    expect(outcome.status).toBe('ok');
    if (outcome.status === 'ok') {
      expect(outcome.conversions).toEqual([]);
      expect(outcome.history).toBeNull();
      expect(outcome.table).toBeNull();
    }
    expect(source.calls).toHaveLength(1);
  });

  it('reports an invalid window as an error outcome before any request', async () => {
    const { source, deps } = makeDeps((base, when) => rates(base, when, { EUR: 0.9 }));

    const outcome = await runConversionCycle(
      { base: 'USD', targets: ['EUR'], amount: 1 },
      deps,
      { windowDays: 0 }
    );

    expect(outcome).toEqual({
      status: 'error',
      request: null,
      error: {
        kind: 'InvalidRequest',
        message: 'Window must be a positive whole number of days, got 0',
      },
    });
    expect(source.calls).toHaveLength(0);
  });

  it('uses the configured window when none is given', async () => {
    const { source, deps } = makeDeps((base, when) => rates(base, when, { EUR: 0.9 }));

    const outcome = await runConversionCycle({ base: 'USD', targets: ['EUR'], amount: 1 }, deps);

    expect(outcome.status === 'ok' ? outcome.history?.dates.length : null).toBe(31);
    expect(source.calls).toHaveLength(32);
  });

  it('swaps into a distinct target list when the old base was also a target', async () => {
    const { deps } = makeDeps((base, when) => rates(base, when, { USD: 1.1, GBP: 0.85 }));

    const outcome = await runConversionCycle(
      { base: 'USD', targets: ['EUR', 'USD'], amount: 1 },
      deps,
      { swap: true, windowDays: 1 }
    );

    expect(outcome.request).toEqual({ base: 'EUR', targets: ['USD'], amount: 1 });
    expect(outcome.status === 'ok' ? outcome.conversions.map((card) => card.target) : []).toEqual([
      'USD',
    ]);
  });

  it('rejects when the caller aborts during the latest fetch', async () => {
    const controller = new AbortController();
    const { source, deps } = makeDeps((base, when) => {
      controller.abort(new Error('inputs changed'));
      return failure('Unreachable', base, when, 'Request aborted');
    });

    await expect(
      runConversionCycle({ base: 'USD', targets: ['EUR'], amount: 1 }, deps, {
        signal: controller.signal,
      })
    ).rejects.toThrow('inputs changed');
    expect(source.calls).toHaveLength(1);
  });

  it('propagates cancellation instead of returning a stale result', async () => {
    const controller = new AbortController();
    const { deps } = makeDeps((base, when) => {
      if (when !== 'latest') {
        controller.abort(new Error('inputs changed'));
      }
      return rates(base, when, { EUR: 0.9 });
    });

    await expect(
      runConversionCycle({ base: 'USD', targets: ['EUR'], amount: 1 }, deps, {
        signal: controller.signal,
      })
    ).rejects.toThrow('inputs changed');
  });
});
