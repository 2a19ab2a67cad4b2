/**
 * Day-by-day historical series for a base currency and a set of targets.
 *
 * One request per date, shared by every target. A failed day or a target
 * missing from a day leaves a gap in that target's series; it never aborts
 * the window.
 */

import { createChildLogger } from '@/utils/logger';
import { runWithConcurrency } from '@/utils/concurrency';
import { DEFAULT_HISTORY_CONCURRENCY, MAX_HISTORY_CONCURRENCY } from '@/core/env';
import { dateWindow, systemClock, type CalendarDate, type Clock } from '@/core/time';
import { FetchError, type FetchOptions, type RateSnapshot, type RateSource } from '@/providers/types';
import { isCurrencyCode, normalizeTargets, parseCurrencyCode, type CurrencyCode } from './currency';

const logger = createChildLogger('history');

export interface RateObservation {
  base: CurrencyCode;
  date: CalendarDate;
  target: CurrencyCode;
  rate: number;
}

/** Ascending by date, no duplicate dates, gaps allowed. */
export type TimeSeries = RateObservation[];

export interface HistorySeries {
  base: CurrencyCode;
  /** every date in the window, ascending */
  dates: CalendarDate[];
  /** one entry per requested target; empty when no day had a rate */
  series: Record<CurrencyCode, TimeSeries>;
  /** date-fetches that returned a failure */
  failedFetches: number;
  /** (date, target) pairs absent from an otherwise successful day */
  missingObservations: number;
}

export interface HistorySeriesBuilderOptions {
  concurrency?: number;
  clock?: Clock;
}

type DaySlot = RateSnapshot | FetchError | null;

/** Returns why `windowDays` is unusable, or null when it is a positive whole number. */
export function windowDaysError(windowDays: number): string | null {
  return Number.isInteger(windowDays) && windowDays > 0
    ? null
    : `Window must be a positive whole number of days, got ${windowDays}`;
}

export class HistorySeriesBuilder {
  private readonly concurrency: number;
  private readonly clock: Clock;

  constructor(
    private readonly source: RateSource,
    options: HistorySeriesBuilderOptions = {}
  ) {
    const requested = options.concurrency ?? DEFAULT_HISTORY_CONCURRENCY;
    this.concurrency = Math.min(MAX_HISTORY_CONCURRENCY, Math.max(1, Math.floor(requested)));
    this.clock = options.clock ?? systemClock;
  }

  async buildSeries(
    base: string,
    targets: readonly string[],
    windowDays: number,
    options: FetchOptions = {}
  ): Promise<HistorySeries> {
    const code = parseCurrencyCode(base);
    if (!code) {
      throw new FetchError(`Invalid base currency code: "${base}"`, 'InvalidRequest', base, 'latest');
    }
    const windowProblem = windowDaysError(windowDays);
    if (windowProblem) {
      throw new FetchError(windowProblem, 'InvalidRequest', code, 'latest');
    }

    const wanted = normalizeTargets(targets).filter(isCurrencyCode);
    const dates = dateWindow(windowDays, this.clock);
    const slots: DaySlot[] = dates.map(() => null);

    await runWithConcurrency(
      dates,
      async (date, index) => {
        try {
          const result = await this.source.fetchRates(code, date, options);
          slots[index] = result.ok ? result.value : result.error;
        } catch (error) {
          if (options.signal?.aborted) throw error;
          slots[index] =
            error instanceof FetchError
              ? error
              : new FetchError(
                  error instanceof Error ? error.message : String(error),
                  'Unreachable',
                  code,
                  date,
                  undefined,
                  error instanceof Error ? error : undefined
                );
        }
      },
      this.concurrency,
      options.signal
    );

    const series: Record<CurrencyCode, TimeSeries> = {};
    for (const target of wanted) {
      series[target] = [];
    }

    let failedFetches = 0;
    let missingObservations = 0;

    dates.forEach((date, index) => {
      const slot = slots[index];
      if (slot === null || slot instanceof FetchError) {
        failedFetches += 1;
        if (slot) {
          logger.warn({ base: code, date, kind: slot.kind }, 'Skipping day without rates');
        }
        return;
      }

      for (const target of wanted) {
        const rate = Object.hasOwn(slot.rates, target) ? slot.rates[target] : undefined;
        if (rate === undefined) {
          missingObservations += 1;
          continue;
        }
        series[target].push({ base: code, date, target, rate });
      }
    });

    logger.info(
      {
        base: code,
        targets: wanted,
        days: dates.length,
        failedFetches,
        missingObservations,
      },
      'Built rate history'
    );

    return { base: code, dates, series, failedFetches, missingObservations };
  }
}
