/**
 * Conversion request parsing and the derived views a presentation layer
 * renders: converted-value cards and the multi-currency rate table.
 */

import { err, ok, type Result } from '@/core/result';
import type { CalendarDate } from '@/core/time';
import { FetchError } from '@/providers/types';
import { normalizeTargets, parseCurrencyCode, type CurrencyCode } from './currency';
import type { HistorySeries } from './history';
import type { SnapshotPartition } from './snapshot';

export interface ConversionRequest {
  base: CurrencyCode;
  /** order-preserving, no duplicates, may be empty */
  targets: CurrencyCode[];
  amount: number;
}

export interface ConversionInput {
  base: string;
  targets: readonly string[];
  amount: number;
}

export interface ConversionCard {
  target: CurrencyCode;
  rate: number;
  converted: number;
  /** converted value with 2 decimals */
  value: string;
  label: string;
  rateLabel: string;
}

export interface RateTableRow {
  date: CalendarDate;
  rates: Record<CurrencyCode, number | null>;
}

function invalid(message: string, base: string): FetchError {
  return new FetchError(message, 'InvalidRequest', base, 'latest');
}

export function parseConversionRequest(input: ConversionInput): Result<ConversionRequest, FetchError> {
  const base = parseCurrencyCode(input.base);
  if (!base) {
    return err(invalid(`Invalid base currency code: "${input.base}"`, input.base));
  }

  const targets = normalizeTargets(input.targets);
  const badTarget = targets.find((target) => parseCurrencyCode(target) === null);
  if (badTarget !== undefined) {
    return err(invalid(`Invalid target currency code: "${badTarget}"`, base));
  }

  if (typeof input.amount !== 'number' || !Number.isFinite(input.amount) || input.amount < 0) {
    return err(invalid(`Amount must be a non-negative number, got ${input.amount}`, base));
  }

  return ok({ base, targets, amount: input.amount });
}

export function convertAmount(amount: number, rate: number): number {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new RangeError(`Amount must be a non-negative number, got ${amount}`);
  }
  return amount * rate;
}

export function buildConversionCards(
  request: ConversionRequest,
  snapshot: SnapshotPartition
): ConversionCard[] {
  const cards: ConversionCard[] = [];
  for (const target of request.targets) {
    const rate = snapshot.available[target];
    if (rate === undefined) continue;

    const converted = convertAmount(request.amount, rate);
    cards.push({
      target,
      rate,
      converted,
      value: converted.toFixed(2),
      label: `${request.amount} ${request.base} → ${target}`,
      rateLabel: `1 ${request.base} = ${rate.toFixed(4)} ${target}`,
    });
  }
  return cards;
}

/**
 * Date × currency table. Only dates with at least one observation get a row;
 * a cell is null where that currency has no rate for the day.
 */
export function pivotSeries(history: HistorySeries): RateTableRow[] {
  const targets = Object.keys(history.series);
  const byDate = new Map<CalendarDate, Record<CurrencyCode, number | null>>();

  for (const target of targets) {
    for (const observation of history.series[target]) {
      let row = byDate.get(observation.date);
      if (!row) {
        row = Object.fromEntries(targets.map((code) => [code, null]));
        byDate.set(observation.date, row);
      }
      row[target] = observation.rate;
    }
  }

  return history.dates
    .filter((date) => byDate.has(date))
    .map((date) => ({ date, rates: byDate.get(date) ?? {} }));
}
