import { err, ok } from '@/core/result';
import {
  FetchError,
  type FetchErrorKind,
  type FetchOptions,
  type RateDate,
  type RateResult,
  type RateSource,
} from '@/providers/types';

export interface RecordedCall {
  base: string;
  when: RateDate;
}

export type RateHandler = (
  base: string,
  when: RateDate,
  options: FetchOptions
) => RateResult | Promise<RateResult>;

/**
 * In-process rate source: answers from a handler and records every call.
 */
export class FakeRateSource implements RateSource {
  readonly name = 'fake';
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: RateHandler) {}

  getRequestCount(): number {
    return this.calls.length;
  }

  async fetchRates(base: string, when: RateDate, options: FetchOptions = {}): Promise<RateResult> {
    this.calls.push({ base, when });
    return this.handler(base, when, options);
  }
}

export function rates(base: string, when: RateDate, values: Record<string, number>): RateResult {
  return ok({ base, asOf: when, rates: values });
}

export function failure(kind: FetchErrorKind, base: string, when: RateDate, message: string = kind): RateResult {
  return err(new FetchError(message, kind, base, when));
}

/** 2026-10-18 at noon, local time */
export const fixedClock = () => new Date(2026, 9, 18, 12, 0, 0);
