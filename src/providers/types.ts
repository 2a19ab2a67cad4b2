/**
 * Shared types for exchange-rate sources.
 *
 * A rate source answers one question: the rates for a base currency either
 * right now ("latest") or on a given calendar day. Everything above it
 * (snapshot partitioning, history aggregation) only sees this interface.
 */
import type { CalendarDate } from '@/core/time';
import type { Result } from '@/core/result';
import type { CurrencyCode } from '@/rates/currency';

export type RateDate = 'latest' | CalendarDate;

export interface RateSnapshot {
  base: CurrencyCode;
  asOf: RateDate;
  /** units of each currency per 1 unit of base; every value is > 0 and finite */
  rates: Record<CurrencyCode, number>;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export type RateResult = Result<RateSnapshot, FetchError>;

export interface RateSource {
  readonly name: string;
  fetchRates(base: string, when: RateDate, options?: FetchOptions): Promise<RateResult>;
  getRequestCount(): number;
}

export type FetchErrorKind =
  | 'Unreachable'
  | 'MalformedResponse'
  | 'UpstreamRejected'
  | 'InvalidRequest';

export class FetchError extends Error {
  constructor(
    message: string,
    public kind: FetchErrorKind,
    public base: string,
    public when: RateDate,
    public status?: number,
    public cause?: Error
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export function isRetryable(error: FetchError): boolean {
  return error.kind === 'Unreachable';
}
