/**
 * ExchangeRate-API client
 * One request per call with a bounded timeout; no retries, no caching.
 *
 *   GET {baseUrl}/latest/USD
 *   GET {baseUrl}/2024-03-01/USD
 *
 * Both answer `{ result: 'success' | 'error', rates?, 'error-type'? }`; the
 * `result` field is checked even on HTTP 200.
 */

import { createChildLogger } from '@/utils/logger';
import { getEnvConfig } from '@/core/env';
import { err, ok, type Result } from '@/core/result';
import { isAfterToday, isCalendarDate, systemClock, type Clock } from '@/core/time';
import { isCurrencyCode, parseCurrencyCode } from '@/rates/currency';
import {
  FetchError,
  type FetchOptions,
  type RateDate,
  type RateResult,
  type RateSource,
} from '../types';

const logger = createChildLogger('erapi');

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface ErApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  clock?: Clock;
}

interface RawResponse {
  status: number;
  ok: boolean;
  body: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function parseJson(text: string): Result<unknown, Error> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(toError(error));
  }
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return value && typeof value === 'object' && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;
}

/**
 * Validates the `rates` mapping. Returns null when any entry breaks the
 * snapshot invariants so the caller never sees a partial mapping.
 */
function parseRates(value: unknown): Record<string, number> | null {
  const record = asRecord(value);
  if (!record) return null;

  const entries = Object.entries(record);
  if (entries.length === 0) return null;

  const rates: Record<string, number> = {};
  for (const [code, rate] of entries) {
    if (!isCurrencyCode(code)) return null;
    if (typeof rate !== 'number' || !Number.isFinite(rate) || rate <= 0) return null;
    rates[code] = rate;
  }
  return rates;
}

export class ErApiClient implements RateSource {
  readonly name = 'er-api';

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly clock: Clock;
  private requestCount = 0;

  constructor(options: ErApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? getEnvConfig().apiBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? getEnvConfig().requestTimeoutMs;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? systemClock;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  buildUrl(base: string, when: RateDate): string {
    return `${this.baseUrl}/${when}/${base}`;
  }

  async fetchRates(base: string, when: RateDate, options: FetchOptions = {}): Promise<RateResult> {
    const code = parseCurrencyCode(base);
    if (!code) {
      return err(
        new FetchError(`Invalid base currency code: "${base}"`, 'InvalidRequest', base, when)
      );
    }
    if (when !== 'latest') {
      if (!isCalendarDate(when)) {
        return err(new FetchError(`Invalid date: "${when}"`, 'InvalidRequest', code, when));
      }
      if (isAfterToday(when, this.clock)) {
        return err(
          new FetchError(`Date ${when} is in the future`, 'InvalidRequest', code, when)
        );
      }
    }

    const url = this.buildUrl(code, when);
    logger.debug({ base: code, when }, 'Fetching rates');

    let raw: RawResponse;
    try {
      raw = await this.request(url, options.signal);
    } catch (error) {
      const cause = toError(error);
      logger.warn({ base: code, when, error: cause.message }, 'Rates request failed');
      return err(new FetchError(cause.message, 'Unreachable', code, when, undefined, cause));
    }

    const result = this.parseResponse(code, when, raw);
    if (!result.ok) {
      logger.warn(
        { base: code, when, kind: result.error.kind, status: raw.status },
        result.error.message
      );
    }
    return result;
  }

  private parseResponse(base: string, when: RateDate, raw: RawResponse): RateResult {
    const json = parseJson(raw.body);
    const payload = json.ok ? asRecord(json.value) : null;

    // An explicit error envelope wins over the transport status
    if (payload?.result === 'error') {
      const errorType =
        typeof payload['error-type'] === 'string' ? payload['error-type'] : 'unknown-error';
      return err(
        new FetchError(
          `Upstream rejected ${base} (${when}): ${errorType}`,
          'UpstreamRejected',
          base,
          when,
          raw.status
        )
      );
    }

    if (!raw.ok) {
      return err(
        new FetchError(
          `Rates API returned HTTP ${raw.status}`,
          'Unreachable',
          base,
          when,
          raw.status
        )
      );
    }

    if (!json.ok) {
      return err(
        new FetchError(
          `Response is not valid JSON: ${json.error.message}`,
          'MalformedResponse',
          base,
          when,
          raw.status,
          json.error
        )
      );
    }

    if (!payload || payload.result !== 'success') {
      return err(
        new FetchError('Response has no success status', 'MalformedResponse', base, when, raw.status)
      );
    }

    const rates = parseRates(payload.rates);
    if (!rates) {
      return err(
        new FetchError(
          'Response rates are missing, empty or invalid',
          'MalformedResponse',
          base,
          when,
          raw.status
        )
      );
    }

    return ok({ base, asOf: when, rates });
  }

  private async request(url: string, signal?: AbortSignal): Promise<RawResponse> {
    if (signal?.aborted) {
      throw new Error('Request aborted');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    this.requestCount++;
    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: {
          Accept: 'application/json',
        },
      });
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      if (timedOut) {
        throw new Error(`Request timed out after ${this.timeoutMs}ms`);
      }
      if (signal?.aborted) {
        throw new Error('Request aborted');
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
