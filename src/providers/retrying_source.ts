/**
 * Rate source decorator that retries transient failures.
 *
 * Only `Unreachable` failures are retried, with exponential backoff. A logical
 * rejection from the upstream (unknown currency, bad date) is returned as-is.
 */

import { createChildLogger } from '@/utils/logger';
import { isRetryable, type FetchOptions, type RateDate, type RateResult, type RateSource } from './types';

const logger = createChildLogger('retrying_source');

export interface RetryOptions {
  maxRetries?: number;
  initialBackoffMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class RetryingRateSource implements RateSource {
  readonly name: string;

  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly inner: RateSource,
    options: RetryOptions = {}
  ) {
    this.name = `${inner.name}+retry`;
    this.maxRetries = Math.max(0, options.maxRetries ?? 2);
    this.initialBackoffMs = Math.max(0, options.initialBackoffMs ?? 500);
    this.sleep = options.sleep ?? abortableSleep;
  }

  getRequestCount(): number {
    return this.inner.getRequestCount();
  }

  async fetchRates(base: string, when: RateDate, options: FetchOptions = {}): Promise<RateResult> {
    let result = await this.inner.fetchRates(base, when, options);

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (result.ok || !isRetryable(result.error) || options.signal?.aborted) {
        return result;
      }

      const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
      logger.warn(
        { base, when, attempt: attempt + 1, backoffMs, error: result.error.message },
        'Rates request unreachable, retrying'
      );
      await this.sleep(backoffMs, options.signal);
      if (options.signal?.aborted) {
        return result;
      }

      result = await this.inner.fetchRates(base, when, options);
    }

    return result;
  }
}
