import { getEnvConfig, type EnvConfig } from '@/core/env';
import type { Clock } from '@/core/time';
import { ErApiClient, type FetchFn } from './erapi/client';
import { RetryingRateSource } from './retrying_source';
import type { RateSource } from './types';

export interface CreateRateSourceOptions {
  env?: EnvConfig;
  fetchFn?: FetchFn;
  clock?: Clock;
}

/**
 * Create the rate source based on ENV configuration.
 *
 * ENV:
 * - FX_API_BASE_URL, FX_REQUEST_TIMEOUT_MS: client settings
 * - FX_MAX_RETRIES > 0 wraps the client in a RetryingRateSource
 */
export function createRateSource(options: CreateRateSourceOptions = {}): RateSource {
  const env = options.env ?? getEnvConfig();

  const client = new ErApiClient({
    baseUrl: env.apiBaseUrl,
    timeoutMs: env.requestTimeoutMs,
    fetchFn: options.fetchFn,
    clock: options.clock,
  });

  if (env.maxRetries > 0) {
    return new RetryingRateSource(client, {
      maxRetries: env.maxRetries,
      initialBackoffMs: env.retryBackoffMs,
    });
  }
  return client;
}
