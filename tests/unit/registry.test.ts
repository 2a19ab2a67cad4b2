import { describe, expect, it, vi } from 'vitest';
import { loadEnvConfig, type EnvConfig } from '@/core/env';
import { ErApiClient, type FetchFn } from '@/providers/erapi/client';
import { createRateSource } from '@/providers/registry';
import { RetryingRateSource } from '@/providers/retrying_source';

function env(overrides: Partial<EnvConfig>): EnvConfig {
  return { ...loadEnvConfig(), apiBaseUrl: 'https://rates.test/v6', ...overrides };
}

describe('createRateSource', () => {
  it('returns the plain client when retries are disabled', () => {
    const source = createRateSource({ env: env({ maxRetries: 0 }) });

    expect(source).toBeInstanceOf(ErApiClient);
  });

  it('wraps the client when retries are enabled', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('down', { status: 502 }));
    const source = createRateSource({
      env: env({ maxRetries: 2, retryBackoffMs: 0 }),
      fetchFn,
    });

    const result = await source.fetchRates('USD', 'latest');

    expect(source).toBeInstanceOf(RetryingRateSource);
    expect(result.ok).toBe(false);
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fetchFn.mock.calls[0][0]).toBe('https://rates.test/v6/latest/USD');
  });
});
