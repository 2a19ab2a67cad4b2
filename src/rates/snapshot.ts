/**
 * Current-rate snapshot for a base currency, projected onto the requested
 * targets.
 */

import { err, ok, type Result } from '@/core/result';
import type { FetchError, FetchOptions, RateSource } from '@/providers/types';
import { isCurrencyCode, normalizeTargets, type CurrencyCode } from './currency';

export interface SnapshotPartition {
  base: CurrencyCode;
  /** requested targets present in the snapshot, in request order */
  available: Record<CurrencyCode, number>;
  /** requested targets the snapshot does not know, in request order */
  missing: string[];
}

/**
 * Splits `targets` by presence in `rates`. Every target lands in exactly one
 * of the two outputs.
 */
export function partitionTargets(
  base: CurrencyCode,
  rates: Record<CurrencyCode, number>,
  targets: readonly string[]
): SnapshotPartition {
  const available: Record<CurrencyCode, number> = {};
  const missing: string[] = [];

  for (const target of normalizeTargets(targets)) {
    const rate = isCurrencyCode(target) && Object.hasOwn(rates, target) ? rates[target] : undefined;
    if (rate !== undefined) {
      available[target] = rate;
    } else {
      missing.push(target);
    }
  }

  return { base, available, missing };
}

export class SnapshotFetcher {
  constructor(private readonly source: RateSource) {}

  /**
   * One "latest" request. A failed request fails the whole snapshot.
   */
  async getSnapshot(
    base: string,
    targets: readonly string[],
    options: FetchOptions = {}
  ): Promise<Result<SnapshotPartition, FetchError>> {
    const result = await this.source.fetchRates(base, 'latest', options);
    if (!result.ok) {
      return err(result.error);
    }

    const snapshot = result.value;
    return ok(partitionTargets(snapshot.base, snapshot.rates, targets));
  }
}
