/**
 * One conversion cycle per user interaction: optional swap, latest snapshot,
 * converted values, then the trend over the targets the snapshot knows.
 */

import { createChildLogger } from '@/utils/logger';
import { getConfig } from '@/core/config';
import { FetchError, type FetchErrorKind, type FetchOptions, type RateSource } from '@/providers/types';
import {
  buildConversionCards,
  parseConversionRequest,
  pivotSeries,
  type ConversionCard,
  type ConversionInput,
  type ConversionRequest,
  type RateTableRow,
} from './conversion';
import { HistorySeriesBuilder, windowDaysError, type HistorySeries } from './history';
import { SnapshotFetcher, type SnapshotPartition } from './snapshot';
import { swapBaseWithFirstTarget } from './swap';

const logger = createChildLogger('cycle');

export interface CycleDependencies {
  snapshots: SnapshotFetcher;
  history: HistorySeriesBuilder;
}

export interface CycleOptions extends FetchOptions {
  swap?: boolean;
  windowDays?: number;
}

export interface CycleError {
  kind: FetchErrorKind;
  message: string;
}

export type CycleOutcome =
  | {
      status: 'error';
      request: ConversionRequest | null;
      error: CycleError;
    }
  | {
      status: 'ok';
      request: ConversionRequest;
      snapshot: SnapshotPartition;
      conversions: ConversionCard[];
      history: HistorySeries | null;
      table: RateTableRow[] | null;
    };

export function createCycleDependencies(source: RateSource, concurrency?: number): CycleDependencies {
  return {
    snapshots: new SnapshotFetcher(source),
    history: new HistorySeriesBuilder(source, { concurrency }),
  };
}

export async function runConversionCycle(
  input: ConversionInput,
  deps: CycleDependencies,
  options: CycleOptions = {}
): Promise<CycleOutcome> {
  const parsed = parseConversionRequest(input);
  if (!parsed.ok) {
    return {
      status: 'error',
      request: null,
      error: { kind: parsed.error.kind, message: parsed.error.message },
    };
  }

  const windowDays = options.windowDays ?? getConfig().windowDays;
  const windowProblem = windowDaysError(windowDays);
  if (windowProblem) {
    return {
      status: 'error',
      request: null,
      error: { kind: 'InvalidRequest', message: windowProblem },
    };
  }

  const request = options.swap ? swapBaseWithFirstTarget(parsed.value) : parsed.value;
  const fetchOptions: FetchOptions = { signal: options.signal };

  const snapshotResult = await deps.snapshots.getSnapshot(
    request.base,
    request.targets,
    fetchOptions
  );
  // Cancelled cycles reject; they never report the aborted request as an outcome
  options.signal?.throwIfAborted();
  if (!snapshotResult.ok) {
    logger.error(
      { base: request.base, kind: snapshotResult.error.kind },
      'Could not fetch latest rates'
    );
    return {
      status: 'error',
      request,
      error: { kind: snapshotResult.error.kind, message: snapshotResult.error.message },
    };
  }

  const snapshot = snapshotResult.value;
  if (snapshot.missing.length > 0) {
    logger.warn({ base: request.base, missing: snapshot.missing }, 'Some currencies not found');
  }

  const conversions = buildConversionCards(request, snapshot);
  const availableTargets = Object.keys(snapshot.available);

  let history: HistorySeries | null = null;
  let table: RateTableRow[] | null = null;
  if (availableTargets.length > 0) {
    try {
      history = await deps.history.buildSeries(
        request.base,
        availableTargets,
        windowDays,
        fetchOptions
      );
    } catch (error) {
      // Cancellation and unexpected failures propagate; invalid input is reported
      if (!(error instanceof FetchError)) throw error;
      return { status: 'error', request, error: { kind: error.kind, message: error.message } };
    }
    table = pivotSeries(history);
  }

  return { status: 'ok', request, snapshot, conversions, history, table };
}
