export { ok, err, type Result } from './core/result';
export { dateWindow, formatDate, parseCalendarDate, today, type CalendarDate, type Clock } from './core/time';
export { getEnvConfig, resetEnvConfig, type EnvConfig } from './core/env';
export {
  describeCurrency,
  findCurrency,
  getConfig,
  resetConfig,
  type AppConfig,
  type CurrencyOption,
} from './core/config';
export {
  FetchError,
  isRetryable,
  type FetchErrorKind,
  type FetchOptions,
  type RateDate,
  type RateResult,
  type RateSnapshot,
  type RateSource,
} from './providers/types';
export { ErApiClient, type ErApiClientOptions, type FetchFn } from './providers/erapi/client';
export { RetryingRateSource, type RetryOptions } from './providers/retrying_source';
export { createRateSource } from './providers/registry';
export { normalizeTargets, parseCurrencyCode, type CurrencyCode } from './rates/currency';
export { SnapshotFetcher, partitionTargets, type SnapshotPartition } from './rates/snapshot';
export {
  HistorySeriesBuilder,
  type HistorySeries,
  type RateObservation,
  type TimeSeries,
} from './rates/history';
export { swapBaseWithFirstTarget } from './rates/swap';
export {
  buildConversionCards,
  convertAmount,
  parseConversionRequest,
  pivotSeries,
  type ConversionCard,
  type ConversionInput,
  type ConversionRequest,
  type RateTableRow,
} from './rates/conversion';
export {
  createCycleDependencies,
  runConversionCycle,
  type CycleDependencies,
  type CycleOptions,
  type CycleOutcome,
} from './rates/cycle';
