/**
 * Application configuration loaded from config/currencies.json: the currency
 * menu offered to the user and the defaults for a conversion.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { normalizeTargets, parseCurrencyCode, type CurrencyCode } from '@/rates/currency';

export interface CurrencyOption {
  code: CurrencyCode;
  label: string;
  flag: string;
}

export interface AppConfig {
  currencies: CurrencyOption[];
  defaultBase: CurrencyCode;
  defaultTargets: CurrencyCode[];
  defaultAmount: number;
  windowDays: number;
}

export const DEFAULT_WINDOW_DAYS = 30;

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function asRecord(raw: unknown): Record<string, unknown> {
  return raw && typeof raw === 'object' && !Array.isArray(raw)
    ? (raw as Record<string, unknown>)
    : {};
}

function normalizeCurrencies(raw: unknown): CurrencyOption[] {
  const entries = Array.isArray(raw) ? raw : [];
  const options: CurrencyOption[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const record = asRecord(entry);
    const code = typeof record.code === 'string' ? parseCurrencyCode(record.code) : null;
    if (!code || seen.has(code)) continue;
    seen.add(code);
    options.push({
      code,
      label: typeof record.label === 'string' ? record.label : code,
      flag: typeof record.flag === 'string' ? record.flag : '',
    });
  }
  return options;
}

export function normalizeAppConfig(raw: unknown): AppConfig {
  const parsed = asRecord(raw);
  const currencies = normalizeCurrencies(parsed.currencies);
  const menu = new Set(currencies.map((c) => c.code));

  const baseCandidate =
    typeof parsed.defaultBase === 'string' ? parseCurrencyCode(parsed.defaultBase) : null;
  const defaultBase =
    baseCandidate && menu.has(baseCandidate) ? baseCandidate : currencies[0]?.code ?? 'USD';

  const rawTargets = Array.isArray(parsed.defaultTargets)
    ? parsed.defaultTargets.filter((t): t is string => typeof t === 'string')
    : [];
  const defaultTargets = normalizeTargets(rawTargets).filter((code) => menu.has(code));

  const amount = parsed.defaultAmount;
  const defaultAmount =
    typeof amount === 'number' && Number.isFinite(amount) && amount >= 0 ? amount : 1;

  const days = parsed.windowDays;
  const windowDays =
    typeof days === 'number' && Number.isInteger(days) && days > 0 ? days : DEFAULT_WINDOW_DAYS;

  return {
    currencies,
    defaultBase,
    defaultTargets,
    defaultAmount,
    windowDays,
  };
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();
  const currenciesPath = join(projectRoot, 'config', 'currencies.json');
  if (!existsSync(currenciesPath)) {
    throw new Error(`Currency configuration not found: ${currenciesPath}`);
  }

  const raw: unknown = JSON.parse(readFileSync(currenciesPath, 'utf-8'));
  return normalizeAppConfig(raw);
}

/** Menu entry for a code, or undefined when the code is not offered. */
export function findCurrency(config: AppConfig, code: string): CurrencyOption | undefined {
  const normalized = parseCurrencyCode(code);
  return normalized ? config.currencies.find((option) => option.code === normalized) : undefined;
}

/** `"🇪🇺 EUR (Euro)"` for menu currencies, the bare code otherwise. */
export function describeCurrency(config: AppConfig, code: string): string {
  const option = findCurrency(config, code);
  if (!option) return code;
  const name = option.label === option.code ? option.code : `${option.code} (${option.label})`;
  return option.flag ? `${option.flag} ${name}` : name;
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
