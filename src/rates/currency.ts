/**
 * Currency code handling. Codes are three upper-case ASCII letters; which
 * codes actually exist is decided by the upstream source at call time.
 */

export type CurrencyCode = string;

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export function normalizeCurrencyCode(value: string): string {
  return value.trim().toUpperCase();
}

export function isCurrencyCode(value: string): boolean {
  return CURRENCY_CODE_PATTERN.test(value);
}

export function parseCurrencyCode(value: string): CurrencyCode | null {
  const normalized = normalizeCurrencyCode(value);
  return isCurrencyCode(normalized) ? normalized : null;
}

/**
 * Trims, upper-cases and de-duplicates a target list, keeping the first
 * occurrence of each code in the caller's order. Entries that are not
 * currency codes are kept as given (after normalization) so callers can
 * report them back.
 */
export function normalizeTargets(targets: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  for (const target of targets) {
    const code = normalizeCurrencyCode(target);
    if (!code || seen.has(code)) continue;
    seen.add(code);
    normalized.push(code);
  }
  return normalized;
}
