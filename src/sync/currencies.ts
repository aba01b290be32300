import { InvalidCurrencyError } from '@/core/errors';
import type { CurrencyCode } from '@/providers/types';

/**
 * Split a comma separated list into trimmed, upper-cased, unique codes.
 */
export function parseCurrencyList(raw: string): CurrencyCode[] {
  const codes = raw
    .split(',')
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code.length > 0);
  return [...new Set(codes)];
}

export function validateCurrencies(requested: CurrencyCode[], known: Iterable<CurrencyCode>): void {
  const knownSet = new Set(known);
  const invalid = requested.filter((code) => !knownSet.has(code));
  if (invalid.length > 0) {
    throw new InvalidCurrencyError(invalid, [...knownSet].sort());
  }
}
