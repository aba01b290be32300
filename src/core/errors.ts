/**
 * Error taxonomy for the rate cache.
 *
 * Validation errors are raised before any I/O. Provider errors are fatal for
 * the current run or poll cycle and are never retried.
 */

export class FxCacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FxCacheError';
  }
}

export class InvalidRangeError extends FxCacheError {
  constructor(
    message: string,
    public readonly start: string,
    public readonly end: string
  ) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export class InvalidCurrencyError extends FxCacheError {
  constructor(
    public readonly invalid: string[],
    public readonly known: string[]
  ) {
    super(
      `The following currencies provided are not valid: ${invalid.join(', ')}. ` +
        `List of valid currencies: ${known.join(', ')}`
    );
    this.name = 'InvalidCurrencyError';
  }
}

/**
 * The provider answered, but with an error payload.
 */
export class SourceError extends FxCacheError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly date: string,
    public readonly base: string
  ) {
    super(message);
    this.name = 'SourceError';
  }
}

/**
 * The request never produced a usable payload (network, timeout, bad body).
 */
export class TransportError extends FxCacheError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly date: string,
    public readonly base: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export type CoverageGap = 'empty' | 'start' | 'end' | 'gap';

export class DateNotInCacheError extends FxCacheError {
  constructor(
    public readonly date: string,
    public readonly gap: CoverageGap,
    tableName: string
  ) {
    super(describeGap(date, gap, tableName));
    this.name = 'DateNotInCacheError';
  }
}

function describeGap(date: string, gap: CoverageGap, tableName: string): string {
  const hint = 'Include the --populate flag to populate the table with the date range.';
  switch (gap) {
    case 'empty':
      return `The table '${tableName}' is not populated. ${hint}`;
    case 'start':
      return `The start date '${date}' is not in the table '${tableName}'. ${hint}`;
    case 'end':
      return `The end date '${date}' is not in the table '${tableName}'. ${hint}`;
    case 'gap':
      return `The date '${date}' is missing from the table '${tableName}'. ${hint}`;
  }
}

export class ConfigError extends FxCacheError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UsageError extends FxCacheError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
