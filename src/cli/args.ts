/**
 * Command-line flags for the rate cache script.
 */

import { UsageError } from '@/core/errors';
import type { CurrencyCode } from '@/providers/types';
import { parseCurrencyList } from '@/sync/currencies';

export interface CliDefaults {
  base: CurrencyCode;
  start: string;
  end: string;
  currencies: CurrencyCode[];
}

export interface FxCliArgs {
  base: CurrencyCode;
  start: string;
  end: string;
  currencies: CurrencyCode[];
  populate: boolean;
  rebuild: boolean;
  visualize: boolean;
  update: boolean;
  help: boolean;
}

type ValueFlag = 'base' | 'start' | 'end' | 'currencies';
type BooleanFlag = 'populate' | 'rebuild' | 'visualize' | 'update' | 'help';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-b': 'base',
  '--base': 'base',
  '-s': 'start',
  '--start': 'start',
  '-e': 'end',
  '--end': 'end',
  '-c': 'currencies',
  '--currencies': 'currencies',
};

const BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
  '-p': 'populate',
  '--populate': 'populate',
  '-r': 'rebuild',
  '--rebuild': 'rebuild',
  '-v': 'visualize',
  '--visualize': 'visualize',
  '-u': 'update',
  '--update': 'update',
  '-h': 'help',
  '--help': 'help',
};

const CURRENCY_CODE = /^[A-Z]{3}$/;

export const USAGE = `
Daily exchange rate cache

Usage:
  tsx scripts/fx_cache.ts [options]

Options:
  -b, --base <CODE>          Base currency (default: USD)
  -s, --start <YYYY-MM-DD>   Start date of the range (default: 2019-05-01)
  -e, --end <YYYY-MM-DD>     End date of the range (default: today)
  -c, --currencies <A,B>     Currencies to include in the chart (default: USD,CAD)
  -p, --populate             Fill the table from start up to and including end
  -r, --rebuild              Allow --populate to drop the table when the base currency changes
  -v, --visualize            Write a chart of the range
  -u, --update               Keep appending new days (runs until interrupted)
  -h, --help                 Show this help message

Environment:
  FX_API_BASE_URL, FX_API_KEY, FX_DB_PATH, LOG_LEVEL
`;

function parseBooleanLike(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return null;
}

export function parseCliArgs(argv: string[], defaults: CliDefaults): FxCliArgs {
  const args: FxCliArgs = {
    base: defaults.base,
    start: defaults.start,
    end: defaults.end,
    currencies: [...defaults.currencies],
    populate: false,
    rebuild: false,
    visualize: false,
    update: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const name = eq >= 0 ? token.slice(0, eq) : token;
    const inline = eq >= 0 ? token.slice(eq + 1) : undefined;

    const valueFlag = VALUE_FLAGS[name];
    if (valueFlag) {
      const value = inline ?? argv[i + 1];
      if (inline === undefined) i++;
      if (value === undefined || value.trim() === '') {
        throw new UsageError(`Missing value for ${name}`);
      }
      applyValue(args, valueFlag, value.trim());
      continue;
    }

    const booleanFlag = BOOLEAN_FLAGS[name];
    if (booleanFlag) {
      const parsed = inline === undefined ? true : parseBooleanLike(inline);
      if (parsed === null) {
        throw new UsageError(`Invalid value for ${name}: ${inline}`);
      }
      args[booleanFlag] = parsed;
      continue;
    }

    throw new UsageError(`Unknown argument: ${token}`);
  }

  return args;
}

function applyValue(args: FxCliArgs, flag: ValueFlag, value: string): void {
  switch (flag) {
    case 'base': {
      const base = value.toUpperCase();
      if (!CURRENCY_CODE.test(base)) {
        throw new UsageError(`Base currency must be a three-letter code, got '${value}'`);
      }
      args.base = base;
      return;
    }
    case 'currencies': {
      const codes = parseCurrencyList(value);
      if (codes.length === 0) {
        throw new UsageError('At least one currency is required for --currencies');
      }
      args.currencies = codes;
      return;
    }
    case 'start':
      args.start = value;
      return;
    case 'end':
      args.end = value;
      return;
  }
}

export function hasMode(args: FxCliArgs): boolean {
  return args.populate || args.visualize || args.update;
}
