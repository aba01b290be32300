/**
 * Payloads of the daily rates endpoint: `GET /{YYYY-MM-DD}?base={CODE}`.
 */

export interface RatesResponseBody {
  base: string;
  date?: string;
  rates: Record<string, number>;
}

/**
 * Outcome of interpreting one HTTP response. Provider errors mean the
 * provider answered and refused; invalid means the body was unusable.
 */
export type RatesResponseResult =
  | { ok: true; body: RatesResponseBody }
  | { ok: false; kind: 'provider'; message: string }
  | { ok: false; kind: 'invalid'; message: string };
