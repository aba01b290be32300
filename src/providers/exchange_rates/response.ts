import { validateRatesResponse } from '@/validation/ajv_instance';
import type { RatesResponseResult } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeErrorDetail(detail: Record<string, unknown>): string {
  const text = [detail.info, detail.message, detail.type].find(
    (value): value is string => typeof value === 'string' && value.length > 0
  );
  const { code } = detail;
  if (text && (typeof code === 'number' || typeof code === 'string')) {
    return `${text} (code ${code})`;
  }
  return text ?? JSON.stringify(detail);
}

/**
 * Pull the provider's own error message out of a payload, if it carries one.
 */
export function extractProviderError(status: number, body: unknown): string | null {
  if (isRecord(body)) {
    const { error } = body;
    if (typeof error === 'string' && error.length > 0) return error;
    if (isRecord(error)) return describeErrorDetail(error);
    if (body.success === false) return 'Provider reported an unsuccessful request';
  }

  if (status >= 200 && status < 300) return null;

  if (isRecord(body) && typeof body.message === 'string' && body.message.length > 0) {
    return body.message;
  }
  return `HTTP ${status}`;
}

export function parseRatesResponse(status: number, body: unknown): RatesResponseResult {
  const providerError = extractProviderError(status, body);
  if (providerError !== null) {
    return { ok: false, kind: 'provider', message: providerError };
  }

  const validation = validateRatesResponse(body);
  if (!validation.valid) {
    return {
      ok: false,
      kind: 'invalid',
      message: `Unexpected response shape: ${validation.errors.join('; ')}`,
    };
  }

  return { ok: true, body: validation.data };
}
