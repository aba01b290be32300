/**
 * Ajv validation instance for provider payloads
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getRatesResponseSchema } from './schema_loader';
import type { RatesResponseBody } from '@/providers/exchange_rates/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, email, uri, etc.)
addFormats(ajv);

let ratesResponseValidator: ValidateFunction<RatesResponseBody> | null = null;

export function getRatesResponseValidator(): ValidateFunction<RatesResponseBody> {
  if (!ratesResponseValidator) {
    ratesResponseValidator = ajv.compile<RatesResponseBody>(getRatesResponseSchema());
  }
  return ratesResponseValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

export function validateRatesResponse(data: unknown): ValidationResult<RatesResponseBody> {
  const validate = getRatesResponseValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
