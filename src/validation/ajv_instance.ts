/**
 * Ajv validation instance with schema validators
 * Schemas are the Source of Truth for ingest and configuration shapes
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawRow, VixRecord } from '@/types/portfolio';
import type { RawAlertingConfig } from '@/core/config';

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

// Lazy-loaded validators
let tableValidator: ValidateFunction<RawRow[]> | null = null;
let vixRecordValidator: ValidateFunction<VixRecord> | null = null;
let alertingConfigValidator: ValidateFunction<RawAlertingConfig> | null = null;

export function getTableValidator(): ValidateFunction<RawRow[]> {
  if (!tableValidator) {
    tableValidator = ajv.compile<RawRow[]>(loadSchema('portfolio_table.v1'));
  }
  return tableValidator;
}

export function getVixRecordValidator(): ValidateFunction<VixRecord> {
  if (!vixRecordValidator) {
    vixRecordValidator = ajv.compile<VixRecord>(loadSchema('vix_record.v1'));
  }
  return vixRecordValidator;
}

export function getAlertingConfigValidator(): ValidateFunction<RawAlertingConfig> {
  if (!alertingConfigValidator) {
    alertingConfigValidator = ajv.compile<RawAlertingConfig>(loadSchema('alerting_config.v1'));
  }
  return alertingConfigValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateTable(data: unknown): ValidationResult<RawRow[]> {
  return runValidator(getTableValidator(), data);
}

export function validateVixRecord(data: unknown): ValidationResult<VixRecord> {
  return runValidator(getVixRecordValidator(), data);
}

export function validateAlertingConfig(data: unknown): ValidationResult<RawAlertingConfig> {
  return runValidator(getAlertingConfigValidator(), data);
}
