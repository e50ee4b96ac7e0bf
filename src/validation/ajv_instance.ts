/**
 * Ajv validation instance. Configuration files are checked against the
 * JSON schemas under schemas/ before they are normalized.
 */

import Ajv2020, { type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { RawLedgerConfig } from '@/core/config';

const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadSchema(schemaName: string): SchemaObject {
  const schemaPath = `${SCHEMA_DIR}${schemaName}.schema.json`;
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchemaObject(parsed)) {
    throw new Error(`Schema ${schemaPath} is not a JSON object`);
  }
  return parsed;
}

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let ledgerConfigValidator: ValidateFunction<RawLedgerConfig> | null = null;

export function getLedgerConfigValidator(): ValidateFunction<RawLedgerConfig> {
  if (!ledgerConfigValidator) {
    const schema = loadSchema('ledger_config.v1');
    ledgerConfigValidator = ajv.compile<RawLedgerConfig>(schema);
  }
  return ledgerConfigValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function validateLedgerConfig(data: unknown): ValidationResult<RawLedgerConfig> {
  const validate = getLedgerConfigValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
