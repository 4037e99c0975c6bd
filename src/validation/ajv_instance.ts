/**
 * Ajv validation instance for configuration files
 * Schemas under schemas/ are the source of truth for config shape
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';

export interface AnalysisConfigJson {
  lookback_days?: number;
  top_n?: number;
  max_volatility?: number;
  min_price?: number;
  concurrency?: number;
  fetch_timeout_ms?: number;
  throttle_ms?: number;
  progress_every?: number;
  max_symbols?: number;
}

export interface UniverseJson {
  name?: string;
  description?: string;
  version?: string;
  symbols: string[];
}

// Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  allowUnionTypes: true,
});

addFormats(ajv);

const validators = new Map<string, ValidateFunction>();

function getValidator(schemaName: SchemaName, projectRoot: string): ValidateFunction {
  const schema = loadSchema(schemaName, projectRoot);
  const existing = validators.get(schema.$id);
  if (existing) return existing;

  const compiled = ajv.compile(schema);
  validators.set(schema.$id, compiled);
  return compiled;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function validateAgainst<T>(
  schemaName: SchemaName,
  data: unknown,
  projectRoot: string
): ValidationResult<T> {
  const validate = getValidator(schemaName, projectRoot);
  if (validate(data)) {
    return { valid: true, data: data as T, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateAnalysisConfig(
  data: unknown,
  projectRoot: string = process.cwd()
): ValidationResult<AnalysisConfigJson> {
  return validateAgainst<AnalysisConfigJson>('analysis.v1', data, projectRoot);
}

export function validateUniverse(
  data: unknown,
  projectRoot: string = process.cwd()
): ValidationResult<UniverseJson> {
  return validateAgainst<UniverseJson>('universe.v1', data, projectRoot);
}
