/**
 * JSON Schema Validation
 *
 * Ajv validation for the MNR source-form contract and the field-mapping
 * table files. Schemas are read from packages/shared/contracts.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow union types and draft annotations
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// ============================================================================
// Data file resolution
// ============================================================================

/**
 * Locate a data file shipped with the shared package (contracts/, field-tables/).
 * Throws when no candidate path exists.
 */
export function resolveDataFile(directory: string, fileName: string): string {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '..', directory, fileName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../packages/shared', directory, fileName),
    // Relative to project root
    path.join(process.cwd(), 'packages/shared', directory, fileName),
    path.join(process.cwd(), directory, fileName),
  ];

  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Data file not found: ${directory}/${fileName}`);
  }
  return found;
}

export function readJsonFile(filePath: string): unknown {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

// ============================================================================
// Compiled validators (lazy, compiled once)
// ============================================================================

/**
 * Compile a contract schema. The returned function is a type guard for T.
 */
export function compileContract<T>(schemaName: string): ValidateFunction<T> {
  const schema = readJsonFile(resolveDataFile('contracts', schemaName));
  if (typeof schema !== 'object' || schema === null) {
    throw new Error(`Schema ${schemaName} is not an object`);
  }
  return ajv.compile<T>(schema);
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'is invalid'}`);
}

const compiled = new Map<string, ValidateFunction>();

function getValidator(schemaName: string): ValidateFunction {
  const existing = compiled.get(schemaName);
  if (existing) return existing;

  const validate = compileContract<unknown>(schemaName);
  compiled.set(schemaName, validate);
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate an extracted/normalized MNR tree against mnr_form.schema.json
 */
export function validateSourceForm(data: unknown): ValidationResult {
  const validate = getValidator('mnr_form.schema.json');

  if (!validate(data)) {
    const errors = formatAjvErrors(validate.errors);
    logger.debug('MNR form validation failed', { error_count: errors.length });
    return { valid: false, errors };
  }

  return { valid: true };
}
