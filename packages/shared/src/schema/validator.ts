/**
 * Source Form Validator / Normalizer
 *
 * Checks an extracted MNR tree against the source contract and coerces the
 * deviations that can be recovered (bare pain scores, boolean strings, numeric
 * strings). Problems are collected, never thrown; only a tree that is not an
 * object at all is rejected.
 */

import { MappingFailureError } from '../errors';
import { logger } from '../logger';
import { validateSourceForm } from '../schemas';
import { isJsonObject, type JsonObject, type JsonValue, type NormalizedForm } from '../types';
import {
  FLAG_GROUP_NAMES,
  FLAG_GROUPS,
  PAIN_LEVEL_KEYS,
  REQUIRED_FIELDS,
  SYMPTOM_BUCKETS,
  YES_NO_GROUPS,
} from './mnr-form';

const PROCESSOR_NAME = 'mnr-source-normalizer';

export interface SourceValidation {
  errors: string[];
}

export interface ProcessedSourceForm {
  /** True when every mandatory field is present */
  success: boolean;
  form: NormalizedForm;
  errors: string[];
}

// ============================================================================
// Validation
// ============================================================================

function isEmptyValue(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.values(value).every(isEmptyValue);
  return false;
}

export function missingRequiredFields(tree: JsonObject): string[] {
  return REQUIRED_FIELDS.filter((field) => isEmptyValue(tree[field]));
}

function painFormatErrors(tree: JsonObject): string[] {
  const painLevels = tree.Pain_Level;
  if (!isJsonObject(painLevels)) return [];

  const errors: string[] = [];
  for (const key of PAIN_LEVEL_KEYS) {
    const value = painLevels[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string' || !value.endsWith('/10')) {
      errors.push(`Pain level ${key} should be in 'X/10' format, got: ${String(value)}`);
    }
  }
  return errors;
}

/**
 * Validate a tree without modifying it.
 */
export function validateSourceTree(tree: unknown): SourceValidation {
  if (!isJsonObject(tree)) {
    return { errors: ['Extracted data must be an object'] };
  }

  const errors = missingRequiredFields(tree).map((field) => `Missing required field: ${field}`);

  const schemaResult = validateSourceForm(tree);
  if (!schemaResult.valid && schemaResult.errors) {
    errors.push(...schemaResult.errors);
  }

  errors.push(...painFormatErrors(tree));

  return { errors };
}

// ============================================================================
// Coercion
// ============================================================================

const TRUE_VALUES = new Set(['true', 'True', 'TRUE', '1', 'yes', 'Yes']);
const FALSE_VALUES = new Set(['false', 'False', 'FALSE', '0', 'no', 'No']);

export function coerceBoolean(value: JsonValue): JsonValue {
  if (value === 1) return true;
  if (value === 0) return false;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (TRUE_VALUES.has(trimmed)) return true;
    if (FALSE_VALUES.has(trimmed)) return false;
    if (trimmed === '') return null;
  }
  return value;
}

/**
 * Bring a pain-scale value into "N/10" form. Values that carry no number are
 * returned unchanged for validation to report.
 */
export function coercePainScale(value: JsonValue): JsonValue {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return `${Math.round(value)}/10`;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(?:\/\s*10|out of 10)?$/i);
    if (match) {
      return `${Math.round(Number(match[1]))}/10`;
    }
    return trimmed;
  }
  return value;
}

export function coerceInteger(value: JsonValue): JsonValue {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.round(value);
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(?:lbs?|pounds|ft|in)?\.?$/i);
    if (match) {
      return Math.round(Number(match[1]));
    }
  }
  return value;
}

function trimStrings(value: JsonValue): JsonValue {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) return value.map(trimStrings);
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = trimStrings(entry);
    }
    return result;
  }
  return value;
}

class Coercer {
  readonly coerced: string[] = [];

  constructor(private readonly tree: JsonObject) {}

  /** Apply a coercion to tree[group][key] (or tree[key] when group is null) */
  apply(group: string | null, key: string, coerce: (value: JsonValue) => JsonValue): void {
    const container = group === null ? this.tree : this.tree[group];
    if (!isJsonObject(container)) return;

    const current = container[key];
    if (current === undefined || current === null) return;

    const next = coerce(current);
    if (next !== current) {
      container[key] = next;
      this.coerced.push(group === null ? key : `${group}.${key}`);
    }
  }
}

function coerceTree(input: JsonObject): { tree: JsonObject; coerced: string[] } {
  const trimmed = trimStrings(input);
  const tree: JsonObject = isJsonObject(trimmed) ? trimmed : {};
  const coercer = new Coercer(tree);

  for (const key of PAIN_LEVEL_KEYS) {
    coercer.apply('Pain_Level', key, coercePainScale);
  }
  coercer.apply(null, 'Daily_Activity_Interference', coercePainScale);

  for (const group of FLAG_GROUP_NAMES) {
    for (const flag of FLAG_GROUPS[group]) {
      coercer.apply(group, flag, coerceBoolean);
    }
  }
  for (const group of Object.keys(YES_NO_GROUPS)) {
    coercer.apply(group, 'Yes', coerceBoolean);
    coercer.apply(group, 'No', coerceBoolean);
  }
  for (const bucket of SYMPTOM_BUCKETS) {
    coercer.apply('Symptoms_Past_Week_Percentage', bucket, coerceBoolean);
  }
  coercer.apply('Relief_Duration', 'Hours', coerceBoolean);
  coercer.apply('Relief_Duration', 'Days', coerceBoolean);

  coercer.apply('Height', 'feet', coerceInteger);
  coercer.apply('Height', 'inches', coerceInteger);
  coercer.apply(null, 'Weight_lbs', coerceInteger);
  coercer.apply('Blood_Pressure', 'systolic', coerceInteger);
  coercer.apply('Blood_Pressure', 'diastolic', coerceInteger);

  return { tree, coerced: coercer.coerced };
}

// ============================================================================
// Processing
// ============================================================================

/**
 * Normalize an extracted tree: coerce, re-validate, stamp provenance.
 *
 * @throws MappingFailureError when the input is not an object tree
 */
export function processSourceTree(input: unknown): ProcessedSourceForm {
  if (!isJsonObject(input)) {
    throw new MappingFailureError('Extracted data must be an object tree');
  }

  const { tree, coerced } = coerceTree(input);
  const { errors } = validateSourceTree(tree);
  const mandatoryPresent = missingRequiredFields(tree).length === 0;

  if (errors.length > 0) {
    logger.warn('Source form validation reported problems', {
      error_count: errors.length,
      mandatory_fields_present: mandatoryPresent,
    });
  }

  return {
    success: mandatoryPresent,
    errors,
    form: {
      fields: tree,
      _provenance: {
        processor: PROCESSOR_NAME,
        validation_method: 'json_schema',
        processed_at: new Date().toISOString(),
        validation_errors: errors,
        coerced_fields: coerced,
        mandatory_fields_present: mandatoryPresent,
      },
    },
  };
}
