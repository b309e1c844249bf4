/**
 * Field-Mapping Tables
 *
 * Static per-template tables (field-tables/*.fields.json) mapping semantic
 * keys of a MappedForm to native PDF widget names, plus search terms used by
 * fuzzy widget matching and overlay anchors.
 */

import fs from 'fs';
import path from 'path';
import type { ValidateFunction } from 'ajv';
import { FieldTableError } from '../errors';
import { logger } from '../logger';
import { compileContract, formatAjvErrors, readJsonFile, resolveDataFile } from '../schemas';

// ============================================================================
// File format
// ============================================================================

export interface FieldTargetEntry {
  name: string;
  /** Index into a "; "-joined value */
  segment?: number;
  /** Label of an "A: x | B: y" part within the segment */
  part?: string;
  /** Checkbox is checked when the value is NOT affirmative */
  negate?: boolean;
}

export interface FieldEntryFile {
  pdfFields: (string | FieldTargetEntry)[];
  searchTerms: string[];
  multiline?: boolean;
  offset?: number;
  fontSize?: number;
}

export interface OverlayLayout {
  offset: number;
  fontSize: number;
  multilineFontSize: number;
  wrapWidth: number;
  maxLines: number;
  lineHeight: number;
  truncateAt: number;
}

export interface FieldTableFile {
  template: string;
  description?: string;
  layout?: Partial<OverlayLayout>;
  fields: Record<string, FieldEntryFile>;
}

// ============================================================================
// Normalized table
// ============================================================================

export interface FieldTarget {
  name: string;
  segment?: number;
  part?: string;
  negate: boolean;
}

export interface FieldSpec {
  key: string;
  targets: FieldTarget[];
  searchTerms: string[];
  multiline: boolean;
  offset?: number;
  fontSize?: number;
}

export interface FieldTable {
  template: string;
  description?: string;
  layout: OverlayLayout;
  /** Declaration order of the file */
  fields: FieldSpec[];
}

export const DEFAULT_OVERLAY_LAYOUT: OverlayLayout = {
  offset: 10,
  fontSize: 10,
  multilineFontSize: 9,
  wrapWidth: 50,
  maxLines: 3,
  lineHeight: 12,
  truncateAt: 60,
};

let validateFile: ValidateFunction<FieldTableFile> | undefined;

function getFileValidator(): ValidateFunction<FieldTableFile> {
  if (!validateFile) {
    validateFile = compileContract<FieldTableFile>('field_table.schema.json');
  }
  return validateFile;
}

function normalizeTarget(entry: string | FieldTargetEntry): FieldTarget {
  if (typeof entry === 'string') {
    return { name: entry, negate: false };
  }
  return { ...entry, negate: entry.negate ?? false };
}

/**
 * Validate parsed table content and normalize it.
 */
export function parseFieldTable(data: unknown, source = 'field table'): FieldTable {
  const validate = getFileValidator();
  if (!validate(data)) {
    throw new FieldTableError(`Invalid ${source}: ${formatAjvErrors(validate.errors).join('; ')}`);
  }

  return {
    template: data.template,
    description: data.description,
    layout: { ...DEFAULT_OVERLAY_LAYOUT, ...data.layout },
    fields: Object.entries(data.fields).map(([key, entry]) => ({
      key,
      targets: entry.pdfFields.map(normalizeTarget),
      searchTerms: entry.searchTerms,
      multiline: entry.multiline ?? false,
      offset: entry.offset,
      fontSize: entry.fontSize,
    })),
  };
}

/**
 * Load a table by path, or by file name from the bundled field-tables/.
 */
export function loadFieldTable(file: string): FieldTable {
  const filePath = path.isAbsolute(file) || fs.existsSync(file) ? file : resolveDataFile('field-tables', file);

  let data: unknown;
  try {
    data = readJsonFile(filePath);
  } catch (error) {
    logger.error('Failed to read field table', error, { file: filePath });
    throw new FieldTableError(`Cannot read field table ${filePath}`);
  }

  return parseFieldTable(data, `field table ${path.basename(filePath)}`);
}

// ============================================================================
// Live intersection & coverage
// ============================================================================

export interface FieldCoverageReport {
  template: string;
  total_pdf_fields: number;
  /** Live widgets referenced by at least one table entry */
  referenced_pdf_fields: number;
  coverage: number;
  /** Semantic keys with at least one live target */
  mapped_keys: string[];
  /** Semantic keys whose declared targets are all missing from the template */
  unmapped_keys: string[];
  /** Declared widget names absent from the template */
  missing_pdf_fields: string[];
  /** Live widgets no entry references */
  unused_pdf_fields: string[];
  /** Candidate live widgets for each unmapped key */
  suggestions: Record<string, string[]>;
}

export interface BuiltFieldTable {
  table: FieldTable;
  report: FieldCoverageReport;
}

export function normalizeFieldName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

function words(text: string): string[] {
  return normalizeFieldName(text)
    .split(' ')
    .filter((word) => word.length > 0);
}

/**
 * A live widget looks like a match for a table entry when a normalized term is
 * a substring of the widget name (or the reverse), or when at least half of
 * the term's words appear in the name.
 */
export function looksLikeMatch(term: string, fieldName: string): boolean {
  const normalizedTerm = normalizeFieldName(term);
  const normalizedName = normalizeFieldName(fieldName);
  if (normalizedTerm === '' || normalizedName === '') return false;

  if (normalizedName.includes(normalizedTerm) || normalizedTerm.includes(normalizedName)) {
    return true;
  }

  const termWords = words(term);
  const nameWords = new Set(words(fieldName));
  const overlap = termWords.filter((word) => nameWords.has(word)).length;
  return termWords.length > 0 && overlap / termWords.length >= 0.5;
}

/**
 * Intersect a static table with the widget names a template actually has.
 * Targets that do not exist are dropped; keys left without targets are
 * reported with suggestions.
 */
export function buildFieldTable(table: FieldTable, liveFieldNames: string[]): BuiltFieldTable {
  const live = new Set(liveFieldNames);
  const referenced = new Set<string>();
  const missing: string[] = [];
  const mappedKeys: string[] = [];
  const unmappedKeys: string[] = [];

  const fields = table.fields.map((spec) => {
    const targets = spec.targets.filter((target) => {
      if (live.has(target.name)) {
        referenced.add(target.name);
        return true;
      }
      missing.push(target.name);
      return false;
    });

    if (targets.length > 0) {
      mappedKeys.push(spec.key);
    } else if (spec.targets.length > 0) {
      unmappedKeys.push(spec.key);
    }
    return { ...spec, targets };
  });

  const unused = liveFieldNames.filter((name) => !referenced.has(name));
  const suggestions: Record<string, string[]> = {};
  for (const key of unmappedKeys) {
    const spec = table.fields.find((entry) => entry.key === key);
    const terms = [key.replace(/_/g, ' '), ...(spec?.searchTerms ?? [])];
    const candidates = unused.filter((name) => terms.some((term) => looksLikeMatch(term, name)));
    if (candidates.length > 0) {
      suggestions[key] = candidates;
    }
  }

  if (unmappedKeys.length > 0) {
    logger.warn('Field table keys have no matching template widget', {
      template: table.template,
      unmapped_keys: unmappedKeys,
    });
  }

  const report: FieldCoverageReport = {
    template: table.template,
    total_pdf_fields: liveFieldNames.length,
    referenced_pdf_fields: referenced.size,
    coverage: liveFieldNames.length === 0 ? 0 : referenced.size / liveFieldNames.length,
    mapped_keys: mappedKeys,
    unmapped_keys: unmappedKeys,
    missing_pdf_fields: missing,
    unused_pdf_fields: unused,
    suggestions,
  };

  return { table: { ...table, fields }, report };
}
