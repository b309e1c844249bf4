/**
 * Output format profiles.
 *
 * A profile bundles what one output format needs: the blank template on disk,
 * the field table intersected with the template's live widgets, and the
 * projection from the normalized tree to a MappedForm.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { TemplateMissingError } from '../errors';
import { buildFieldTable, loadFieldTable, type FieldCoverageReport, type FieldTable } from '../filling/field-table';
import type { PdfFillEngine } from '../filling/fill-engine';
import { logger } from '../logger';
import { mapToSourceSchema, mapToTargetSchema } from '../schema/mapper';
import type { MappedForm, NormalizedForm, OutputFormat } from '../types';

export const TEMPLATE_FILES: Record<OutputFormat, string> = {
  source_schema: 'mnr_form.pdf',
  target_schema: 'ash_medical_form.pdf',
};

export const FIELD_TABLE_FILES: Record<OutputFormat, string> = {
  source_schema: 'mnr.fields.json',
  target_schema: 'ash.fields.json',
};

const PROJECTIONS: Record<OutputFormat, (form: NormalizedForm) => MappedForm> = {
  source_schema: mapToSourceSchema,
  target_schema: mapToTargetSchema,
};

export interface FormatProfile {
  format: OutputFormat;
  templatePath: string;
  table: FieldTable;
  coverage: FieldCoverageReport;
  fieldNames: string[];
  project: (form: NormalizedForm) => MappedForm;
}

export interface FormatProfileOptions {
  templateDir?: string;
  /** Explicit template path; skips the directory search */
  templatePath?: string;
  /** Field table file name or path */
  tableFile?: string;
}

/**
 * Template path for a format: TEMPLATE_DIR first, then the working directory.
 */
export function resolveTemplatePath(format: OutputFormat, templateDir: string = config.templateDir): string {
  const fileName = TEMPLATE_FILES[format];
  const candidates = [path.resolve(templateDir, fileName), path.resolve(process.cwd(), fileName)];

  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new TemplateMissingError(format, candidates);
  }
  return found;
}

/**
 * Template path a profile would use, checked to exist.
 */
export function locateTemplate(format: OutputFormat, options: FormatProfileOptions = {}): string {
  const { templatePath } = options;
  if (templatePath === undefined) {
    return resolveTemplatePath(format, options.templateDir);
  }
  if (!fs.existsSync(templatePath)) {
    throw new TemplateMissingError(format, [templatePath]);
  }
  return templatePath;
}

export async function loadFormatProfile(
  format: OutputFormat,
  engine: PdfFillEngine,
  options: FormatProfileOptions = {}
): Promise<FormatProfile> {
  const templatePath = locateTemplate(format, options);
  const template = await engine.loadTemplate(templatePath);
  const { table, report } = buildFieldTable(loadFieldTable(options.tableFile ?? FIELD_TABLE_FILES[format]), template.fieldNames);

  logger.debug('Format profile loaded', {
    format,
    template: path.basename(templatePath),
    pdf_fields: report.total_pdf_fields,
    coverage: report.coverage,
  });

  return {
    format,
    templatePath,
    table,
    coverage: report,
    fieldNames: template.fieldNames,
    project: PROJECTIONS[format],
  };
}
