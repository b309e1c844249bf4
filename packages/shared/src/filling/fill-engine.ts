/**
 * PDF Fill Engine
 *
 * Writes a MappedForm into a blank template using a cascade of methods; the
 * first that fills anything wins:
 * - structured_fields: native widgets named in the field table, typed writes
 * - basic_fields: text widgets matched by fuzzy name search
 * - overlay: text drawn beside label phrases found on the page
 */

import fs from 'fs';
import path from 'path';
import {
  PDFCheckBox,
  PDFDocument,
  PDFDropdown,
  PDFRadioGroup,
  PDFTextField,
  StandardFonts,
  rgb,
  type PDFField,
} from 'pdf-lib';
import type { CacheStore, TemplateEntry } from '../cache-store';
import { firstSuccess } from '../cascade';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { fillMethodCounter } from '../metrics';
import { PdfjsAnchorLocator, type AnchorBox, type AnchorLocator } from '../pdf/anchor-locator';
import type { FillAttempt, FillingResult, FillMethod, MappedForm } from '../types';
import { normalizeFieldName, type FieldSpec, type FieldTable, type FieldTarget } from './field-table';
import { layoutOverlayText } from './overlay-layout';

export interface FillRequest {
  mapped: MappedForm;
  templatePath: string;
  table: FieldTable;
  outputPath: string;
  /** Structured widgets before fuzzy matching */
  enhanced: boolean;
}

interface MethodOutcome {
  success: boolean;
  error?: string;
  fieldsFilled: number;
  warnings: string[];
  bytes?: Uint8Array;
}

export interface FillEngineOptions {
  cache: CacheStore;
  locator?: AnchorLocator;
}

const AFFIRMATIVE = new Set(['yes', 'true', '1', 'on', 'checked', 'x']);

export function isAffirmative(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return AFFIRMATIVE.has(normalized) || /^yes\b/.test(normalized);
}

/**
 * Narrow a joined value to what one widget shows: a "; "-separated segment,
 * then the labelled part ("Measurement: 20 min") within it.
 */
export function selectTargetValue(value: string, target: FieldTarget): string | undefined {
  let selected = value;

  if (target.segment !== undefined) {
    const segment = value.split('; ')[target.segment];
    if (segment === undefined) return undefined;
    selected = segment;
  }

  if (target.part !== undefined) {
    const wanted = target.part.toLowerCase();
    const part = selected
      .split(' | ')
      .map((piece) => {
        const colon = piece.indexOf(':');
        return colon === -1
          ? undefined
          : { label: piece.slice(0, colon).trim().toLowerCase(), text: piece.slice(colon + 1).trim() };
      })
      .find((piece) => piece?.label === wanted);
    if (!part || part.text === '') return undefined;
    selected = part.text;
  }

  return selected;
}

function matchOption(options: string[], value: string): string | undefined {
  const wanted = normalizeFieldName(value);
  return options.find((option) => normalizeFieldName(option) === wanted);
}

/**
 * Write a value coerced to the widget type. Returns false when the widget
 * cannot represent the value.
 */
function writeField(field: PDFField, value: string, target: FieldTarget, multiline: boolean): boolean {
  if (field instanceof PDFTextField) {
    if (multiline) field.enableMultiline();
    field.setText(value);
    return true;
  }
  if (field instanceof PDFCheckBox) {
    if (isAffirmative(value) !== target.negate) {
      field.check();
    } else {
      field.uncheck();
    }
    return true;
  }
  if (field instanceof PDFRadioGroup) {
    const options = field.getOptions();
    const option = matchOption(options, value) ?? (isAffirmative(value) ? options[0] : undefined);
    if (option === undefined) return false;
    field.select(option);
    return true;
  }
  if (field instanceof PDFDropdown) {
    const option = matchOption(field.getOptions(), value);
    if (option === undefined) return false;
    field.select(option);
    return true;
  }
  return false;
}

export class PdfFillEngine {
  private readonly cache: CacheStore;
  private readonly locator: AnchorLocator;

  constructor(options: FillEngineOptions) {
    this.cache = options.cache;
    this.locator = options.locator ?? new PdfjsAnchorLocator();
  }

  /**
   * Template bytes and widget inventory, read once per path.
   */
  async loadTemplate(templatePath: string): Promise<TemplateEntry> {
    const cached = this.cache.getTemplate(templatePath);
    if (cached) return cached;

    const bytes = new Uint8Array(await fs.promises.readFile(templatePath));
    const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true });
    const entry: TemplateEntry = {
      bytes,
      fieldNames: pdf
        .getForm()
        .getFields()
        .map((field) => field.getName()),
      pageCount: pdf.getPageCount(),
    };

    this.cache.setTemplate(templatePath, entry);
    logger.debug('Template loaded', {
      template: path.basename(templatePath),
      field_count: entry.fieldNames.length,
      page_count: entry.pageCount,
    });
    return entry;
  }

  async fill(request: FillRequest): Promise<FillingResult> {
    const template = await this.loadTemplate(request.templatePath);
    const totalFields = Object.keys(request.mapped).length;

    const configured: FillMethod[] = request.enhanced
      ? ['structured_fields', 'basic_fields', 'overlay']
      : ['basic_fields', 'structured_fields', 'overlay'];
    // The method that last worked for this template goes first
    const known = this.cache.getFillMethod(request.templatePath);
    const order = known ? [known, ...configured.filter((method) => method !== known)] : configured;

    const warnings: string[] = [];
    const run = async (method: FillMethod): Promise<MethodOutcome> => {
      const outcome = await this.runMethod(method, request, template.bytes);
      warnings.push(...outcome.warnings);
      fillMethodCounter.inc({ method, status: outcome.success ? 'success' : 'failed' });
      return outcome;
    };

    const outcome = await firstSuccess(order.map((method) => ({ name: method, run: () => run(method) })));
    const attempts: FillAttempt[] = outcome.failures.map((failure) => ({ method: failure.name, error: failure.error }));

    const outputBytes = outcome.winner?.result.bytes;
    if (!outcome.winner || !outputBytes) {
      const error = `All fill methods failed: ${attempts.map((a) => `${a.method}: ${a.error}`).join('; ')}`;
      logger.warn('PDF fill failed', { template: path.basename(request.templatePath), attempts });
      return {
        success: false,
        fields_filled: 0,
        total_fields: totalFields,
        method_used: order[order.length - 1],
        warnings,
        error,
        attempts,
      };
    }

    const { name: method, result } = outcome.winner;
    await fs.promises.mkdir(path.dirname(request.outputPath), { recursive: true });
    await fs.promises.writeFile(request.outputPath, outputBytes);
    this.cache.setFillMethod(request.templatePath, method);

    logger.info('PDF filled', {
      method,
      fields_filled: result.fieldsFilled,
      total_fields: totalFields,
      output: path.basename(request.outputPath),
    });

    return {
      success: true,
      output_path: request.outputPath,
      fields_filled: result.fieldsFilled,
      total_fields: totalFields,
      method_used: method,
      warnings,
      attempts,
    };
  }

  private runMethod(method: FillMethod, request: FillRequest, bytes: Uint8Array): Promise<MethodOutcome> {
    switch (method) {
      case 'structured_fields':
        return this.fillStructured(request, bytes);
      case 'basic_fields':
        return this.fillBasic(request, bytes);
      case 'overlay':
        return this.fillOverlay(request, bytes);
    }
  }

  private async fillStructured(request: FillRequest, bytes: Uint8Array): Promise<MethodOutcome> {
    const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true });
    const form = pdf.getForm();
    const fields = new Map(form.getFields().map((field) => [field.getName(), field]));
    const warnings: string[] = [];

    if (fields.size === 0) {
      return { success: false, error: 'No fillable form fields found', fieldsFilled: 0, warnings };
    }

    let filled = 0;
    for (const spec of request.table.fields) {
      const value = request.mapped[spec.key];
      if (value === undefined) continue;

      for (const target of spec.targets) {
        const field = fields.get(target.name);
        if (!field) {
          warnings.push(`Field not found in template: ${target.name}`);
          continue;
        }
        const targetValue = selectTargetValue(value, target);
        if (targetValue === undefined) continue;

        try {
          if (writeField(field, targetValue, target, spec.multiline)) filled++;
        } catch (error) {
          logger.error('Failed to write form field', error, { field: target.name });
          warnings.push(`Could not fill ${target.name}: ${errorMessage(error)}`);
        }
      }
    }

    if (filled === 0) {
      return { success: false, error: 'No structured fields were filled', fieldsFilled: 0, warnings };
    }
    return { success: true, fieldsFilled: filled, warnings, bytes: await pdf.save() };
  }

  private async fillBasic(request: FillRequest, bytes: Uint8Array): Promise<MethodOutcome> {
    const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true });
    const form = pdf.getForm();
    const allFields = form.getFields();
    const warnings: string[] = [];

    if (allFields.length === 0) {
      return { success: false, error: 'No fillable form fields found', fieldsFilled: 0, warnings };
    }

    const textFields = allFields
      .filter((field): field is PDFTextField => field instanceof PDFTextField)
      .map((field) => ({ field, name: normalizeFieldName(field.getName()) }));
    const specs = new Map(request.table.fields.map((spec) => [spec.key, spec]));
    const used = new Set<PDFTextField>();

    let filled = 0;
    for (const [key, value] of Object.entries(request.mapped)) {
      const terms = [...(specs.get(key)?.searchTerms ?? []), key]
        .map(normalizeFieldName)
        .filter((term) => term !== '');

      const match = textFields.find(({ field, name }) => !used.has(field) && terms.some((term) => name.includes(term)));
      if (!match) continue;

      try {
        match.field.setText(value);
        used.add(match.field);
        filled++;
      } catch (error) {
        logger.error('Failed to write form field', error, { field: match.field.getName() });
        warnings.push(`Could not fill ${match.field.getName()}: ${errorMessage(error)}`);
      }
    }

    if (filled === 0) {
      return { success: false, error: 'No form fields matched', fieldsFilled: 0, warnings };
    }
    return { success: true, fieldsFilled: filled, warnings, bytes: await pdf.save() };
  }

  private async fillOverlay(request: FillRequest, bytes: Uint8Array): Promise<MethodOutcome> {
    const anchors = await this.locator.index(bytes);
    const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true });
    const font = await pdf.embedFont(StandardFonts.Helvetica);
    const pages = pdf.getPages();
    const { layout } = request.table;
    const specs = new Map<string, FieldSpec>(request.table.fields.map((spec) => [spec.key, spec]));
    const warnings: string[] = [];

    let placed = 0;
    for (const [key, value] of Object.entries(request.mapped)) {
      const spec = specs.get(key);
      const terms = spec && spec.searchTerms.length > 0 ? spec.searchTerms : [key.replace(/_/g, ' ')];

      let anchor: AnchorBox | undefined;
      for (const term of terms) {
        anchor = anchors.find(term);
        if (anchor) break;
      }
      const page = anchor ? pages[anchor.pageIndex] : undefined;
      if (!anchor || !page) {
        warnings.push(`No anchor found for ${key}`);
        continue;
      }

      const multiline = spec?.multiline ?? false;
      const lines = layoutOverlayText(value, multiline, layout);
      if (lines.length === 0) continue;

      const size = spec?.fontSize ?? (multiline ? layout.multilineFontSize : layout.fontSize);
      const x = anchor.x1 + (spec?.offset ?? layout.offset);
      // Centre the first line on the label
      const y = anchor.y0 + (anchor.y1 - anchor.y0 - size) / 2;

      lines.forEach((line, index) => {
        page.drawText(line, { x, y: y - index * layout.lineHeight, size, font, color: rgb(0, 0, 1) });
      });
      placed++;
    }

    if (placed === 0) {
      return { success: false, error: 'No anchors found for any field', fieldsFilled: 0, warnings };
    }
    return { success: true, fieldsFilled: placed, warnings, bytes: await pdf.save() };
  }
}
