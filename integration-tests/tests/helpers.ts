/**
 * Test Helpers
 *
 * In-memory templates built with pdf-lib, fake extraction strategies and
 * temporary output directories. Nothing here touches the network.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PDFDocument, PDFTextField, StandardFonts } from 'pdf-lib';
import {
  emptyMnrForm,
  hashContent,
  processSourceTree,
  type ExtractionMethodName,
  type ExtractionResult,
  type ExtractionStrategy,
  type JsonObject,
  type NormalizedForm,
  type PreparedDocument,
  type StrategyAvailability,
} from '@formbridge/shared';

// ============================================================================
// Form data
// ============================================================================

/**
 * A filled-in intake form: 170 lb patient, current pain 9, one activity.
 */
export function sampleMnrTree(): JsonObject {
  const tree = emptyMnrForm();

  tree.Primary_Care_Physician = 'Dr. Alice Moreno';
  tree.Physician_Phone = '555-010-2233';
  tree.Employer = 'Harbor Freight Lines';
  tree.Job_Description = 'Warehouse lead';
  tree.Current_Health_Problems = 'Lower back pain';
  tree.When_Began = '03/2024';
  tree.How_Happened = 'Lifting boxes';
  tree.Date = '05/14/2024';

  tree.Pain_Level = { Average_Past_Week: '6/10', Worst_Past_Week: '8/10', Current: '9/10' };
  tree.Daily_Activity_Interference = '5/10';
  tree.Height = { feet: 5, inches: 10 };
  tree.Weight_lbs = 170;
  tree.Blood_Pressure = { systolic: 120, diastolic: 80 };

  tree.Treatment_Received = {
    Surgery: false,
    Medications: true,
    Physical_Therapy: true,
    Chiropractic: false,
    Massage: false,
    Injections: false,
    Other: 'Yoga',
  };
  tree.Pain_Quality = { Sharp: true, Throbbing: false, Ache: true, Burning: false, Numb: false, Tingling: false };
  tree.Under_Physician_Care = { No: false, Yes: true, Conditions: 'Hypertension' };
  tree.Activities_Monitored = [{ Activity: 'Walking', Measurement: '20 min', How_has_changed: 'Improved' }];

  return tree;
}

export function normalizedForm(tree: JsonObject = sampleMnrTree()): NormalizedForm {
  return processSourceTree(tree).form;
}

// ============================================================================
// PDF templates
// ============================================================================

export interface AcroFormSpec {
  text?: string[];
  checkboxes?: string[];
  /** Radio group name and its options */
  radios?: Record<string, string[]>;
}

/**
 * One-page template with the given widgets stacked down the page.
 */
export async function buildAcroFormTemplate(spec: AcroFormSpec): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const page = pdf.addPage([612, 792]);
  const form = pdf.getForm();
  let y = 740;

  for (const name of spec.text ?? []) {
    form.createTextField(name).addToPage(page, { x: 200, y, width: 300, height: 18 });
    y -= 24;
  }
  for (const name of spec.checkboxes ?? []) {
    form.createCheckBox(name).addToPage(page, { x: 200, y, width: 12, height: 12 });
    y -= 24;
  }
  for (const [name, options] of Object.entries(spec.radios ?? {})) {
    const group = form.createRadioGroup(name);
    options.forEach((option, index) => {
      group.addOptionToPage(option, page, { x: 200 + index * 40, y, width: 12, height: 12 });
    });
    y -= 24;
  }

  return pdf.save();
}

/**
 * One-page template with printed labels and no widgets, for overlay filling.
 */
export async function buildLabelTemplate(labels: string[]): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  const page = pdf.addPage([612, 792]);
  const font = await pdf.embedFont(StandardFonts.Helvetica);
  let y = 740;

  for (const label of labels) {
    page.drawText(label, { x: 50, y, size: 10, font });
    y -= 30;
  }

  return pdf.save();
}

export async function readFieldValues(bytes: Uint8Array): Promise<Record<string, string | undefined>> {
  const pdf = await PDFDocument.load(bytes);
  const values: Record<string, string | undefined> = {};
  for (const field of pdf.getForm().getFields()) {
    if (field instanceof PDFTextField) {
      values[field.getName()] = field.getText();
    }
  }
  return values;
}

// ============================================================================
// Files
// ============================================================================

export function makeTempDir(prefix = 'formbridge-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, bytes: Uint8Array): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, bytes);
  return filePath;
}

/**
 * Any valid PDF serves as the uploaded document when extraction is faked.
 */
export async function buildUploadPdf(marker = 'intake'): Promise<Buffer> {
  const pdf = await PDFDocument.create();
  pdf.setTitle(marker);
  pdf.addPage([612, 792]);
  return Buffer.from(await pdf.save());
}

export function preparedDocument(bytes: Buffer, filename = 'intake.pdf'): PreparedDocument {
  return { bytes, mime_type: 'application/pdf', filename, content_hash: hashContent(bytes) };
}

// ============================================================================
// Fake strategies
// ============================================================================

export type FakeBehavior =
  | { kind: 'success'; data: JsonObject; cost?: number; confidence?: number }
  | { kind: 'failure'; error: string; cost?: number; delayMs?: number }
  | { kind: 'throw'; error: string };

/**
 * Extraction strategy with scripted behavior that counts its calls.
 */
export class FakeStrategy implements ExtractionStrategy {
  readonly description: string;
  calls = 0;

  constructor(
    readonly method: ExtractionMethodName,
    private readonly behavior: FakeBehavior,
    private readonly available = true
  ) {
    this.description = `fake ${method}`;
  }

  isAvailable(): StrategyAvailability {
    return this.available ? { available: true } : { available: false, reason: 'disabled in test' };
  }

  async extract(): Promise<ExtractionResult> {
    this.calls++;
    switch (this.behavior.kind) {
      case 'success':
        return {
          success: true,
          data: this.behavior.data,
          method_used: this.method,
          confidence: this.behavior.confidence ?? 0.9,
          cost: this.behavior.cost ?? 0,
          tokens: 0,
          processing_time: 0.01,
        };
      case 'failure': {
        const { error, cost, delayMs } = this.behavior;
        if (delayMs) {
          await new Promise((resolve) => setTimeout(resolve, delayMs));
        }
        return {
          success: false,
          method_used: this.method,
          confidence: 0,
          cost: cost ?? 0,
          tokens: 0,
          processing_time: 0.01,
          error,
        };
      }
      case 'throw':
        throw new Error(this.behavior.error);
    }
  }
}
