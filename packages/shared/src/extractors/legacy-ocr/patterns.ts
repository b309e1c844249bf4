/**
 * MNR Form OCR Patterns
 *
 * Regular expressions for reading MNR fields out of OCR text or a PDF text
 * layer. Each field has an ordered list of rules; the first rule that matches
 * wins and a field with no match stays null.
 *
 * Checkbox groups use one shared check: a tick mark (X, check glyphs) directly
 * before or after the option label, on the same line. An option whose label is
 * present without a mark is false; one whose label is missing stays null.
 */

import type { JsonObject, JsonValue } from '../../types';
import {
  emptyMnrForm,
  FLAG_GROUP_NAMES,
  FLAG_GROUPS,
  SYMPTOM_BUCKETS,
  type MnrTextField,
  type PainLevelKey,
} from '../../schema/mnr-form';

/** Text fields: capture group 1 is the value */
export const TEXT_FIELD_RULES: Record<MnrTextField, RegExp[]> = {
  Primary_Care_Physician: [/Primary\s+Care\s+Physician[:\s]*([^\n]+)/i],
  Physician_Phone: [/Physician\s*Phone\s*#?[:\s]*([\d\-(). ]{10,})/i, /(?:Phone|Tel)\s*#?[:\s]*([^\n]+)/i],
  Employer: [/Employer[:\s]*([^\n]+)/i],
  Job_Description: [/Job\s+(?:Description|Title)[:\s]*([^\n]+)/i],
  Current_Health_Problems: [/current\s+health\s+problem(?:\(s\)|s)?[:\s]*([^\n]+)/i],
  When_Began: [/When\s+it\s+began\??[:\s]*([^\n]+)/i, /When.*began[:\s]*([^\n]+)/i],
  How_Happened: [/How\s+it\s+happened\??[:\s]*([^\n]+)/i, /How.*happened[:\s]*([^\n]+)/i],
  Pain_Medication: [/Pain\s+Medication\s*(?:\([^)]*\))?[:\s]*([^\n]+)/i],
  Health_History: [/(?:Pertinent\s+)?Health\s+history[:\s]*([^\n]+)/i],
  Date: [/\bDate[:\s]+(\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4})/i, /\bDate\b[:\s]*([^\n]+)/i],
  Signature: [/Signature[:\s]*([^\n]+)/i],
};

/** Pain scales: capture group 1 is the 0-10 score */
export const PAIN_RULES: Record<PainLevelKey, RegExp[]> = {
  Average_Past_Week: [/Average[^\n\d]*?(\d{1,2})\b/i],
  Worst_Past_Week: [/Wors[te][^\n\d]*?(\d{1,2})\b/i],
  Current: [/Current\s+Pain[^\n\d]*?(\d{1,2})\b/i, /Current[^\n\d]*?(\d{1,2})\b/i],
};

export const DAILY_INTERFERENCE_RULES: RegExp[] = [
  /interfered\s+with\s+your\s+daily\s+activit(?:y|ies)[^\n\d]*?(\d{1,2})\b/i,
];

export const HEIGHT_RULES: RegExp[] = [
  /Height[:\s]*(\d+)\s*(?:'|ft\.?|feet)\s*(\d+)/i,
  /Height[:\s]*(\d+)['"]*\s*(\d+)/i,
];

export const WEIGHT_RULES: RegExp[] = [/Weight[:\s]*(\d+)/i];

export const BLOOD_PRESSURE_RULES: RegExp[] = [/(?:Blood\s+Pressure|\bBP)[:\s]*(\d{2,3})\s*\/\s*(\d{2,3})/i];

/** Yes/No questions: capture group 1 is "yes" or "no" */
export const YES_NO_RULES = {
  Under_Physician_Care: /under\s+(?:the\s+)?care\s+of\s+a\s+physician\??[:\s]*(yes|no)\b/i,
  New_Complaints: /new\s+complaints\??[:\s]*(yes|no)\b/i,
  Re_Injuries: /re-?injur(?:y|ies)\??[:\s]*(yes|no)\b/i,
  Pregnant: /pregnant\??[:\s]*(yes|no)\b/i,
} as const;

export const YES_NO_DETAIL_RULES = {
  Under_Physician_Care: { key: 'Conditions', rule: /for\s+what\s+conditions?\??[:\s]*([^\n]+)/i },
  New_Complaints: { key: 'Explain', rule: /new\s+complaints\??[:\s]*yes\W+(?:explain[:\s]*)?([^\n]+)/i },
  Re_Injuries: { key: 'Explain', rule: /re-?injur(?:y|ies)\??[:\s]*yes\W+(?:explain[:\s]*)?([^\n]+)/i },
  Pregnant: { key: 'Weeks', rule: /#\s*of\s*weeks[:\s]*(\d+)/i },
} as const;

/** Printed label of a checkbox option, where it differs from the key */
const OPTION_LABELS: Record<string, string> = {
  Rehab_Home_Care: 'Rehab/Home Care',
  Spinal_Adjustment_Manipulation: 'Spinal Adjustment',
  Prescription_Medications: 'Prescription Medication',
  '1_per_week': '1/week',
  '2_per_week': '2/week',
};

const MARK = '[Xx✓✔☑✗✘]';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function optionLabel(option: string): string {
  return OPTION_LABELS[option] ?? option.replace(/_/g, ' ');
}

/**
 * true when the label carries a tick mark, false when it is printed without
 * one, null when the label is not in the text at all.
 */
export function checkboxState(text: string, label: string): boolean | null {
  const escaped = escapeRegExp(label).replace(/\s+/g, '\\s+');
  if (!new RegExp(escaped, 'i').test(text)) return null;

  const markAfter = new RegExp(`${escaped}[ \\t\\[\\]():]*${MARK}(?![A-Za-z])`, 'i');
  const markBefore = new RegExp(`(?:^|[\\s\\[(])${MARK}[\\])]?[ \\t]*${escaped}`, 'im');
  return markAfter.test(text) || markBefore.test(text);
}

function firstMatch(text: string, rules: readonly RegExp[]): RegExpMatchArray | undefined {
  for (const rule of rules) {
    const match = text.match(rule);
    if (match) return match;
  }
  return undefined;
}

function cleanCapture(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function formatPhone(raw: string): string {
  const digits = raw.replace(/\D/g, '');
  return digits.length === 10 ? `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6)}` : raw.trim();
}

function painScore(text: string, rules: readonly RegExp[]): string | null {
  const match = firstMatch(text, rules);
  if (!match) return null;
  const score = Number(match[1]);
  return score <= 10 ? `${score}/10` : null;
}

function setIn(form: JsonObject, group: string, key: string, value: JsonValue): void {
  const container = form[group];
  if (container !== null && typeof container === 'object' && !Array.isArray(container)) {
    container[key] = value;
  }
}

/**
 * Parse recognized text into the MNR tree.
 */
export function parseMnrText(text: string): JsonObject {
  const form = emptyMnrForm();

  for (const [field, rules] of Object.entries(TEXT_FIELD_RULES)) {
    const match = firstMatch(text, rules);
    const value = cleanCapture(match?.[1]);
    form[field] = value !== null && field === 'Physician_Phone' ? formatPhone(value) : value;
  }

  for (const [key, rules] of Object.entries(PAIN_RULES)) {
    setIn(form, 'Pain_Level', key, painScore(text, rules));
  }
  form.Daily_Activity_Interference = painScore(text, DAILY_INTERFERENCE_RULES);

  const height = firstMatch(text, HEIGHT_RULES);
  if (height) {
    form.Height = { feet: Number(height[1]), inches: Number(height[2]) };
  }

  const weight = firstMatch(text, WEIGHT_RULES);
  if (weight) {
    form.Weight_lbs = Number(weight[1]);
  }

  const pressure = firstMatch(text, BLOOD_PRESSURE_RULES);
  if (pressure) {
    form.Blood_Pressure = { systolic: Number(pressure[1]), diastolic: Number(pressure[2]) };
  }

  for (const [group, rule] of Object.entries(YES_NO_RULES)) {
    const match = text.match(rule);
    if (!match) continue;
    const answer = match[1].toLowerCase();
    setIn(form, group, 'Yes', answer === 'yes');
    setIn(form, group, 'No', answer === 'no');
  }

  for (const [group, { key, rule }] of Object.entries(YES_NO_DETAIL_RULES)) {
    const detail = cleanCapture(text.match(rule)?.[1]);
    if (detail === null) continue;
    setIn(form, group, key, key === 'Weeks' ? Number(detail) : detail);
  }

  for (const group of FLAG_GROUP_NAMES) {
    for (const option of FLAG_GROUPS[group]) {
      setIn(form, group, option, checkboxState(text, optionLabel(option)));
    }
  }

  for (const bucket of SYMPTOM_BUCKETS) {
    setIn(form, 'Symptoms_Past_Week_Percentage', bucket, checkboxState(text, bucket));
  }

  return form;
}
