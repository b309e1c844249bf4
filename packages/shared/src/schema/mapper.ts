/**
 * Schema Mapper
 *
 * Deterministic projections of a NormalizedForm into flat field maps:
 * - mapToTargetSchema: nested MNR tree -> flat ASH semantic keys
 * - mapToSourceSchema: same tree flattened under MNR keys, for the MNR template
 *
 * Both are pure. Source fields with no counterpart are dropped. Empty results
 * are omitted rather than written as empty strings.
 */

import { MappingFailureError } from '../errors';
import { isJsonObject, type JsonObject, type JsonValue, type MappedForm, type NormalizedForm } from '../types';
import {
  ACTIVITY_KEYS,
  FLAG_GROUP_TEXT_FIELD,
  FLAG_GROUPS,
  FLAG_GROUP_NAMES,
  MNR_TEXT_FIELDS,
  PAIN_LEVEL_KEYS,
  SYMPTOM_BUCKETS,
  type FlagGroup,
  type MnrTextField,
  type PainLevelKey,
  type YesNoGroup,
} from './mnr-form';

// ============================================================================
// Value helpers
// ============================================================================

function scalarText(value: JsonValue | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function group(fields: JsonObject, key: string): JsonObject | undefined {
  const value = fields[key];
  return isJsonObject(value) ? value : undefined;
}

/**
 * Height as feet'inches". A missing half renders as 0; both missing is absent.
 */
export function formatHeight(height: JsonObject | undefined): string | undefined {
  if (!height) return undefined;
  const feet = scalarText(height.feet);
  const inches = scalarText(height.inches);
  if (feet === undefined && inches === undefined) return undefined;
  return `${feet ?? '0'}'${inches ?? '0'}"`;
}

export function formatBloodPressure(pressure: JsonObject | undefined): string | undefined {
  if (!pressure) return undefined;
  const systolic = scalarText(pressure.systolic);
  const diastolic = scalarText(pressure.diastolic);
  if (systolic && diastolic) return `${systolic}/${diastolic}`;
  return systolic ?? diastolic;
}

export function formatWeight(weight: JsonValue | undefined): string | undefined {
  const text = scalarText(weight);
  return text === undefined ? undefined : `${text} lbs`;
}

/**
 * Comma-joined labels of the true flags in declared order, plus the group's
 * open-text clause ("Other: ...", "Out of town: ...") when present.
 */
export function joinFlags(groupName: FlagGroup, values: JsonObject | undefined): string | undefined {
  if (!values) return undefined;

  const flags: readonly string[] = FLAG_GROUPS[groupName];
  const parts = flags
    .filter((flag) => values[flag] === true)
    .map((flag) => flag.replace(/_/g, ' '));

  const textField = FLAG_GROUP_TEXT_FIELD[groupName];
  const text = textField ? scalarText(values[textField]) : undefined;
  if (text) {
    parts.push(textField === 'Out_of_Town_Dates' ? `Out of town: ${text}` : `Other: ${text}`);
  }

  return parts.length > 0 ? parts.join(', ') : undefined;
}

/**
 * "Yes: <explain>" / "Yes" / "No"; absent when neither box is ticked.
 */
export function formatYesNo(values: JsonObject | undefined, explainKey: string): string | undefined {
  if (!values) return undefined;
  if (values.Yes === true) {
    const explain = scalarText(values[explainKey]);
    return explain ? `Yes: ${explain}` : 'Yes';
  }
  if (values.No === true) return 'No';
  return undefined;
}

export function formatPregnancy(values: JsonObject | undefined): string | undefined {
  if (!values) return undefined;
  if (values.Yes === true) {
    const weeks = scalarText(values.Weeks);
    const physician = scalarText(values.Physician);
    return `Yes${weeks ? `, ${weeks} weeks` : ''}${physician ? `, Physician: ${physician}` : ''}`;
  }
  if (values.No === true) return 'No';
  return undefined;
}

export function formatActivities(value: JsonValue | undefined): string | undefined {
  if (!Array.isArray(value)) return undefined;

  const labels: Record<(typeof ACTIVITY_KEYS)[number], string> = {
    Activity: 'Activity',
    Measurement: 'Measurement',
    How_has_changed: 'Change',
  };

  const segments = value
    .filter(isJsonObject)
    .map((activity) =>
      ACTIVITY_KEYS.flatMap((key) => {
        const text = scalarText(activity[key]);
        return text ? [`${labels[key]}: ${text}`] : [];
      }).join(' | ')
    )
    .filter((segment) => segment !== '');

  return segments.length > 0 ? segments.join('; ') : undefined;
}

/** The first true bucket, verbatim */
export function selectBucket(values: JsonObject | undefined): string | undefined {
  if (!values) return undefined;
  return SYMPTOM_BUCKETS.find((bucket) => values[bucket] === true);
}

export function formatReliefDuration(values: JsonObject | undefined): string | undefined {
  if (!values) return undefined;
  const parts: string[] = [];

  if (values.Hours === true) {
    const hours = scalarText(values.Hours_Number);
    parts.push(hours ? `${hours} hours` : 'Hours');
  }
  if (values.Days === true) {
    const days = scalarText(values.Days_Number);
    parts.push(days ? `${days} days` : 'Days');
  }

  return parts.length > 0 ? parts.join(', ') : undefined;
}

function assertForm(form: NormalizedForm): JsonObject {
  if (!isJsonObject(form.fields)) {
    throw new MappingFailureError('Normalized form has no object tree to map');
  }
  return form.fields;
}

function assign(target: MappedForm, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') {
    target[key] = value;
  }
}

// ============================================================================
// Target schema (ASH)
// ============================================================================

const TARGET_TEXT_RENAMES: Record<MnrTextField, string> = {
  Primary_Care_Physician: 'primary_care_physician',
  Physician_Phone: 'physician_phone',
  Employer: 'employer',
  Job_Description: 'job_description',
  Current_Health_Problems: 'health_problems',
  When_Began: 'when_began',
  How_Happened: 'how_happened',
  Pain_Medication: 'pain_medication',
  Health_History: 'health_history',
  Date: 'date',
  Signature: 'signature',
};

const TARGET_PAIN_KEYS: Record<PainLevelKey, string> = {
  Average_Past_Week: 'average_pain',
  Worst_Past_Week: 'worst_pain',
  Current: 'current_pain',
};

const TARGET_FLAG_KEYS: Record<FlagGroup, string> = {
  Treatment_Received: 'treatments_received',
  Helpful_Treatments: 'helpful_treatments',
  Pain_Quality: 'pain_quality',
  Progress_Since_Acupuncture: 'progress_since_acupuncture',
  Upcoming_Treatment_Course: 'upcoming_treatment_course',
};

const TARGET_YES_NO_KEYS: Record<Exclude<YesNoGroup, 'Pregnant'>, { key: string; explain: string }> = {
  Under_Physician_Care: { key: 'under_physician_care', explain: 'Conditions' },
  New_Complaints: { key: 'new_complaints', explain: 'Explain' },
  Re_Injuries: { key: 're_injuries', explain: 'Explain' },
};

export function mapToTargetSchema(form: NormalizedForm): MappedForm {
  const fields = assertForm(form);
  const mapped: MappedForm = {};

  for (const field of MNR_TEXT_FIELDS) {
    assign(mapped, TARGET_TEXT_RENAMES[field], scalarText(fields[field]));
  }

  assign(mapped, 'height', formatHeight(group(fields, 'Height')));
  assign(mapped, 'weight', formatWeight(fields.Weight_lbs));
  assign(mapped, 'blood_pressure', formatBloodPressure(group(fields, 'Blood_Pressure')));

  const painLevels = group(fields, 'Pain_Level');
  for (const key of PAIN_LEVEL_KEYS) {
    assign(mapped, TARGET_PAIN_KEYS[key], painLevels ? scalarText(painLevels[key]) : undefined);
  }
  assign(mapped, 'daily_activity_interference', scalarText(fields.Daily_Activity_Interference));

  for (const groupName of FLAG_GROUP_NAMES) {
    assign(mapped, TARGET_FLAG_KEYS[groupName], joinFlags(groupName, group(fields, groupName)));
  }

  for (const [groupName, { key, explain }] of Object.entries(TARGET_YES_NO_KEYS)) {
    assign(mapped, key, formatYesNo(group(fields, groupName), explain));
  }
  assign(mapped, 'pregnant', formatPregnancy(group(fields, 'Pregnant')));

  assign(mapped, 'activities_monitored', formatActivities(fields.Activities_Monitored));
  assign(mapped, 'symptoms_percentage', selectBucket(group(fields, 'Symptoms_Past_Week_Percentage')));
  assign(mapped, 'relief_duration', formatReliefDuration(group(fields, 'Relief_Duration')));

  return mapped;
}

// ============================================================================
// Source schema (MNR)
// ============================================================================

/**
 * Flatten the normalized tree under its own MNR keys. Pain sub-levels use
 * dotted keys ("Pain_Level.Current"); groups use the same join rules as the
 * target projection.
 */
export function mapToSourceSchema(form: NormalizedForm): MappedForm {
  const fields = assertForm(form);
  const mapped: MappedForm = {};

  for (const field of MNR_TEXT_FIELDS) {
    assign(mapped, field, scalarText(fields[field]));
  }

  const painLevels = group(fields, 'Pain_Level');
  for (const key of PAIN_LEVEL_KEYS) {
    assign(mapped, `Pain_Level.${key}`, painLevels ? scalarText(painLevels[key]) : undefined);
  }
  assign(mapped, 'Daily_Activity_Interference', scalarText(fields.Daily_Activity_Interference));

  assign(mapped, 'Height', formatHeight(group(fields, 'Height')));
  assign(mapped, 'Weight_lbs', formatWeight(fields.Weight_lbs));
  assign(mapped, 'Blood_Pressure', formatBloodPressure(group(fields, 'Blood_Pressure')));

  for (const groupName of FLAG_GROUP_NAMES) {
    assign(mapped, groupName, joinFlags(groupName, group(fields, groupName)));
  }

  assign(mapped, 'Under_Physician_Care', formatYesNo(group(fields, 'Under_Physician_Care'), 'Conditions'));
  assign(mapped, 'New_Complaints', formatYesNo(group(fields, 'New_Complaints'), 'Explain'));
  assign(mapped, 'Re_Injuries', formatYesNo(group(fields, 'Re_Injuries'), 'Explain'));
  assign(mapped, 'Pregnant', formatPregnancy(group(fields, 'Pregnant')));

  assign(mapped, 'Activities_Monitored', formatActivities(fields.Activities_Monitored));
  assign(mapped, 'Symptoms_Past_Week_Percentage', selectBucket(group(fields, 'Symptoms_Past_Week_Percentage')));
  assign(mapped, 'Relief_Duration', formatReliefDuration(group(fields, 'Relief_Duration')));

  return mapped;
}
