/**
 * MNR Source Form Contract
 *
 * Fixed key sets of the nested intake form. The extraction prompt, the legacy
 * parser, the validator and both projections all read their field order from
 * here so the tree shape stays identical across strategies.
 */

import type { JsonObject } from '../types';

export const MNR_TEXT_FIELDS = [
  'Primary_Care_Physician',
  'Physician_Phone',
  'Employer',
  'Job_Description',
  'Current_Health_Problems',
  'When_Began',
  'How_Happened',
  'Pain_Medication',
  'Health_History',
  'Date',
  'Signature',
] as const;

export type MnrTextField = (typeof MNR_TEXT_FIELDS)[number];

export const REQUIRED_FIELDS = ['Primary_Care_Physician', 'Current_Health_Problems', 'Pain_Level'] as const;

export const PAIN_LEVEL_KEYS = ['Average_Past_Week', 'Worst_Past_Week', 'Current'] as const;

export type PainLevelKey = (typeof PAIN_LEVEL_KEYS)[number];

/** Boolean checkbox groups; `Other` (where listed) is an open-text sub-field */
export const FLAG_GROUPS = {
  Treatment_Received: ['Surgery', 'Medications', 'Physical_Therapy', 'Chiropractic', 'Massage', 'Injections'],
  Helpful_Treatments: [
    'Acupuncture',
    'Chinese_Herbs',
    'Massage_Therapy',
    'Nutritional_Supplements',
    'Prescription_Medications',
    'Physical_Therapy',
    'Rehab_Home_Care',
    'Spinal_Adjustment_Manipulation',
  ],
  Pain_Quality: ['Sharp', 'Throbbing', 'Ache', 'Burning', 'Numb', 'Tingling'],
  Progress_Since_Acupuncture: ['Excellent', 'Good', 'Fair', 'Poor', 'Worse'],
  Upcoming_Treatment_Course: ['1_per_week', '2_per_week'],
} as const;

export type FlagGroup = keyof typeof FLAG_GROUPS;

export const FLAG_GROUP_NAMES: readonly FlagGroup[] = [
  'Treatment_Received',
  'Helpful_Treatments',
  'Pain_Quality',
  'Progress_Since_Acupuncture',
  'Upcoming_Treatment_Course',
];

/** Open-text companion of each flag group, when it has one */
export const FLAG_GROUP_TEXT_FIELD: Partial<Record<FlagGroup, string>> = {
  Treatment_Received: 'Other',
  Helpful_Treatments: 'Other',
  Upcoming_Treatment_Course: 'Out_of_Town_Dates',
};

export const SYMPTOM_BUCKETS = [
  '0-10%',
  '11-20%',
  '21-30%',
  '31-40%',
  '41-50%',
  '51-60%',
  '61-70%',
  '71-80%',
  '81-90%',
  '91-100%',
] as const;

/** Yes/No groups and the open-text field that explains a "Yes" */
export const YES_NO_GROUPS = {
  Under_Physician_Care: 'Conditions',
  New_Complaints: 'Explain',
  Re_Injuries: 'Explain',
  Pregnant: 'Weeks',
} as const;

export type YesNoGroup = keyof typeof YES_NO_GROUPS;

export const ACTIVITY_KEYS = ['Activity', 'Measurement', 'How_has_changed'] as const;

/**
 * Empty tree with every key of the contract present and null leaves.
 * Both strategies start from this so absent fields stay null.
 */
export function emptyMnrForm(): JsonObject {
  const form: JsonObject = {};

  for (const field of MNR_TEXT_FIELDS) {
    form[field] = null;
  }

  form.Under_Physician_Care = { No: null, Yes: null, Conditions: null };
  form.New_Complaints = { No: null, Yes: null, Explain: null };
  form.Re_Injuries = { No: null, Yes: null, Explain: null };
  form.Pregnant = { No: null, Yes: null, Weeks: null, Physician: null };

  for (const group of FLAG_GROUP_NAMES) {
    const entry: JsonObject = {};
    for (const flag of FLAG_GROUPS[group]) {
      entry[flag] = null;
    }
    const textField = FLAG_GROUP_TEXT_FIELD[group];
    if (textField) {
      entry[textField] = null;
    }
    form[group] = entry;
  }

  const buckets: JsonObject = {};
  for (const bucket of SYMPTOM_BUCKETS) {
    buckets[bucket] = null;
  }
  form.Symptoms_Past_Week_Percentage = buckets;

  form.Pain_Level = { Average_Past_Week: null, Worst_Past_Week: null, Current: null };
  form.Daily_Activity_Interference = null;
  form.Activities_Monitored = [];
  form.Relief_Duration = { Hours: null, Hours_Number: null, Days: null, Days_Number: null };
  form.Height = { feet: null, inches: null };
  form.Weight_lbs = null;
  form.Blood_Pressure = { systolic: null, diastolic: null };

  return form;
}
