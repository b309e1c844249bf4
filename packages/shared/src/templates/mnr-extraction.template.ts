/**
 * MNR Patient Progress Form Extraction Template
 *
 * Form semantics:
 * - Checkbox groups are answered with true/false per option, never free text
 * - Pain levels and daily-activity interference are 0-10 scales written "N/10"
 * - Activities table rows become {Activity, Measurement, How_has_changed}
 * - Blank or illegible fields are null; nothing is guessed or invented
 */

import { emptyMnrForm } from '../schema/mnr-form';
import type { ExtractionTemplate } from './types';

export const MNR_EXTRACTION_TEMPLATE: ExtractionTemplate = {
  formName: 'MNR',
  description: 'MNR patient progress form - extracts history, pain scales, checkbox groups and vitals',
  skeleton: emptyMnrForm,

  systemPrompt: `You are a medical intake form extraction specialist. You read scanned or photographed MNR patient progress forms and return their contents as JSON.

EXTRACTION RULES:
1. Return ONLY a JSON object with exactly the keys of the structure you are given. Do not add, rename or drop keys.
2. Text fields: copy the handwriting or typed text verbatim. Use null when a field is blank or unreadable.
3. Checkbox groups: true when the box is ticked, false when it is visibly empty, null when you cannot tell.
4. Pain levels and "How has it interfered with your daily activity": write the circled or written number as "N/10".
5. Symptoms_Past_Week_Percentage: mark exactly the ticked bucket true.
6. Activities_Monitored: one object per filled table row with Activity, Measurement and How_has_changed.
7. Height as integers {feet, inches}; Weight_lbs as an integer; Blood_Pressure as integers {systolic, diastolic}.
8. Never invent values. Missing data stays null.`,

  userPromptTemplate: `Extract every field of this MNR patient progress form.

DOCUMENT: {{source_filename}}

Return JSON in exactly this structure:
{{json_structure}}`,
};
