/**
 * Schema Mapper Tests
 *
 * Projections of a normalized MNR form onto ASH keys and flat MNR keys.
 */

import {
  formatActivities,
  formatBloodPressure,
  formatHeight,
  formatPregnancy,
  formatReliefDuration,
  formatYesNo,
  joinFlags,
  mapToSourceSchema,
  mapToTargetSchema,
  selectBucket,
} from '@formbridge/shared';
import { normalizedForm, sampleMnrTree } from './helpers';

describe('mapToTargetSchema', () => {
  it('should map a complete form onto ASH keys', () => {
    expect(mapToTargetSchema(normalizedForm())).toEqual({
      primary_care_physician: 'Dr. Alice Moreno',
      physician_phone: '555-010-2233',
      employer: 'Harbor Freight Lines',
      job_description: 'Warehouse lead',
      health_problems: 'Lower back pain',
      when_began: '03/2024',
      how_happened: 'Lifting boxes',
      date: '05/14/2024',
      height: `5'10"`,
      weight: '170 lbs',
      blood_pressure: '120/80',
      average_pain: '6/10',
      worst_pain: '8/10',
      current_pain: '9/10',
      daily_activity_interference: '5/10',
      treatments_received: 'Medications, Physical Therapy, Other: Yoga',
      pain_quality: 'Sharp, Ache',
      under_physician_care: 'Yes: Hypertension',
      activities_monitored: 'Activity: Walking | Measurement: 20 min | Change: Improved',
    });
  });

  it('should omit empty values instead of writing empty strings', () => {
    const tree = sampleMnrTree();
    tree.Employer = '';
    tree.Blood_Pressure = { systolic: null, diastolic: null };

    const mapped = mapToTargetSchema(normalizedForm(tree));

    expect(mapped).not.toHaveProperty('employer');
    expect(mapped).not.toHaveProperty('blood_pressure');
  });

  it('should be deterministic and leave the form untouched', () => {
    const form = normalizedForm();
    const before = JSON.stringify(form.fields);

    const first = mapToTargetSchema(form);
    const second = mapToTargetSchema(form);

    expect(second).toEqual(first);
    expect(JSON.stringify(form.fields)).toBe(before);
  });

  it('should map pregnancy and symptom percentage', () => {
    const tree = sampleMnrTree();
    tree.Pregnant = { No: false, Yes: true, Weeks: 12, Physician: 'Dr. Lee' };
    tree.Symptoms_Past_Week_Percentage = { '41-50%': true, '61-70%': true };

    const mapped = mapToTargetSchema(normalizedForm(tree));

    expect(mapped.pregnant).toBe('Yes, 12 weeks, Physician: Dr. Lee');
    expect(mapped.symptoms_percentage).toBe('41-50%');
  });
});

describe('mapToSourceSchema', () => {
  it('should flatten the form under MNR keys', () => {
    expect(mapToSourceSchema(normalizedForm())).toEqual({
      Primary_Care_Physician: 'Dr. Alice Moreno',
      Physician_Phone: '555-010-2233',
      Employer: 'Harbor Freight Lines',
      Job_Description: 'Warehouse lead',
      Current_Health_Problems: 'Lower back pain',
      When_Began: '03/2024',
      How_Happened: 'Lifting boxes',
      Date: '05/14/2024',
      'Pain_Level.Average_Past_Week': '6/10',
      'Pain_Level.Worst_Past_Week': '8/10',
      'Pain_Level.Current': '9/10',
      Daily_Activity_Interference: '5/10',
      Height: `5'10"`,
      Weight_lbs: '170 lbs',
      Blood_Pressure: '120/80',
      Treatment_Received: 'Medications, Physical Therapy, Other: Yoga',
      Pain_Quality: 'Sharp, Ache',
      Under_Physician_Care: 'Yes: Hypertension',
      Activities_Monitored: 'Activity: Walking | Measurement: 20 min | Change: Improved',
    });
  });
});

describe('value formatting', () => {
  it('should render a missing height half as zero', () => {
    expect(formatHeight({ feet: 5, inches: null })).toBe(`5'0"`);
    expect(formatHeight({ feet: null, inches: 11 })).toBe(`0'11"`);
    expect(formatHeight({ feet: null, inches: null })).toBeUndefined();
  });

  it('should render a single blood pressure reading as is', () => {
    expect(formatBloodPressure({ systolic: 120, diastolic: null })).toBe('120');
    expect(formatBloodPressure({ systolic: 130, diastolic: 85 })).toBe('130/85');
  });

  it('should render yes/no answers', () => {
    expect(formatYesNo({ Yes: true, No: false, Explain: 'Knee' }, 'Explain')).toBe('Yes: Knee');
    expect(formatYesNo({ Yes: true, No: false, Explain: null }, 'Explain')).toBe('Yes');
    expect(formatYesNo({ Yes: false, No: true, Explain: null }, 'Explain')).toBe('No');
    expect(formatYesNo({ Yes: null, No: null, Explain: 'ignored' }, 'Explain')).toBeUndefined();
  });

  it('should render a pregnancy without details', () => {
    expect(formatPregnancy({ Yes: true, No: false, Weeks: null, Physician: null })).toBe('Yes');
    expect(formatPregnancy({ Yes: false, No: true, Weeks: null, Physician: null })).toBe('No');
  });

  it('should join flags with the open-text clause', () => {
    expect(joinFlags('Upcoming_Treatment_Course', { '1_per_week': true, Out_of_Town_Dates: 'June 1-7' })).toBe(
      '1 per week, Out of town: June 1-7'
    );
    expect(joinFlags('Helpful_Treatments', { Acupuncture: false, Other: 'Cupping' })).toBe('Other: Cupping');
    expect(joinFlags('Pain_Quality', { Sharp: false, Ache: null })).toBeUndefined();
  });

  it('should join activities and skip empty parts', () => {
    expect(
      formatActivities([
        { Activity: 'Walking', Measurement: '20 min', How_has_changed: 'Improved' },
        { Activity: 'Stairs', Measurement: null, How_has_changed: '' },
      ])
    ).toBe('Activity: Walking | Measurement: 20 min | Change: Improved; Activity: Stairs');
    expect(formatActivities([])).toBeUndefined();
  });

  it('should pick the first ticked symptom bucket', () => {
    expect(selectBucket({ '0-10%': false, '81-90%': true, '91-100%': true })).toBe('81-90%');
    expect(selectBucket({ '0-10%': null })).toBeUndefined();
  });

  it('should render relief duration units', () => {
    expect(formatReliefDuration({ Hours: true, Hours_Number: 4, Days: true, Days_Number: null })).toBe(
      '4 hours, Days'
    );
    expect(formatReliefDuration({ Hours: false, Days: true, Days_Number: '2' })).toBe('2 days');
  });
});
