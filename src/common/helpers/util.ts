import { formatInTimeZone } from 'date-fns-tz';
import {
  CATEGORY_LABELS,
  type StoredAssessment,
} from 'src/assessment/types/assessment';

export function toCapital(str: string): string {
  if (!str) return str;
  return str.charAt(0).toUpperCase() + str.slice(1).toLowerCase();
}

/** `annualElectricityKwh` -> `Annual Electricity Kwh` */
export function humanizeField(field: string): string {
  return field
    .split(/(?=[A-Z])/)
    .map(toCapital)
    .join(' ');
}

export type AssessmentVM = StoredAssessment & {
  categoryLabel: string;
  assessedAtLabel: string; // yyyy/MM/dd HH:mm in the app time zone
  intakeRows: { label: string; value: string }[];
};

export function buildAssessmentVM(
  assessment: StoredAssessment,
  tz: string,
): AssessmentVM {
  const intakeRows = Object.entries(assessment.intake)
    .filter(([, value]) => value !== undefined && value !== null && value !== '')
    .map(([field, value]) => ({
      label: humanizeField(field),
      value: String(value),
    }));

  return {
    ...assessment,
    categoryLabel: CATEGORY_LABELS[assessment.category],
    assessedAtLabel: formatInTimeZone(
      new Date(assessment.assessedAt),
      tz,
      'yyyy/MM/dd HH:mm',
    ),
    intakeRows,
  };
}
