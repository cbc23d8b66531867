import type { Category, OnboardingAnswers } from '../types/assessment';

const GREEN_THRESHOLD = 3;
const SLL_THRESHOLD = 2;

export function classifyApplicant(answers: OnboardingAnswers): Category {
  let green = 0;
  let sll = 0;

  if (answers.isManufacturing) green += 1;
  if (answers.consumesSignificantEnergy) {
    green += 1;
    sll += 0.5;
  }
  if (answers.tracksEnvMetrics) green += 2;
  if (answers.measuresEmissions) green += 2;

  if (answers.hasSustainabilityGoals) sll += 2;
  if (answers.appliedForEsgLoan) sll += 1;
  if (answers.hasEmployeePolicies) sll += 1;

  if (green >= GREEN_THRESHOLD) return 'green';
  if (sll >= SLL_THRESHOLD) return 'sll';
  return 'other';
}
