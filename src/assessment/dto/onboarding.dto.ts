import { IsBoolean } from 'class-validator';
import { ToCheckbox } from 'src/common/transforms/form-value.transforms';
import type { OnboardingAnswers } from '../types/assessment';

// Unticked checkboxes are not posted at all, hence the false defaults.
export class OnboardingDto implements OnboardingAnswers {
  @ToCheckbox()
  @IsBoolean()
  isManufacturing: boolean = false;

  @ToCheckbox()
  @IsBoolean()
  consumesSignificantEnergy: boolean = false;

  @ToCheckbox()
  @IsBoolean()
  tracksEnvMetrics: boolean = false;

  @ToCheckbox()
  @IsBoolean()
  measuresEmissions: boolean = false;

  @ToCheckbox()
  @IsBoolean()
  hasSustainabilityGoals: boolean = false;

  @ToCheckbox()
  @IsBoolean()
  appliedForEsgLoan: boolean = false;

  @ToCheckbox()
  @IsBoolean()
  hasEmployeePolicies: boolean = false;
}

export const ONBOARDING_FIELDS = [
  'isManufacturing',
  'consumesSignificantEnergy',
  'tracksEnvMetrics',
  'measuresEmissions',
  'hasSustainabilityGoals',
  'appliedForEsgLoan',
  'hasEmployeePolicies',
] as const satisfies readonly (keyof OnboardingAnswers)[];
