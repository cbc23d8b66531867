export const CATEGORIES = ['green', 'sll', 'other'] as const;

export type Category = (typeof CATEGORIES)[number];

export const CATEGORY_LABELS: Record<Category, string> = {
  green: 'Green Loan',
  sll: 'Sustainability-Linked Loan',
  other: 'ESG Readiness',
};

export function isCategory(value: unknown): value is Category {
  return CATEGORIES.some((c) => c === value);
}

export interface OnboardingAnswers {
  isManufacturing: boolean;
  consumesSignificantEnergy: boolean;
  tracksEnvMetrics: boolean;
  measuresEmissions: boolean;
  hasSustainabilityGoals: boolean;
  appliedForEsgLoan: boolean;
  hasEmployeePolicies: boolean;
}

export interface GreenIntake {
  annualElectricityKwh: number;
  annualFuelLitres: number;
  waterConsumptionLitres: number;
  wasteGeneratedKgMonth: number;
  renewableEnergyPct: number;
  efficiencyEquipment?: string;
  industryCode?: string;
}

export interface SllIntake {
  turnoverLastThreeYears: string;
  targetImprovementGoals: string;
  numEmployees: number;
  workforceDiversityStats?: string;
  safetyIncidentCount: number;
  trainingPrograms?: string;
  governancePolicies?: string;
}

export interface OtherIntake {
  businessInfo: string;
  existingDocs?: string;
  interestAreas?: string;
}

export type IntakeSubmission =
  | { category: 'green'; data: GreenIntake }
  | { category: 'sll'; data: SllIntake }
  | { category: 'other'; data: OtherIntake };

export interface Suggestion {
  text: string;
  icon: string;
}

export interface BreakdownItem {
  label: string;
  points: number;
}

export type Rating = 'A' | 'B' | 'C' | 'D';

export interface Scorecard {
  score: number;
  rating: Rating;
  breakdown: BreakdownItem[];
  suggestions: Suggestion[];
}

export interface CarbonResult {
  estimatedCarbon: number;
  breakdown: {
    electricity: number;
    fuel: number;
    water: number;
  };
  unit: 'kgCO2e/year';
}

/** What the dashboard needs; kept in the session between redirect and GET. */
export interface StoredAssessment {
  category: Category;
  intake: IntakeSubmission['data'];
  scorecard: Scorecard;
  carbon: CarbonResult;
  verdict: string;
  assessedAt: string; // ISO-8601
}
