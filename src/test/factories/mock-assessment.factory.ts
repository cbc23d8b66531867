import type {
  GreenIntake,
  OnboardingAnswers,
  OtherIntake,
  SllIntake,
  StoredAssessment,
} from 'src/assessment/types/assessment';

export function createMockAnswers(
  overrides: Partial<OnboardingAnswers> = {},
): OnboardingAnswers {
  return {
    isManufacturing: false,
    consumesSignificantEnergy: false,
    tracksEnvMetrics: false,
    measuresEmissions: false,
    hasSustainabilityGoals: false,
    appliedForEsgLoan: false,
    hasEmployeePolicies: false,
    ...overrides,
  };
}

export function createMockGreenIntake(
  overrides: Partial<GreenIntake> = {},
): GreenIntake {
  return {
    annualElectricityKwh: 5_000,
    annualFuelLitres: 500,
    waterConsumptionLitres: 10_000,
    wasteGeneratedKgMonth: 50,
    renewableEnergyPct: 60,
    efficiencyEquipment: 'LED retrofits',
    industryCode: '3811',
    ...overrides,
  };
}

export function createMockSllIntake(
  overrides: Partial<SllIntake> = {},
): SllIntake {
  return {
    turnoverLastThreeYears: '1.2 Cr, 1.5 Cr, 1.9 Cr',
    targetImprovementGoals: 'Reduce energy use by 15% within three years',
    numEmployees: 25,
    safetyIncidentCount: 0,
    governancePolicies: 'Ethics code and whistleblower hotline',
    ...overrides,
  };
}

export function createMockOtherIntake(
  overrides: Partial<OtherIntake> = {},
): OtherIntake {
  return {
    businessInfo: 'We make handmade paper products',
    existingDocs: 'ISO 9001 certified',
    interestAreas: 'solar and water recycling',
    ...overrides,
  };
}

export function createMockStoredAssessment(
  overrides: Partial<StoredAssessment> = {},
): StoredAssessment {
  return {
    category: 'green',
    intake: createMockGreenIntake(),
    scorecard: {
      score: 100,
      rating: 'A',
      breakdown: [{ label: 'Renewable Energy', points: 25 }],
      suggestions: [],
    },
    carbon: {
      estimatedCarbon: 5443.76,
      breakdown: { electricity: 4100, fuel: 1340, water: 3.76 },
      unit: 'kgCO2e/year',
    },
    verdict: 'Strong candidate for a green loan.',
    assessedAt: '2025-09-01T02:39:00.000Z',
    ...overrides,
  };
}
