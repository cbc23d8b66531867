import type { CarbonResult } from '../types/assessment';

// kgCO2 per unit, India grid average and diesel proxy
export const EMISSION_FACTORS = {
  electricityPerKwh: 0.82,
  fuelPerLitre: 2.68,
  waterPerLitre: 0.000376,
} as const;

export interface CarbonInputs {
  annualElectricityKwh?: number;
  annualFuelLitres?: number;
  waterConsumptionLitres?: number;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function calculateCarbonProxy(inputs: CarbonInputs): CarbonResult {
  const electricity =
    (inputs.annualElectricityKwh ?? 0) * EMISSION_FACTORS.electricityPerKwh;
  const fuel = (inputs.annualFuelLitres ?? 0) * EMISSION_FACTORS.fuelPerLitre;
  const water =
    (inputs.waterConsumptionLitres ?? 0) * EMISSION_FACTORS.waterPerLitre;

  return {
    estimatedCarbon: round2(electricity + fuel + water),
    breakdown: {
      electricity: round2(electricity),
      fuel: round2(fuel),
      water: round2(water),
    },
    unit: 'kgCO2e/year',
  };
}
