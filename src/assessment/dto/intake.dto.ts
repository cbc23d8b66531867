import {
  IsDefined,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import {
  ToOptionalNumber,
  ToTrimmedText,
} from 'src/common/transforms/form-value.transforms';
import type { GreenIntake, OtherIntake, SllIntake } from '../types/assessment';

const TEXT_LIMIT = 2000;
const numberMsg = { message: 'Please enter a number.' };
const requiredMsg = { message: 'This field is required.' };
const notNegativeMsg = { message: 'Must be zero or more.' };

export class GreenIntakeDto implements GreenIntake {
  @ToOptionalNumber()
  @Min(0, notNegativeMsg)
  @IsNumber({}, numberMsg)
  @IsDefined(requiredMsg)
  annualElectricityKwh!: number;

  @ToOptionalNumber()
  @Min(0, notNegativeMsg)
  @IsNumber({}, numberMsg)
  @IsDefined(requiredMsg)
  annualFuelLitres!: number;

  @ToOptionalNumber()
  @Min(0, notNegativeMsg)
  @IsNumber({}, numberMsg)
  @IsDefined(requiredMsg)
  waterConsumptionLitres!: number;

  @ToOptionalNumber()
  @Min(0, notNegativeMsg)
  @IsNumber({}, numberMsg)
  @IsDefined(requiredMsg)
  wasteGeneratedKgMonth!: number;

  @ToOptionalNumber()
  @Max(100, { message: 'Must be between 0 and 100.' })
  @Min(0, { message: 'Must be between 0 and 100.' })
  @IsNumber({}, numberMsg)
  @IsDefined(requiredMsg)
  renewableEnergyPct!: number;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  efficiencyEquipment?: string;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(20)
  @IsString()
  industryCode?: string;
}

export class SllIntakeDto implements SllIntake {
  @ToTrimmedText()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  @IsDefined(requiredMsg)
  turnoverLastThreeYears!: string;

  @ToTrimmedText()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  @IsDefined(requiredMsg)
  targetImprovementGoals!: string;

  @ToOptionalNumber()
  @Min(0, notNegativeMsg)
  @IsInt({ message: 'Please enter a whole number.' })
  @IsDefined(requiredMsg)
  numEmployees!: number;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  workforceDiversityStats?: string;

  @ToOptionalNumber()
  @Min(0, notNegativeMsg)
  @IsInt({ message: 'Please enter a whole number.' })
  @IsDefined(requiredMsg)
  safetyIncidentCount!: number;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  trainingPrograms?: string;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  governancePolicies?: string;
}

export class OtherIntakeDto implements OtherIntake {
  @ToTrimmedText()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  @IsDefined(requiredMsg)
  businessInfo!: string;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  existingDocs?: string;

  @ToTrimmedText()
  @IsOptional()
  @MaxLength(TEXT_LIMIT)
  @IsString()
  interestAreas?: string;
}

export const INTAKE_FIELDS = {
  green: [
    'annualElectricityKwh',
    'annualFuelLitres',
    'waterConsumptionLitres',
    'wasteGeneratedKgMonth',
    'renewableEnergyPct',
    'efficiencyEquipment',
    'industryCode',
  ],
  sll: [
    'turnoverLastThreeYears',
    'targetImprovementGoals',
    'numEmployees',
    'workforceDiversityStats',
    'safetyIncidentCount',
    'trainingPrograms',
    'governancePolicies',
  ],
  other: ['businessInfo', 'existingDocs', 'interestAreas'],
} as const satisfies Record<string, readonly string[]>;
