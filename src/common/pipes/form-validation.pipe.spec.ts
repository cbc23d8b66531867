import type { ArgumentMetadata, ValidationError } from '@nestjs/common';
import { ContactFormDto } from 'src/forms/dto/contact-form.dto';
import { OnboardingDto } from 'src/assessment/dto/onboarding.dto';
import {
  GreenIntakeDto,
  OtherIntakeDto,
  SllIntakeDto,
} from 'src/assessment/dto/intake.dto';
import { FormValidationError } from 'src/errors/forms/form-validation.error';
import { createFormValidationPipe, toFieldErrors } from './form-validation.pipe';

const bodyOf = (metatype: ArgumentMetadata['metatype']): ArgumentMetadata => ({
  type: 'body',
  metatype,
});

async function fieldErrorsOf(
  promise: Promise<unknown>,
): Promise<Record<string, string>> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof FormValidationError) return err.fieldErrors;
    throw err;
  }
  throw new Error('expected validation to fail');
}

describe('toFieldErrors', () => {
  it('keeps the first message per field and flattens children', () => {
    const errors: ValidationError[] = [
      {
        property: 'email',
        constraints: { isNotEmpty: 'required', isEmail: 'bad email' },
        children: [],
      },
      {
        property: 'address',
        children: [
          {
            property: 'city',
            constraints: { isString: 'city must be text' },
            children: [],
          },
        ],
      },
    ];

    expect(toFieldErrors(errors)).toEqual({
      email: 'required',
      'address.city': 'city must be text',
    });
  });
});

describe('createFormValidationPipe', () => {
  const pipe = createFormValidationPipe();

  describe('ContactFormDto', () => {
    it('trims the name and normalises the email', async () => {
      const dto = await pipe.transform(
        { name: '  Asha Rao  ', email: ' Asha@Example.COM ' },
        bodyOf(ContactFormDto),
      );

      expect(dto).toBeInstanceOf(ContactFormDto);
      expect(dto).toEqual({ name: 'Asha Rao', email: 'asha@example.com' });
    });

    it('reports the presence check first for blank input', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform({ name: '   ', email: '' }, bodyOf(ContactFormDto)),
      );

      expect(fieldErrors).toEqual({
        name: 'Please enter your name.',
        email: 'Please enter your email address.',
      });
    });

    it('rejects a malformed email and an overlong name', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform(
          { name: 'a'.repeat(101), email: 'not-an-email' },
          bodyOf(ContactFormDto),
        ),
      );

      expect(fieldErrors).toEqual({
        name: 'Name must be 100 characters or fewer.',
        email: 'Please enter a valid email address.',
      });
    });

    it('rejects fields the form does not have', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform(
          { name: 'Asha', email: 'asha@example.com', admin: 'yes' },
          bodyOf(ContactFormDto),
        ),
      );

      expect(Object.keys(fieldErrors)).toEqual(['admin']);
    });
  });

  describe('OnboardingDto', () => {
    it('reads hidden+checkbox pairs and defaults missing boxes to false', async () => {
      const dto = await pipe.transform(
        {
          isManufacturing: ['0', '1'],
          tracksEnvMetrics: '0',
          hasSustainabilityGoals: 'on',
        },
        bodyOf(OnboardingDto),
      );

      expect(dto).toEqual({
        isManufacturing: true,
        consumesSignificantEnergy: false,
        tracksEnvMetrics: false,
        measuresEmissions: false,
        hasSustainabilityGoals: true,
        appliedForEsgLoan: false,
        hasEmployeePolicies: false,
      });
    });
  });

  describe('GreenIntakeDto', () => {
    const valid = {
      annualElectricityKwh: '12000',
      annualFuelLitres: '800',
      waterConsumptionLitres: '40000',
      wasteGeneratedKgMonth: '120',
      renewableEnergyPct: '30',
      efficiencyEquipment: '  LED lighting ',
      industryCode: '',
    };

    it('converts numbers and drops blank optional text', async () => {
      const dto = await pipe.transform(valid, bodyOf(GreenIntakeDto));

      expect(dto).toEqual({
        annualElectricityKwh: 12000,
        annualFuelLitres: 800,
        waterConsumptionLitres: 40000,
        wasteGeneratedKgMonth: 120,
        renewableEnergyPct: 30,
        efficiencyEquipment: 'LED lighting',
        industryCode: undefined,
      });
    });

    it('reports empty, non-numeric, negative and out-of-range values', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform(
          {
            ...valid,
            annualElectricityKwh: '',
            annualFuelLitres: 'lots',
            waterConsumptionLitres: '-5',
            renewableEnergyPct: '140',
          },
          bodyOf(GreenIntakeDto),
        ),
      );

      expect(fieldErrors).toEqual({
        annualElectricityKwh: 'This field is required.',
        annualFuelLitres: 'Please enter a number.',
        waterConsumptionLitres: 'Must be zero or more.',
        renewableEnergyPct: 'Must be between 0 and 100.',
      });
    });

    it('does not read hex, binary or octal literals as numbers', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform(
          {
            ...valid,
            annualElectricityKwh: '0x10',
            annualFuelLitres: '0b11',
            waterConsumptionLitres: '0o7',
          },
          bodyOf(GreenIntakeDto),
        ),
      );

      expect(fieldErrors).toEqual({
        annualElectricityKwh: 'Please enter a number.',
        annualFuelLitres: 'Please enter a number.',
        waterConsumptionLitres: 'Please enter a number.',
      });
    });
  });

  describe('SllIntakeDto', () => {
    it('requires whole numbers for headcount and incidents', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform(
          {
            turnoverLastThreeYears: '1 Cr',
            targetImprovementGoals: 'Cut water use by 10%',
            numEmployees: '12.5',
            safetyIncidentCount: '1',
          },
          bodyOf(SllIntakeDto),
        ),
      );

      expect(fieldErrors).toEqual({
        numEmployees: 'Please enter a whole number.',
      });
    });
  });

  describe('OtherIntakeDto', () => {
    it('requires the business description', async () => {
      const fieldErrors = await fieldErrorsOf(
        pipe.transform({ businessInfo: ' ' }, bodyOf(OtherIntakeDto)),
      );

      expect(fieldErrors).toEqual({ businessInfo: 'This field is required.' });
    });
  });
});
