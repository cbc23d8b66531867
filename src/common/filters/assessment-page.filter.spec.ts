import { AssessmentPageFilter, formViewFor } from './assessment-page.filter';
import {
  createMockReq,
  createMockRes,
  createMockHost,
} from 'src/test/factories/mock-http.factory';
import {
  AssessmentNotFoundError,
  FormValidationError,
  OnboardingRequiredError,
  UnknownCategoryError,
} from 'src/errors';

jest.mock('src/common/helpers/flash-helper', () => ({ setFlash: jest.fn() }));
import { setFlash } from 'src/common/helpers/flash-helper';

const invalid = () =>
  new FormValidationError({ annualFuelLitres: 'Please enter a number.' });

describe('formViewFor', () => {
  it.each([
    ['/intake/green', 'intake/green'],
    ['/intake/sll/', 'intake/sll'],
    ['/intake/other', 'intake/other'],
    ['/intake/blue', 'onboarding'],
    ['/onboarding', 'onboarding'],
  ])('%s → %s', (path, view) => {
    expect(formViewFor(createMockReq({ url: path }))).toBe(view);
  });
});

describe('Assessment page filter mapping', () => {
  beforeEach(() => jest.clearAllMocks());

  it.each(['green', 'sll', 'other'])(
    'FORM_VALIDATION_FAILED on /intake/%s → 400 re-render of its form',
    (track) => {
      const req = createMockReq({
        method: 'POST',
        url: `/intake/${track}`,
        body: { annualFuelLitres: 'lots', businessInfo: 'Bakery' },
      });
      const res = createMockRes();

      AssessmentPageFilter.catch(invalid(), createMockHost(req, res));

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.render).toHaveBeenCalledWith(`intake/${track}`, {
        errors: [
          {
            message: 'Please correct the highlighted fields.',
            code: 'FORM_VALIDATION_FAILED',
          },
        ],
        form: { annualFuelLitres: 'lots', businessInfo: 'Bakery' },
        fieldErrors: { annualFuelLitres: 'Please enter a number.' },
      });
      expect(setFlash).not.toHaveBeenCalled();
    },
  );

  it('FORM_VALIDATION_FAILED on /onboarding → re-render keeps ticked boxes', () => {
    const req = createMockReq({
      method: 'POST',
      url: '/onboarding',
      body: { isManufacturing: ['0', '1'], tracksEnvMetrics: '0', extra: 'x' },
    });
    const res = createMockRes();

    AssessmentPageFilter.catch(
      new FormValidationError({ extra: 'property extra should not exist' }),
      createMockHost(req, res),
    );

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.render).toHaveBeenCalledWith('onboarding', {
      errors: [
        {
          message: 'Please correct the highlighted fields.',
          code: 'FORM_VALIDATION_FAILED',
        },
      ],
      form: { isManufacturing: ['0', '1'], tracksEnvMetrics: '0' },
      fieldErrors: { extra: 'property extra should not exist' },
    });
  });

  it('UNKNOWN_CATEGORY → error flash + 303 /onboarding', () => {
    const req = createMockReq({ url: '/intake/blue' });
    const res = createMockRes();

    AssessmentPageFilter.catch(
      new UnknownCategoryError('blue'),
      createMockHost(req, res),
    );

    expect(setFlash).toHaveBeenCalledWith(
      req,
      'error',
      'Please choose one of the available tracks.',
      { form: {}, fieldErrors: undefined },
    );
    expect(res.redirect).toHaveBeenCalledWith(303, '/onboarding');
  });

  it('ONBOARDING_REQUIRED → info flash + 303 /onboarding', () => {
    const req = createMockReq({ method: 'POST', url: '/intake/green' });
    const res = createMockRes();

    AssessmentPageFilter.catch(
      new OnboardingRequiredError(),
      createMockHost(req, res),
    );

    expect(setFlash).toHaveBeenCalledWith(
      req,
      'info',
      'Please answer a few quick questions first.',
      { form: {}, fieldErrors: undefined },
    );
    expect(res.redirect).toHaveBeenCalledWith(303, '/onboarding');
  });

  it('ASSESSMENT_NOT_FOUND → info flash + 303 /onboarding', () => {
    const req = createMockReq({ url: '/dashboard' });
    const res = createMockRes();

    AssessmentPageFilter.catch(
      new AssessmentNotFoundError(),
      createMockHost(req, res),
    );

    expect(setFlash).toHaveBeenCalledWith(
      req,
      'info',
      'No assessment yet. Start with the questionnaire.',
      { form: {}, fieldErrors: undefined },
    );
    expect(res.redirect).toHaveBeenCalledWith(303, '/onboarding');
    expect(res.render).not.toHaveBeenCalled();
  });
});
