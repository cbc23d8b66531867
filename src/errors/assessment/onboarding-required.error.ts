import { DomainError } from '../domain-error.base';

export class OnboardingRequiredError extends DomainError {
  constructor() {
    super('OnboardingRequiredError', {
      code: 'ONBOARDING_REQUIRED',
      message: 'Onboarding questionnaire has not been completed',
    });
  }
}
