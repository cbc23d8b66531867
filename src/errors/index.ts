export * from './domain-error.base';
export * from './forms/form-validation.error';
export * from './assessment/unknown-category.error';
export * from './assessment/onboarding-required.error';
export * from './assessment/assessment-not-found.error';
