import { DomainError } from '../domain-error.base';

export type FieldErrors = Record<string, string>;

export interface FormValidationData {
  fieldErrors: FieldErrors;
}

export class FormValidationError extends DomainError<FormValidationData> {
  constructor(fieldErrors: FieldErrors) {
    super('FormValidationError', {
      code: 'FORM_VALIDATION_FAILED',
      message: 'Please correct the highlighted fields.',
      data: { fieldErrors },
    });
  }

  get fieldErrors(): FieldErrors {
    return this.data?.fieldErrors ?? {};
  }
}
