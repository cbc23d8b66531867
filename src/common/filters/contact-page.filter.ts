import { createDomainErrorPageFilter } from './factory/create-domain-error-page-filter';
import { makeRenderHandler } from '../types/domain-error-page.types';
import { dataAs } from 'src/errors/utils/error-data';
import type { FormValidationData } from 'src/errors/forms/form-validation.error';

export const ContactPageFilter = createDomainErrorPageFilter({
  FORM_VALIDATION_FAILED: makeRenderHandler('index', {
    msg: () => 'Please correct the highlighted fields.',
    fieldErrors: (err) => dataAs<FormValidationData>(err)?.fieldErrors,
    preserve: ['name', 'email'],
  }),
});
