import type { Request } from 'express';
import { HttpStatus } from '@nestjs/common';
import { createDomainErrorPageFilter } from './factory/create-domain-error-page-filter';
import {
  makeRedirectHandler,
  makeRenderHandler,
} from '../types/domain-error-page.types';
import { dataAs } from 'src/errors/utils/error-data';
import type { FormValidationData } from 'src/errors/forms/form-validation.error';
import { isCategory } from 'src/assessment/types/assessment';
import { INTAKE_FIELDS } from 'src/assessment/dto/intake.dto';
import { ONBOARDING_FIELDS } from 'src/assessment/dto/onboarding.dto';

/** The view that holds the form posted to this path. */
export function formViewFor(req: Request): string {
  const match = /^\/intake\/([^/]+)\/?$/.exec(req.path);
  if (match && isCategory(match[1])) return `intake/${match[1]}`;
  return 'onboarding';
}

const PRESERVED_FIELDS = [
  ...ONBOARDING_FIELDS,
  ...INTAKE_FIELDS.green,
  ...INTAKE_FIELDS.sll,
  ...INTAKE_FIELDS.other,
];

export const AssessmentPageFilter = createDomainErrorPageFilter({
  FORM_VALIDATION_FAILED: makeRenderHandler(formViewFor, {
    msg: () => 'Please correct the highlighted fields.',
    fieldErrors: (err) => dataAs<FormValidationData>(err)?.fieldErrors,
    preserve: PRESERVED_FIELDS,
  }),

  UNKNOWN_CATEGORY: makeRedirectHandler('/onboarding', {
    semanticStatus: HttpStatus.NOT_FOUND,
    msg: () => 'Please choose one of the available tracks.',
  }),

  ONBOARDING_REQUIRED: makeRedirectHandler('/onboarding', {
    semanticStatus: HttpStatus.CONFLICT,
    type: 'info',
    msg: () => 'Please answer a few quick questions first.',
  }),

  ASSESSMENT_NOT_FOUND: makeRedirectHandler('/onboarding', {
    semanticStatus: HttpStatus.NOT_FOUND,
    type: 'info',
    msg: () => 'No assessment yet. Start with the questionnaire.',
  }),
});
