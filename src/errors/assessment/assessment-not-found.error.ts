import { DomainError } from '../domain-error.base';

export class AssessmentNotFoundError extends DomainError {
  constructor() {
    super('AssessmentNotFoundError', {
      code: 'ASSESSMENT_NOT_FOUND',
      message: 'No assessment stored in this session',
    });
  }
}
