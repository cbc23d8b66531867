import { DomainError } from '../domain-error.base';

export class UnknownCategoryError extends DomainError<{ category: string }> {
  constructor(category: string) {
    super('UnknownCategoryError', {
      code: 'UNKNOWN_CATEGORY',
      message: `Unknown intake category "${category}"`,
      data: { category },
    });
  }
}
