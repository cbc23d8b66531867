import { ValidationError, ValidationPipe } from '@nestjs/common';
import {
  FormValidationError,
  type FieldErrors,
} from 'src/errors/forms/form-validation.error';

/**
 * One message per field: the first failing constraint wins. Nested
 * properties are reported under a dotted path (`address.city`).
 */
export function toFieldErrors(
  errors: ValidationError[],
  parentPath = '',
): FieldErrors {
  const out: FieldErrors = {};
  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0 && out[path] === undefined) {
      out[path] = messages[0];
    }
    if (error.children?.length) {
      Object.assign(out, toFieldErrors(error.children, path));
    }
  }
  return out;
}

export function createFormValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: { enableImplicitConversion: true },
    exceptionFactory: (errors: ValidationError[]) =>
      new FormValidationError(toFieldErrors(errors)),
  });
}
