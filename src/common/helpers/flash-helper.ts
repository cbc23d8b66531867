import { Request } from 'express';
import type {
  FlashMessage,
  FlashType,
  FormValues,
} from 'src/common/types/session';
import type { FieldErrors } from 'src/errors/forms/form-validation.error';

export function setFlash(
  req: Request,
  type: FlashType,
  message: string,
  extras?: { form?: FormValues; fieldErrors?: FieldErrors },
) {
  const flash: FlashMessage = {
    type,
    message,
    ...(extras?.form ? { form: extras.form } : {}),
    ...(extras?.fieldErrors ? { fieldErrors: extras.fieldErrors } : {}),
  };
  req.session.flash = flash;
}
