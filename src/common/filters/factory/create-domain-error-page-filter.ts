// create-domain-error-page-filter.ts
import type { Request as ExpressRequest, Response } from 'express';
import type { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import { HttpStatus, Logger } from '@nestjs/common';
import { setFlash } from 'src/common/helpers/flash-helper';
import { formBody } from 'src/common/helpers/request';
import {
  makeRedirectHandler,
  type Handler,
  type FlashMsg,
  type FieldErrs,
} from '../../types/domain-error-page.types';
import type { FormValues } from 'src/common/types/session';
import type { FieldErrors } from 'src/errors/forms/form-validation.error';
import {
  isDomainError,
  type DomainError,
  type DomainErrorCode,
} from 'src/errors/domain-error.base';
import { AllExceptionsFilter } from '../all-exception.filter';

const log = new Logger('DomainErrorPageFilter');

/** Flattens an Error.cause chain into something JSON.stringify can take. */
export function serializeCause(cause: unknown): unknown {
  if (!(cause instanceof Error)) return cause;
  const out: Record<string, unknown> = {
    name: cause.name,
    message: cause.message,
  };
  if (cause.cause !== undefined) out.cause = serializeCause(cause.cause);
  return out;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

// Expected user mistakes are info; only server faults are errors.
export function pickLogLevel(
  code: DomainErrorCode | undefined,
  semanticStatus?: number,
): Level {
  const s = semanticStatus ?? 0;

  if (s >= 500) return 'error';

  const infoStatuses = new Set([400, 404, 409, 422]);
  if (infoStatuses.has(s)) {
    const infoCodes = new Set<DomainErrorCode>([
      'FORM_VALIDATION_FAILED',
      'ONBOARDING_REQUIRED',
      'ASSESSMENT_NOT_FOUND',
    ]);
    if (!code || infoCodes.has(code)) return 'info';
  }

  if (s >= 400) return 'warn';

  return 'info';
}

export type DomainErrorHandlerMap = Partial<Record<DomainErrorCode, Handler>>;

export function createDomainErrorPageFilter(
  map: DomainErrorHandlerMap,
  fallback: ExceptionFilter = new AllExceptionsFilter(),
): ExceptionFilter {
  return {
    catch(e: unknown, host: ArgumentsHost) {
      if (!isDomainError(e)) return fallback.catch(e, host);
      const err: DomainError = e;

      // unmapped codes go home with a generic message
      const handler: Handler =
        map[err.code] ??
        makeRedirectHandler('/', { msg: 'Unknown error happens' });

      const ctx = host.switchToHttp();
      const req = ctx.getRequest<ExpressRequest>();
      const res = ctx.getResponse<Response>();

      const semanticStatus =
        handler.kind === 'redirect' ? handler.semanticStatus : handler.status;
      const responseStatus =
        handler.kind === 'redirect'
          ? (handler.httpStatus ?? HttpStatus.SEE_OTHER)
          : (handler.status ?? HttpStatus.BAD_REQUEST);

      const payloadForLog = {
        code: err.code,
        message: err.message,
        data: err.data,
        semanticStatus,
        responseStatus,
        route: req.originalUrl,
        method: req.method,
        ip: req.ip,
        ua: req.get('user-agent'),
        cause: serializeCause(err.cause),
      };

      const pretty = JSON.stringify(payloadForLog);
      switch (pickLogLevel(err.code, semanticStatus)) {
        case 'error':
          log.error(pretty);
          break;
        case 'warn':
          log.warn(pretty);
          break;
        case 'info':
          log.log(pretty);
          break;
        default:
          log.debug(pretty);
      }

      res.setHeader('X-Error-Code', err.code);
      if (semanticStatus) res.setHeader('X-Error-Status', String(semanticStatus));

      // ---- preserve: submitted values to refill the form ----
      const body = formBody(req);
      const form: FormValues = {};
      for (const key of handler.preserve ?? []) {
        if (Object.prototype.hasOwnProperty.call(body, key)) {
          form[key] = body[key];
        }
      }

      const resolveMsg = (msg?: FlashMsg): string =>
        typeof msg === 'function' ? msg(err) : (msg ?? err.message);

      const resolveFieldErrors = (fe?: FieldErrs): FieldErrors | undefined =>
        typeof fe === 'function' ? fe(err) : fe;

      if (handler.kind === 'render') {
        const view =
          typeof handler.view === 'function'
            ? handler.view(req, err)
            : handler.view;
        const message = resolveMsg(handler.msg);
        res.status(responseStatus);
        return res.render(view, {
          errors: [{ message, code: err.code }],
          form,
          fieldErrors: resolveFieldErrors(handler.fieldErrors) ?? {},
        });
      }

      const to =
        typeof handler.to === 'function' ? handler.to(req, err) : handler.to;
      const message = resolveMsg(handler.msg);
      const fieldErrors = resolveFieldErrors(handler.fieldErrors);

      setFlash(req, handler.type ?? 'error', message, { form, fieldErrors });
      return res.redirect(responseStatus, to);
    },
  };
}
