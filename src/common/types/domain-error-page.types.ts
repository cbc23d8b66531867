import { HttpStatus } from '@nestjs/common';
import type { DomainError } from 'src/errors/domain-error.base';
import type { Request as ExpressRequest } from 'express';
import type { FlashType } from './session';
import type { FieldErrors } from 'src/errors/forms/form-validation.error';

export type { FlashType };

export type RedirectTo =
  | string
  | ((req: ExpressRequest, err: DomainError) => string);

export type ViewName =
  | string
  | ((req: ExpressRequest, err: DomainError) => string);

export type FlashMsg = string | ((err: DomainError) => string);

export type FieldErrs =
  | FieldErrors
  | ((err: DomainError) => FieldErrors | undefined);

// status is left to each branch
export type CommonHandlerProps = {
  msg?: FlashMsg;
  type?: FlashType;
  fieldErrors?: FieldErrs;
  preserve?: string[];
};

export type RedirectHandler = CommonHandlerProps & {
  kind: 'redirect';
  to: RedirectTo;
  /** 3xx actually sent to the browser (default 303) */
  httpStatus?: number;
  /** 4xx/5xx meaning of the failure, for logs only */
  semanticStatus?: number;
};

export type RenderHandler = CommonHandlerProps & {
  kind: 'render';
  view: ViewName;
  /** status sent with the re-rendered page (default 400) */
  status?: number;
};

export type Handler = RedirectHandler | RenderHandler;

// ---------- Factories ----------

type RedirectOpts = Omit<RedirectHandler, 'kind' | 'to'>;
export function makeRedirectHandler(
  to: RedirectTo,
  opts: RedirectOpts = {},
): RedirectHandler {
  return {
    kind: 'redirect',
    to,
    msg: opts.msg,
    type: opts.type ?? 'error',
    fieldErrors: opts.fieldErrors,
    preserve: opts.preserve,
    httpStatus: opts.httpStatus ?? HttpStatus.SEE_OTHER,
    semanticStatus: opts.semanticStatus,
  };
}

type RenderOpts = Omit<RenderHandler, 'kind' | 'view'>;
export function makeRenderHandler(
  view: ViewName,
  opts: RenderOpts = {},
): RenderHandler {
  return {
    kind: 'render',
    view,
    msg: opts.msg,
    type: opts.type ?? 'error',
    fieldErrors: opts.fieldErrors,
    preserve: opts.preserve,
    status: opts.status ?? HttpStatus.BAD_REQUEST,
  };
}
