export type DomainErrorCode =
  | 'FORM_VALIDATION_FAILED'
  | 'UNKNOWN_CATEGORY'
  | 'ONBOARDING_REQUIRED'
  | 'ASSESSMENT_NOT_FOUND';

export interface DomainErrorParams<D = unknown> {
  message?: string; // developer-friendly default/override
  code: DomainErrorCode;
  data?: D; // structured context (e.g., { fieldErrors: { email: '...' } })
  cause?: unknown;
}

export class DomainError<D = unknown> extends Error {
  readonly code: DomainErrorCode;
  readonly data?: D;
  readonly cause?: unknown;

  constructor(name: string, params: DomainErrorParams<D>) {
    super(params.message ?? name);
    this.name = name;
    this.code = params.code;
    this.data = params.data;
    this.cause = params.cause;

    // Keep correct stack, trim constructor frames where supported
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    // Safe to log/serialize without leaking stack by default
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
    };
  }
}

export const isDomainError = (e: unknown): e is DomainError =>
  e instanceof DomainError && typeof e.code === 'string';
