import 'express-session';
import type { FieldErrors } from 'src/errors/forms/form-validation.error';
import type {
  Category,
  OnboardingAnswers,
  StoredAssessment,
} from 'src/assessment/types/assessment';

export type FlashType = 'error' | 'success' | 'info' | 'warning';

export type FormValues = Record<string, unknown>;

export interface FlashMessage {
  type: FlashType;
  message: string;
  form?: FormValues;
  fieldErrors?: FieldErrors;
}

export interface ContactDetails {
  name: string;
  email: string;
}

declare module 'express-session' {
  interface SessionData {
    flash?: FlashMessage;
    contact?: ContactDetails;
    category?: Category;
    onboarding?: OnboardingAnswers;
    assessment?: StoredAssessment;
    csrfBound?: boolean;
  }
}

declare global {
  namespace Express {
    interface Locals {
      flash?: FlashMessage | null;
      csrfToken?: () => string;
    }
  }
}
