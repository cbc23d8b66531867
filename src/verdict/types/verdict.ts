import type {
  Category,
  IntakeSubmission,
  Suggestion,
} from 'src/assessment/types/assessment';

export interface VerdictContext {
  category: Category;
  score: number;
  rating: string;
  carbonEstimate: number;
  intake: IntakeSubmission['data'];
  suggestions: Suggestion[];
}

export const VERDICT_MESSAGES = {
  unconfigured: 'AI verdict unavailable. Please configure GEMINI_API_KEY.',
  unavailable: (status: number) =>
    `AI service temporarily unavailable (Error ${status}).`,
  timeout: 'AI service timed out. Please try again.',
  empty: 'Unable to generate verdict.',
  failed: 'An error occurred while generating the verdict.',
} as const;
