import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiError, GoogleGenAI } from '@google/genai';
import { SYSTEM_PROMPTS } from './verdict.prompts';
import { VERDICT_MESSAGES, type VerdictContext } from './types/verdict';

export const GENERATION_CONFIG = {
  temperature: 0.7,
  maxOutputTokens: 1000,
  topP: 0.9,
} as const;

export function buildUserMessage(ctx: VerdictContext): string {
  const submitted = Object.entries(ctx.intake)
    .filter(([, v]) => v !== undefined && v !== null && v !== '' && v !== 0)
    .map(([k, v]) => `- ${k}: ${String(v)}`)
    .join('\n');

  const suggestions = ctx.suggestions.length
    ? ctx.suggestions.map((s) => `- ${s.text}`).join('\n')
    : 'None';

  const carbon = ctx.carbonEstimate.toLocaleString('en-US', {
    maximumFractionDigits: 0,
  });

  return [
    'USER ASSESSMENT RESULTS:',
    `Category: ${ctx.category.toUpperCase()}`,
    `Score: ${ctx.score}/100`,
    `Rating: ${ctx.rating}`,
    `Estimated Carbon Footprint: ${carbon} kgCO2e/year`,
    '',
    "USER'S SUBMITTED DATA:",
    submitted,
    '',
    'SYSTEM-GENERATED SUGGESTIONS:',
    suggestions,
    '',
    'Based on the above, provide your expert verdict and personalized recommendations.',
  ].join('\n');
}

@Injectable()
export class VerdictService {
  private readonly logger = new Logger(VerdictService.name);
  private readonly client?: GoogleGenAI;

  constructor(private readonly config: ConfigService) {
    const apiKey = this.config.get<string>('GEMINI_API_KEY');
    if (apiKey) this.client = new GoogleGenAI({ apiKey });
  }

  /** Never rejects: every failure becomes a message the dashboard can show. */
  async generate(ctx: VerdictContext): Promise<string> {
    if (!this.client) return VERDICT_MESSAGES.unconfigured;

    const model = this.config.get<string>('GEMINI_MODEL', 'gemini-2.5-flash');
    const timeoutMs = this.config.get<number>('VERDICT_TIMEOUT_MS', 60_000);

    try {
      const response = await this.client.models.generateContent({
        model,
        contents: buildUserMessage(ctx),
        config: {
          ...GENERATION_CONFIG,
          systemInstruction: SYSTEM_PROMPTS[ctx.category],
          httpOptions: { timeout: timeoutMs },
        },
      });
      return response.text?.trim() || VERDICT_MESSAGES.empty;
    } catch (err) {
      if (err instanceof ApiError) {
        this.logger.warn(
          `Verdict request failed with ${err.status}: ${err.message}`,
        );
        return VERDICT_MESSAGES.unavailable(err.status);
      }
      if (
        err instanceof Error &&
        (err.name === 'TimeoutError' || err.name === 'AbortError')
      ) {
        this.logger.warn(`Verdict request timed out after ${timeoutMs}ms`);
        return VERDICT_MESSAGES.timeout;
      }
      this.logger.error(
        'Verdict generation failed',
        err instanceof Error ? err.stack : String(err),
      );
      return VERDICT_MESSAGES.failed;
    }
  }
}
