import { Injectable, Logger } from '@nestjs/common';
import { VerdictService } from 'src/verdict/verdict.service';
import { classifyApplicant } from './scoring/classify';
import { calculateCarbonProxy } from './scoring/carbon';
import { generateScorecard } from './scoring/scorecard';
import type {
  Category,
  IntakeSubmission,
  OnboardingAnswers,
  StoredAssessment,
} from './types/assessment';

@Injectable()
export class AssessmentService {
  private readonly logger = new Logger(AssessmentService.name);

  constructor(private readonly verdictService: VerdictService) {}

  classify(answers: OnboardingAnswers): Category {
    const category = classifyApplicant(answers);
    this.logger.log(`Onboarding classified as ${category}`);
    return category;
  }

  async assess(
    submission: IntakeSubmission,
    now: Date = new Date(),
  ): Promise<StoredAssessment> {
    // only the green intake asks for consumption figures
    const carbon = calculateCarbonProxy(
      submission.category === 'green' ? submission.data : {},
    );
    const scorecard = generateScorecard(submission);

    const verdict = await this.verdictService.generate({
      category: submission.category,
      score: scorecard.score,
      rating: scorecard.rating,
      carbonEstimate: carbon.estimatedCarbon,
      intake: submission.data,
      suggestions: scorecard.suggestions,
    });

    this.logger.log(
      `Assessment ${submission.category}: score ${scorecard.score} (${scorecard.rating})`,
    );

    return {
      category: submission.category,
      intake: { ...submission.data },
      scorecard,
      carbon,
      verdict,
      assessedAt: now.toISOString(),
    };
  }
}
