import {
  Body,
  Controller,
  HttpStatus,
  Post,
  Req,
  Res,
  UseFilters,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AssessmentPageFilter } from 'src/common/filters/assessment-page.filter';
import { setFlash } from 'src/common/helpers/flash-helper';
import { OnboardingRequiredError } from 'src/errors';
import { AssessmentService } from './assessment.service';
import { OnboardingDto } from './dto/onboarding.dto';
import { GreenIntakeDto, OtherIntakeDto, SllIntakeDto } from './dto/intake.dto';
import {
  CATEGORY_LABELS,
  type IntakeSubmission,
  type OnboardingAnswers,
} from './types/assessment';

@Controller()
@UseFilters(AssessmentPageFilter)
export class AssessmentController {
  constructor(private readonly assessmentService: AssessmentService) {}

  @Post('onboarding')
  submitOnboarding(
    @Req() req: Request,
    @Body() dto: OnboardingDto,
    @Res() res: Response,
  ) {
    const answers: OnboardingAnswers = { ...dto };
    const category = this.assessmentService.classify(answers);

    req.session.category = category;
    req.session.onboarding = answers;
    delete req.session.assessment;

    setFlash(
      req,
      'info',
      `Based on your answers, the ${CATEGORY_LABELS[category]} track fits you best.`,
    );
    return res.redirect(HttpStatus.SEE_OTHER, `/intake/${category}`);
  }

  @Post('intake/green')
  submitGreen(
    @Req() req: Request,
    @Body() dto: GreenIntakeDto,
    @Res() res: Response,
  ) {
    return this.submitIntake(req, res, { category: 'green', data: { ...dto } });
  }

  @Post('intake/sll')
  submitSll(
    @Req() req: Request,
    @Body() dto: SllIntakeDto,
    @Res() res: Response,
  ) {
    return this.submitIntake(req, res, { category: 'sll', data: { ...dto } });
  }

  @Post('intake/other')
  submitOther(
    @Req() req: Request,
    @Body() dto: OtherIntakeDto,
    @Res() res: Response,
  ) {
    return this.submitIntake(req, res, { category: 'other', data: { ...dto } });
  }

  @Post('start-over')
  startOver(@Req() req: Request, @Res() res: Response) {
    delete req.session.contact;
    delete req.session.category;
    delete req.session.onboarding;
    delete req.session.assessment;
    setFlash(req, 'info', 'Your answers have been cleared.');
    return res.redirect(HttpStatus.SEE_OTHER, '/');
  }

  private async submitIntake(
    req: Request,
    res: Response,
    submission: IntakeSubmission,
  ) {
    if (!req.session.category) throw new OnboardingRequiredError();

    const assessment = await this.assessmentService.assess(submission);
    req.session.category = submission.category;
    req.session.assessment = assessment;

    setFlash(req, 'success', 'Your assessment is ready.');
    return res.redirect(HttpStatus.SEE_OTHER, '/dashboard');
  }
}
