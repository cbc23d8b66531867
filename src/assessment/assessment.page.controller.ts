import { Controller, Get, Param, Req, Res, UseFilters } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { AssessmentPageFilter } from 'src/common/filters/assessment-page.filter';
import { buildAssessmentVM } from 'src/common/helpers/util';
import type { FlashMessage } from 'src/common/types/session';
import {
  AssessmentNotFoundError,
  OnboardingRequiredError,
  UnknownCategoryError,
} from 'src/errors';
import { CATEGORY_LABELS, isCategory } from './types/assessment';

@Controller()
@UseFilters(AssessmentPageFilter)
export class AssessmentPageController {
  constructor(private readonly config: ConfigService) {}

  @Get('onboarding')
  onboarding(@Req() req: Request, @Res() res: Response) {
    return res.render('onboarding', {
      contact: req.session.contact ?? null,
      form: req.session.onboarding ?? {},
      fieldErrors: {},
    });
  }

  @Get('intake/:category')
  intake(
    @Req() req: Request,
    @Param('category') category: string,
    @Res() res: Response,
  ) {
    if (!isCategory(category)) throw new UnknownCategoryError(category);
    if (!req.session.category) throw new OnboardingRequiredError();

    const flash: FlashMessage | null | undefined = res.locals.flash;
    return res.render(`intake/${category}`, {
      category,
      categoryLabel: CATEGORY_LABELS[category],
      form: flash?.form ?? {},
      fieldErrors: flash?.fieldErrors ?? {},
    });
  }

  @Get('dashboard')
  dashboard(@Req() req: Request, @Res() res: Response) {
    const assessment = req.session.assessment;
    if (!assessment) throw new AssessmentNotFoundError();

    const tz = this.config.get<string>('APP_TIME_ZONE', 'Asia/Kolkata');
    return res.render('dashboard', { vm: buildAssessmentVM(assessment, tz) });
  }
}
