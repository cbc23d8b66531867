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
import type { ContactDetails } from 'src/common/types/session';
import { FormsService } from './forms.service';
import { ContactFormDto } from './dto/contact-form.dto';
import { setFlash } from 'src/common/helpers/flash-helper';
import { ContactPageFilter } from 'src/common/filters/contact-page.filter';

@Controller()
@UseFilters(ContactPageFilter)
export class FormsController {
  constructor(private readonly formsService: FormsService) {}

  @Post('submit-form')
  submitForm(
    @Req() req: Request,
    @Body() dto: ContactFormDto,
    @Res() res: Response,
  ) {
    const contact: ContactDetails = this.formsService.acceptContact(dto);
    req.session.contact = contact;
    setFlash(req, 'success', this.formsService.successMessage(contact));
    return res.redirect(HttpStatus.SEE_OTHER, '/onboarding');
  }
}
