import { Controller, Get, Req, Res } from '@nestjs/common';
import { Request, Response } from 'express';
import type { FlashMessage } from 'src/common/types/session';

@Controller()
export class AppController {
  @Get()
  getIndex(@Req() req: Request, @Res() res: Response): void {
    const flash: FlashMessage | null | undefined = res.locals.flash;
    return res.render('index', {
      contact: req.session.contact ?? null,
      form: flash?.form ?? {},
      fieldErrors: flash?.fieldErrors ?? {},
    });
  }
}
