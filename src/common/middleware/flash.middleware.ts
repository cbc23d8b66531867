import { Request, Response, NextFunction } from 'express';
import type { FlashMessage } from 'src/common/types/session';

// Read-once: whatever was flashed by the previous request is handed to the
// views of this one and removed from the session.
export function flashMessage(req: Request, res: Response, next: NextFunction) {
  const msg: FlashMessage | undefined = req.session.flash;
  if (msg !== undefined) {
    res.locals.flash = msg;
    delete req.session.flash;
  } else {
    res.locals.flash = null;
  }
  next();
}
