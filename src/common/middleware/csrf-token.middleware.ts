import { Request, Response, NextFunction } from 'express';
import 'src/common/types/session';

export type CsrfTokenGenerator = (req: Request, res: Response) => string;

/**
 * Exposes `csrfToken()` to the views. The token is bound to the session id,
 * so the first call marks the session for saving; responses that render no
 * form leave the visitor without a stored session.
 */
export function csrfTokenLocals(generate: CsrfTokenGenerator) {
  return (req: Request, res: Response, next: NextFunction) => {
    let token: string | undefined;
    res.locals.csrfToken = () => {
      if (token === undefined) {
        req.session.csrfBound = true;
        token = generate(req, res);
      }
      return token;
    };
    next();
  };
}
