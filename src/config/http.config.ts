import type { ConfigService } from '@nestjs/config';
import type { SessionOptions } from 'express-session';

export const SESSION_COOKIE_NAME = 'esg_intake_session';

export function isProductionEnv(config: ConfigService): boolean {
  return ['production', 'prod'].includes(
    config.get<string>('NODE_ENV', 'development'),
  );
}

/**
 * Value for Express' `trust proxy`. Secure cookies are only sent when
 * `req.secure` is true, which behind a TLS-terminating proxy needs at least
 * one trusted hop.
 */
export function trustProxySetting(config: ConfigService): number | false {
  const hops = config.get<number>('TRUST_PROXY');
  if (hops !== undefined) return hops > 0 ? hops : false;
  return isProductionEnv(config) ? 1 : false;
}

export function buildSessionOptions(config: ConfigService): SessionOptions {
  const secure = isProductionEnv(config);
  return {
    name: SESSION_COOKIE_NAME,
    secret: config.getOrThrow<string>('SESSION_SECRET'),
    resave: false,
    // stored only once written to (flash, answers, or a rendered CSRF token)
    saveUninitialized: false,
    rolling: false,
    cookie: {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure,
      maxAge: config.get<number>('SESSION_MAX_AGE', 600_000),
    },
  };
}
