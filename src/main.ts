// main.ts
import 'reflect-metadata';
import express, { NextFunction, Request, Response } from 'express';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { HttpStatus } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { doubleCsrf } from 'csrf-csrf';
import cookieParser from 'cookie-parser';
import session from 'express-session';
import { join } from 'path';
import { AppModule } from './app.module';
import { flashMessage } from './common/middleware/flash.middleware';
import { csrfTokenLocals } from './common/middleware/csrf-token.middleware';
import {
  buildSessionOptions,
  isProductionEnv,
  trustProxySetting,
} from './config/http.config';
import { AllExceptionsFilter } from './common/filters/all-exception.filter';
import { createFormValidationPipe } from './common/pipes/form-validation.pipe';
import { WinstonLoggerService } from './common/logger/winston-logger.service';
import { isRecord } from './common/helpers/request';
import { loggerInstance } from './common/logger/logger';

const ROOT_DIR = join(__dirname, '..', '..');

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function csrfTokenFrom(req: Request): string | undefined {
  const body: unknown = req.body;
  if (isRecord(body) && typeof body._csrf === 'string') return body._csrf;
  return (
    headerValue(req.headers['x-csrf-token']) ??
    headerValue(req.headers['x-xsrf-token'])
  );
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: new WinstonLoggerService(),
  });
  const config = app.get(ConfigService);
  const isProduction = isProductionEnv(config);
  const sessionSecret = config.getOrThrow<string>('SESSION_SECRET');

  const { doubleCsrfProtection, invalidCsrfTokenError, generateCsrfToken } =
    doubleCsrf({
      getSecret: () => config.get<string>('CSRF_SECRET') || sessionSecret,
      getSessionIdentifier: (req) => req.sessionID,
      cookieName: 'XSRF-TOKEN',
      cookieOptions: {
        httpOnly: true,
        sameSite: 'lax',
        secure: isProduction,
        path: '/',
      },
      getCsrfTokenFromRequest: csrfTokenFrom,
      ignoredMethods: ['GET', 'HEAD', 'OPTIONS'],
    });

  app.setBaseViewsDir(join(ROOT_DIR, 'views'));
  app.setViewEngine('pug');
  app.useStaticAssets(join(ROOT_DIR, 'public'), { prefix: '/static/' });

  app.useGlobalPipes(createFormValidationPipe());

  const trustProxy = trustProxySetting(config);
  if (trustProxy !== false) app.set('trust proxy', trustProxy);

  app.use(session(buildSessionOptions(config)));
  app.use(cookieParser());

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use(doubleCsrfProtection);

  // _csrf is not a form field; ValidationPipe would reject it
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    if (isRecord(body) && '_csrf' in body) {
      delete body._csrf;
    }
    next();
  });

  app.use(csrfTokenLocals(generateCsrfToken));

  app.use(
    (err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (err === invalidCsrfTokenError) {
        res.status(HttpStatus.FORBIDDEN).send('Invalid CSRF token');
        return;
      }
      next(err);
    },
  );

  app.use(flashMessage);
  app.useGlobalFilters(new AllExceptionsFilter());

  await app.listen(config.get<number>('PORT', 3000));
}

bootstrap().catch((err: unknown) => {
  loggerInstance.error('Bootstrap failed', {
    context: 'Bootstrap',
    stack: err instanceof Error ? err.stack : String(err),
  });
  process.exit(1);
});
