import { LoggerService } from '@nestjs/common';
import type { Logger } from 'winston';
import { loggerInstance } from './logger';

/**
 * Bridges Nest's `Logger` to winston so framework and application logs share
 * one format. The last string argument Nest passes is the context.
 */
export class WinstonLoggerService implements LoggerService {
  constructor(private readonly logger: Logger = loggerInstance) {}

  log(message: unknown, ...optionalParams: unknown[]) {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    // Nest calls error(message, stack, context)
    const [maybeStack, ...rest] = optionalParams;
    if (typeof maybeStack === 'string' && rest.length > 0) {
      this.write('error', message, rest, { stack: maybeStack });
      return;
    }
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]) {
    this.write('verbose', message, optionalParams);
  }

  private write(
    level: string,
    message: unknown,
    params: unknown[],
    extra: Record<string, unknown> = {},
  ) {
    const last = params[params.length - 1];
    const context = typeof last === 'string' ? last : undefined;
    const text =
      typeof message === 'string' ? message : JSON.stringify(message);
    this.logger.log(level, text, { ...(context ? { context } : {}), ...extra });
  }
}
