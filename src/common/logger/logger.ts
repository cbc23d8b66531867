import * as winston from 'winston';

const colorizer = winston.format.colorize();

export const devLineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, context, ms, stack, ...meta } = info;

  const pureLevel = info[Symbol.for('level')];

  const metaData = Object.keys(meta).length
    ? `\n${JSON.stringify(meta, null, 2)}`
    : '';

  // keep the stack's own line breaks
  const stackTrace = stack ? `\n${String(stack)}` : '';

  const ctx = typeof context === 'string' ? context : 'App';

  const logLine = `[${String(timestamp)}] ${level} [${ctx}] ${String(message)} ${String(ms ?? '')}${metaData}${stackTrace}`;

  if (pureLevel === 'error') {
    return colorizer.colorize('error', logLine);
  }

  return logLine;
});

export const loggerInstance = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.ms(),
  ),
  transports: [
    new winston.transports.Console({
      format:
        process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'prod'
          ? winston.format.json()
          : winston.format.combine(winston.format.colorize(), devLineFormat),
    }),
  ],
});
