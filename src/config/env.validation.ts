import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { IsIanaTimeZone } from 'src/common/validators/is-iana-time-zone';

export const NODE_ENVS = ['development', 'production', 'prod', 'test'] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

export class EnvironmentVariables {
  @IsIn(NODE_ENVS)
  NODE_ENV: NodeEnv = 'development';

  @Max(65535)
  @Min(0)
  @IsInt()
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  SESSION_SECRET!: string;

  // falls back to SESSION_SECRET
  @IsOptional()
  @IsString()
  CSRF_SECRET?: string;

  // proxy hops to trust; defaults to 1 in production
  @IsOptional()
  @Min(0)
  @IsInt()
  TRUST_PROXY?: number;

  @Min(1000)
  @IsInt()
  SESSION_MAX_AGE: number = 600_000;

  @IsIn(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  LOG_LEVEL: string = 'info';

  @IsIanaTimeZone()
  APP_TIME_ZONE: string = 'Asia/Kolkata';

  @IsOptional()
  @IsString()
  GEMINI_API_KEY?: string;

  @IsString()
  @IsNotEmpty()
  GEMINI_MODEL: string = 'gemini-2.5-flash';

  @Min(1000)
  @IsInt()
  VERDICT_TIMEOUT_MS: number = 60_000;
}

export type AppConfig = EnvironmentVariables;

/** `validate` hook for ConfigModule: throws once, listing every bad variable. */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}
