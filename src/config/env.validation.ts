import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Min, validateSync } from 'class-validator';

// Reads the raw env string: implicit conversion would already have turned "false" into true.
const toBoolean = ({ obj, key, value }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  return typeof raw === 'string' ? raw.trim().toLowerCase() === 'true' : value;
};

const trimmed = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() || undefined : value;

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  DATABASE_URL!: string;

  @Transform(toBoolean)
  @IsBoolean()
  DATABASE_SSL: boolean = false;

  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE: boolean = true;

  @Transform(trimmed)
  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @Transform(trimmed)
  @IsString()
  OPENAI_BASE_URL: string = 'https://api.openai.com/v1';

  @IsInt()
  @Min(1000)
  OPENAI_TIMEOUT_MS: number = 60000;

  @IsString()
  OPENAI_RESOLVER_MODEL: string = 'gpt-4.1-mini';

  @IsString()
  OPENAI_SHORT_MODEL: string = 'gpt-4.1-mini';

  @IsString()
  OPENAI_FULL_MODEL: string = 'gpt-4.1';

  @IsString()
  OPENAI_COMPAT_MODEL: string = 'gpt-4.1';

  @Transform(trimmed)
  @IsOptional()
  @IsString()
  GOOGLE_WEB_CLIENT_ID?: string;

  @Transform(trimmed)
  @IsOptional()
  @IsString()
  TELEGRAM_BOT_TOKEN?: string;

  @IsInt()
  @Min(1)
  TELEGRAM_AUTH_MAX_AGE_SECONDS: number = 86400;

  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim().replace(/^@/, '') || undefined : value,
  )
  @IsOptional()
  @IsString()
  TELEGRAM_BOT_USERNAME?: string;

  @Transform(trimmed)
  @IsString()
  TELEGRAM_REDIRECT_URI: string = '/auth/telegram/callback';

  @Transform(trimmed)
  @IsString()
  APP_DEEP_LINK_REDIRECT: string = 'bestias://auth/telegram';

  @Transform(toBoolean)
  @IsBoolean()
  DEV_SEED_ENABLED: boolean = false;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}
