import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { LogFormat, LogLevel } from '@logging/value-objects';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

/**
 * Environment variables read at startup. Anything not listed passes through
 * untouched.
 */
export class EnvironmentVariables {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  PORT: number = 3000;

  @IsEnum(LogFormat)
  @IsOptional()
  LOG_FORMAT?: LogFormat;

  @IsEnum(LogLevel)
  @IsOptional()
  LOG_LEVEL: LogLevel = LogLevel.INFO;

  // Implicit conversion would turn "false" into true
  @Transform(
    ({ obj }: { obj: Record<string, unknown> }) =>
      obj.LOG_CALLSTACK_DIRECTLY === true ||
      obj.LOG_CALLSTACK_DIRECTLY === 'true',
  )
  @IsBoolean()
  LOG_CALLSTACK_DIRECTLY: boolean = false;

  @IsString()
  @IsOptional()
  LOG_FILE_PATH?: string;

  @IsString()
  @IsOptional()
  SERVICE_NAME?: string;
}

/**
 * `validate` hook for ConfigModule.forRoot.
 * Throws with every constraint message when a variable is invalid.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }
  return validated;
}
