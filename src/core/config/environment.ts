import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { flattenValidationErrors } from '../common/utils/validation.util';

export enum NodeEnvironment {
  DEVELOPMENT = 'development',
  PRODUCTION = 'production',
  TEST = 'test',
}

const BOOLEAN_STRINGS = ['true', 'false'];

/**
 * Environment variables read at start-up. Values arrive as strings and
 * numeric ones are converted before validation.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsEnum(NodeEnvironment)
  NODE_ENV: NodeEnvironment = NodeEnvironment.DEVELOPMENT;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsString()
  POSTGRES_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  POSTGRES_PORT: number = 5432;

  @IsOptional()
  @IsString()
  POSTGRES_USER?: string;

  @IsOptional()
  @IsString()
  POSTGRES_PASSWORD?: string;

  @IsOptional()
  @IsString()
  POSTGRES_DB?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  DATABASE_POOL_SIZE: number = 20;

  @IsOptional()
  @IsInt()
  @Min(0)
  DATABASE_RETRY_ATTEMPTS: number = 10;

  @IsOptional()
  @IsInt()
  @Min(0)
  DATABASE_RETRY_DELAY: number = 3000;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  DATABASE_RUN_MIGRATIONS?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  DATABASE_SSL_REJECT_UNAUTHORIZED?: string;

  @IsOptional()
  @IsIn(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsIn(['pretty', 'json'])
  LOG_FORMAT?: string;

  @IsOptional()
  @IsIn(BOOLEAN_STRINGS)
  LOG_ENABLE_FILE?: string;

  @IsOptional()
  @IsString()
  LOG_FILE_PATH?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HEALTH_CHECK_TIMEOUT: number = 10000;
}

/**
 * `validate` hook for ConfigModule. Throws listing every invalid variable.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(
      `Invalid environment configuration:\n${flattenValidationErrors(errors).join('\n')}`,
    );
  }

  return validated;
}
