import { Transform, plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';
import { ANALYTICS_DOMAINS } from '../modules/simulation/definitions';

/**
 * Environment variables accepted at startup.
 * Values arrive as strings; numeric fields are converted before validation.
 */
export class EnvironmentVariables {
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsIn([...ANALYTICS_DOMAINS])
  ANALYTICS_DOMAIN?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  /** Only "false" disables the scheduler */
  @IsOptional()
  @IsString()
  METRICS_SIMULATION_ENABLED?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  METRICS_SIMULATION_INTERVAL_SECONDS?: number;

  @IsOptional()
  @IsString()
  METRICS_COLLECT_DEFAULT?: string;
}

/**
 * Validates process environment for ConfigModule.forRoot({ validate }).
 * Unknown variables pass through untouched.
 * @throws Error listing every failed constraint
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.map(error => Object.values(error.constraints || {}).join(', '));
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }

  return config;
}
