import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export type PaymentGatewayMode = 'http' | 'sandbox';

/**
 * Environment variables read through ConfigService.
 *
 * Numeric values are converted here, so `configService.get<number>()`
 * returns real numbers once the config has been validated.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @IsOptional()
  @IsString()
  MONGO_URI?: string;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsString()
  JWT_SECRET?: string;

  @Type(() => Number)
  @IsInt()
  @Min(60)
  HOLD_WINDOW_SECONDS: number = 720;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  BOOKING_FEE_MINOR: number = 3000;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  TAX_RATE: number = 0.18;

  @IsString()
  CURRENCY: string = 'INR';

  @IsIn(['http', 'sandbox'])
  PAYMENT_GATEWAY_MODE: PaymentGatewayMode = 'sandbox';

  @IsOptional()
  @IsString()
  PAYMENT_GATEWAY_URL?: string;

  @IsOptional()
  @IsString()
  PAYMENT_KEY_ID?: string;

  @IsOptional()
  @IsString()
  PAYMENT_KEY_SECRET?: string;

  @IsOptional()
  @IsString()
  PAYMENT_WEBHOOK_SECRET?: string;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  PAYMENT_GATEWAY_TIMEOUT_MS: number = 5000;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(5)
  PAYMENT_GATEWAY_MAX_RETRIES: number = 2;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  PAYMENT_GATEWAY_RETRY_DELAY_MS: number = 200;

  @Type(() => Number)
  @IsInt()
  @Min(50)
  REDIS_COMMAND_TIMEOUT_MS: number = 2000;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  MONGO_OPERATION_TIMEOUT_MS: number = 5000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  RECONCILER_BATCH_SIZE: number = 100;

  @IsString()
  NOTIFICATION_QUEUE_KEY: string = 'notifications:queue';
}

/**
 * `validate` hook for ConfigModule.forRoot
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}

/**
 * Shared ConfigModule options for the API and the worker process
 */
export const configModuleOptions = {
  isGlobal: true,
  envFilePath: ['.env.local', '.env'],
  validate,
};
