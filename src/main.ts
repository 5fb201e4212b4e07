import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

const REQUIRED_OUTSIDE_DEVELOPMENT = [
  'JWT_SECRET',
  'MONGO_URI',
  'REDIS_URL',
  'PAYMENT_KEY_SECRET',
  'PAYMENT_WEBHOOK_SECRET',
];

function corsOptions(config: ConfigService, development: boolean): CorsOptions {
  const origins = (config.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    origin: development || (origins.length > 0 ? origins : false),
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  };
}

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // The webhook signature is computed over the raw request bytes
  const app = await NestFactory.create(AppModule, { rawBody: true });
  const config = app.get(ConfigService);
  const env = config.get<string>('NODE_ENV') ?? 'development';
  const development = env === 'development';

  if (!development) {
    const missing = REQUIRED_OUTSIDE_DEVELOPMENT.filter((key) => !config.get<string>(key));
    if (missing.length > 0) {
      throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
    }
  }

  const cors = corsOptions(config, development);
  if (cors.origin === false) {
    logger.warn('CORS_ORIGINS is empty; cross-origin requests are refused');
  }

  app.setGlobalPrefix('api');
  app.enableCors(cors);
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalPipes(
    new ValidationPipe({ transform: true, whitelist: true, forbidNonWhitelisted: true }),
  );
  app.enableShutdownHooks();

  const port = config.get<number>('PORT') ?? 3000;
  await app.listen(port);
  logger.log(`Booking API listening on :${port}/api (${env})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
