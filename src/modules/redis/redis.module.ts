import { Global, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { RedisService } from './redis.service';
import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_REDIS_URL,
  REDIS_CLIENT,
} from './redis.constants';

const MAX_RECONNECT_ATTEMPTS = 10;

function createRedisClient(config: ConfigService): Redis {
  const logger = new Logger('RedisModule');
  const url = config.get<string>('REDIS_URL') || DEFAULT_REDIS_URL;

  const client = new Redis(url, {
    // Commands fail fast on a stalled connection; the hold store reports
    // the failure as STORE_UNAVAILABLE (503).
    commandTimeout:
      config.get<number>('REDIS_COMMAND_TIMEOUT_MS') ?? DEFAULT_COMMAND_TIMEOUT_MS,
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    keepAlive: 30000,
    enableReadyCheck: true,
    retryStrategy: (attempt: number) => {
      if (attempt > MAX_RECONNECT_ATTEMPTS) {
        logger.error(`Giving up on Redis after ${MAX_RECONNECT_ATTEMPTS} attempts`);
        return null;
      }
      return Math.min(attempt * 100, 3000);
    },
  });

  client
    .on('ready', () => logger.log(`Redis ready at ${url}`))
    .on('reconnecting', (delay: number) => logger.warn(`Redis reconnecting in ${delay}ms`))
    .on('error', (error: Error) => logger.error(`Redis error: ${error.message}`))
    .on('close', () => logger.warn('Redis connection closed'));

  return client;
}

/**
 * One Redis connection per process, shared by the hold store, the
 * notification queue and the health check.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    { provide: REDIS_CLIENT, useFactory: createRedisClient, inject: [ConfigService] },
    RedisService,
  ],
  exports: [RedisService, REDIS_CLIENT],
})
export class RedisModule {}
