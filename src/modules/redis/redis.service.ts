import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

type ScriptArg = string | number;

/**
 * The subset of Redis the hold store, the notification queue and the
 * health probe use. Owns the client's shutdown.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  // Hold index (sorted set scored by expiry)

  zremrangebyscore(key: string, min: ScriptArg, max: ScriptArg): Promise<number> {
    return this.redis.zremrangebyscore(key, min, max);
  }

  zrangebyscore(key: string, min: ScriptArg, max: ScriptArg): Promise<string[]> {
    return this.redis.zrangebyscore(key, min, max);
  }

  // Notification queue

  lpush(key: string, value: string): Promise<number> {
    return this.redis.lpush(key, value);
  }

  // Lua

  eval(script: string, keys: string[], args: ScriptArg[]): Promise<unknown> {
    return this.redis.eval(script, keys.length, ...keys, ...args);
  }

  /** Rejects with a NOSCRIPT error when the server has dropped its script cache */
  evalsha(sha: string, keys: string[], args: ScriptArg[]): Promise<unknown> {
    return this.redis.evalsha(sha, keys.length, ...keys, ...args);
  }

  async scriptLoad(script: string): Promise<string> {
    const reply = await this.redis.script('LOAD', script);
    if (typeof reply !== 'string') {
      throw new Error('SCRIPT LOAD returned a non-string reply');
    }
    return reply;
  }

  ping(): Promise<string> {
    return this.redis.ping();
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
    this.logger.log('Redis client closed');
  }
}
