import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { StoreUnavailableError } from '../../common/errors';
import { RedisService } from '../redis/redis.service';
import { HoldResult, HoldStore } from './hold-store.interface';
import { HOLD_KEYS, HOLD_SCRIPTS, HoldScriptName } from './hold.constants';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * HoldStore on Redis: one key per seat whose value is the holder id and
 * whose PX TTL is the hold window, plus a per-showtime sorted set of seat
 * expiries that the same scripts maintain for the seat map.
 *
 * Scripts run through EVALSHA with the SHA cached at startup, falling back
 * to EVAL when the server has lost its script cache.
 */
@Injectable()
export class RedisHoldStore implements HoldStore, OnModuleInit {
  private readonly logger = new Logger(RedisHoldStore.name);

  private scriptShaCache: Partial<Record<HoldScriptName, string>> = {};

  constructor(private readonly redisService: RedisService) {}

  async onModuleInit(): Promise<void> {
    const names: HoldScriptName[] = ['acquire', 'release'];
    for (const name of names) {
      const sha = await this.redisService.scriptLoad(HOLD_SCRIPTS[name]);
      this.scriptShaCache[name] = sha;
      this.logger.debug(`Loaded Lua script: ${name} (SHA: ${sha.substring(0, 8)}...)`);
    }
  }

  async acquire(
    showtimeId: string,
    seatIds: string[],
    holderId: string,
    ttlMs: number,
    replaceable: string[] = [],
  ): Promise<HoldResult> {
    if (seatIds.length === 0) {
      return { granted: true };
    }

    const expiresAtMs = Date.now() + ttlMs;
    const result = await this.executeScript(
      'acquire',
      this.keysFor(showtimeId, seatIds),
      [holderId, ttlMs, expiresAtMs, ...seatIds, ...replaceable],
    );

    if (!isStringArray(result)) {
      throw new Error(`Unexpected acquire reply for showtime ${showtimeId}`);
    }

    if (result.length > 0) {
      this.logger.debug(
        `acquire refused - showtimeId: ${showtimeId}, holder: ${holderId}, conflicts: ${result.join(',')}`,
      );
      return { granted: false, conflicts: result };
    }

    this.logger.debug(
      `acquire - showtimeId: ${showtimeId}, holder: ${holderId}, seats: ${seatIds.join(',')}, ttlMs: ${ttlMs}`,
    );
    return { granted: true };
  }

  async release(
    showtimeId: string,
    seatIds: string[],
    holderId: string,
  ): Promise<number> {
    if (seatIds.length === 0) {
      return 0;
    }

    const result = await this.executeScript(
      'release',
      this.keysFor(showtimeId, seatIds),
      [holderId, ...seatIds],
    );

    if (typeof result !== 'number') {
      throw new Error(`Unexpected release reply for showtime ${showtimeId}`);
    }

    this.logger.debug(
      `release - showtimeId: ${showtimeId}, holder: ${holderId}, released: ${result}/${seatIds.length}`,
    );
    return result;
  }

  async snapshot(showtimeId: string): Promise<string[]> {
    const indexKey = HOLD_KEYS.INDEX(showtimeId);
    const now = Date.now();

    await this.redisService.zremrangebyscore(indexKey, '-inf', now);
    return this.redisService.zrangebyscore(indexKey, `(${now}`, '+inf');
  }

  private keysFor(showtimeId: string, seatIds: string[]): string[] {
    return [
      HOLD_KEYS.INDEX(showtimeId),
      ...seatIds.map((seatId) => HOLD_KEYS.SEAT(showtimeId, seatId)),
    ];
  }

  /**
   * Execute a Lua script by SHA with fallback to EVAL
   */
  private async executeScript(
    name: HoldScriptName,
    keys: string[],
    args: (string | number)[],
  ): Promise<unknown> {
    const sha = this.scriptShaCache[name];

    if (!sha) {
      return this.loadAndEval(name, keys, args);
    }

    try {
      return await this.redisService.evalsha(sha, keys, args);
    } catch (error) {
      if (error instanceof Error && error.message.includes('NOSCRIPT')) {
        this.logger.warn(`Script ${name} not in cache, falling back to EVAL`);
        return this.loadAndEval(name, keys, args);
      }
      throw this.unavailable(name, keys, error);
    }
  }

  private async loadAndEval(
    name: HoldScriptName,
    keys: string[],
    args: (string | number)[],
  ): Promise<unknown> {
    const script = HOLD_SCRIPTS[name];
    try {
      const result = await this.redisService.eval(script, keys, args);
      this.scriptShaCache[name] = await this.redisService.scriptLoad(script);
      return result;
    } catch (error) {
      throw this.unavailable(name, keys, error);
    }
  }

  private unavailable(
    name: HoldScriptName,
    keys: string[],
    error: unknown,
  ): StoreUnavailableError {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    this.logger.error(`${name} failed - keys: ${keys.length}, error: ${reason}`);
    return new StoreUnavailableError(reason);
  }
}
