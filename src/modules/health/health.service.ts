import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { RedisService } from '../redis/redis.service';

export interface HealthCheckResult {
  status: 'ok' | 'error';
  timestamp: string;
  uptime: number;
  services: {
    mongodb: ServiceHealth;
    redis: ServiceHealth;
  };
}

export interface ServiceHealth {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

const MONGO_STATES: Record<number, string> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

/**
 * HealthService probes the booking store (MongoDB) and the hold store
 * (Redis). Either one down means the service cannot take bookings.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();

  constructor(
    @InjectConnection()
    private readonly mongoConnection: Connection,
    private readonly redisService: RedisService,
  ) {}

  async check(): Promise<HealthCheckResult> {
    const [mongodb, redis] = await Promise.all([
      this.probe('MongoDB', () => this.pingMongo()),
      this.probe('Redis', () => this.pingRedis()),
    ]);

    return {
      status: mongodb.status === 'up' && redis.status === 'up' ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: { mongodb, redis },
    };
  }

  private async pingMongo(): Promise<void> {
    const state = this.mongoConnection.readyState;
    if (state !== 1) {
      throw new Error(`Connection state: ${MONGO_STATES[state] ?? 'unknown'}`);
    }
    if (!this.mongoConnection.db) {
      throw new Error('No database handle');
    }
    await this.mongoConnection.db.admin().ping();
  }

  private async pingRedis(): Promise<void> {
    const pong = await this.redisService.ping();
    if (pong !== 'PONG') {
      throw new Error(`Unexpected ping response: ${pong}`);
    }
  }

  private async probe(
    name: string,
    ping: () => Promise<void>,
  ): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      await ping();
      return { status: 'up', latency: Date.now() - start };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`${name} health check failed: ${message}`);
      return { status: 'down', latency: Date.now() - start, error: message };
    }
  }
}
