import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { HealthService, HealthCheckResult } from './health.service';

/**
 * Probe endpoints
 *
 * - GET /api/health - MongoDB and Redis status, always 200
 * - GET /api/health/live - process is up
 * - GET /api/health/ready - 503 unless both stores answer
 */
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  async check(): Promise<HealthCheckResult> {
    return this.healthService.check();
  }

  @Get('live')
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('ready')
  async ready(): Promise<HealthCheckResult> {
    const result = await this.healthService.check();
    if (result.status !== 'ok') {
      throw new ServiceUnavailableException({
        statusCode: 503,
        errorCode: 'NOT_READY',
        message: 'Dependencies are not ready',
        details: result.services,
        timestamp: result.timestamp,
      });
    }
    return result;
  }
}
