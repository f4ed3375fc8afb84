import { Controller, Get, HttpStatus, HttpException } from '@nestjs/common';
import { HealthService, HealthCheckResult } from './health.service';
import { SERVICE_NAME } from '../../core/logger/pino.config';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /health
   */
  @Get()
  getHealth() {
    const result: HealthCheckResult = this.healthService.getBasicHealth();

    return {
      status: result.status,
      service: SERVICE_NAME,
      ...result.details,
      timestamp: result.timestamp,
    };
  }

  /**
   * GET /health/db
   */
  @Get('db')
  async getDatabaseHealth() {
    const result = await this.healthService.getDatabaseHealth();

    const response = {
      status: result.status,
      check: 'database',
      details: result.details,
      duration: result.duration,
      timestamp: result.timestamp,
    };

    if (result.status === 'error') {
      throw new HttpException(response, HttpStatus.SERVICE_UNAVAILABLE);
    }

    return response;
  }
}
