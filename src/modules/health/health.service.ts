import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmHealthIndicator } from '@nestjs/terminus';

export interface HealthCheckResult {
  status: 'ok' | 'error';
  details?: Record<string, unknown>;
  duration?: number;
  timestamp: string;
}

const BYTES_PER_MB = 1024 * 1024;

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly healthCheckTimeout: number;
  private readonly startTime: number;

  constructor(
    private readonly typeOrmHealthIndicator: TypeOrmHealthIndicator,
    private readonly configService: ConfigService,
  ) {
    this.healthCheckTimeout = parseInt(
      this.configService.get('HEALTH_CHECK_TIMEOUT', '10000'),
      10,
    );
    this.startTime = Date.now();
  }

  /**
   * Process-level health: uptime, memory and runtime versions
   */
  getBasicHealth(): HealthCheckResult {
    const memoryUsage = process.memoryUsage();

    return {
      status: 'ok',
      details: {
        uptime: Math.floor((Date.now() - this.startTime) / 1000),
        memory: {
          rss: Math.round(memoryUsage.rss / BYTES_PER_MB),
          heapTotal: Math.round(memoryUsage.heapTotal / BYTES_PER_MB),
          heapUsed: Math.round(memoryUsage.heapUsed / BYTES_PER_MB),
        },
        version: process.env.npm_package_version ?? '0.1.0',
        nodeVersion: process.version,
        environment: this.configService.get('NODE_ENV', 'development'),
      },
      timestamp: new Date().toISOString(),
    };
  }

  async getDatabaseHealth(): Promise<HealthCheckResult> {
    const startTime = Date.now();
    try {
      const result = await this.typeOrmHealthIndicator.pingCheck('database', {
        timeout: this.healthCheckTimeout,
      });

      return {
        status: 'ok',
        details: result,
        duration: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.error('Database health check failed', error);
      return {
        status: 'error',
        details: {
          error: error instanceof Error ? error.message : 'Unknown error',
        },
        duration: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      };
    }
  }
}
