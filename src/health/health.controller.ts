/**
 * 헬스체크 컨트롤러
 *
 * - GET /health: 실행 여부와 uptime (의존성 확인 없음)
 * - GET /health/detailed: TerminusModule 기반 Database + Redis 상세 헬스체크
 *
 * Redis가 비활성화된 경우 redis 인디케이터는 up(disabled)으로 보고합니다.
 */

import { Controller, Get, Res } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckError,
  HealthCheckResult,
  HealthCheckService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { Response } from 'express';
import { CacheService } from '../core/cache/cache.service';
import { RequestContextService } from '../core/context/request-context.service';
import { DatabaseService } from '../core/database/database.service';
import { LoggerService } from '../core/logger/logger.service';
import { ResponseBuilderFactory } from '../common/response/response-builder.factory';
import { writeApiResult } from '../common/response/write-api-result';
import { roundMs } from '../common/utils';

@Controller('health')
export class HealthController {
  constructor(
    private readonly healthCheckService: HealthCheckService,
    private readonly databaseService: DatabaseService,
    private readonly cacheService: CacheService,
    private readonly responses: ResponseBuilderFactory,
    private readonly requestContext: RequestContextService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext('HealthController');
  }

  /**
   * 기본 헬스체크 엔드포인트
   *
   * @example
   * GET /api/health
   *
   * Response:
   * { "success": true, "message": "API is healthy", "code": 200,
   *   "data": { "status": "running", "uptime": 12.345 }, ... }
   */
  @Get()
  check(@Res() res: Response): void {
    const result = this.responses
      .create('HealthController')
      .setCorrelationId(this.requestContext.getCorrelationId())
      .successResponse({ status: 'running', uptime: roundMs(process.uptime()) }, 'API is healthy');
    writeApiResult(res, result);
  }

  /**
   * 상세 헬스체크 엔드포인트
   *
   * 하나라도 down이면 terminus가 503을 반환합니다.
   */
  @Get('detailed')
  @HealthCheck()
  async checkDetailed(): Promise<HealthCheckResult> {
    return this.healthCheckService.check([
      () => this.indicator('database', () => this.databaseService.isHealthy()),
      () => this.redisIndicator(),
    ]);
  }

  private async redisIndicator(): Promise<HealthIndicatorResult> {
    if (!this.cacheService.isEnabled()) {
      return { redis: { status: 'up', enabled: false } };
    }
    return this.indicator('redis', () => this.cacheService.isHealthy());
  }

  private async indicator(
    key: string,
    probe: () => Promise<boolean>,
  ): Promise<HealthIndicatorResult> {
    const healthy = await probe().catch((error: unknown) => {
      this.logger.warn(`Health probe failed: ${key}`, { error });
      return false;
    });

    const result: HealthIndicatorResult = { [key]: { status: healthy ? 'up' : 'down' } };
    if (!healthy) {
      throw new HealthCheckError(`${key} is unavailable`, result);
    }
    return result;
  }
}
