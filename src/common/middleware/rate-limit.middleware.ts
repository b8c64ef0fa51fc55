/**
 * Rate Limit 미들웨어
 *
 * Redis 고정 윈도우 카운터 기반의 요청 제한 미들웨어입니다.
 * 클라이언트 IP와 경로별로 분당 100회를 허용하며, 초과 시 429 응답을 반환합니다.
 * Redis를 사용할 수 없으면 제한 없이 통과시킵니다.
 *
 * @example
 * ```typescript
 * // app.module.ts
 * export class AppModule implements NestModule {
 *   configure(consumer: MiddlewareConsumer) {
 *     consumer.apply(RateLimitMiddleware).forRoutes('*');
 *   }
 * }
 * ```
 */

import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { CACHE_KEYS, CACHE_TTL } from '../../core/cache/cache-key.constants';
import { CacheService } from '../../core/cache/cache.service';
import { RequestContextService } from '../../core/context/request-context.service';
import { LoggerService } from '../../core/logger/logger.service';
import { ResponseBuilderFactory } from '../response/response-builder.factory';
import { writeApiResult } from '../response/write-api-result';

/** 분당 최대 요청 수 */
export const RATE_LIMIT_PER_MINUTE = 100;

@Injectable()
export class RateLimitMiddleware implements NestMiddleware {
  constructor(
    private readonly cacheService: CacheService,
    private readonly responses: ResponseBuilderFactory,
    private readonly requestContext: RequestContextService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext('RateLimitMiddleware');
  }

  /**
   * Redis INCR로 카운터를 증가시키고, 최초 요청 시 윈도우 TTL을 설정합니다
   */
  async use(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (!this.cacheService.isConnected()) {
      next();
      return;
    }

    const identifier = this.getIdentifier(req);
    const endpoint = req.originalUrl.split('?')[0];
    const counter = await this.cacheService.increment(
      CACHE_KEYS.RATE_LIMIT(identifier, endpoint),
      CACHE_TTL.RATE_LIMIT,
    );

    if (!counter) {
      next();
      return;
    }

    res.setHeader('X-RateLimit-Limit', String(RATE_LIMIT_PER_MINUTE));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, RATE_LIMIT_PER_MINUTE - counter.count)));

    if (counter.count > RATE_LIMIT_PER_MINUTE) {
      this.logger.warn('Rate limit exceeded', {
        identifier,
        endpoint,
        count: counter.count,
        limit: RATE_LIMIT_PER_MINUTE,
      });

      const result = this.responses
        .create('RateLimitMiddleware')
        .setCorrelationId(this.requestContext.getCorrelationId())
        .tooManyRequestsResponse('Too many requests', counter.ttl);
      writeApiResult(res, result);
      return;
    }

    next();
  }

  /**
   * 요청에서 클라이언트 식별자를 추출합니다
   *
   * X-Forwarded-For의 첫 주소, 없으면 연결 IP를 사용합니다.
   */
  private getIdentifier(req: Request): string {
    const forwarded = req.headers['x-forwarded-for'];
    if (typeof forwarded === 'string') {
      return forwarded.split(',')[0].trim();
    }

    return req.ip || '0.0.0.0';
  }
}
