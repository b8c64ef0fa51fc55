/**
 * HTTP 요청 로깅 미들웨어
 *
 * 응답이 끝나면 요청 한 건을 감사 로그(HTTP_REQUEST)와 api 채널에 기록합니다.
 * 헤더/쿼리/본문은 감사 로거에서 마스킹됩니다.
 *
 * @module common/middleware
 */

import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { performance } from 'perf_hooks';
import { AuditLoggerService } from '../../core/audit/audit-logger.service';
import { RequestContextService } from '../../core/context/request-context.service';

@Injectable()
export class HttpLoggingMiddleware implements NestMiddleware {
  constructor(
    private readonly auditLogger: AuditLoggerService,
    private readonly requestContext: RequestContextService,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const startedAt = performance.now();
    const store = this.requestContext.get();

    res.on('finish', () => {
      this.requestContext.runWithin(store, () => this.logRequest(req, res, startedAt));
    });

    next();
  }

  private logRequest(req: Request, res: Response, startedAt: number): void {
    const durationMs = performance.now() - startedAt;
    const path = req.originalUrl.split('?')[0];
    const errorMessage: unknown = res.locals.errorMessage;

    void this.auditLogger.record({
      kind: 'http',
      method: req.method,
      path,
      headers: req.headers,
      query: req.query,
      body: req.body,
      statusCode: res.statusCode,
      durationMs,
      isError: res.statusCode >= 500,
      message: typeof errorMessage === 'string' ? errorMessage : undefined,
      module: this.requestContext.get()?.module,
    });
    this.auditLogger.logApiRequest(req, res.statusCode, durationMs);
  }
}
