/**
 * SQL 로깅 미들웨어
 *
 * 요청 중 실행된 SQL을 수집하고, 응답이 끝나면 한 번의 batch insert로 감사 로그에 기록합니다.
 * 각 SQL의 module은 요청을 처리한 핸들러 이름입니다.
 *
 * @module common/middleware
 */

import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { AuditLoggerService } from '../../core/audit/audit-logger.service';
import { RequestContextService, RequestContextStore } from '../../core/context/request-context.service';

@Injectable()
export class SqlLoggingMiddleware implements NestMiddleware {
  constructor(
    private readonly auditLogger: AuditLoggerService,
    private readonly requestContext: RequestContextService,
  ) {}

  use(_req: Request, res: Response, next: NextFunction): void {
    this.requestContext.enableQueryCapture();
    const store = this.requestContext.get();

    res.on('finish', () => {
      if (!store || store.queries.length === 0) {
        return;
      }

      this.requestContext.run(store, () => this.flush(store));
    });

    next();
  }

  private flush(store: RequestContextStore): void {
    const module = store.module ?? 'unknown';
    const queries = store.queries.splice(0);

    void this.auditLogger.record({
      kind: 'batch',
      entries: queries.map((query) => ({
        sql: query.sql,
        params: query.params,
        durationMs: query.durationMs,
        isError: query.isError,
        message: query.message,
        module,
      })),
    });
  }
}
