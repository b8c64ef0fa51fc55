/**
 * Correlation ID 미들웨어
 *
 * 요청의 X-Correlation-ID 헤더를 재사용하거나 새로 생성하여
 * 요청 헤더, 응답 헤더, 요청 컨텍스트에 기록합니다.
 * 이후의 모든 미들웨어/핸들러는 이 요청 컨텍스트 안에서 실행됩니다.
 *
 * @module common/middleware
 */

import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import {
  CORRELATION_ID_HEADER,
  REQUEST_ID_HEADER,
  generateCorrelationId,
} from '../../core/context/correlation-id';
import { RequestContextService } from '../../core/context/request-context.service';

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  return header && header.trim() !== '' ? header : undefined;
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  constructor(private readonly requestContext: RequestContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId =
      firstHeader(req.headers[CORRELATION_ID_HEADER.toLowerCase()]) ?? generateCorrelationId();

    req.headers[CORRELATION_ID_HEADER.toLowerCase()] = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    this.requestContext.run(
      {
        correlationId,
        requestId: firstHeader(req.headers[REQUEST_ID_HEADER.toLowerCase()]),
        ip: req.ip,
        userAgent: firstHeader(req.headers['user-agent']),
        captureQueries: false,
        queries: [],
      },
      () => next(),
    );
  }
}
