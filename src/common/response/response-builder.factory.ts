/**
 * 응답 빌더 팩토리
 *
 * 요청마다 새로운 ResponseBuilder를 만들어 줍니다.
 * 실행 환경, 현재 요청의 X-Request-ID, 예외 보고용 감사 로거가 미리 설정됩니다.
 *
 * @module common/response
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditLoggerService } from '../../core/audit/audit-logger.service';
import { RequestContextService } from '../../core/context/request-context.service';
import { isProductionEnv } from '../config';
import { ResponseBuilder } from './response-builder';

@Injectable()
export class ResponseBuilderFactory {
  constructor(
    private readonly configService: ConfigService,
    private readonly requestContext: RequestContextService,
    private readonly auditLogger: AuditLoggerService,
  ) {}

  /**
   * 새 빌더를 생성합니다
   *
   * @param source - 예외 보고 시 사용할 호출 클래스 이름
   */
  create(source?: string): ResponseBuilder {
    return new ResponseBuilder({
      production: isProductionEnv(this.configService.get<string>('app.nodeEnv', 'development')),
      errorSink: this.auditLogger,
      requestId: this.requestContext.get()?.requestId,
      source,
    });
  }
}
