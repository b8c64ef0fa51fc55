/**
 * 요청 컨텍스트 인터셉터
 *
 * 요청을 처리하는 핸들러 이름을 `Controller@method` 형식으로 요청 컨텍스트에 기록합니다.
 * HTTP 요청 감사 로그와 요청 중 실행된 SQL의 module 값으로 사용됩니다.
 *
 * @module common/interceptors
 */

import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { RequestContextService } from '../../core/context/request-context.service';

@Injectable()
export class RequestContextInterceptor implements NestInterceptor {
  constructor(private readonly requestContext: RequestContextService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    this.requestContext.setModule(`${context.getClass().name}@${context.getHandler().name}`);
    return next.handle();
  }
}
