/**
 * 요청 컨텍스트 모듈
 *
 * RequestContextService를 전역으로 제공합니다.
 *
 * @module core/context
 */

import { Global, Module } from '@nestjs/common';
import { RequestContextService } from './request-context.service';

@Global()
@Module({
  providers: [RequestContextService],
  exports: [RequestContextService],
})
export class RequestContextModule {}
