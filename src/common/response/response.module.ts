/**
 * 응답 모듈
 *
 * ResponseBuilderFactory를 전역으로 제공합니다.
 *
 * @module common/response
 */

import { Global, Module } from '@nestjs/common';
import { ResponseBuilderFactory } from './response-builder.factory';

@Global()
@Module({
  providers: [ResponseBuilderFactory],
  exports: [ResponseBuilderFactory],
})
export class ResponseModule {}
