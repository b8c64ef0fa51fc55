/**
 * 캐시 모듈
 *
 * Redis 기반 캐시 기능을 전역으로 제공하는 모듈입니다.
 * ioredis를 사용하여 Direct 모드와 Cluster 모드를 모두 지원합니다.
 */

import { Global, Module } from '@nestjs/common';
import { CacheService } from './cache.service';

@Global()
@Module({
  providers: [CacheService],
  exports: [CacheService],
})
export class CacheModule {}
