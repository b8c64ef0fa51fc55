/**
 * 데이터베이스 모듈
 *
 * DatabaseService를 전역으로 제공하는 NestJS 모듈.
 * 애플리케이션 전체에서 단일 커넥션 풀을 공유합니다.
 *
 * @module core/database
 */

import { Global, Module } from '@nestjs/common';
import { DatabaseService } from './database.service';

@Global()
@Module({
  providers: [DatabaseService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
