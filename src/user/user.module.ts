/**
 * 사용자 모듈
 *
 * 사용자 도메인에 필요한 컨트롤러, 서비스, 리포지토리를 등록합니다.
 * UserService는 ActiveUserGuard 등 외부에서 사용할 수 있도록 exports 합니다.
 *
 * @module user
 */

import { Module } from '@nestjs/common';
import { UserController } from './user.controller';
import { UserService } from './user.service';
import { UserRepository } from './user.repository';
import { ActiveUserGuard } from '../common/guards/active-user.guard';

/**
 * 사용자 도메인 모듈
 *
 * @description
 * - UserController: /users, /user REST 엔드포인트
 * - UserService: 비즈니스 로직 (코드 생성, 잠금, 통계 캐시, 감사 로그)
 * - UserRepository: drizzle 기반 데이터 접근 계층
 *
 * 외부 의존성 (전역 모듈):
 * - DatabaseService, CacheService, AuditLoggerService, PasswordService, ResponseBuilderFactory
 */
@Module({
  controllers: [UserController],
  providers: [UserService, UserRepository, ActiveUserGuard],
  exports: [UserService],
})
export class UserModule {}
