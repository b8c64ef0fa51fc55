/**
 * 루트 애플리케이션 모듈
 *
 * NestJS 애플리케이션의 최상위 모듈로,
 * 전역 설정과 핵심 모듈을 통합합니다.
 *
 * @module app
 */

import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { RequestContextModule } from './core/context/request-context.module';
import { LoggerModule } from './core/logger/logger.module';
import { DatabaseModule } from './core/database/database.module';
import { CacheModule } from './core/cache/cache.module';
import { AuditModule } from './core/audit/audit.module';
import { SecurityModule } from './core/security/security.module';
import { ResponseModule } from './common/response/response.module';
import { AuthModule } from './auth/auth.module';
import { PermissionModule } from './permission/permission.module';
import { UserModule } from './user/user.module';
import { HealthModule } from './health/health.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { OptionalJwtAuthGuard } from './common/guards/jwt-auth.guard';
import { RequestContextInterceptor } from './common/interceptors/request-context.interceptor';
import { CorrelationIdMiddleware } from './common/middleware/correlation-id.middleware';
import { HttpLoggingMiddleware } from './common/middleware/http-logging.middleware';
import { SqlLoggingMiddleware } from './common/middleware/sql-logging.middleware';
import { RateLimitMiddleware } from './common/middleware/rate-limit.middleware';
import {
  appConfig,
  databaseConfig,
  jwtConfig,
  loggingConfig,
  redisConfig,
} from './common/config';

/**
 * 애플리케이션 루트 모듈
 *
 * @description
 * - ConfigModule: app/database/jwt/redis/logging 설정 전역 로드
 * - RequestContextModule: AsyncLocalStorage 기반 요청 컨텍스트
 * - LoggerModule: Winston 채널 로깅
 * - DatabaseModule: drizzle + mysql2 연결 (쿼리 계측 포함)
 * - CacheModule: Redis 캐시 레이어
 * - AuditModule: 감사 로그 (로그 채널 + sql_audit_logs 테이블)
 * - HttpExceptionFilter: 모든 예외를 표준 envelope로 변환
 * - OptionalJwtAuthGuard: Bearer 토큰이 있으면 요청 주체를 식별
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [appConfig, databaseConfig, jwtConfig, redisConfig, loggingConfig],
    }),
    RequestContextModule,
    LoggerModule,
    DatabaseModule,
    CacheModule,
    AuditModule,
    SecurityModule,
    ResponseModule,
    AuthModule,
    PermissionModule,
    UserModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: HttpExceptionFilter },
    { provide: APP_GUARD, useClass: OptionalJwtAuthGuard },
    { provide: APP_INTERCEPTOR, useClass: RequestContextInterceptor },
  ],
})
export class AppModule implements NestModule {
  /**
   * 전역 미들웨어를 등록합니다
   *
   * 순서: correlation id → HTTP 감사 로그 → SQL 감사 로그 → 요청 제한.
   * 요청 제한으로 거부된 요청도 HTTP 감사 로그에 남습니다.
   */
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(CorrelationIdMiddleware, HttpLoggingMiddleware, SqlLoggingMiddleware, RateLimitMiddleware)
      .forRoutes('*');
  }
}
