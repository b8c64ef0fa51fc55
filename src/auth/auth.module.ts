/**
 * 인증 모듈
 *
 * JWT 기반의 요청 주체 식별을 구성합니다.
 * 전역 OptionalJwtAuthGuard가 이 모듈의 JwtStrategy를 사용합니다.
 *
 * @module auth
 */

import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { JwtStrategy } from './strategies/jwt.strategy';

@Module({
  imports: [PassportModule.register({ defaultStrategy: 'jwt' })],
  providers: [JwtStrategy],
  exports: [PassportModule],
})
export class AuthModule {}
