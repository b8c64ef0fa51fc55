/**
 * JWT Passport 전략
 *
 * Authorization 헤더의 Bearer Token을 검증하여
 * JWT 페이로드에서 사용자 ID와 표시 이름을 추출합니다.
 * 토큰 발급은 이 애플리케이션의 범위 밖이며, 공유 비밀 키로 서명된 토큰만 검증합니다.
 *
 * @module auth/strategies
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { RequestActor } from '../../core/context/request-context.service';

/**
 * JWT Access Token 페이로드 인터페이스
 */
export interface JwtPayload {
  /** 사용자 ID */
  sub: number;

  /** 표시 이름 (감사 로그 executed_by) */
  name: string;

  /** 토큰 발급 시간 (Unix timestamp) */
  iat?: number;

  /** 토큰 만료 시간 (Unix timestamp) */
  exp?: number;
}

/**
 * Passport JWT 전략 구현
 *
 * @description
 * - Authorization: Bearer {token} 헤더에서 JWT를 추출합니다
 * - JWT 서명을 검증하고 만료 여부를 확인합니다
 * - 유효한 토큰의 주체를 request.user로 주입합니다
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('jwt.secret'),
    });
  }

  /**
   * @param payload - JWT에서 디코딩된 페이로드
   * @returns 요청 주체
   */
  validate(payload: JwtPayload): RequestActor {
    return {
      id: Number(payload.sub),
      name: payload.name,
    };
  }
}
