/**
 * JWT 인증 설정
 *
 * 요청 주체(actor) 식별을 위한 Bearer 토큰 검증 설정을 정의합니다.
 * 토큰 발급은 외부 인증 서버의 책임입니다.
 *
 * @module common/config
 */

import { registerAs } from '@nestjs/config';

/**
 * JWT 검증 관련 설정을 등록합니다.
 *
 * @description
 * - secret: JWT 서명 검증에 사용되는 비밀 키
 */
export default registerAs('jwt', () => ({
  secret: process.env.JWT_SECRET || 'default-secret-change-in-production',
}));
