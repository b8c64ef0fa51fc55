/**
 * 애플리케이션 설정
 *
 * 애플리케이션의 기본 실행 환경 설정을 정의합니다.
 * NODE_ENV, PORT, API 프리픽스, CORS 허용 도메인을 관리합니다.
 *
 * @module common/config
 */

import { registerAs } from '@nestjs/config';

/**
 * 애플리케이션 기본 설정을 등록합니다.
 *
 * @description
 * - NODE_ENV: 실행 환경 (local, development, test, production)
 * - PORT: 서버 리스닝 포트
 * - API_PREFIX: API 경로 접두사 (기본값: api)
 * - CORS_ORIGINS: 콤마로 구분된 허용 도메인 목록 ('*'이면 전체 허용)
 */
export default registerAs('app', () => ({
  nodeEnv: process.env.NODE_ENV || 'local',
  port: parseInt(process.env.PORT || '3000', 10),
  apiPrefix: process.env.API_PREFIX || 'api',
  corsOrigins: process.env.CORS_ORIGINS || '*',
}));

/**
 * 프로덕션 환경 여부를 판별합니다
 *
 * 프로덕션에서는 응답의 debug 블록과 서버 에러 상세 메시지가 노출되지 않습니다.
 *
 * @param nodeEnv - app.nodeEnv 설정값
 */
export function isProductionEnv(nodeEnv: string | undefined): boolean {
  return nodeEnv === 'production' || nodeEnv === 'prod';
}
