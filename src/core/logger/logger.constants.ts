/**
 * 로거 상수
 *
 * @module core/logger
 */

/** 공유 Winston 인스턴스 주입 토큰 */
export const WINSTON_LOGGER = Symbol('WINSTON_LOGGER');

/**
 * 로그 채널 목록
 *
 * - application: 기본 애플리케이션 로그 (감사 로그 저장 실패 등 폴백 포함)
 * - api: API 요청/에러 로그
 * - database: 도메인 DB 작업 로그
 * - performance: 임계치 초과 경고
 * - service-errors: 서비스 계층 예외
 */
export const LOG_CHANNELS = [
  'application',
  'api',
  'database',
  'performance',
  'service-errors',
] as const;

export type LogChannel = (typeof LOG_CHANNELS)[number];

/** defaultMeta.service 값 */
export const LOG_SERVICE_NAME = 'user-management-api';
