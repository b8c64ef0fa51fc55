/**
 * 캐시 키 상수 정의
 *
 * 키 형식: `{도메인}:{식별자}` 패턴을 따릅니다.
 *
 * @example
 * ```typescript
 * await cacheService.set(CACHE_KEYS.USER_STATS, statistics, CACHE_TTL.USER_STATS);
 * ```
 */

export const CACHE_KEYS = {
  /** 사용자 통계 캐시 키 */
  USER_STATS: 'user_stats',

  /**
   * Rate Limit 캐시 키를 생성합니다
   *
   * @param clientId - 클라이언트 식별자 (사용자 ID 또는 IP)
   * @param endpoint - API 엔드포인트 경로
   * @returns 'rate_limit:{clientId}:{endpoint}' 형식의 캐시 키
   */
  RATE_LIMIT: (clientId: string, endpoint: string) => `rate_limit:${clientId}:${endpoint}`,
} as const;

/**
 * 캐시 TTL 상수 (초 단위)
 */
export const CACHE_TTL = {
  /** 사용자 통계: 5분 */
  USER_STATS: 300,

  /** Rate Limit 윈도우: 1분 */
  RATE_LIMIT: 60,
} as const;
