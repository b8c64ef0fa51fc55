/**
 * Correlation ID 생성
 *
 * 요청 단위 추적 식별자를 생성합니다.
 * UUID v7(시간 순 정렬 가능)을 사용하며, 생성에 실패하면
 * 프로세스 로컬 카운터 기반 식별자로 대체하여 절대 예외를 던지지 않습니다.
 *
 * @module core/context
 */

import { v7 as uuidv7 } from 'uuid';

/** 요청/응답 Correlation ID 헤더 이름 */
export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

/** 클라이언트가 전달하는 요청 ID 헤더 이름 */
export const REQUEST_ID_HEADER = 'X-Request-ID';

let fallbackSequence = 0;

/**
 * 시간 순 정렬 가능한 고유 식별자를 생성합니다
 *
 * @param generate - 식별자 생성 함수 (기본값: UUID v7)
 * @returns 생성된 식별자, 실패 시 `local-{pid}-{seq}` 형식
 *
 * @example
 * ```typescript
 * generateCorrelationId(); // '0192f1c4-7b3a-7d21-9c4e-2f1a8b6c0d13'
 * ```
 */
export function generateCorrelationId(generate: () => string = uuidv7): string {
  try {
    return generate();
  } catch {
    fallbackSequence += 1;
    return `local-${process.pid}-${fallbackSequence}`;
  }
}
