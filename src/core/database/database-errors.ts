/**
 * 데이터베이스 에러 판별 유틸리티
 *
 * @module core/database
 */

/** MySQL 유일 제약 위반 에러 코드 */
const DUPLICATE_ENTRY_CODE = 'ER_DUP_ENTRY';

/**
 * 유일 제약 위반 에러인지 판별합니다
 *
 * 드라이버 에러가 다른 에러의 cause로 감싸진 경우도 확인합니다.
 *
 * @param error - 발생한 에러
 * @param key - 위반된 인덱스 이름에 포함되어야 하는 문자열 (선택)
 * @returns 유일 제약 위반 여부
 *
 * @example
 * ```typescript
 * if (isDuplicateEntryError(error, 'users_code_unique')) {
 *   // 코드 재생성 후 재시도
 * }
 * ```
 */
export function isDuplicateEntryError(error: unknown, key?: string): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  if ('code' in error && error.code === DUPLICATE_ENTRY_CODE) {
    if (key === undefined) {
      return true;
    }

    const message =
      'sqlMessage' in error && typeof error.sqlMessage === 'string'
        ? error.sqlMessage
        : error instanceof Error
          ? error.message
          : '';
    return message.includes(key);
  }

  return 'cause' in error ? isDuplicateEntryError(error.cause, key) : false;
}
