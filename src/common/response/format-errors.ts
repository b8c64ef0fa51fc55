/**
 * 에러 입력 정규화
 *
 * @module common/response
 */

import { ErrorsInput, FormattedError } from '../interfaces/api-response.interface';

/**
 * 에러 입력을 envelope의 errors 목록으로 정규화합니다
 *
 * - 문자열: `[{ message }]`
 * - 필드 → 메시지(들) 매핑: 키 순서대로 `[{ field, messages }]`
 * - 목록: 그대로 반환
 *
 * @example
 * ```typescript
 * formatErrors('Invalid token');
 * // [{ message: 'Invalid token' }]
 *
 * formatErrors({ email: ['The email field is required.'], name: 'Too long' });
 * // [{ field: 'email', messages: ['The email field is required.'] },
 * //  { field: 'name', messages: ['Too long'] }]
 * ```
 */
export function formatErrors(errors: ErrorsInput): FormattedError[] {
  if (typeof errors === 'string') {
    return [{ message: errors }];
  }

  if (Array.isArray(errors)) {
    return errors;
  }

  return Object.entries(errors).map(([field, messages]) => ({
    field,
    messages: Array.isArray(messages) ? messages : [messages],
  }));
}
