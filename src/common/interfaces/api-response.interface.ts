/**
 * API 응답 표준 인터페이스
 *
 * 모든 API 엔드포인트의 응답 본문(envelope) 형식을 통일합니다.
 * 키 순서는 ResponseBuilder가 조립하는 순서와 같습니다.
 *
 * @template T - 응답 데이터의 타입
 *
 * @example
 * ```typescript
 * const response: ApiEnvelope<{ id: number }> = {
 *   success: true,
 *   message: 'Success',
 *   code: 200,
 *   data: { id: 1 },
 *   correlation_id: '0192f1c4-7b3a-7d21-9c4e-2f1a8b6c0d13',
 *   timestamp: '2025-01-15T09:00:00.000Z',
 * };
 * ```
 */
export interface ApiEnvelope<T = unknown> {
  /** 요청 처리 성공 여부 */
  success: boolean;

  message: string;

  /** HTTP 상태 코드 */
  code: number;

  data?: T;

  /** 정규화된 에러 목록 */
  errors?: FormattedError[];

  correlation_id?: string;

  /** HATEOAS 링크 (rel → URL) */
  links?: Record<string, string>;

  /** 페이지네이션 범위, 개수 등 추가 메타 정보 */
  meta?: Record<string, unknown>;

  /** 디버그 정보 (프로덕션 환경에서는 포함되지 않음) */
  debug?: Record<string, unknown>;

  /** ISO-8601 응답 생성 시각 */
  timestamp: string;

  /** 클라이언트가 보낸 X-Request-ID */
  request_id?: string;
}

/**
 * 정규화된 에러 항목
 *
 * - 문자열 에러: `{ message }`
 * - 필드 에러: `{ field, messages }`
 * - 목록으로 전달된 항목은 형태를 바꾸지 않고 그대로 전달됩니다
 */
export type FormattedError =
  | { message: string }
  | { field: string; messages: string[] }
  | Record<string, unknown>;

/**
 * errorResponse/validationErrorResponse 등이 받는 에러 입력
 */
export type ErrorsInput = string | FormattedError[] | Record<string, string | string[]>;

/**
 * 응답 빌더의 최종 결과
 *
 * body가 null이면 본문 없이 응답합니다 (204).
 */
export interface ApiResult<T = unknown> {
  statusCode: number;
  headers: Record<string, string>;
  body: ApiEnvelope<T> | null;
}
