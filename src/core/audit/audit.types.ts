/**
 * 감사 로그 입력 타입
 *
 * AuditLoggerService.record()가 받는 세 가지 입력 형태를 정의합니다.
 *
 * @module core/audit
 */

import { AuditOperation } from '../database/schema';

/** 이 시간(ms)을 초과한 HTTP 요청/SQL은 성능 경고를 추가로 남깁니다 */
export const SLOW_OPERATION_THRESHOLD_MS = 1000;

/** 성능 경고 메타데이터에 포함되는 SQL/작업 문자열 최대 길이 */
export const SLOW_OPERATION_SNIPPET_LENGTH = 200;

/**
 * 처리가 끝난 HTTP 요청 한 건
 */
export interface HttpAuditInput {
  kind: 'http';
  method: string;
  path: string;
  headers: Record<string, unknown>;
  query: unknown;
  body: unknown;
  statusCode: number;
  durationMs: number;
  isError: boolean;
  message?: string;
  module?: string;
}

/**
 * 실행된 SQL 한 건
 */
export interface SqlStatement {
  sql: string;
  params?: unknown;
  /** 생략하면 SQL 첫 키워드로 판별합니다 */
  operation?: AuditOperation;
  durationMs?: number;
  isError?: boolean;
  message?: string;
  module?: string;
}

export interface SqlAuditInput extends SqlStatement {
  kind: 'sql';
}

/**
 * 여러 SQL을 한 번의 insert로 저장하는 입력
 */
export interface BatchAuditInput {
  kind: 'batch';
  entries: SqlStatement[];
  /** 개별 항목에 메시지가 없을 때 사용할 메시지 */
  message?: string;
}

export type AuditInput = HttpAuditInput | SqlAuditInput | BatchAuditInput;

/**
 * 로그 facet이 참조하는 요청 정보
 *
 * Express Request와 구조적으로 호환됩니다.
 */
export interface AuditRequest {
  method: string;
  url: string;
  originalUrl?: string;
  ip?: string;
  headers: Record<string, string | string[] | undefined>;
  query?: unknown;
  body?: unknown;
}

/**
 * logUserAction 대상 사용자
 */
export interface AuditUserRef {
  id: number;
  code?: string;
  email?: string;
}
