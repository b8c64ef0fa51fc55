/**
 * 감사 로거 서비스
 *
 * HTTP 요청, SQL 실행, 서비스 에러를 하나의 감사 로그 테이블(sql_audit_logs)에
 * 기록하는 통합 로깅 진입점입니다.
 *
 * - 모든 요청 헤더/쿼리/본문/SQL 파라미터는 저장 전 redact()로 마스킹됩니다
 * - 1000ms를 초과한 단일 SQL/HTTP 요청은 performance 채널에 경고를 추가로 남깁니다
 * - module을 지정하지 않은 SQL은 호출 스택에서 호출한 클래스를 찾아 기록합니다
 * - 저장 실패는 application 채널에 기록하고 호출자에게 전파하지 않습니다
 *
 * 그 외 auth/user-action/performance/service-error facet은 각 로그 채널 파일에 기록됩니다.
 *
 * @example
 * ```typescript
 * await this.auditLogger.record({
 *   kind: 'sql',
 *   sql: 'SELECT * FROM users WHERE id = ?',
 *   params: [1],
 *   durationMs: 12.5,
 * });
 *
 * this.auditLogger.logUserAction('locked', { id: user.id, code: user.code });
 * ```
 *
 * @module core/audit
 */

import { HttpException, Injectable } from '@nestjs/common';
import { v7 as uuidv7 } from 'uuid';
import { LoggerService, LogMetadata } from '../logger/logger.service';
import { RequestContextService } from '../context/request-context.service';
import { AuditOperation, CORRELATION_ID_MAX_LENGTH, NewAuditLogEntry } from '../database/schema';
import { AuditLogRepository } from './audit-log.repository';
import {
  AuditInput,
  AuditRequest,
  AuditUserRef,
  HttpAuditInput,
  SLOW_OPERATION_SNIPPET_LENGTH,
  SLOW_OPERATION_THRESHOLD_MS,
  SqlStatement,
} from './audit.types';
import { redact } from '../../common/security/redact';
import { describeError, errorMessage, resolveCallerModule, roundMs } from '../../common/utils';

/** 호출 모듈 추적 시 건너뛰는 로깅 계층 클래스 */
const LOGGING_COMPONENTS = ['AuditLoggerService', 'HttpLoggingMiddleware', 'SqlLoggingMiddleware'];

/** 경고 레벨로 기록되는 사용자 작업 */
const HIGH_SEVERITY_ACTIONS = new Set(['deleted', 'force_deleted', 'disabled', 'locked', 'banned']);

const SQL_KEYWORDS = new Set<AuditOperation>([
  'SELECT',
  'INSERT',
  'UPDATE',
  'DELETE',
  'CREATE',
  'ALTER',
  'DROP',
]);

const DOMAIN_OPERATIONS: ReadonlyArray<[RegExp, AuditOperation]> = [
  [/^(list.*|search|get.*|statistics)$/, 'SELECT'],
  [/^create$/, 'INSERT'],
  [/^(update|lock|unlock|enable|disable|restore)$/, 'UPDATE'],
  [/^(delete|force_delete)$/, 'DELETE'],
];

/**
 * SQL 첫 키워드로 작업 종류를 판별합니다
 *
 * @example
 * ```typescript
 * detectOperation('  select * from users'); // 'SELECT'
 * detectOperation('WITH t AS (...) SELECT 1'); // 'UNKNOWN'
 * ```
 */
export function detectOperation(sql: string): AuditOperation {
  const keyword = sql.trim().split(/\s+/, 1)[0].toUpperCase();
  for (const operation of SQL_KEYWORDS) {
    if (operation === keyword) {
      return operation;
    }
  }
  return 'UNKNOWN';
}

/**
 * 도메인 작업 이름(list, create, force_delete 등)을 감사 작업 종류로 변환합니다
 */
export function toAuditOperation(name: string): AuditOperation {
  const normalized = name.toLowerCase();
  const match = DOMAIN_OPERATIONS.find(([pattern]) => pattern.test(normalized));
  return match ? match[1] : 'UNKNOWN';
}

function requestPath(request: AuditRequest): string {
  return (request.originalUrl ?? request.url).split('?')[0];
}

function headerValue(request: AuditRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

@Injectable()
export class AuditLoggerService {
  constructor(
    private readonly logger: LoggerService,
    private readonly context: RequestContextService,
    private readonly repository: AuditLogRepository,
  ) {
    this.logger.setContext('AuditLogger');
  }

  /**
   * HTTP 요청, 단일 SQL 또는 SQL 묶음을 감사 로그에 기록합니다
   *
   * 저장 쿼리는 요청 컨텍스트 밖에서 실행되어 요청 SQL 목록에 다시 수집되지 않습니다.
   * 실패해도 reject하지 않습니다.
   *
   * @param input - 기록할 이벤트
   */
  async record(input: AuditInput): Promise<void> {
    try {
      const rows = this.buildRows(input);
      if (rows.length === 0) {
        return;
      }
      await this.context.runUntracked(() => this.repository.insertMany(rows));
    } catch (error) {
      this.logger.channel('application').error('Failed to write audit log', {
        kind: input.kind,
        error: errorMessage(error),
      });
    }
  }

  /**
   * API 에러를 api 채널에 기록합니다
   *
   * @param error - 발생한 에러
   * @param request - 에러가 발생한 요청 (선택)
   */
  logApiError(error: unknown, request?: AuditRequest): void {
    const { message, ...description } = describeError(error);
    const meta: LogMetadata = {
      ...description,
      error: message,
      code: error instanceof HttpException ? error.getStatus() : undefined,
      trace: error instanceof Error ? error.stack?.split('\n').slice(1, 11).map((line) => line.trim()) : undefined,
      ...this.baseContext(),
    };

    if (request) {
      meta.request = {
        method: request.method,
        path: requestPath(request),
        ip: request.ip,
        user_agent: headerValue(request, 'user-agent'),
      };
      meta.query = redact(request.query);
      meta.input = redact(request.body);
    }

    this.logger.channel('api').error(message, meta);
  }

  /**
   * 처리된 API 요청을 api 채널에 기록합니다
   *
   * 400 이상의 상태 코드는 경고 레벨입니다.
   */
  logApiRequest(request: AuditRequest, statusCode: number, durationMs: number): void {
    const path = requestPath(request);
    const failed = statusCode >= 400;
    const meta: LogMetadata = {
      method: request.method,
      path,
      status_code: statusCode,
      duration_ms: roundMs(durationMs),
      ...this.baseContext(),
    };

    const api = this.logger.channel('api');
    if (failed) {
      api.warn(`API request failed: ${request.method} ${path}`, meta);
    } else {
      api.info(`API request: ${request.method} ${path}`, meta);
    }
  }

  /**
   * 인증 이벤트를 기록합니다
   *
   * @param event - 이벤트 이름 (login, logout, token_rejected 등)
   * @param userId - 대상 사용자 ID (생략 시 현재 요청 주체)
   * @param data - 추가 데이터 (마스킹되어 기록)
   */
  logAuthEvent(event: string, userId?: number, data: Record<string, unknown> = {}): void {
    const base = this.baseContext();
    this.logger.channel('application').info(`Auth Event: ${event}`, {
      event,
      ...base,
      user_id: userId ?? base.user_id,
      data: redact(data),
    });
  }

  /**
   * 도메인 데이터베이스 작업을 database 채널과 감사 로그에 기록합니다
   *
   * 감사 로그의 sql_text는 `{OPERATION} {ENTITY}S` 형식이며 실패 시 ` FAILED`가 붙습니다.
   *
   * @param operation - 작업 이름 (list, create, force_delete 등)
   * @param entityType - 엔티티 이름 (예: 'User')
   * @param id - 대상 엔티티 ID
   * @param durationMs - 소요 시간 (ms)
   * @param metadata - 추가 메타데이터
   * @param isError - 실패 여부
   * @param message - 결과 메시지
   *
   * @example
   * ```typescript
   * await auditLogger.logDatabaseOperation('lock', 'User', 7, 3.2, { seconds: 3600 });
   * // sql_text: 'LOCK USERS', operation: 'UPDATE'
   * ```
   */
  async logDatabaseOperation(
    operation: string,
    entityType: string,
    id: number | string | null,
    durationMs: number,
    metadata: Record<string, unknown> = {},
    isError = false,
    message?: string,
  ): Promise<void> {
    const meta: LogMetadata = {
      operation,
      entity_type: entityType,
      entity_id: id,
      duration_ms: roundMs(durationMs),
      metadata: redact(metadata),
      ...this.baseContext(),
    };

    const database = this.logger.channel('database');
    if (isError) {
      database.error(`Database Operation: ${operation} on ${entityType}`, { ...meta, error: message });
    } else {
      database.info(`Database Operation: ${operation} on ${entityType}`, meta);
    }

    const sqlText = `${operation.toUpperCase()} ${entityType.toUpperCase()}S${isError ? ' FAILED' : ''}`;

    await this.record({
      kind: 'sql',
      sql: sqlText,
      params: { entity_id: id, ...metadata },
      operation: toAuditOperation(operation),
      durationMs,
      isError,
      message,
      module: resolveCallerModule(LOGGING_COMPONENTS),
    });
  }

  /**
   * 임계값을 초과한 작업을 performance 채널에 경고로 기록합니다
   */
  logPerformanceIssue(
    operation: string,
    message: string,
    durationMs: number,
    thresholdMs: number,
    metadata: Record<string, unknown> = {},
  ): void {
    this.logger.channel('performance').warn(message, {
      operation,
      duration_ms: roundMs(durationMs),
      threshold_ms: roundMs(thresholdMs),
      exceeded_by_ms: roundMs(durationMs - thresholdMs),
      metadata,
      ...this.baseContext(),
    });
  }

  /**
   * 사용자 대상 비즈니스 작업을 기록합니다
   *
   * deleted, force_deleted, disabled, locked, banned는 경고 레벨, 나머지는 info 레벨입니다.
   *
   * @param action - 작업 이름
   * @param user - 대상 사용자
   * @param data - 추가 데이터 (마스킹되어 기록)
   */
  logUserAction(action: string, user?: AuditUserRef | null, data: Record<string, unknown> = {}): void {
    const meta: LogMetadata = {
      action,
      target_user_id: user?.id ?? null,
      target_user_code: user?.code,
      data: redact(data),
      ...this.baseContext(),
    };

    const application = this.logger.channel('application');
    if (HIGH_SEVERITY_ACTIONS.has(action)) {
      application.warn(`User Action: ${action}`, meta);
    } else {
      application.info(`User Action: ${action}`, meta);
    }
  }

  /**
   * 서비스 계층 에러를 service-errors 채널과 감사 로그(ERROR)에 기록합니다
   *
   * @param service - 서비스 이름 (감사 로그 module)
   * @param method - 메서드 이름
   * @param error - 발생한 에러
   * @param context - 추가 컨텍스트 (마스킹되어 기록)
   */
  async logServiceError(
    service: string,
    method: string,
    error: unknown,
    context: Record<string, unknown> = {},
  ): Promise<void> {
    const { message, ...description } = describeError(error);

    this.logger.channel('service-errors').error(`Service Error: ${service}::${method}`, {
      service,
      method,
      ...description,
      error: message,
      context: redact(context),
      ...this.baseContext(),
    });

    await this.record({
      kind: 'sql',
      sql: `Service error in ${service}::${method}`,
      params: { error: message },
      operation: 'ERROR',
      isError: true,
      message,
      module: service,
    });
  }

  /**
   * 입력을 감사 로그 행으로 변환합니다
   */
  private buildRows(input: AuditInput): NewAuditLogEntry[] {
    switch (input.kind) {
      case 'http':
        return [this.buildHttpRow(input)];
      case 'sql':
        return [this.buildSqlRow(input, input.module ?? resolveCallerModule(LOGGING_COMPONENTS), true)];
      case 'batch': {
        if (input.entries.length === 0) {
          return [];
        }
        const caller = resolveCallerModule(LOGGING_COMPONENTS);
        return input.entries.map((entry) =>
          this.buildSqlRow(
            { ...entry, message: entry.message ?? input.message },
            entry.module ?? caller,
            false,
            'Batch Query Failed',
          ),
        );
      }
    }
  }

  private buildHttpRow(input: HttpAuditInput): NewAuditLogEntry {
    const method = input.method.toUpperCase();
    const module = input.module ?? 'unknown';
    const durationMs = roundMs(input.durationMs);

    if (durationMs > SLOW_OPERATION_THRESHOLD_MS) {
      this.logPerformanceIssue(
        'http_request',
        `Slow request detected: ${method} ${input.path}`,
        durationMs,
        SLOW_OPERATION_THRESHOLD_MS,
        { operation: `${method} ${input.path}`.slice(0, SLOW_OPERATION_SNIPPET_LENGTH), module },
      );
    }

    return {
      ...this.rowDefaults(),
      sqlText: `HTTP ${method} ${input.path}`,
      sqlParams: {
        status_code: input.statusCode,
        headers: redact(input.headers),
        query: redact(input.query),
        body: redact(input.body),
      },
      operation: 'HTTP_REQUEST',
      durationMs,
      module,
      isError: input.isError,
      message: input.message ?? (input.isError ? 'Unknown Error' : 'Success'),
    };
  }

  private buildSqlRow(
    statement: SqlStatement,
    module: string,
    warnWhenSlow: boolean,
    failureMessage = 'Query Failed',
  ): NewAuditLogEntry {
    const operation = statement.operation ?? detectOperation(statement.sql);
    const durationMs = roundMs(statement.durationMs ?? 0);
    const isError = statement.isError ?? false;

    if (warnWhenSlow && durationMs > SLOW_OPERATION_THRESHOLD_MS) {
      this.logPerformanceIssue(
        'sql_query',
        `Slow query detected: ${operation}`,
        durationMs,
        SLOW_OPERATION_THRESHOLD_MS,
        { sql: statement.sql.slice(0, SLOW_OPERATION_SNIPPET_LENGTH), module },
      );
    }

    return {
      ...this.rowDefaults(),
      sqlText: statement.sql,
      sqlParams: redact(statement.params ?? null),
      operation,
      durationMs,
      module,
      isError,
      message: statement.message ?? (isError ? failureMessage : 'Success'),
    };
  }

  private rowDefaults(): Pick<
    NewAuditLogEntry,
    'id' | 'executedBy' | 'userId' | 'ipAddress' | 'userAgent' | 'correlationId' | 'createdAt' | 'updatedAt'
  > {
    const store = this.context.get();
    const now = new Date();

    return {
      id: uuidv7(),
      executedBy: store?.actor?.name ?? 'system',
      userId: store?.actor?.id ?? null,
      ipAddress: store?.ip ?? 'unknown',
      userAgent: store?.userAgent ?? 'unknown',
      correlationId: store?.correlationId.slice(0, CORRELATION_ID_MAX_LENGTH) ?? null,
      createdAt: now,
      updatedAt: now,
    };
  }

  private baseContext(): LogMetadata {
    const store = this.context.get();

    return {
      correlation_id: store?.correlationId,
      user_id: store?.actor?.id ?? null,
      ip: store?.ip ?? 'unknown',
      user_agent: store?.userAgent ?? 'unknown',
      timestamp: new Date().toISOString(),
    };
  }
}
