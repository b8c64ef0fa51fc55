/**
 * 응답 빌더
 *
 * 모든 API 응답을 같은 envelope 형식으로 조립합니다.
 * 설정 메서드(setCorrelationId, withLinks, withMeta, withDebug)는 체이닝되며,
 * 최종 메서드(*Response)는 상태 코드/헤더/본문을 담은 ApiResult를 반환하고
 * 설정 상태를 초기화합니다. 빌더는 요청마다 새로 만들어 사용합니다.
 *
 * @example
 * ```typescript
 * const builder = this.responses.create('UserController');
 * const result = builder
 *   .setCorrelationId(correlationId)
 *   .withLinks({ self: `/users/${user.code}` })
 *   .createdResponse(user, 'User created successfully', `/users/${user.code}`);
 * writeApiResult(res, result);
 * ```
 *
 * @module common/response
 */

import {
  ApiEnvelope,
  ApiResult,
  ErrorsInput,
} from '../interfaces/api-response.interface';
import { Paginated } from '../pagination/paginated';
import { describeError } from '../utils';
import { formatErrors } from './format-errors';

/** 예외 보고 대상 (AuditLoggerService와 호환) */
export interface ServiceErrorSink {
  logServiceError(
    service: string,
    method: string,
    error: unknown,
    context?: Record<string, unknown>,
  ): Promise<void> | void;
}

export interface ResponseBuilderOptions {
  /** 프로덕션 환경 여부 (true면 debug 블록을 포함하지 않음) */
  production?: boolean;
  /** 예외를 보고할 로거 */
  errorSink?: ServiceErrorSink;
  /** 클라이언트가 보낸 X-Request-ID */
  requestId?: string;
  /** 예외 보고 시 사용할 서비스 이름 */
  source?: string;
}

/**
 * bulkOperationResponse의 항목별 결과
 */
export type BulkItemResult = Record<string, unknown>;

/** 모든 응답에 포함되는 보안 헤더 */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
};

interface EnvelopeParts<T> {
  success: boolean;
  message: string;
  code: number;
  data?: T;
  errors?: ErrorsInput;
  headers?: Record<string, string>;
}

export class ResponseBuilder {
  private correlationId?: string;
  private links: Record<string, string> = {};
  private meta: Record<string, unknown> = {};
  private debug: Record<string, unknown> = {};

  private readonly production: boolean;
  private readonly errorSink?: ServiceErrorSink;
  private readonly requestId?: string;
  private readonly source: string;

  constructor(options: ResponseBuilderOptions = {}) {
    this.production = options.production ?? false;
    this.errorSink = options.errorSink;
    this.requestId = options.requestId;
    this.source = options.source ?? 'ResponseBuilder';
  }

  setCorrelationId(correlationId: string | undefined): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * 디버그 정보를 추가합니다 (프로덕션 환경에서는 무시)
   */
  withDebug(debug: Record<string, unknown>): this {
    if (!this.production) {
      this.debug = { ...this.debug, ...debug };
    }
    return this;
  }

  withLinks(links: Record<string, string>): this {
    this.links = { ...this.links, ...links };
    return this;
  }

  withMeta(meta: Record<string, unknown>): this {
    this.meta = { ...this.meta, ...meta };
    return this;
  }

  /**
   * 설정 상태(correlation id, links, meta, debug)를 모두 비웁니다
   */
  reset(): this {
    this.correlationId = undefined;
    this.links = {};
    this.meta = {};
    this.debug = {};
    return this;
  }

  successResponse<T>(data?: T, message = 'Success', code = 200): ApiResult<T> {
    return this.emit({ success: true, message, code, data });
  }

  /**
   * 에러 응답을 만듭니다
   *
   * exception이 주어지면 먼저 service-errors 채널에 보고하고,
   * 프로덕션이 아니면 예외 클래스/메시지/파일/라인을 debug에 포함합니다.
   */
  errorResponse(
    message: string,
    code = 400,
    errors?: ErrorsInput,
    exception?: unknown,
  ): ApiResult {
    if (exception !== undefined) {
      this.reportException('errorResponse', exception);
    }
    return this.emit({ success: false, message, code, errors });
  }

  createdResponse<T>(data?: T, message = 'Created successfully', location?: string): ApiResult<T> {
    return this.emit({
      success: true,
      message,
      code: 201,
      data,
      headers: location ? { Location: location } : undefined,
    });
  }

  acceptedResponse<T>(data?: T, message = 'Accepted'): ApiResult<T> {
    return this.emit({ success: true, message, code: 202, data });
  }

  noContentResponse(): ApiResult {
    try {
      return { statusCode: 204, headers: this.buildHeaders(), body: null };
    } finally {
      this.reset();
    }
  }

  /**
   * 404 응답을 만듭니다
   *
   * @param message - 에러 메시지
   * @param resourceType - 지정하면 메시지가 `{resourceType} not found`로 바뀝니다
   */
  notFoundResponse(message = 'Resource not found', resourceType?: string): ApiResult {
    const text = resourceType ? `${resourceType} not found` : message;
    return this.emit({ success: false, message: text, code: 404 });
  }

  validationErrorResponse(errors: ErrorsInput, message = 'Validation failed'): ApiResult {
    return this.emit({ success: false, message, code: 422, errors });
  }

  unauthorizedResponse(message = 'Unauthorized', realm?: string): ApiResult {
    return this.emit({
      success: false,
      message,
      code: 401,
      headers: realm ? { 'WWW-Authenticate': `Bearer realm="${realm}"` } : undefined,
    });
  }

  forbiddenResponse(message = 'Forbidden', reason?: string): ApiResult {
    if (reason) {
      this.withMeta({ reason });
    }
    return this.emit({ success: false, message, code: 403 });
  }

  serverErrorResponse(message = 'Internal server error', exception?: unknown): ApiResult {
    if (exception !== undefined) {
      this.reportException('serverErrorResponse', exception);
    }
    return this.emit({ success: false, message, code: 500 });
  }

  conflictResponse(message = 'Conflict', conflicts?: ErrorsInput): ApiResult {
    return this.emit({ success: false, message, code: 409, errors: conflicts });
  }

  tooManyRequestsResponse(message = 'Too many requests', retryAfterSeconds?: number): ApiResult {
    if (retryAfterSeconds === undefined) {
      return this.emit({ success: false, message, code: 429 });
    }

    this.withMeta({ retry_after: retryAfterSeconds });
    return this.emit({
      success: false,
      message,
      code: 429,
      headers: { 'Retry-After': String(retryAfterSeconds) },
    });
  }

  /**
   * 페이지네이션 응답을 만듭니다
   *
   * withLinks가 true이면 self/first/last 링크와, 해당하는 경우 prev/next 링크를 추가합니다.
   * withLinks()로 먼저 지정한 링크가 자동 생성 링크보다 우선합니다.
   */
  paginatedResponse<T>(
    page: Paginated<T>,
    message = 'Success',
    withLinks = true,
  ): ApiResult<{ items: T[]; pagination: Record<string, number | boolean | null> }> {
    if (withLinks) {
      const links: Record<string, string> = {
        self: page.url(page.currentPage),
        first: page.url(1),
        last: page.url(page.lastPage),
      };
      if (page.currentPage > 1) {
        links.prev = page.url(page.currentPage - 1);
      }
      if (page.hasMorePages) {
        links.next = page.url(page.currentPage + 1);
      }
      this.links = { ...links, ...this.links };
    }

    return this.emit({
      success: true,
      message,
      code: 200,
      data: {
        items: page.items,
        pagination: {
          current_page: page.currentPage,
          per_page: page.perPage,
          total: page.total,
          last_page: page.lastPage,
          from: page.from,
          to: page.to,
          has_more_pages: page.hasMorePages,
        },
      },
    });
  }

  /**
   * 일괄 작업 결과 응답을 만듭니다
   *
   * @example
   * ```typescript
   * builder.bulkOperationResponse(2, 1, results, 'delete').body?.message;
   * // 'Bulk delete completed: 2 successful, 1 failed'
   * ```
   */
  bulkOperationResponse(
    successCount: number,
    failCount: number,
    results: BulkItemResult[] = [],
    operation = 'operation',
  ): ApiResult<{ summary: { total: number; successful: number; failed: number }; results?: BulkItemResult[] }> {
    return this.emit({
      success: true,
      message: `Bulk ${operation} completed: ${successCount} successful, ${failCount} failed`,
      code: 200,
      data: {
        summary: { total: successCount + failCount, successful: successCount, failed: failCount },
        ...(results.length > 0 ? { results } : {}),
      },
    });
  }

  collectionResponse<T>(items: T[], message = 'Success'): ApiResult<{ items: T[] }> {
    this.withMeta({ count: items.length });
    return this.emit({ success: true, message, code: 200, data: { items } });
  }

  partialContentResponse<T>(
    data: T,
    from: number,
    to: number,
    total: number,
    message = 'Partial content',
  ): ApiResult<T> {
    this.withMeta({ range: { from, to, total } });
    return this.emit({
      success: true,
      message,
      code: 206,
      data,
      headers: { 'Content-Range': `items ${from}-${to}/${total}` },
    });
  }

  private reportException(method: string, exception: unknown): void {
    if (this.errorSink) {
      void this.errorSink.logServiceError(this.source, method, exception);
    }

    if (!this.production) {
      const { exception: name, message, file, line } = describeError(exception);
      this.withDebug({ exception: name, message, file, line });
    }
  }

  private buildHeaders(extra: Record<string, string> = {}): Record<string, string> {
    return {
      ...SECURITY_HEADERS,
      ...(this.correlationId ? { 'X-Correlation-ID': this.correlationId } : {}),
      ...extra,
    };
  }

  /**
   * envelope를 조립하고 설정 상태를 초기화합니다
   */
  private emit<T>(parts: EnvelopeParts<T>): ApiResult<T> {
    try {
      const body: ApiEnvelope<T> = {
        success: parts.success,
        message: parts.message,
        code: parts.code,
        ...(parts.data !== undefined ? { data: parts.data } : {}),
        ...(parts.errors !== undefined ? { errors: formatErrors(parts.errors) } : {}),
        ...(this.correlationId ? { correlation_id: this.correlationId } : {}),
        ...(Object.keys(this.links).length > 0 ? { links: this.links } : {}),
        ...(Object.keys(this.meta).length > 0 ? { meta: this.meta } : {}),
        ...(!this.production && Object.keys(this.debug).length > 0 ? { debug: this.debug } : {}),
        timestamp: new Date().toISOString(),
        ...(this.requestId ? { request_id: this.requestId } : {}),
      };

      return { statusCode: parts.code, headers: this.buildHeaders(parts.headers), body };
    } finally {
      this.reset();
    }
  }
}
