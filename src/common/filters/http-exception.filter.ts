/**
 * 전역 HTTP 예외 필터
 *
 * 모든 예외를 표준 API 응답 envelope로 변환하여 반환합니다.
 * HttpException, ValidationPipe 에러, 예상치 못한 런타임 에러를 모두 처리하며,
 * 응답 전에 api 채널에 에러를 기록합니다.
 *
 * 상태 코드별 응답:
 * - 401: unauthorizedResponse
 * - 403: forbiddenResponse
 * - 404: notFoundResponse
 * - 409: conflictResponse
 * - 422: validationErrorResponse (필드 에러 포함)
 * - 429: tooManyRequestsResponse
 * - 500: serverErrorResponse (프로덕션에서는 메시지를 숨김)
 * - 그 외 5xx: 상태 코드를 유지한 errorResponse (예: 헬스체크 실패 503)
 *
 * @module common/filters
 */

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { AuditLoggerService } from '../../core/audit/audit-logger.service';
import { RequestContextService } from '../../core/context/request-context.service';
import { isProductionEnv } from '../config';
import { ApiResult } from '../interfaces/api-response.interface';
import { ResponseBuilder } from '../response/response-builder';
import { ResponseBuilderFactory } from '../response/response-builder.factory';
import { writeApiResult } from '../response/write-api-result';

/**
 * HttpException 응답 본문에서 추출한 메시지와 필드 에러
 */
interface HttpExceptionDescription {
  message: string;
  errors?: Record<string, string[]>;
}

function toFieldErrors(value: unknown): Record<string, string[]> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }

  const errors: Record<string, string[]> = {};
  for (const [field, messages] of Object.entries(value)) {
    if (Array.isArray(messages)) {
      errors[field] = messages.filter((message): message is string => typeof message === 'string');
    } else if (typeof messages === 'string') {
      errors[field] = [messages];
    }
  }

  return Object.keys(errors).length > 0 ? errors : undefined;
}

/**
 * HttpException의 응답 본문을 해석합니다
 *
 * message가 배열이면 ', '로 이어 붙입니다.
 */
export function describeHttpException(exception: HttpException): HttpExceptionDescription {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return { message: response };
  }

  const raw = 'message' in response ? response.message : undefined;
  const message = Array.isArray(raw)
    ? raw.join(', ')
    : typeof raw === 'string'
      ? raw
      : exception.message;

  return {
    message,
    errors: 'errors' in response ? toFieldErrors(response.errors) : undefined,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly production: boolean;

  constructor(
    private readonly responses: ResponseBuilderFactory,
    private readonly auditLogger: AuditLoggerService,
    private readonly requestContext: RequestContextService,
    configService: ConfigService,
  ) {
    this.production = isProductionEnv(configService.get<string>('app.nodeEnv'));
  }

  /**
   * 예외를 기록하고 표준 envelope로 응답합니다
   *
   * @param exception - 발생한 예외 객체
   * @param host - 실행 컨텍스트의 ArgumentsHost
   */
  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    this.auditLogger.logApiError(exception, request);

    const inbound = request.headers['x-correlation-id'];
    const builder = this.responses
      .create('HttpExceptionFilter')
      .setCorrelationId(
        this.requestContext.getCorrelationId() ?? (typeof inbound === 'string' ? inbound : undefined),
      );

    const result =
      exception instanceof HttpException
        ? this.fromHttpException(builder, exception)
        : builder.serverErrorResponse(
            this.production || !(exception instanceof Error) ? 'Internal server error' : exception.message,
            exception,
          );

    response.locals.errorMessage = result.body?.message;
    writeApiResult(response, result);
  }

  private fromHttpException(builder: ResponseBuilder, exception: HttpException): ApiResult {
    const status = exception.getStatus();
    const { message, errors } = describeHttpException(exception);

    switch (status) {
      case HttpStatus.UNPROCESSABLE_ENTITY:
        return builder.validationErrorResponse(errors ?? message, message);
      case HttpStatus.NOT_FOUND:
        return builder.notFoundResponse(message);
      case HttpStatus.METHOD_NOT_ALLOWED:
        return builder.errorResponse('Method not allowed', status);
      case HttpStatus.TOO_MANY_REQUESTS:
        return builder.tooManyRequestsResponse(message);
      case HttpStatus.UNAUTHORIZED:
        return builder.unauthorizedResponse(message);
      case HttpStatus.FORBIDDEN:
        return builder.forbiddenResponse(message);
      case HttpStatus.CONFLICT:
        return builder.conflictResponse(message, errors);
      default:
        if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
          return builder.serverErrorResponse(
            this.production ? 'Internal server error' : message,
            exception,
          );
        }
        if (status > HttpStatus.INTERNAL_SERVER_ERROR) {
          return builder.errorResponse(message, status, errors, exception);
        }
        return builder.errorResponse(message, status, errors);
    }
  }
}
