/**
 * 전역 ValidationPipe
 *
 * class-validator 검증 실패를 422 응답으로 변환합니다.
 * 필드 에러는 `{ 필드경로: [메시지...] }` 형식으로 예외 필터에 전달됩니다.
 *
 * @module common/pipes
 */

import { UnprocessableEntityException, ValidationError, ValidationPipe } from '@nestjs/common';

/**
 * 중첩된 검증 에러를 `parent.child` 경로 기준으로 펼칩니다
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): Record<string, string[]> {
  const result: Record<string, string[]> = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      result[path] = Object.values(error.constraints);
    }

    if (error.children && error.children.length > 0) {
      Object.assign(result, flattenValidationErrors(error.children, path));
    }
  }

  return result;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
    exceptionFactory: (errors: ValidationError[]) =>
      new UnprocessableEntityException({
        message: 'Validation failed',
        errors: flattenValidationErrors(errors),
      }),
  });
}
