/**
 * 현재 사용자 데코레이터
 *
 * 선택적 JWT 가드가 식별한 요청 주체를 반환하는 파라미터 데코레이터입니다.
 * 익명 요청이면 null입니다.
 *
 * @example
 * ```typescript
 * @Get('user')
 * current(@CurrentUser() actor: RequestActor | null) {
 *   return actor;
 * }
 * ```
 */

import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { toRequestActor } from '../guards/jwt-auth.guard';

export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) => {
  const request = ctx.switchToHttp().getRequest<Request & { user?: unknown }>();
  return toRequestActor(request.user);
});
