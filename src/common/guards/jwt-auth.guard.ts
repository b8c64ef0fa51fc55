/**
 * 선택적 JWT 인증 가드
 *
 * Passport JWT 전략으로 Authorization 헤더의 토큰을 검증합니다.
 * 토큰이 없거나 유효하지 않아도 요청을 막지 않으며,
 * 유효한 토큰이면 요청 주체를 요청 컨텍스트에 기록합니다.
 * 전역 가드(APP_GUARD)로 등록되어 감사 로그의 executed_by/user_id를 채웁니다.
 *
 * @module common/guards
 */

import { ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Request } from 'express';
import { RequestActor, RequestContextService } from '../../core/context/request-context.service';

/**
 * request.user 값이 요청 주체인지 확인합니다
 */
export function toRequestActor(user: unknown): RequestActor | null {
  if (
    typeof user === 'object' &&
    user !== null &&
    'id' in user &&
    typeof user.id === 'number' &&
    Number.isFinite(user.id) &&
    'name' in user &&
    typeof user.name === 'string'
  ) {
    return { id: user.id, name: user.name };
  }
  return null;
}

@Injectable()
export class OptionalJwtAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly requestContext: RequestContextService) {
    super();
  }

  /**
   * @returns 항상 true (인증 실패는 익명 요청으로 처리)
   */
  async canActivate(context: ExecutionContext): Promise<boolean> {
    try {
      await super.canActivate(context);
    } catch (error) {
      if (!(error instanceof UnauthorizedException)) {
        throw error;
      }
      return true;
    }

    const request = context.switchToHttp().getRequest<Request & { user?: unknown }>();
    const actor = toRequestActor(request.user);
    if (actor) {
      this.requestContext.setActor(actor);
    }

    return true;
  }
}
