/**
 * 활성 사용자 가드
 *
 * 인증된 요청 주체의 계정이 비활성화되었거나 잠겨 있으면 403을 반환합니다.
 * 익명 요청은 통과시킵니다.
 *
 * @module common/guards
 */

import { CanActivate, ForbiddenException, Injectable } from '@nestjs/common';
import { RequestContextService } from '../../core/context/request-context.service';
import { UserService } from '../../user/user.service';

@Injectable()
export class ActiveUserGuard implements CanActivate {
  constructor(
    private readonly requestContext: RequestContextService,
    private readonly userService: UserService,
  ) {}

  async canActivate(): Promise<boolean> {
    const actor = this.requestContext.getActor();
    if (!actor) {
      return true;
    }

    const user = await this.userService.getById(actor.id);
    if (!user) {
      return true;
    }

    if (!user.enable) {
      throw new ForbiddenException('Your account has been disabled');
    }

    if (this.userService.isLocked(user)) {
      throw new ForbiddenException('Your account is locked');
    }

    return true;
  }
}
