/**
 * 권한 서비스
 *
 * 사용자별 리소스/작업 권한을 확인하고 부여/회수합니다.
 *
 * @example
 * ```typescript
 * await permissionService.grant(user.id, 'users', 'update');
 * await permissionService.hasPermission(user.id, 'users', 'update', 42); // true
 * await permissionService.hasAll(user.id, 'users', ['update', 'delete']); // false
 * ```
 *
 * @module permission
 */

import { Injectable } from '@nestjs/common';
import { AuditLoggerService } from '../core/audit/audit-logger.service';
import { PermissionRepository } from './permission.repository';

@Injectable()
export class PermissionService {
  constructor(
    private readonly permissionRepository: PermissionRepository,
    private readonly auditLogger: AuditLoggerService,
  ) {}

  /**
   * @param resourceId - 특정 리소스 ID (생략하면 리소스 전체 권한만 인정)
   */
  async hasPermission(
    userId: number,
    resource: string,
    action: string,
    resourceId?: number,
  ): Promise<boolean> {
    return this.permissionRepository.exists({ userId, resource, action, resourceId });
  }

  /**
   * 나열된 작업 중 하나라도 권한이 있는지 확인합니다
   */
  async hasAny(userId: number, resource: string, actions: string[], resourceId?: number): Promise<boolean> {
    for (const action of actions) {
      if (await this.hasPermission(userId, resource, action, resourceId)) {
        return true;
      }
    }
    return false;
  }

  /**
   * 나열된 작업 모두에 권한이 있는지 확인합니다
   */
  async hasAll(userId: number, resource: string, actions: string[], resourceId?: number): Promise<boolean> {
    for (const action of actions) {
      if (!(await this.hasPermission(userId, resource, action, resourceId))) {
        return false;
      }
    }
    return true;
  }

  async grant(userId: number, resource: string, action: string, resourceId?: number): Promise<void> {
    await this.permissionRepository.insert({ userId, resource, action, resourceId });
    this.auditLogger.logAuthEvent('permission_granted', userId, { resource, action, resource_id: resourceId });
  }

  /**
   * @returns 실제로 회수되었으면 true
   */
  async revoke(userId: number, resource: string, action: string, resourceId?: number): Promise<boolean> {
    const removed = await this.permissionRepository.delete({ userId, resource, action, resourceId });
    if (removed > 0) {
      this.auditLogger.logAuthEvent('permission_revoked', userId, { resource, action, resource_id: resourceId });
    }
    return removed > 0;
  }
}
