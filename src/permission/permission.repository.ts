/**
 * 권한 리포지토리
 *
 * permissions 테이블에 대한 조회/부여/회수를 담당합니다.
 *
 * @module permission
 */

import { Injectable } from '@nestjs/common';
import { and, eq, isNull, or, SQL } from 'drizzle-orm';
import { DatabaseService } from '../core/database/database.service';
import { permissions } from '../core/database/schema';

/**
 * 권한 한 건 (resourceId가 없으면 리소스 전체 권한)
 */
export interface PermissionGrant {
  userId: number;
  resource: string;
  action: string;
  resourceId?: number | null;
}

@Injectable()
export class PermissionRepository {
  constructor(private readonly database: DatabaseService) {}

  /**
   * 조건에 맞는 권한이 있는지 확인합니다
   *
   * resourceId가 주어지면 해당 리소스 권한 또는 리소스 전체 권한을 모두 인정합니다.
   */
  async exists(grant: PermissionGrant): Promise<boolean> {
    const scope: SQL | undefined =
      grant.resourceId === undefined || grant.resourceId === null
        ? isNull(permissions.resourceId)
        : or(isNull(permissions.resourceId), eq(permissions.resourceId, grant.resourceId));

    const rows = await this.database.db
      .select({ id: permissions.id })
      .from(permissions)
      .where(
        and(
          eq(permissions.userId, grant.userId),
          eq(permissions.resource, grant.resource),
          eq(permissions.action, grant.action),
          scope,
        ),
      )
      .limit(1);

    return rows.length > 0;
  }

  /**
   * 권한을 부여합니다 (이미 있으면 무시)
   */
  async insert(grant: PermissionGrant): Promise<void> {
    await this.database.db
      .insert(permissions)
      .ignore()
      .values({
        userId: grant.userId,
        resource: grant.resource,
        action: grant.action,
        resourceId: grant.resourceId ?? null,
      });
  }

  /**
   * 권한을 회수합니다
   *
   * @returns 삭제된 행 수
   */
  async delete(grant: PermissionGrant): Promise<number> {
    const [result] = await this.database.db
      .delete(permissions)
      .where(
        and(
          eq(permissions.userId, grant.userId),
          eq(permissions.resource, grant.resource),
          eq(permissions.action, grant.action),
          grant.resourceId === undefined || grant.resourceId === null
            ? isNull(permissions.resourceId)
            : eq(permissions.resourceId, grant.resourceId),
        ),
      );
    return result.affectedRows;
  }
}
