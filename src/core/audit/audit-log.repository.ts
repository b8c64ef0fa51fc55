/**
 * 감사 로그 레포지토리
 *
 * sql_audit_logs 테이블에 대한 쓰기를 담당합니다.
 * 감사 로그는 추가만 되며 수정/삭제되지 않습니다.
 *
 * @module core/audit
 */

import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { NewAuditLogEntry, sqlAuditLogs } from '../database/schema';

@Injectable()
export class AuditLogRepository {
  constructor(private readonly database: DatabaseService) {}

  /**
   * 여러 감사 로그 행을 한 번의 insert로 저장합니다
   *
   * @param rows - 저장할 행 목록 (비어 있으면 아무 것도 하지 않음)
   */
  async insertMany(rows: NewAuditLogEntry[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }

    await this.database.db.insert(sqlAuditLogs).values(rows);
  }
}
