/**
 * 감사 로그 모듈
 *
 * AuditLoggerService를 전역으로 제공합니다.
 *
 * @module core/audit
 */

import { Global, Module } from '@nestjs/common';
import { AuditLogRepository } from './audit-log.repository';
import { AuditLoggerService } from './audit-logger.service';

@Global()
@Module({
  providers: [AuditLogRepository, AuditLoggerService],
  exports: [AuditLoggerService],
})
export class AuditModule {}
