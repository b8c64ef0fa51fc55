/**
 * Audit Logger Integration Tests
 *
 * Tests AuditLoggerService against an in-memory audit table and a
 * capturing winston logger:
 * - HTTP, SQL and batch rows with redacted parameters
 * - Request context attribution (actor, ip, correlation id)
 * - Slow operation warnings on the performance channel
 * - Caller module attribution from the call stack
 * - Channel facets (api, application, database, service-errors)
 */

import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AuditLogRepository } from '../../src/core/audit/audit-log.repository';
import {
  AuditLoggerService,
  detectOperation,
  toAuditOperation,
} from '../../src/core/audit/audit-logger.service';
import { RequestContextService } from '../../src/core/context/request-context.service';
import { CORRELATION_ID_MAX_LENGTH } from '../../src/core/database/schema';
import { LoggerService } from '../../src/core/logger/logger.service';
import { InMemoryAuditLogRepository } from '../utils/in-memory-repositories';
import { createLogCapture, LogCapture } from '../utils/log-capture';
import { createMockContextStore, createMockRequest } from '../utils/mock-factories';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

class NightlyReportJob {
  constructor(private readonly audit: AuditLoggerService) {}

  run(sql: string, durationMs = 3.2): Promise<void> {
    return this.audit.record({ kind: 'sql', sql, params: [1], durationMs });
  }
}

class UserImportJob {
  constructor(private readonly audit: AuditLoggerService) {}

  flush(): Promise<void> {
    return this.audit.record({
      kind: 'batch',
      entries: [
        { sql: 'SELECT 1', durationMs: 1500 },
        { sql: 'UPDATE users SET enable = 0', isError: true },
        { sql: 'DELETE FROM users WHERE id = 3', isError: true, message: 'Deadlock found' },
      ],
    });
  }
}

class AccountMaintenanceJob {
  constructor(private readonly audit: AuditLoggerService) {}

  lock(id: number): Promise<void> {
    return this.audit.logDatabaseOperation('lock', 'User', id, 3.2, { seconds: 3600 });
  }

  failLock(id: number): Promise<void> {
    return this.audit.logDatabaseOperation('lock', 'User', id, 8, {}, true, 'Lock wait timeout');
  }
}

describe('AuditLoggerService', () => {
  let capture: LogCapture;
  let auditLogs: InMemoryAuditLogRepository;
  let audit: AuditLoggerService;
  let context: RequestContextService;

  beforeEach(async () => {
    capture = createLogCapture();
    auditLogs = new InMemoryAuditLogRepository();

    const moduleRef = await Test.createTestingModule({
      providers: [
        AuditLoggerService,
        RequestContextService,
        { provide: AuditLogRepository, useValue: auditLogs },
        { provide: LoggerService, useValue: capture.createLogger() },
      ],
    }).compile();

    audit = moduleRef.get(AuditLoggerService);
    context = moduleRef.get(RequestContextService);
  });

  describe('record (http)', () => {
    it('should store a redacted HTTP row attributed to the request actor', async () => {
      const store = createMockContextStore({ actor: { id: 7, name: 'Kim Minsu' } });

      await context.run(store, () =>
        audit.record({
          kind: 'http',
          method: 'post',
          path: '/api/users',
          headers: { authorization: 'Bearer test-token', 'user-agent': 'jest' },
          query: { token: 'test-token' },
          body: { name: 'Kim Minsu', password: 'test-secret' },
          statusCode: 201,
          durationMs: 12.5,
          isError: false,
          module: 'UserController@create',
        }),
      );

      expect(auditLogs.rows).toHaveLength(1);
      const [row] = auditLogs.rows;
      expect(row.id).toMatch(UUID_PATTERN);
      expect(row).toMatchObject({
        sqlText: 'HTTP POST /api/users',
        sqlParams: {
          status_code: 201,
          headers: { authorization: '***REDACTED***', 'user-agent': 'jest' },
          query: { token: '***REDACTED***' },
          body: { name: 'Kim Minsu', password: '***REDACTED***' },
        },
        operation: 'HTTP_REQUEST',
        durationMs: 12.5,
        module: 'UserController@create',
        isError: false,
        message: 'Success',
        executedBy: 'Kim Minsu',
        userId: 7,
        ipAddress: '127.0.0.1',
        userAgent: 'jest',
        correlationId: 'corr-test-0001',
      });
    });

    it('should fall back to system defaults outside a request', async () => {
      await audit.record({
        kind: 'http',
        method: 'GET',
        path: '/api/users',
        headers: {},
        query: {},
        body: {},
        statusCode: 500,
        durationMs: 4,
        isError: true,
      });

      expect(auditLogs.rows[0]).toMatchObject({
        module: 'unknown',
        message: 'Unknown Error',
        isError: true,
        executedBy: 'system',
        userId: null,
        ipAddress: 'unknown',
        userAgent: 'unknown',
        correlationId: null,
      });
    });

    it('should cap an oversized correlation id to the column length', async () => {
      const correlationId = 'c'.repeat(300);

      await context.run(createMockContextStore({ correlationId }), () =>
        audit.record({ kind: 'sql', sql: 'SELECT 1', module: 'HealthController' }),
      );

      expect(auditLogs.rows).toHaveLength(1);
      expect(auditLogs.rows[0].correlationId).toBe('c'.repeat(CORRELATION_ID_MAX_LENGTH));
      expect(CORRELATION_ID_MAX_LENGTH).toBe(255);
    });

    it('should warn about slow requests on the performance channel', async () => {
      await audit.record({
        kind: 'http',
        method: 'GET',
        path: '/api/users/stats',
        headers: {},
        query: {},
        body: {},
        statusCode: 200,
        durationMs: 1500,
        isError: false,
      });

      const warnings = capture.channel('performance');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({
        level: 'warn',
        message: 'Slow request detected: GET /api/users/stats',
        operation: 'http_request',
        duration_ms: 1500,
        threshold_ms: 1000,
        exceeded_by_ms: 500,
        metadata: { operation: 'GET /api/users/stats', module: 'unknown' },
      });
    });

    it('should not warn at exactly the threshold', async () => {
      await audit.record({
        kind: 'http',
        method: 'GET',
        path: '/api/users',
        headers: {},
        query: {},
        body: {},
        statusCode: 200,
        durationMs: 1000,
        isError: false,
      });

      expect(capture.channel('performance')).toHaveLength(0);
    });
  });

  describe('record (sql)', () => {
    it('should attribute the row to the calling class', async () => {
      await new NightlyReportJob(audit).run('SELECT * FROM users WHERE id = ?');

      expect(auditLogs.rows[0]).toMatchObject({
        sqlText: 'SELECT * FROM users WHERE id = ?',
        sqlParams: [1],
        operation: 'SELECT',
        durationMs: 3.2,
        module: 'NightlyReportJob',
        isError: false,
        message: 'Success',
      });
    });

    it('should prefer an explicit module and operation', async () => {
      await audit.record({
        kind: 'sql',
        sql: 'CALL archive_users()',
        operation: 'UPDATE',
        module: 'UserRepository',
        params: { password: 'test-secret' },
      });

      expect(auditLogs.rows[0]).toMatchObject({
        operation: 'UPDATE',
        module: 'UserRepository',
        sqlParams: { password: '***REDACTED***' },
        durationMs: 0,
      });
    });

    it('should mark failed statements with a default message', async () => {
      await audit.record({ kind: 'sql', sql: 'DELETE FROM users', isError: true, module: 'UserRepository' });

      expect(auditLogs.rows[0]).toMatchObject({ operation: 'DELETE', isError: true, message: 'Query Failed' });
    });

    it('should warn about slow queries with a shortened statement', async () => {
      const sql = `SELECT ${'x'.repeat(300)}`;

      await new NightlyReportJob(audit).run(sql, 1500);

      const [warning] = capture.channel('performance');
      expect(warning).toMatchObject({
        message: 'Slow query detected: SELECT',
        operation: 'sql_query',
        exceeded_by_ms: 500,
        metadata: { sql: sql.slice(0, 200), module: 'NightlyReportJob' },
      });
    });
  });

  describe('record (batch)', () => {
    it('should insert every entry without slow warnings', async () => {
      await new UserImportJob(audit).flush();

      expect(auditLogs.rows.map((row) => [row.operation, row.isError, row.message, row.module])).toEqual([
        ['SELECT', false, 'Success', 'UserImportJob'],
        ['UPDATE', true, 'Batch Query Failed', 'UserImportJob'],
        ['DELETE', true, 'Deadlock found', 'UserImportJob'],
      ]);
      expect(capture.channel('performance')).toHaveLength(0);
    });

    it('should use the batch message for entries without one', async () => {
      await audit.record({
        kind: 'batch',
        message: 'Nightly import',
        entries: [{ sql: 'INSERT INTO users (name) VALUES (?)', module: 'UserImportJob' }],
      });

      expect(auditLogs.rows[0]).toMatchObject({ operation: 'INSERT', message: 'Nightly import' });
    });

    it('should write nothing for an empty batch', async () => {
      const insert = jest.spyOn(auditLogs, 'insertMany');

      await audit.record({ kind: 'batch', entries: [] });

      expect(insert).not.toHaveBeenCalled();
    });
  });

  describe('persistence', () => {
    it('should log storage failures instead of rejecting', async () => {
      auditLogs.failWith = new Error('Connection lost');

      await expect(
        audit.record({ kind: 'sql', sql: 'SELECT 1', module: 'HealthController' }),
      ).resolves.toBeUndefined();

      expect(auditLogs.rows).toHaveLength(0);
      expect(capture.channel('application')).toEqual([
        expect.objectContaining({
          level: 'error',
          message: 'Failed to write audit log',
          kind: 'sql',
          error: 'Connection lost',
        }),
      ]);
    });

    it('should write outside the request context', async () => {
      const seen: Array<string | undefined> = [];
      jest.spyOn(auditLogs, 'insertMany').mockImplementation(async () => {
        seen.push(context.getCorrelationId());
      });

      await context.run(createMockContextStore(), () =>
        audit.record({ kind: 'sql', sql: 'SELECT 1', module: 'UserRepository' }),
      );

      expect(seen).toEqual([undefined]);
    });
  });

  describe('logDatabaseOperation', () => {
    it('should log the operation and store a summarized row', async () => {
      await new AccountMaintenanceJob(audit).lock(7);

      expect(auditLogs.rows[0]).toMatchObject({
        sqlText: 'LOCK USERS',
        sqlParams: { entity_id: 7, seconds: 3600 },
        operation: 'UPDATE',
        durationMs: 3.2,
        module: 'AccountMaintenanceJob',
        isError: false,
        message: 'Success',
      });
      expect(capture.channel('database')).toEqual([
        expect.objectContaining({
          level: 'info',
          message: 'Database Operation: lock on User',
          operation: 'lock',
          entity_type: 'User',
          entity_id: 7,
          duration_ms: 3.2,
          metadata: { seconds: 3600 },
        }),
      ]);
    });

    it('should flag failed operations', async () => {
      await new AccountMaintenanceJob(audit).failLock(7);

      expect(auditLogs.rows[0]).toMatchObject({
        sqlText: 'LOCK USERS FAILED',
        isError: true,
        message: 'Lock wait timeout',
      });
      expect(capture.channel('database')[0]).toMatchObject({
        level: 'error',
        message: 'Database Operation: lock on User',
        error: 'Lock wait timeout',
      });
    });
  });

  describe('operation mapping', () => {
    it.each([
      ['list', 'SELECT'],
      ['getByCode', 'SELECT'],
      ['statistics', 'SELECT'],
      ['create', 'INSERT'],
      ['restore', 'UPDATE'],
      ['force_delete', 'DELETE'],
      ['export', 'UNKNOWN'],
    ])('should map %s to %s', (name, operation) => {
      expect(toAuditOperation(name)).toBe(operation);
    });

    it('should detect the leading SQL keyword', () => {
      expect(detectOperation('  select * from users')).toBe('SELECT');
      expect(detectOperation('drop table sessions')).toBe('DROP');
      expect(detectOperation('WITH recent AS (SELECT 1) SELECT * FROM recent')).toBe('UNKNOWN');
      expect(detectOperation('')).toBe('UNKNOWN');
    });
  });

  describe('facets', () => {
    it('should log high severity user actions as warnings', () => {
      audit.logUserAction('locked', { id: 3, code: '20250115093000123456' }, { seconds: 60, password: 'test-secret' });
      audit.logUserAction('created', { id: 3 });
      audit.logUserAction('listed');

      const [locked, created, listed] = capture.channel('application');
      expect(locked).toMatchObject({
        level: 'warn',
        message: 'User Action: locked',
        target_user_id: 3,
        target_user_code: '20250115093000123456',
        data: { seconds: 60, password: '***REDACTED***' },
      });
      expect(created).toMatchObject({ level: 'info', message: 'User Action: created' });
      expect(listed).toMatchObject({ level: 'info', target_user_id: null });
    });

    it('should log service errors and store an ERROR row', async () => {
      await audit.logServiceError('UserService', 'create', new Error('Insert failed'), {
        email: 'kim@test.example.com',
        password: 'test-secret',
      });

      expect(capture.channel('service-errors')[0]).toMatchObject({
        level: 'error',
        message: 'Service Error: UserService::create',
        service: 'UserService',
        method: 'create',
        exception: 'Error',
        error: 'Insert failed',
        context: { email: 'kim@test.example.com', password: '***REDACTED***' },
      });
      expect(auditLogs.rows[0]).toMatchObject({
        sqlText: 'Service error in UserService::create',
        sqlParams: { error: 'Insert failed' },
        operation: 'ERROR',
        isError: true,
        message: 'Insert failed',
        module: 'UserService',
      });
    });

    it('should log API errors with the request stripped of secrets', () => {
      const request = createMockRequest({
        url: '/api/users/abc?token=test-token',
        originalUrl: '/api/users/abc?token=test-token',
        query: { token: 'test-token', page: '1' },
        body: { password: 'test-secret' },
      });

      audit.logApiError(new NotFoundException('User not found'), request);

      expect(capture.channel('api')[0]).toMatchObject({
        level: 'error',
        message: 'User not found',
        exception: 'NotFoundException',
        error: 'User not found',
        code: 404,
        request: { method: 'GET', path: '/api/users/abc', ip: '127.0.0.1', user_agent: 'jest' },
        query: { token: '***REDACTED***', page: '1' },
        input: { password: '***REDACTED***' },
      });
    });

    it('should log failed API requests as warnings', () => {
      audit.logApiRequest(createMockRequest(), 200, 12.5);
      audit.logApiRequest(createMockRequest(), 404, 3);

      const [ok, failed] = capture.channel('api');
      expect(ok).toMatchObject({
        level: 'info',
        message: 'API request: GET /api/users',
        status_code: 200,
        duration_ms: 12.5,
      });
      expect(failed).toMatchObject({ level: 'warn', message: 'API request failed: GET /api/users' });
    });

    it('should attribute auth events to the request actor by default', () => {
      context.run(createMockContextStore({ actor: { id: 9, name: 'Lee' } }), () => {
        audit.logAuthEvent('token_rejected', undefined, { token: 'test-token', reason: 'expired' });
      });
      audit.logAuthEvent('login', 5);

      const [rejected, login] = capture.channel('application');
      expect(rejected).toMatchObject({
        message: 'Auth Event: token_rejected',
        user_id: 9,
        data: { token: '***REDACTED***', reason: 'expired' },
      });
      expect(login).toMatchObject({ message: 'Auth Event: login', user_id: 5 });
    });
  });
});
