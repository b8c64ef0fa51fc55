/**
 * SQL Logging Middleware Integration Tests
 *
 * Mounts CorrelationIdMiddleware and SqlLoggingMiddleware in front of a
 * small controller that records queries the way the instrumented pool does,
 * then checks the batch written when the response finishes.
 */

import {
  Controller,
  Get,
  INestApplication,
  MiddlewareConsumer,
  Module,
  NestModule,
} from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { CorrelationIdMiddleware } from '../../src/common/middleware/correlation-id.middleware';
import { SqlLoggingMiddleware } from '../../src/common/middleware/sql-logging.middleware';
import { RequestContextInterceptor } from '../../src/common/interceptors/request-context.interceptor';
import { AuditLogRepository } from '../../src/core/audit/audit-log.repository';
import { AuditLoggerService } from '../../src/core/audit/audit-logger.service';
import { RequestContextService } from '../../src/core/context/request-context.service';
import { LoggerService } from '../../src/core/logger/logger.service';
import { flushAuditWrites, InMemoryAuditLogRepository } from '../utils';
import { createLogCapture } from '../utils/log-capture';

@Controller('reports')
class ReportController {
  constructor(private readonly requestContext: RequestContextService) {}

  @Get()
  list(): { generated: boolean } {
    this.requestContext.recordQuery({
      sql: 'SELECT * FROM users WHERE id = ?',
      params: [1],
      durationMs: 2.5,
      isError: false,
    });
    this.requestContext.recordQuery({
      sql: 'UPDATE users SET enable = ? WHERE id = ?',
      params: [0, 1],
      durationMs: 8,
      isError: true,
      message: 'Lock wait timeout',
    });
    return { generated: true };
  }

  @Get('cached')
  cached(): { generated: boolean } {
    return { generated: false };
  }
}

describe('SqlLoggingMiddleware', () => {
  let app: INestApplication;
  let auditLogs: InMemoryAuditLogRepository;
  let requestContext: RequestContextService;

  beforeEach(async () => {
    auditLogs = new InMemoryAuditLogRepository();
    const capture = createLogCapture();

    @Module({
      controllers: [ReportController],
      providers: [
        AuditLoggerService,
        RequestContextService,
        { provide: AuditLogRepository, useValue: auditLogs },
        { provide: LoggerService, useValue: capture.createLogger() },
        { provide: APP_INTERCEPTOR, useClass: RequestContextInterceptor },
      ],
    })
    class ReportingModule implements NestModule {
      configure(consumer: MiddlewareConsumer): void {
        consumer.apply(CorrelationIdMiddleware, SqlLoggingMiddleware).forRoutes('*');
      }
    }

    const moduleRef = await Test.createTestingModule({ imports: [ReportingModule] }).compile();
    app = moduleRef.createNestApplication({ logger: false });
    await app.init();
    requestContext = moduleRef.get(RequestContextService);
  });

  afterEach(async () => {
    await app.close();
  });

  it('should write the queries captured during a request as one batch', async () => {
    await request(app.getHttpServer())
      .get('/reports')
      .set('X-Correlation-ID', 'corr-sql-0001')
      .expect(200);
    await flushAuditWrites();

    expect(auditLogs.rows).toHaveLength(2);
    expect(auditLogs.rows[0]).toMatchObject({
      sqlText: 'SELECT * FROM users WHERE id = ?',
      sqlParams: [1],
      operation: 'SELECT',
      durationMs: 2.5,
      module: 'ReportController@list',
      isError: false,
      message: 'Success',
      correlationId: 'corr-sql-0001',
    });
    expect(auditLogs.rows[1]).toMatchObject({
      sqlText: 'UPDATE users SET enable = ? WHERE id = ?',
      sqlParams: [0, 1],
      operation: 'UPDATE',
      durationMs: 8,
      module: 'ReportController@list',
      isError: true,
      message: 'Lock wait timeout',
      correlationId: 'corr-sql-0001',
    });
  });

  it('should write nothing when the request ran no queries', async () => {
    await request(app.getHttpServer()).get('/reports/cached').expect(200);
    await flushAuditWrites();

    expect(auditLogs.rows).toHaveLength(0);
  });

  it('should ignore queries recorded outside a request', async () => {
    requestContext.recordQuery({ sql: 'SELECT 1', params: [], durationMs: 1, isError: false });

    await request(app.getHttpServer()).get('/reports/cached').expect(200);
    await flushAuditWrites();

    expect(auditLogs.rows).toHaveLength(0);
  });
});
