/**
 * Test Utilities
 *
 * Builds the full application (AppModule) with the same global setup as
 * main.ts, replacing every outbound dependency with an in-process stand-in.
 */

import { INestApplication } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { AuditLogRepository } from '../../src/core/audit/audit-log.repository';
import { CacheService } from '../../src/core/cache/cache.service';
import { DatabaseService } from '../../src/core/database/database.service';
import { WINSTON_LOGGER } from '../../src/core/logger/logger.constants';
import { PasswordService } from '../../src/core/security/password.service';
import { PermissionRepository } from '../../src/permission/permission.repository';
import { UserRepository } from '../../src/user/user.repository';
import {
  FakeDatabaseService,
  FakePasswordService,
  InMemoryAuditLogRepository,
  InMemoryCacheService,
  InMemoryPermissionRepository,
  InMemoryUserRepository,
} from './in-memory-repositories';
import { createLogCapture, LogCapture } from './log-capture';

/**
 * Test context interface
 */
export interface TestContext {
  app: INestApplication;
  module: TestingModule;
  users: InMemoryUserRepository;
  auditLogs: InMemoryAuditLogRepository;
  permissions: InMemoryPermissionRepository;
  database: FakeDatabaseService;
  logs: LogCapture;
}

/**
 * Optional stand-ins for services that are disabled by default in tests
 */
export interface TestAppOptions {
  /** Replaces the Redis-backed cache (disabled under REDIS_ENABLED=false) */
  cache?: InMemoryCacheService;
}

/**
 * Creates the application with in-memory persistence and captured logs
 */
export async function createTestApp(options: TestAppOptions = {}): Promise<TestContext> {
  const users = new InMemoryUserRepository();
  const auditLogs = new InMemoryAuditLogRepository();
  const permissions = new InMemoryPermissionRepository();
  const database = new FakeDatabaseService();
  const logs = createLogCapture();

  const builder = Test.createTestingModule({ imports: [AppModule] });
  if (options.cache) {
    builder.overrideProvider(CacheService).useValue(options.cache);
  }

  const module = await builder
    .overrideProvider(DatabaseService)
    .useValue(database)
    .overrideProvider(UserRepository)
    .useValue(users)
    .overrideProvider(AuditLogRepository)
    .useValue(auditLogs)
    .overrideProvider(PermissionRepository)
    .useValue(permissions)
    .overrideProvider(PasswordService)
    .useClass(FakePasswordService)
    .overrideProvider(WINSTON_LOGGER)
    .useValue(logs.winston)
    .compile();

  const app = configureApp(module.createNestApplication({ logger: false }));
  await app.init();

  return { app, module, users, auditLogs, permissions, database, logs };
}

/**
 * Safely closes a test application
 */
export async function closeTestApp(context: TestContext | undefined): Promise<void> {
  if (context?.app) {
    await context.app.close();
  }
}

/**
 * Signs a bearer token accepted by JwtStrategy (JWT_SECRET=test-secret)
 */
export function signAccessToken(id: number, name: string): string {
  return new JwtService({ secret: 'test-secret' }).sign({ sub: id, name }, { expiresIn: '1h' });
}

/**
 * Lets response 'finish' handlers run before audit rows are inspected
 */
export function flushAuditWrites(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
