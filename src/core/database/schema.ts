/**
 * 데이터베이스 스키마
 *
 * drizzle-orm mysql-core 테이블 정의입니다.
 * - users: 사용자 계정 (Soft Delete, 잠금 상태, 감사 컬럼 포함)
 * - sql_audit_logs: HTTP 요청/SQL/서비스 에러 감사 로그 (append-only)
 * - permissions: 사용자별 리소스 권한
 *
 * @module core/database
 */

import {
  bigint,
  boolean,
  char,
  date,
  double,
  index,
  int,
  json,
  mysqlEnum,
  mysqlTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/mysql-core';

export const USER_GENDERS = ['male', 'female', 'other'] as const;
export type UserGender = (typeof USER_GENDERS)[number];

export const AUDIT_OPERATIONS = [
  'SELECT',
  'INSERT',
  'UPDATE',
  'DELETE',
  'CREATE',
  'ALTER',
  'DROP',
  'HTTP_REQUEST',
  'ERROR',
  'UNKNOWN',
] as const;
export type AuditOperation = (typeof AUDIT_OPERATIONS)[number];

/** 저장되는 correlation id의 최대 길이 (초과분은 잘라서 저장) */
export const CORRELATION_ID_MAX_LENGTH = 255;

/**
 * 사용자 테이블
 *
 * email/phone 유일성은 삭제되지 않은 행 기준으로 서비스 계층에서 검사합니다.
 * code는 20자리 숫자이며 생성 후 변경되지 않습니다.
 */
export const users = mysqlTable(
  'users',
  {
    id: bigint('id', { mode: 'number', unsigned: true }).autoincrement().primaryKey(),
    code: varchar('code', { length: 20 }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    email: varchar('email', { length: 255 }).notNull(),
    password: varchar('password', { length: 255 }).notNull(),
    phone: varchar('phone', { length: 20 }),
    dateOfBirth: date('date_of_birth', { mode: 'string' }),
    gender: mysqlEnum('gender', USER_GENDERS),
    avatar: varchar('avatar', { length: 2048 }),
    emailVerifiedAt: timestamp('email_verified_at'),
    enable: boolean('enable').notNull().default(true),
    lockedAt: timestamp('locked_at'),
    lockCount: int('lock_count').notNull().default(0),
    createdBy: varchar('created_by', { length: 255 }),
    updatedBy: varchar('updated_by', { length: 255 }),
    deletedBy: varchar('deleted_by', { length: 255 }),
    deletedAt: timestamp('deleted_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow().onUpdateNow(),
  },
  (table) => ({
    codeUnique: uniqueIndex('users_code_unique').on(table.code),
    emailIndex: index('users_email_index').on(table.email),
    phoneIndex: index('users_phone_index').on(table.phone),
    createdAtIndex: index('users_created_at_index').on(table.createdAt),
  }),
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

/**
 * 감사 로그 테이블
 *
 * 이벤트당 한 행이 추가되며 수정되지 않습니다.
 * id는 UUID v7이므로 생성 순서대로 정렬됩니다.
 */
export const sqlAuditLogs = mysqlTable(
  'sql_audit_logs',
  {
    id: char('id', { length: 36 }).primaryKey(),
    sqlText: text('sql_text').notNull(),
    sqlParams: json('sql_params'),
    operation: mysqlEnum('operation', AUDIT_OPERATIONS).notNull().default('UNKNOWN'),
    durationMs: double('duration_ms').notNull().default(0),
    executedBy: varchar('executed_by', { length: 255 }).notNull(),
    userId: bigint('user_id', { mode: 'number', unsigned: true }),
    module: varchar('module', { length: 255 }).notNull(),
    ipAddress: varchar('ip_address', { length: 45 }).notNull(),
    userAgent: text('user_agent').notNull(),
    isError: boolean('is_error').notNull().default(false),
    message: text('message'),
    correlationId: varchar('correlation_id', { length: CORRELATION_ID_MAX_LENGTH }),
    createdAt: timestamp('created_at', { fsp: 3 }).notNull(),
    updatedAt: timestamp('updated_at', { fsp: 3 }).notNull(),
  },
  (table) => ({
    operationIndex: index('sql_audit_logs_operation_index').on(table.operation),
    correlationIndex: index('sql_audit_logs_correlation_id_index').on(table.correlationId),
    createdAtIndex: index('sql_audit_logs_created_at_index').on(table.createdAt),
  }),
);

export type AuditLogEntry = typeof sqlAuditLogs.$inferSelect;
export type NewAuditLogEntry = typeof sqlAuditLogs.$inferInsert;

/**
 * 권한 테이블
 *
 * resourceId가 null이면 해당 리소스 전체에 대한 권한입니다.
 */
export const permissions = mysqlTable(
  'permissions',
  {
    id: bigint('id', { mode: 'number', unsigned: true }).autoincrement().primaryKey(),
    userId: bigint('user_id', { mode: 'number', unsigned: true }).notNull(),
    resource: varchar('resource', { length: 255 }).notNull(),
    action: varchar('action', { length: 255 }).notNull(),
    resourceId: bigint('resource_id', { mode: 'number', unsigned: true }),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow().onUpdateNow(),
  },
  (table) => ({
    lookupIndex: index('permissions_user_resource_action_index').on(
      table.userId,
      table.resource,
      table.action,
    ),
    grantUnique: uniqueIndex('permissions_grant_unique').on(
      table.userId,
      table.resource,
      table.action,
      table.resourceId,
    ),
  }),
);

export type Permission = typeof permissions.$inferSelect;
export type NewPermission = typeof permissions.$inferInsert;
