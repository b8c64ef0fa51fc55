/**
 * 사용자 리포지토리
 *
 * drizzle-orm 기반의 사용자 데이터 접근 계층입니다.
 * 모든 조회 메서드는 기본적으로 Soft Delete된 레코드를 제외하며,
 * 삭제된 레코드 조회를 위한 별도 메서드를 제공합니다.
 *
 * @example
 * ```typescript
 * constructor(private readonly userRepository: UserRepository) {}
 *
 * const user = await this.userRepository.findById(userId);
 * ```
 *
 * @module user
 */

import { Injectable } from '@nestjs/common';
import { and, count, desc, eq, gt, isNotNull, isNull, or, SQL, sql } from 'drizzle-orm';
import { DatabaseService } from '../core/database/database.service';
import { NewUser, User, users } from '../core/database/schema';

/**
 * 사용자 통계
 */
export interface UserStatistics {
  total: number;
  /** enable = true */
  active: number;
  disabled: number;
  /** 잠금 만료 시각이 현재 이후인 사용자 */
  locked: number;
  /** 이메일 인증 완료 */
  verified: number;
}

/**
 * 페이지 조회 결과
 */
export interface UserSlice {
  items: User[];
  total: number;
}

/** 수정 가능한 사용자 컬럼 */
export type UserPatch = Partial<Omit<NewUser, 'id' | 'code' | 'createdAt' | 'updatedAt'>>;

/**
 * 잠금 만료 시각이 now 이후인 조건
 *
 * now는 컬럼 매퍼를 거쳐 UTC 문자열로 바인딩됩니다.
 */
export function currentlyLocked(now: Date): SQL {
  return gt(users.lockedAt, now);
}

/**
 * LIKE 패턴의 특수 문자(\, %, _)를 이스케이프합니다
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (character) => `\\${character}`);
}

/**
 * 사용자 데이터 접근 리포지토리
 *
 * @description
 * - 모든 조회 메서드에 deleted_at IS NULL 필터를 적용하여 Soft Delete 지원
 * - 생성, 수정, 삭제, 복원 등 CRUD 전체 메서드 제공
 * - drizzle 클라이언트를 직접 노출하지 않고 도메인 중심 인터페이스 제공
 */
@Injectable()
export class UserRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.db;
  }

  /**
   * 활성 사용자 목록을 생성일 역순으로 조회합니다
   *
   * search가 주어지면 이름/이메일/전화번호에 대해 대소문자 구분 없는 부분 일치 검색을 합니다.
   *
   * @param offset - 건너뛸 행 수
   * @param limit - 최대 행 수
   * @param search - 검색어 (선택)
   */
  async slice(offset: number, limit: number, search?: string): Promise<UserSlice> {
    const conditions: SQL[] = [isNull(users.deletedAt)];

    if (search) {
      const pattern = `%${escapeLike(search.toLowerCase())}%`;
      const matches = or(
        sql`LOWER(${users.name}) LIKE ${pattern}`,
        sql`LOWER(${users.email}) LIKE ${pattern}`,
        sql`LOWER(${users.phone}) LIKE ${pattern}`,
      );
      if (matches) {
        conditions.push(matches);
      }
    }

    const where = and(...conditions);

    const [items, totals] = await Promise.all([
      this.db
        .select()
        .from(users)
        .where(where)
        .orderBy(desc(users.createdAt), desc(users.id))
        .limit(limit)
        .offset(offset),
      this.db.select({ total: count() }).from(users).where(where),
    ]);

    return { items, total: totals[0]?.total ?? 0 };
  }

  /**
   * 페이지 번호 기준으로 활성 사용자를 조회합니다
   */
  async paginate(page: number, perPage: number, search?: string): Promise<UserSlice> {
    return this.slice((page - 1) * perPage, perPage, search);
  }

  async findById(id: number): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.id, id), isNull(users.deletedAt)))
      .limit(1);
    return rows[0] ?? null;
  }

  async findByCode(code: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.code, code), isNull(users.deletedAt)))
      .limit(1);
    return rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.email, email), isNull(users.deletedAt)))
      .limit(1);
    return rows[0] ?? null;
  }

  async findByPhone(phone: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.phone, phone), isNull(users.deletedAt)))
      .limit(1);
    return rows[0] ?? null;
  }

  /**
   * Soft Delete된 사용자를 ID로 조회합니다
   */
  async findTrashedById(id: number): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(users)
      .where(and(eq(users.id, id), isNotNull(users.deletedAt)))
      .limit(1);
    return rows[0] ?? null;
  }

  /**
   * 삭제 여부와 관계없이 코드 사용 여부를 확인합니다
   */
  async codeExists(code: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.code, code))
      .limit(1);
    return rows.length > 0;
  }

  /**
   * 새로운 사용자를 생성합니다
   *
   * @param data - 사용자 생성 데이터 (비밀번호는 해시된 값)
   * @returns 생성된 사용자 엔티티
   */
  async create(data: NewUser): Promise<User> {
    const [inserted] = await this.db.insert(users).values(data).$returningId();
    const created = await this.findAnyById(inserted.id);
    if (!created) {
      throw new Error(`User ${inserted.id} was not found after insert`);
    }
    return created;
  }

  /**
   * 사용자 정보를 수정합니다
   *
   * updated_at 컬럼을 현재 시각으로 갱신합니다.
   *
   * @returns 수정된 사용자 엔티티 (없으면 null)
   */
  async update(id: number, patch: UserPatch): Promise<User | null> {
    await this.db
      .update(users)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(users.id, id));
    return this.findAnyById(id);
  }

  /**
   * deleted_at을 설정하여 Soft Delete합니다
   */
  async softDelete(id: number, deletedBy?: string): Promise<void> {
    await this.db
      .update(users)
      .set({ deletedAt: new Date(), deletedBy: deletedBy ?? null, updatedAt: new Date() })
      .where(eq(users.id, id));
  }

  /**
   * Soft Delete된 사용자를 복원합니다
   */
  async restore(id: number): Promise<User | null> {
    await this.db
      .update(users)
      .set({ deletedAt: null, deletedBy: null, updatedAt: new Date() })
      .where(eq(users.id, id));
    return this.findById(id);
  }

  /**
   * 사용자 행을 영구 삭제합니다
   */
  async forceDelete(id: number): Promise<void> {
    await this.db.delete(users).where(eq(users.id, id));
  }

  /**
   * 삭제되지 않은 사용자의 집계 통계를 조회합니다
   *
   * @param now - 잠금 여부 판단 기준 시각
   */
  async statistics(now: Date): Promise<UserStatistics> {
    const [row] = await this.db
      .select({
        total: count(),
        active: sql`COALESCE(SUM(CASE WHEN ${users.enable} = 1 THEN 1 ELSE 0 END), 0)`.mapWith(Number),
        disabled: sql`COALESCE(SUM(CASE WHEN ${users.enable} = 0 THEN 1 ELSE 0 END), 0)`.mapWith(Number),
        locked: sql`COALESCE(SUM(CASE WHEN ${currentlyLocked(now)} THEN 1 ELSE 0 END), 0)`.mapWith(Number),
        verified: sql`COALESCE(SUM(CASE WHEN ${users.emailVerifiedAt} IS NOT NULL THEN 1 ELSE 0 END), 0)`.mapWith(
          Number,
        ),
      })
      .from(users)
      .where(isNull(users.deletedAt));

    return row ?? { total: 0, active: 0, disabled: 0, locked: 0, verified: 0 };
  }

  private async findAnyById(id: number): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return rows[0] ?? null;
  }
}
