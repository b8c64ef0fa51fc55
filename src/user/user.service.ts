/**
 * 사용자 서비스
 *
 * 사용자 도메인의 비즈니스 로직을 처리합니다.
 * 모든 저장소 작업은 소요 시간을 측정하여 감사 로그(logDatabaseOperation)에 기록하며,
 * 실패한 작업은 service-errors 채널에도 기록한 뒤 호출자에게 다시 던집니다.
 *
 * - 생성: argon2id 해시, 이메일 인증 시각 기록, 20자리 고유 코드 부여
 * - 수정: 허용된 필드만 반영, 변경 전/후 diff 기록 (비밀번호는 마스킹)
 * - 통계: Redis 캐시 (5분), 변경 작업 시 무효화
 *
 * @example
 * ```typescript
 * constructor(private readonly userService: UserService) {}
 *
 * const user = await this.userService.create({
 *   name: 'Jane Doe',
 *   email: 'jane@example.com',
 *   password: 'test-secret',
 * });
 * await this.userService.lock(user, 600);
 * ```
 *
 * @module user
 */

import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import dayjs from 'dayjs';
import { performance } from 'perf_hooks';
import { AuditLoggerService } from '../core/audit/audit-logger.service';
import { CACHE_KEYS, CACHE_TTL } from '../core/cache/cache-key.constants';
import { CacheService } from '../core/cache/cache.service';
import { RequestContextService } from '../core/context/request-context.service';
import { isDuplicateEntryError } from '../core/database/database-errors';
import { NewUser, User } from '../core/database/schema';
import { PasswordService } from '../core/security/password.service';
import { REDACTION_MASK } from '../common/security/redact';
import { Paginated } from '../common/pagination/paginated';
import { errorMessage, randomDigits } from '../common/utils';
import { UserPatch, UserRepository, UserStatistics } from './user.repository';

/** 사용자 코드 길이 */
export const USER_CODE_LENGTH = 20;

/** 코드 충돌 시 재생성 최대 횟수 */
export const MAX_CODE_ATTEMPTS = 5;

/** 기본 잠금 시간 (초) */
export const DEFAULT_LOCK_SECONDS = 3600;

const CODE_TIMESTAMP_FORMAT = 'YYYYMMDDHHmmss';
const USER_CODE_INDEX = 'users_code_unique';

/**
 * 사용자 생성 입력
 */
export interface CreateUserInput {
  name: string;
  email: string;
  /** 평문 비밀번호 (저장 전 해시) */
  password: string;
  phone?: string | null;
  /** YYYY-MM-DD */
  dateOfBirth?: string | null;
  gender?: User['gender'];
  avatar?: string | null;
}

/**
 * 사용자 수정 입력 (지정된 필드만 반영)
 */
export interface UpdateUserInput {
  name?: string;
  email?: string;
  password?: string;
  phone?: string | null;
  dateOfBirth?: string | null;
  gender?: User['gender'];
  avatar?: string | null;
  enable?: boolean;
}

/**
 * 캐시를 거친 통계 조회 결과
 */
export interface CachedStatistics {
  statistics: UserStatistics;
  cached: boolean;
  /** 통계 집계 시각 (ISO-8601) */
  generatedAt: string;
}

const UPDATABLE_FIELDS = [
  'name',
  'email',
  'password',
  'phone',
  'dateOfBirth',
  'gender',
  'avatar',
  'enable',
] as const satisfies ReadonlyArray<keyof UpdateUserInput & keyof UserPatch>;

function isUserStatistics(value: unknown): value is UserStatistics {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: object = value;
  return (['total', 'active', 'disabled', 'locked', 'verified'] as const).every(
    (key) => typeof Reflect.get(record, key) === 'number',
  );
}

function isCachedStatistics(value: unknown): value is Omit<CachedStatistics, 'cached'> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'statistics' in value &&
    isUserStatistics(value.statistics) &&
    'generatedAt' in value &&
    typeof value.generatedAt === 'string'
  );
}

@Injectable()
export class UserService {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly auditLogger: AuditLoggerService,
    private readonly cacheService: CacheService,
    private readonly passwordService: PasswordService,
    private readonly requestContext: RequestContextService,
  ) {}

  /**
   * 활성 사용자 목록을 페이지 단위로 조회합니다
   *
   * @param page - 1부터 시작하는 페이지 번호
   * @param perPage - 페이지 크기
   * @param search - 이름/이메일/전화번호 검색어 (선택)
   */
  async list(page: number, perPage: number, search?: string): Promise<Paginated<User>> {
    const result = await this.track(
      'list',
      null,
      () => this.userRepository.paginate(page, perPage, search),
      { page, per_page: perPage, search },
    );

    this.auditLogger.logUserAction('listed', null, { page, per_page: perPage, total: result.total });
    return new Paginated(result.items, result.total, perPage, page);
  }

  /**
   * 이름/이메일/전화번호에 대해 대소문자 구분 없는 부분 일치 검색을 합니다
   */
  async search(query: string, page = 1, perPage = 20): Promise<Paginated<User>> {
    const result = await this.track(
      'search',
      null,
      () => this.userRepository.paginate(page, perPage, query),
      { query, page, per_page: perPage },
    );

    this.auditLogger.logUserAction('searched', null, { query, total: result.total });
    return new Paginated(result.items, result.total, perPage, page);
  }

  /**
   * 1부터 시작하는 순번 범위(from..to)의 사용자를 조회합니다
   *
   * @returns 범위의 사용자와 전체 사용자 수
   */
  async range(from: number, to: number): Promise<{ items: User[]; total: number }> {
    return this.track(
      'list_range',
      null,
      () => this.userRepository.slice(from - 1, to - from + 1),
      { from, to },
    );
  }

  async getById(id: number): Promise<User | null> {
    return this.track('get', id, () => this.userRepository.findById(id));
  }

  async getByCode(code: string): Promise<User | null> {
    return this.track('get_by_code', code, () => this.userRepository.findByCode(code));
  }

  async getByEmail(email: string): Promise<User | null> {
    return this.track('get_by_email', null, () => this.userRepository.findByEmail(email), { email });
  }

  /**
   * Soft Delete된 사용자를 조회합니다 (복원 대상 확인용)
   */
  async getTrashedById(id: number): Promise<User | null> {
    return this.track('get_trashed', id, () => this.userRepository.findTrashedById(id));
  }

  /**
   * 사용자를 생성합니다
   *
   * 이메일/전화번호가 이미 사용 중이면 ConflictException을 던집니다.
   * 코드 유일 제약 위반으로 저장이 실패하면 새 코드로 한 번 재시도합니다.
   *
   * @param input - 생성 입력
   * @param seed - 코드 생성에 사용할 시드 (선택)
   * @returns 생성된 사용자
   */
  async create(input: CreateUserInput, seed?: string): Promise<User> {
    await this.assertUnique(input.email, input.phone ?? undefined);

    const user = await this.track(
      'create',
      null,
      async () => {
        const values: Omit<NewUser, 'code'> = {
          name: input.name,
          email: input.email,
          password: await this.passwordService.hash(input.password),
          phone: input.phone ?? null,
          dateOfBirth: input.dateOfBirth ?? null,
          gender: input.gender ?? null,
          avatar: input.avatar ?? null,
          emailVerifiedAt: new Date(),
          enable: true,
          lockCount: 0,
          createdBy: this.actorName(),
        };

        try {
          return await this.userRepository.create({ ...values, code: await this.makeUserCode(seed) });
        } catch (error) {
          if (!isDuplicateEntryError(error, USER_CODE_INDEX)) {
            throw error;
          }
          return this.userRepository.create({ ...values, code: await this.makeUserCode() });
        }
      },
      { email: input.email },
    );

    await this.invalidateStatistics();
    this.auditLogger.logUserAction('created', user);
    return user;
  }

  /**
   * 사용자 정보를 수정합니다
   *
   * 허용된 필드만 반영하며, 변경된 필드의 전/후 값을 감사 로그에 남깁니다.
   * 비밀번호는 다시 해시되고 diff에는 마스킹 값으로 기록됩니다.
   *
   * @param user - 수정 대상 사용자
   * @param input - 수정 입력
   * @returns 수정된 사용자
   */
  async update(user: User, input: UpdateUserInput): Promise<User> {
    await this.assertUnique(
      input.email !== undefined && input.email !== user.email ? input.email : undefined,
      input.phone && input.phone !== user.phone ? input.phone : undefined,
      user.id,
    );

    const patch: UserPatch = {
      name: input.name,
      email: input.email,
      phone: input.phone,
      dateOfBirth: input.dateOfBirth,
      gender: input.gender,
      avatar: input.avatar,
      enable: input.enable,
    };
    const changes: Record<string, { from: unknown; to: unknown }> = {};

    for (const field of UPDATABLE_FIELDS) {
      const value = input[field];
      if (value === undefined) {
        continue;
      }

      if (field === 'password') {
        changes.password = { from: REDACTION_MASK, to: REDACTION_MASK };
        continue;
      }

      if (value !== user[field]) {
        changes[field] = { from: user[field], to: value };
      }
    }

    const updated = await this.track(
      'update',
      user.id,
      async () => {
        if (input.password !== undefined) {
          patch.password = await this.passwordService.hash(input.password);
        }
        return this.requireUser(
          await this.userRepository.update(user.id, { ...patch, updatedBy: this.actorName() }),
        );
      },
      { changes },
    );

    await this.invalidateStatistics();
    this.auditLogger.logUserAction('updated', updated, { changes });
    return updated;
  }

  /**
   * 사용자를 Soft Delete합니다 (restore로 복원 가능)
   */
  async delete(user: User): Promise<void> {
    await this.track('delete', user.id, () =>
      this.userRepository.softDelete(user.id, this.actorName() ?? undefined),
    );
    await this.invalidateStatistics();
    this.auditLogger.logUserAction('deleted', user);
  }

  /**
   * 삭제된 사용자를 복원합니다
   *
   * 삭제 이후 같은 이메일 또는 전화번호로 가입한 사용자가 있으면 409를 던집니다.
   */
  async restore(user: User): Promise<User> {
    await this.assertUnique(user.email, user.phone ?? undefined, user.id);

    const restored = await this.track('restore', user.id, async () =>
      this.requireUser(await this.userRepository.restore(user.id)),
    );
    await this.invalidateStatistics();
    this.auditLogger.logUserAction('restored', restored);
    return restored;
  }

  /**
   * 사용자 행을 영구 삭제합니다 (복원 불가)
   */
  async forceDelete(user: User): Promise<void> {
    await this.track('force_delete', user.id, () => this.userRepository.forceDelete(user.id));
    await this.invalidateStatistics();
    this.auditLogger.logUserAction('force_deleted', user);
  }

  /**
   * 사용자를 지정한 시간 동안 잠급니다
   *
   * 잠금 만료 시각 = 현재 + seconds, 잠금 횟수 1 증가
   *
   * @param user - 대상 사용자
   * @param seconds - 잠금 시간 (초, 기본 3600)
   */
  async lock(user: User, seconds = DEFAULT_LOCK_SECONDS): Promise<User> {
    const lockedUntil = new Date(Date.now() + seconds * 1000);
    const locked = await this.track(
      'lock',
      user.id,
      async () =>
        this.requireUser(
          await this.userRepository.update(user.id, {
            lockedAt: lockedUntil,
            lockCount: user.lockCount + 1,
            updatedBy: this.actorName(),
          }),
        ),
      { seconds, locked_until: lockedUntil.toISOString() },
    );
    await this.invalidateStatistics();
    this.auditLogger.logUserAction('locked', locked, { seconds });
    return locked;
  }

  async unlock(user: User): Promise<User> {
    const unlocked = await this.track('unlock', user.id, async () =>
      this.requireUser(
        await this.userRepository.update(user.id, {
          lockedAt: null,
          lockCount: 0,
          updatedBy: this.actorName(),
        }),
      ),
    );
    await this.invalidateStatistics();
    this.auditLogger.logUserAction('unlocked', unlocked);
    return unlocked;
  }

  async enable(user: User): Promise<User> {
    return this.setEnabled(user, true);
  }

  async disable(user: User): Promise<User> {
    return this.setEnabled(user, false);
  }

  /**
   * 잠금 만료 시각이 설정되어 있고 아직 지나지 않았으면 잠긴 상태입니다
   */
  isLocked(user: Pick<User, 'lockedAt'>, now: Date = new Date()): boolean {
    return user.lockedAt !== null && user.lockedAt.getTime() > now.getTime();
  }

  isActive(user: Pick<User, 'enable' | 'lockedAt'>, now: Date = new Date()): boolean {
    return user.enable && !this.isLocked(user, now);
  }

  /**
   * 삭제되지 않은 사용자의 집계 통계를 조회합니다
   */
  async statistics(): Promise<UserStatistics> {
    const statistics = await this.track('statistics', null, () =>
      this.userRepository.statistics(new Date()),
    );
    this.auditLogger.logUserAction('statistics_retrieved', null, { ...statistics });
    return statistics;
  }

  /**
   * 통계를 Redis 캐시(5분)에서 조회하고, 없으면 집계 후 저장합니다
   */
  async cachedStatistics(): Promise<CachedStatistics> {
    const cached = await this.cacheService.get(CACHE_KEYS.USER_STATS, isCachedStatistics);
    if (cached) {
      return { ...cached, cached: true };
    }

    const statistics = await this.statistics();
    const generatedAt = new Date().toISOString();
    await this.cacheService.set(
      CACHE_KEYS.USER_STATS,
      { statistics, generatedAt },
      CACHE_TTL.USER_STATS,
    );

    return { statistics, cached: false, generatedAt };
  }

  /**
   * 20자리 사용자 코드를 생성합니다
   *
   * 1. 현재 시각 `YYYYMMDDHHmmss`(14자리)를 기본값으로 합니다
   * 2. 시드가 있으면 숫자만 남겨 20자리로 자르고, 14자리 미만이거나 기본값으로 시작하지 않으면 버립니다
   * 3. 20자리가 될 때까지 임의의 숫자로 채웁니다
   * 4. 이미 사용 중이면 기본값 + 임의 6자리로 최대 5회 다시 만듭니다
   * 5. 그래도 사용 중이면 마지막 2자리를 바꾸고, 한 번 더 확인한 뒤 실패하면 ConflictException
   *
   * @param seed - 코드 시드 (선택)
   *
   * @example
   * ```typescript
   * // 2025-01-15 09:30:00
   * await userService.makeUserCode(); // '20250115093000' + 임의 6자리
   * ```
   */
  async makeUserCode(seed?: string): Promise<string> {
    const base = dayjs().format(CODE_TIMESTAMP_FORMAT);
    let candidate = base;

    if (seed !== undefined) {
      const digits = seed.replace(/\D/g, '').slice(0, USER_CODE_LENGTH);
      if (digits.length >= base.length && digits.startsWith(base)) {
        candidate = digits;
      }
    }

    candidate = this.padCode(candidate);

    let taken = await this.userRepository.codeExists(candidate);
    for (let attempt = 0; taken && attempt < MAX_CODE_ATTEMPTS; attempt++) {
      candidate = base + randomDigits(Math.min(6, USER_CODE_LENGTH - base.length));
      taken = await this.userRepository.codeExists(candidate);
    }

    if (!taken) {
      return candidate;
    }

    candidate =
      candidate.length < USER_CODE_LENGTH
        ? this.padCode(candidate)
        : candidate.slice(0, USER_CODE_LENGTH - 2) + randomDigits(2);

    if (await this.userRepository.codeExists(candidate)) {
      throw new ConflictException('Unable to generate a unique user code');
    }

    return candidate;
  }

  private padCode(code: string): string {
    return code.length < USER_CODE_LENGTH
      ? code + randomDigits(USER_CODE_LENGTH - code.length)
      : code;
  }

  private async setEnabled(user: User, enable: boolean): Promise<User> {
    const operation = enable ? 'enable' : 'disable';
    const updated = await this.track(operation, user.id, async () =>
      this.requireUser(
        await this.userRepository.update(user.id, { enable, updatedBy: this.actorName() }),
      ),
    );
    await this.invalidateStatistics();
    this.auditLogger.logUserAction(enable ? 'enabled' : 'disabled', updated);
    return updated;
  }

  /**
   * 이메일/전화번호가 다른 활성 사용자에게 사용 중이면 ConflictException을 던집니다
   */
  private async assertUnique(email?: string, phone?: string, exceptId?: number): Promise<void> {
    const errors: Record<string, string[]> = {};

    if (email !== undefined) {
      const owner = await this.userRepository.findByEmail(email);
      if (owner && owner.id !== exceptId) {
        errors.email = ['The email has already been taken.'];
      }
    }

    if (phone !== undefined) {
      const owner = await this.userRepository.findByPhone(phone);
      if (owner && owner.id !== exceptId) {
        errors.phone = ['The phone has already been taken.'];
      }
    }

    if (Object.keys(errors).length > 0) {
      throw new ConflictException({ message: 'User already exists', errors });
    }
  }

  private requireUser(user: User | null): User {
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  private actorName(): string | null {
    return this.requestContext.getActor()?.name ?? null;
  }

  private async invalidateStatistics(): Promise<void> {
    await this.cacheService.del(CACHE_KEYS.USER_STATS);
  }

  /**
   * 저장소 작업의 소요 시간을 측정하고 결과를 감사 로그에 기록합니다
   *
   * 실패하면 에러 플래그와 함께 기록하고 service-errors에도 남긴 뒤 다시 던집니다.
   */
  private async track<T>(
    operation: string,
    id: number | string | null,
    work: () => Promise<T>,
    metadata: Record<string, unknown> = {},
  ): Promise<T> {
    const startedAt = performance.now();

    try {
      const result = await work();
      await this.auditLogger.logDatabaseOperation(
        operation,
        'User',
        id,
        performance.now() - startedAt,
        metadata,
      );
      return result;
    } catch (error) {
      await this.auditLogger.logDatabaseOperation(
        operation,
        'User',
        id,
        performance.now() - startedAt,
        metadata,
        true,
        errorMessage(error),
      );
      await this.auditLogger.logServiceError('UserService', operation, error, {
        entity_id: id,
        ...metadata,
      });
      throw error;
    }
  }
}
