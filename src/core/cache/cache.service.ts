/**
 * 캐시 서비스
 *
 * Redis 기반의 캐시 서비스를 제공합니다.
 * ioredis를 사용하여 Direct 모드와 Cluster 모드를 모두 지원하며,
 * Redis가 비활성화되었거나 연결할 수 없으면 모든 연산이 캐시 미스처럼 동작합니다.
 *
 * @example
 * ```typescript
 * constructor(private readonly cacheService: CacheService) {}
 *
 * async getStatistics(): Promise<UserStatistics> {
 *   const cached = await this.cacheService.get(CACHE_KEYS.USER_STATS, isUserStatistics);
 *   if (cached) return cached;
 *   const statistics = await this.repository.statistics(new Date());
 *   await this.cacheService.set(CACHE_KEYS.USER_STATS, statistics, CACHE_TTL.USER_STATS);
 *   return statistics;
 * }
 * ```
 */

import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { Cluster } from 'ioredis';
import { LoggerService } from '../logger/logger.service';
import { RedisNode } from '../../common/config/redis.config';
import { errorMessage } from '../../common/utils';

/**
 * 캐시 통계 인터페이스
 */
export interface CacheStats {
  /** 캐시 적중 횟수 */
  hits: number;
  /** 캐시 미스 횟수 */
  misses: number;
  /** Redis 연결 상태 */
  connected: boolean;
}

/** 캐시 값 타입 검사 함수 */
export type CacheGuard<T> = (value: unknown) => value is T;

@Injectable()
export class CacheService implements OnModuleInit, OnModuleDestroy {
  /** Redis 클라이언트 인스턴스 (Direct 또는 Cluster) */
  private client: Redis | Cluster | null = null;

  private stats: CacheStats = { hits: 0, misses: 0, connected: false };

  private readonly mode: 'direct' | 'cluster';
  private readonly enabled: boolean;

  constructor(
    private readonly configService: ConfigService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext('CacheService');
    this.mode = this.configService.get<'direct' | 'cluster'>('redis.mode', 'direct');
    this.enabled = this.configService.get<boolean>('redis.enabled', true);
  }

  /**
   * 모듈 초기화 시 Redis 연결을 수립합니다
   *
   * Direct 모드: 단일 Redis 인스턴스에 연결합니다.
   * Cluster 모드: REDIS_CLUSTER_NODES에 정의된 노드들에 연결합니다.
   */
  async onModuleInit(): Promise<void> {
    if (!this.enabled) {
      this.logger.info('Redis cache is disabled by configuration');
      return;
    }

    const password = this.configService.get<string>('redis.password');

    try {
      if (this.mode === 'cluster') {
        const nodes = this.configService.get<RedisNode[]>('redis.clusterNodes', []);

        if (nodes.length === 0) {
          this.logger.warn('No cluster nodes configured, falling back to disabled state');
          return;
        }

        this.client = new Cluster(nodes, { redisOptions: { password } });
        this.logger.info('Redis cluster connection established', { nodeCount: nodes.length });
      } else {
        const host = this.configService.get<string>('redis.host', 'localhost');
        const port = this.configService.get<number>('redis.port', 6379);

        this.client = new Redis({ host, port, password, lazyConnect: true });
        await this.client.connect();
        this.logger.info('Redis direct connection established', { host, port });
      }

      this.stats.connected = true;
    } catch (error) {
      this.stats.connected = false;
      this.logger.error('Failed to connect to Redis', {
        mode: this.mode,
        error: errorMessage(error),
      });
    }
  }

  /**
   * 모듈 소멸 시 Redis 연결을 정리합니다
   */
  async onModuleDestroy(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.quit();
      this.stats.connected = false;
      this.logger.info('Redis connection closed gracefully');
    } catch (error) {
      this.logger.error('Error while closing Redis connection', { error: errorMessage(error) });
    }
  }

  /**
   * 캐시에서 값을 조회합니다
   *
   * 저장된 JSON 문자열을 파싱한 뒤 guard를 통과한 값만 반환합니다.
   * 키가 없거나, 형태가 맞지 않거나, 오류가 발생하면 null을 반환합니다.
   *
   * @param key - 캐시 키
   * @param guard - 값의 형태를 검사하는 타입 가드
   */
  async get<T>(key: string, guard: CacheGuard<T>): Promise<T | null> {
    if (!this.client || !this.stats.connected) {
      this.stats.misses++;
      return null;
    }

    try {
      const raw = await this.client.get(key);
      const value: unknown = raw === null ? null : JSON.parse(raw);

      if (!guard(value)) {
        this.stats.misses++;
        return null;
      }

      this.stats.hits++;
      return value;
    } catch (error) {
      this.stats.misses++;
      this.logger.error('Cache get operation failed', { key, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * 캐시에 값을 저장합니다
   *
   * @param key - 캐시 키
   * @param value - 저장할 값 (JSON 직렬화)
   * @param ttlSeconds - TTL (초 단위, 선택적)
   * @returns 저장 성공 여부
   */
  async set(key: string, value: unknown, ttlSeconds?: number): Promise<boolean> {
    if (!this.client || !this.stats.connected) {
      return false;
    }

    try {
      const serialized = JSON.stringify(value);

      if (ttlSeconds !== undefined && ttlSeconds > 0) {
        await this.client.set(key, serialized, 'EX', ttlSeconds);
      } else {
        await this.client.set(key, serialized);
      }

      return true;
    } catch (error) {
      this.logger.error('Cache set operation failed', { key, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * 캐시에서 하나 이상의 키를 삭제합니다
   *
   * @returns 실제로 삭제된 키의 개수
   */
  async del(...keys: string[]): Promise<number> {
    if (!this.client || !this.stats.connected || keys.length === 0) {
      return 0;
    }

    try {
      return await this.client.del(...keys);
    } catch (error) {
      this.logger.error('Cache del operation failed', { keys, error: errorMessage(error) });
      return 0;
    }
  }

  /**
   * 카운터를 1 증가시키고, 처음 생성된 키이면 만료 시간을 설정합니다
   *
   * Rate Limiting 카운터에 사용됩니다.
   *
   * @param key - 카운터 키
   * @param ttlSeconds - 윈도우 길이 (초)
   * @returns 증가 후 값과 남은 TTL. Redis를 사용할 수 없으면 null
   */
  async increment(key: string, ttlSeconds: number): Promise<{ count: number; ttl: number } | null> {
    if (!this.client || !this.stats.connected) {
      return null;
    }

    try {
      const count = await this.client.incr(key);
      if (count === 1) {
        await this.client.expire(key, ttlSeconds);
      }
      const ttl = await this.client.ttl(key);
      return { count, ttl: ttl > 0 ? ttl : ttlSeconds };
    } catch (error) {
      this.logger.error('Cache increment operation failed', { key, error: errorMessage(error) });
      return null;
    }
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  isConnected(): boolean {
    return this.stats.connected;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Redis 서버의 헬스 상태를 확인합니다
   *
   * PING 명령을 통해 응답 가능 여부를 검증합니다.
   */
  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.stats.connected) {
      return false;
    }

    try {
      return (await this.client.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}
