/**
 * 요청 컨텍스트 서비스
 *
 * AsyncLocalStorage로 요청 하나의 수명 동안 유지되는 컨텍스트를 제공합니다.
 * Correlation ID, 요청 ID, 클라이언트 IP/User-Agent, 인증된 요청 주체,
 * 처리 핸들러 이름, 요청 중 실행된 SQL 목록을 보관합니다.
 *
 * @example
 * ```typescript
 * // 미들웨어
 * this.requestContext.run(store, () => next());
 *
 * // 서비스
 * const correlationId = this.requestContext.getCorrelationId();
 * ```
 *
 * @module core/context
 */

import { AsyncLocalStorage } from 'async_hooks';
import { Injectable } from '@nestjs/common';

/**
 * 요청 주체 (JWT로 식별된 사용자)
 */
export interface RequestActor {
  /** 사용자 ID */
  id: number;
  /** 표시 이름 (감사 로그 executed_by) */
  name: string;
}

/**
 * 요청 중 실행된 SQL 한 건
 */
export interface CapturedQuery {
  sql: string;
  params: unknown[];
  durationMs: number;
  isError: boolean;
  message?: string;
}

/**
 * 요청 컨텍스트 저장소
 */
export interface RequestContextStore {
  correlationId: string;
  requestId?: string;
  ip?: string;
  userAgent?: string;
  actor?: RequestActor;
  /** `Controller@handler` 형식의 처리 핸들러 이름 */
  module?: string;
  /** SQL 수집 활성화 여부 */
  captureQueries: boolean;
  queries: CapturedQuery[];
}

@Injectable()
export class RequestContextService {
  private readonly storage = new AsyncLocalStorage<RequestContextStore>();

  /**
   * 주어진 저장소를 컨텍스트로 하여 콜백을 실행합니다
   */
  run<T>(store: RequestContextStore, callback: () => T): T {
    return this.storage.run(store, callback);
  }

  /**
   * 저장소가 있으면 그 컨텍스트에서, 없으면 그대로 콜백을 실행합니다
   *
   * 응답 finish 이벤트처럼 요청 컨텍스트가 전파되지 않는 콜백에서 사용합니다.
   */
  runWithin<T>(store: RequestContextStore | undefined, callback: () => T): T {
    return store ? this.storage.run(store, callback) : callback();
  }

  /**
   * 컨텍스트 밖에서 콜백을 실행합니다
   *
   * 감사 로그 저장 쿼리가 요청 SQL 목록에 다시 수집되지 않도록 할 때 사용합니다.
   */
  runUntracked<T>(callback: () => T): T {
    return this.storage.exit(callback);
  }

  get(): RequestContextStore | undefined {
    return this.storage.getStore();
  }

  getCorrelationId(): string | undefined {
    return this.storage.getStore()?.correlationId;
  }

  getActor(): RequestActor | undefined {
    return this.storage.getStore()?.actor;
  }

  setActor(actor: RequestActor): void {
    const store = this.storage.getStore();
    if (store) {
      store.actor = actor;
    }
  }

  setModule(module: string): void {
    const store = this.storage.getStore();
    if (store) {
      store.module = module;
    }
  }

  enableQueryCapture(): void {
    const store = this.storage.getStore();
    if (store) {
      store.captureQueries = true;
    }
  }

  /**
   * 실행된 SQL을 현재 요청의 수집 목록에 추가합니다
   *
   * 컨텍스트가 없거나 수집이 비활성화된 경우 무시됩니다.
   */
  recordQuery(query: CapturedQuery): void {
    const store = this.storage.getStore();
    if (store?.captureQueries) {
      store.queries.push(query);
    }
  }
}
