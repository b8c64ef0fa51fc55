/**
 * 쿼리 계측
 *
 * mysql2 커넥션 풀의 query/execute 호출을 감싸 실행 시간과 결과를 기록합니다.
 * 기록된 쿼리는 요청 컨텍스트에 수집되어 SQL 로깅 미들웨어가 일괄 저장합니다.
 *
 * @module core/database
 */

import { performance } from 'perf_hooks';
import { CapturedQuery } from '../context/request-context.service';
import { errorMessage, roundMs } from '../../common/utils';

/** 실행된 쿼리를 전달받는 콜백 */
export type QueryRecorder = (query: CapturedQuery) => void;

const INSTRUMENTED_METHODS = new Set<PropertyKey>(['query', 'execute']);

/**
 * query/execute 인자에서 SQL 문과 바인딩 파라미터를 추출합니다
 *
 * mysql2는 `(sql, values)` 와 `({ sql, values }, values?)` 두 형식을 모두 받습니다.
 */
export function describeStatement(args: unknown[]): { sql: string; params: unknown[] } {
  const [statement, values] = args;
  const fallbackParams: unknown[] = Array.isArray(values) ? values : [];

  if (typeof statement === 'string') {
    return { sql: statement, params: fallbackParams };
  }

  if (
    typeof statement === 'object' &&
    statement !== null &&
    'sql' in statement &&
    typeof statement.sql === 'string'
  ) {
    const params: unknown[] =
      'values' in statement && Array.isArray(statement.values) ? statement.values : fallbackParams;
    return { sql: statement.sql, params };
  }

  return { sql: 'UNKNOWN SQL', params: fallbackParams };
}

/**
 * 쿼리 실행을 계측하는 풀 프록시를 생성합니다
 *
 * 풀과 커넥션처럼 Promise를 반환하는 query/execute를 가진 객체면 모두 감쌀 수 있습니다.
 *
 * @param pool - 원본 mysql2 Promise 풀
 * @param record - 쿼리 실행 완료 시 호출되는 콜백
 * @returns query/execute가 계측되는 풀
 */
export function instrumentPool<T extends object>(pool: T, record: QueryRecorder): T {
  return new Proxy(pool, {
    get(target, property, receiver) {
      const value: unknown = Reflect.get(target, property, receiver);

      if (!INSTRUMENTED_METHODS.has(property) || typeof value !== 'function') {
        return value;
      }

      return (...args: unknown[]) => {
        const statement = describeStatement(args);
        const startedAt = performance.now();
        const pending: Promise<unknown> = Reflect.apply(value, target, args);

        return pending.then(
          (result) => {
            record({
              ...statement,
              durationMs: roundMs(performance.now() - startedAt),
              isError: false,
            });
            return result;
          },
          (error: unknown) => {
            record({
              ...statement,
              durationMs: roundMs(performance.now() - startedAt),
              isError: true,
              message: errorMessage(error),
            });
            throw error;
          },
        );
      };
    },
  });
}
