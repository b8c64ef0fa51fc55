/**
 * Query Instrumentation Integration Tests
 *
 * Tests statement extraction from mysql2 call shapes and the pool proxy
 * that times query/execute calls.
 */

import { CapturedQuery } from '../../src/core/context/request-context.service';
import { describeStatement, instrumentPool } from '../../src/core/database/query-instrumentation';

class FakePool {
  readonly name = 'fake-pool';
  failWith: Error | null = null;

  async query(sql: string, values?: unknown[]): Promise<[unknown[], undefined]> {
    if (this.failWith) {
      throw this.failWith;
    }
    return [[{ sql, values }], undefined];
  }

  async execute(options: { sql: string; values?: unknown[] }): Promise<[unknown[], undefined]> {
    return [[{ id: 1, sql: options.sql }], undefined];
  }

  end(): string {
    return `${this.name} closed`;
  }
}

describe('Query instrumentation', () => {
  describe('describeStatement', () => {
    it('should read a plain SQL string with values', () => {
      expect(describeStatement(['SELECT * FROM users WHERE id = ?', [1]])).toEqual({
        sql: 'SELECT * FROM users WHERE id = ?',
        params: [1],
      });
    });

    it('should prefer values embedded in an options object', () => {
      expect(describeStatement([{ sql: 'SELECT ?', values: ['a'] }, ['b']])).toEqual({
        sql: 'SELECT ?',
        params: ['a'],
      });
      expect(describeStatement([{ sql: 'SELECT ?' }, ['b']])).toEqual({ sql: 'SELECT ?', params: ['b'] });
    });

    it('should describe unrecognized shapes', () => {
      expect(describeStatement([42])).toEqual({ sql: 'UNKNOWN SQL', params: [] });
    });
  });

  describe('instrumentPool', () => {
    let pool: FakePool;
    let recorded: CapturedQuery[];

    beforeEach(() => {
      pool = new FakePool();
      recorded = [];
    });

    it('should record successful queries and pass the result through', async () => {
      const instrumented = instrumentPool(pool, (query) => recorded.push(query));

      const [rows] = await instrumented.query('SELECT * FROM users WHERE id = ?', [1]);

      expect(rows).toEqual([{ sql: 'SELECT * FROM users WHERE id = ?', values: [1] }]);
      expect(recorded).toHaveLength(1);
      expect(recorded[0]).toMatchObject({
        sql: 'SELECT * FROM users WHERE id = ?',
        params: [1],
        isError: false,
      });
      expect(recorded[0].durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should record execute calls given as options objects', async () => {
      const instrumented = instrumentPool(pool, (query) => recorded.push(query));

      await instrumented.execute({ sql: 'UPDATE users SET enable = ? WHERE id = ?', values: [0, 3] });

      expect(recorded[0]).toMatchObject({ sql: 'UPDATE users SET enable = ? WHERE id = ?', params: [0, 3] });
    });

    it('should record failures and rethrow them', async () => {
      pool.failWith = new Error("Table 'users' doesn't exist");
      const instrumented = instrumentPool(pool, (query) => recorded.push(query));

      await expect(instrumented.query('SELECT 1')).rejects.toThrow("Table 'users' doesn't exist");
      expect(recorded[0]).toMatchObject({
        sql: 'SELECT 1',
        params: [],
        isError: true,
        message: "Table 'users' doesn't exist",
      });
    });

    it('should leave other members untouched', () => {
      const instrumented = instrumentPool(pool, (query) => recorded.push(query));

      expect(instrumented.name).toBe('fake-pool');
      expect(instrumented.end()).toBe('fake-pool closed');
      expect(recorded).toHaveLength(0);
    });
  });
});
