/**
 * Common Utilities Integration Tests
 *
 * Tests the helpers shared by logging and the user domain:
 * - Caller attribution from the stack
 * - Error descriptions for logs and debug payloads
 * - Duration rounding, boolean parsing and correlation id generation
 */

import {
  describeError,
  parseBoolean,
  randomDigits,
  resolveCallerModule,
  roundMs,
} from '../../src/common/utils';
import { generateCorrelationId } from '../../src/core/context/correlation-id';

class AuditFacade {
  write(): string {
    return resolveCallerModule(['AuditFacade']);
  }
}

class ReportingJob {
  constructor(private readonly facade: AuditFacade) {}

  run(): string {
    return this.facade.write();
  }

  direct(): string {
    return resolveCallerModule();
  }
}

class QuotaExceededError extends Error {}

describe('Common utilities', () => {
  describe('resolveCallerModule', () => {
    it('should report the class that made the call', () => {
      expect(new ReportingJob(new AuditFacade()).direct()).toBe('ReportingJob');
    });

    it('should skip the listed logging classes', () => {
      expect(new ReportingJob(new AuditFacade()).run()).toBe('ReportingJob');
    });
  });

  describe('describeError', () => {
    it('should describe an Error with its class and source location', () => {
      const description = describeError(new QuotaExceededError('Quota exceeded'));

      expect(description.exception).toBe('QuotaExceededError');
      expect(description.message).toBe('Quota exceeded');
      expect(description.file).toMatch(/common-utils\.integration\.spec\.ts$/);
      expect(typeof description.line).toBe('number');
    });

    it('should describe thrown non-Error values by type', () => {
      expect(describeError('boom')).toEqual({ exception: 'string', message: 'boom' });
      expect(describeError(42)).toEqual({ exception: 'number', message: '42' });
    });
  });

  describe('roundMs', () => {
    it('should round to two decimals', () => {
      expect(roundMs(12.5)).toBe(12.5);
      expect(roundMs(1.006)).toBe(1.01);
    });

    it('should clamp negative and non-finite durations to zero', () => {
      expect(roundMs(-3)).toBe(0);
      expect(roundMs(Number.NaN)).toBe(0);
    });
  });

  describe('parseBoolean', () => {
    it('should parse true/1 and fall back to the default', () => {
      expect(parseBoolean('TRUE')).toBe(true);
      expect(parseBoolean('1')).toBe(true);
      expect(parseBoolean('no', true)).toBe(false);
      expect(parseBoolean(undefined, true)).toBe(true);
      expect(parseBoolean('', true)).toBe(true);
    });
  });

  describe('randomDigits', () => {
    it('should return exactly the requested number of digits', () => {
      expect(randomDigits(6)).toMatch(/^\d{6}$/);
      expect(randomDigits(0)).toBe('');
    });
  });

  describe('generateCorrelationId', () => {
    it('should generate a UUID v7 by default', () => {
      expect(generateCorrelationId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it('should fall back to a process-local id when generation fails', () => {
      const id = generateCorrelationId(() => {
        throw new Error('entropy unavailable');
      });

      expect(id).toMatch(new RegExp(`^local-${process.pid}-\\d+$`));
    });
  });
});
