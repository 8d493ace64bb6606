import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger, isLogLevel, type LogEntry, type LogOutput } from './logger.js';

describe('Logger', () => {
  let captured: LogEntry[];
  let output: LogOutput;

  beforeEach(() => {
    captured = [];
    output = (entry: LogEntry) => {
      captured.push(entry);
    };
  });

  describe('structured output', () => {
    it('writes one JSON line to stdout by default', () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const logger = createLogger({ service: 'gateway' });

      logger.info('hello');

      expect(writeSpy).toHaveBeenCalledOnce();
      const raw = String(writeSpy.mock.calls[0]?.[0]);
      const parsed: unknown = JSON.parse(raw.trim());
      expect(parsed).toMatchObject({ level: 'info', message: 'hello', service: 'gateway' });

      writeSpy.mockRestore();
    });

    it('includes context fields', () => {
      const logger = createLogger({
        output,
        clock: () => new Date('2026-03-01T12:00:00.000Z'),
        context: { correlationId: 'corr-1', principalId: 'officer_7', role: 'loan_officer' },
      });

      logger.info('request received');

      expect(captured).toEqual([
        {
          timestamp: '2026-03-01T12:00:00.000Z',
          level: 'info',
          message: 'request received',
          service: 'lendgate',
          correlationId: 'corr-1',
          principalId: 'officer_7',
          role: 'loan_officer',
        },
      ]);
    });

    it('generates a correlation id when none is given', () => {
      const logger = createLogger({ output });
      logger.info('x');
      expect(captured[0]?.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('level filtering', () => {
    it('drops entries below the minimum level', () => {
      const logger = createLogger({ output, level: 'warn' });

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(captured.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('recognises valid level names', () => {
      expect(isLogLevel('fatal')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
    });
  });

  describe('errors', () => {
    it('serializes the error name, message and code', () => {
      const logger = createLogger({ output });
      const err = Object.assign(new Error('boom'), { code: 'LEDGER_UNAVAILABLE' });

      logger.error('append failed', err);

      expect(captured[0]?.error).toMatchObject({
        name: 'Error',
        message: 'boom',
        code: 'LEDGER_UNAVAILABLE',
      });
    });
  });

  describe('PII scrubbing', () => {
    it('scrubs metadata values before output', () => {
      const logger = createLogger({ output });

      logger.warn('lookup', { ssn: '123-45-6789', nested: { email: 'jane@example.com' } });

      expect(captured[0]?.metadata).toEqual({
        ssn: '[SSN_REDACTED]',
        nested: { email: '[EMAIL_REDACTED]' },
      });
    });

    it('scrubs the message itself', () => {
      const logger = createLogger({ output });
      logger.info('borrower 123-45-6789 denied');
      expect(captured[0]?.message).toBe('borrower [SSN_REDACTED] denied');
    });
  });

  describe('child loggers', () => {
    it('merges context and shares the output', () => {
      const parent = createLogger({ output, context: { correlationId: 'req-9' } });
      const child = parent.child({ principalId: 'u-1', operation: 'GET /api/applications' });

      child.info('scoped');

      expect(captured[0]).toMatchObject({
        correlationId: 'req-9',
        principalId: 'u-1',
        operation: 'GET /api/applications',
      });
    });

    it('inherits the minimum level', () => {
      const child = createLogger({ output, level: 'error' }).child({ role: 'ceo' });
      child.info('ignored');
      expect(captured).toHaveLength(0);
    });
  });
});
