/**
 * Logger Unit Tests
 *
 * @module tests/unit/utils/logger.spec
 * @security LM-001: Secrets never reach a log line
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createLogger, logger, parseLogLevel } from '../../../src/utils/logger';

describe('logger', () => {
  describe('redactString', () => {
    it('should redact the key in a hub connection string', () => {
      expect(logger.redactString('HostName=hub.example.test;DeviceId=item-1;SharedAccessKey=dGVzdC1zZWNyZXQ=')).toBe(
        'HostName=hub.example.test;DeviceId=item-1;SharedAccessKey=[REDACTED]'
      );
    });

    it('should redact a SAS token', () => {
      expect(logger.redactString('auth SharedAccessSignature sr=hub%2Fdevices%2Fa&sig=abc&se=1 failed')).toBe(
        'auth SharedAccessSignature [REDACTED] failed'
      );
    });

    it('should redact bearer tokens', () => {
      expect(logger.redactString('header Bearer test-secret.part')).toBe('header Bearer [REDACTED]');
    });

    it('should leave ordinary text alone', () => {
      expect(logger.redactString('Drain completed: 3/3 delivered')).toBe('Drain completed: 3/3 delivered');
    });
  });

  describe('redactObject', () => {
    it('should redact sensitive keys at any depth', () => {
      expect(
        logger.redactObject({
          identityId: 'item-1',
          credential: 'HostName=h;DeviceId=d;SharedAccessKey=x',
          nested: { apiKey: 'test-secret', retries: 2 },
        })
      ).toEqual({
        identityId: 'item-1',
        credential: '[REDACTED]',
        nested: { apiKey: '[REDACTED]', retries: 2 },
      });
    });

    it('should redact secrets inside error messages', () => {
      const redacted = logger.redactObject(new Error('bad SharedAccessKey=abc'));

      expect(redacted).toMatchObject({ name: 'Error', message: 'bad SharedAccessKey=[REDACTED]' });
    });

    it('should serialize dates', () => {
      expect(logger.redactObject({ at: new Date('2026-01-01T00:00:00.000Z') })).toEqual({
        at: '2026-01-01T00:00:00.000Z',
      });
    });
  });

  describe('output', () => {
    let stdoutSpy: MockInstance<typeof process.stdout.write>;
    let stderrSpy: MockInstance<typeof process.stderr.write>;

    const lines = (spy: MockInstance<typeof process.stdout.write>): unknown[] => spy.mock.calls.map(([chunk]) => JSON.parse(String(chunk)));

    beforeEach(() => {
      stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      logger.setLevel('debug');
    });

    afterEach(() => {
      stdoutSpy.mockRestore();
      stderrSpy.mockRestore();
      logger.setLevel('info');
    });

    it('should write one JSON line per entry with redacted context', () => {
      createLogger('delivery-worker').info('Sink delivery failed', {
        entryId: 7,
        credential: 'HostName=h;DeviceId=d;SharedAccessKey=x',
      });

      expect(lines(stdoutSpy)).toEqual([
        expect.objectContaining({
          level: 'info',
          message: 'Sink delivery failed',
          service: 'delivery-worker',
          context: { entryId: 7, credential: '[REDACTED]' },
        }),
      ]);
    });

    it('should send warnings and errors to stderr', () => {
      createLogger('hub-client').warn('Hub link lost');

      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(lines(stderrSpy)).toEqual([expect.objectContaining({ level: 'warn', message: 'Hub link lost' })]);
    });

    it('should drop entries below the minimum level', () => {
      logger.setLevel('warn');

      createLogger('scan-ingestion').info('Scan accepted');
      createLogger('scan-ingestion').debug('Scan detail');

      expect(stdoutSpy).not.toHaveBeenCalled();
    });
  });

  describe('parseLogLevel', () => {
    it('should accept known levels in any case', () => {
      expect(parseLogLevel('DEBUG')).toBe('debug');
      expect(parseLogLevel('warn')).toBe('warn');
    });

    it('should reject unknown or missing values', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });
});
