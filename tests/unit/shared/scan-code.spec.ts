/**
 * Scan Code Admission Unit Tests
 *
 * @module tests/unit/shared/scan-code.spec
 */

import { describe, it, expect } from 'vitest';
import { checkScanCode, editDistance, normalizeCode, MAX_CODE_LENGTH } from '../../../src/shared/scan-code';

const RULES = {
  reservedTestCodes: ['817994ccfe14'],
  minCodeLength: 6,
  maxEditDistance: 2,
};

describe('scan-code', () => {
  describe('normalizeCode()', () => {
    it('should trim scanner line endings and lowercase', () => {
      expect(normalizeCode('  ABC-123456\r\n')).toBe('abc-123456');
    });
  });

  describe('editDistance()', () => {
    it('should compute the Levenshtein distance', () => {
      expect(editDistance('kitten', 'sitting')).toBe(3);
      expect(editDistance('same', 'same')).toBe(0);
      expect(editDistance('', 'abc')).toBe(3);
    });

    it('should stop early once the limit is exceeded', () => {
      expect(editDistance('kitten', 'sitting', 1)).toBe(2);
      expect(editDistance('a', 'abcdef', 2)).toBe(3);
    });
  });

  describe('checkScanCode()', () => {
    it('should accept an ordinary barcode', () => {
      expect(checkScanCode('4006381333931', RULES)).toEqual({ verdict: 'valid', normalized: '4006381333931' });
    });

    it('should normalize before deciding', () => {
      expect(checkScanCode(' ABC-123456\n', RULES)).toEqual({ verdict: 'valid', normalized: 'abc-123456' });
    });

    it('should flag the reserved test code regardless of case', () => {
      expect(checkScanCode('817994CCFE14', RULES)).toEqual({ verdict: 'test-code', normalized: '817994ccfe14' });
    });

    it('should reject codes below the minimum length', () => {
      expect(checkScanCode('abc', RULES)).toEqual({
        verdict: 'invalid',
        normalized: 'abc',
        reason: 'code shorter than 6 characters',
      });
    });

    it('should reject codes above the maximum length', () => {
      const result = checkScanCode('9'.repeat(MAX_CODE_LENGTH + 1), RULES);
      expect(result.verdict).toBe('invalid');
      expect(result).toHaveProperty('reason', `code longer than ${MAX_CODE_LENGTH} characters`);
    });

    it('should reject characters outside the allowed set', () => {
      expect(checkScanCode('item 42x', RULES)).toEqual({
        verdict: 'invalid',
        normalized: 'item 42x',
        reason: 'code contains unsupported characters',
      });
    });

    it('should reject a fragment of a reserved code', () => {
      expect(checkScanCode('817994cc', RULES)).toEqual({
        verdict: 'invalid',
        normalized: '817994cc',
        reason: 'code is a fragment of a reserved test code',
      });
    });

    it('should reject a near miss of a reserved code', () => {
      expect(checkScanCode('817994ccfe15', RULES)).toEqual({
        verdict: 'invalid',
        normalized: '817994ccfe15',
        reason: 'code is too close to a reserved test code',
      });
    });

    it('should accept a near miss when the distance rule is disabled', () => {
      expect(checkScanCode('817994ccfe15', { ...RULES, maxEditDistance: 0 }).verdict).toBe('valid');
    });
  });
});
