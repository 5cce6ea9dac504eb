/**
 * Scan Code Rules
 *
 * Normalization and admission rules for scanned codes before they may become
 * hub identity ids. Pure functions, no I/O.
 *
 * A reserved test code that arrives truncated or with one misread character
 * must never be provisioned as a fresh identity, so codes that are
 * edit-distance-near a reserved code, or a fragment of one, are rejected.
 *
 * @example
 * ```typescript
 * checkScanCode('  ABC-123456 ', { reservedTestCodes: ['817994ccfe14'], minCodeLength: 6, maxEditDistance: 2 });
 * // { verdict: 'valid', normalized: 'abc-123456' }
 * ```
 *
 * @module shared/scan-code
 * @security SEC-014: INPUT_VALIDATION - All inputs validated with strict regex
 */

// ============================================================================
// Constants
// ============================================================================

/** Upper bound imposed by the hub on device ids */
export const MAX_CODE_LENGTH = 64;

/** Characters allowed in a normalized code */
const CODE_PATTERN = /^[a-z0-9._:-]+$/;

// ============================================================================
// Types
// ============================================================================

export interface ScanCodeRules {
  reservedTestCodes: readonly string[];
  minCodeLength: number;
  /** Reserved-code neighbours within this distance are rejected */
  maxEditDistance: number;
}

export type ScanCodeCheck =
  | { verdict: 'valid'; normalized: string }
  | { verdict: 'test-code'; normalized: string }
  | { verdict: 'invalid'; normalized: string; reason: string };

// ============================================================================
// Normalization
// ============================================================================

/**
 * Trim surrounding whitespace (scanners append CR/LF) and lowercase
 */
export function normalizeCode(code: string): string {
  return code.trim().toLowerCase();
}

/**
 * Levenshtein distance with an early exit once `limit` is exceeded
 *
 * @returns The distance, or `limit + 1` when it is larger than `limit`
 */
export function editDistance(a: string, b: string, limit: number = Number.MAX_SAFE_INTEGER): number {
  if (Math.abs(a.length - b.length) > limit) return limit + 1;
  if (a === b) return 0;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const value = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
      current.push(value);
      rowMin = Math.min(rowMin, value);
    }
    if (rowMin > limit) return limit + 1;
    previous = current;
  }
  return previous[b.length];
}

// ============================================================================
// Admission
// ============================================================================

/**
 * Decide whether a raw scanned code may be used as an identity id
 */
export function checkScanCode(code: string, rules: ScanCodeRules): ScanCodeCheck {
  const normalized = normalizeCode(code);
  const reserved = rules.reservedTestCodes.map(normalizeCode);

  if (reserved.includes(normalized)) {
    return { verdict: 'test-code', normalized };
  }

  if (normalized.length < rules.minCodeLength) {
    return {
      verdict: 'invalid',
      normalized,
      reason: `code shorter than ${rules.minCodeLength} characters`,
    };
  }

  if (normalized.length > MAX_CODE_LENGTH) {
    return { verdict: 'invalid', normalized, reason: `code longer than ${MAX_CODE_LENGTH} characters` };
  }

  if (!CODE_PATTERN.test(normalized)) {
    return { verdict: 'invalid', normalized, reason: 'code contains unsupported characters' };
  }

  for (const testCode of reserved) {
    if (testCode.includes(normalized)) {
      return { verdict: 'invalid', normalized, reason: 'code is a fragment of a reserved test code' };
    }
    if (editDistance(normalized, testCode, rules.maxEditDistance) <= rules.maxEditDistance) {
      return { verdict: 'invalid', normalized, reason: 'code is too close to a reserved test code' };
    }
  }

  return { verdict: 'valid', normalized };
}
