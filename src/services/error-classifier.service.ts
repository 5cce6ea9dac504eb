/**
 * Error Classification Service
 *
 * Splits outbound HTTP failures into transient (retry later) and permanent
 * (the request itself is wrong) so that provisioning can tell "hub down"
 * apart from "hub rejected this identity name".
 *
 * @module services/error-classifier
 * @compliance ERR-007: Error retry logic with proper categorization
 */

import axios from 'axios';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type ErrorCategory = 'TRANSIENT' | 'PERMANENT';

export interface ErrorClassificationResult {
  category: ErrorCategory;
  /** HTTP status when the server responded */
  httpStatus?: number;
  reason: string;
}

// ============================================================================
// HTTP Status Code Classification
// ============================================================================

/**
 * Status codes worth retrying. Every other 4xx is the caller's fault.
 */
const TRANSIENT_HTTP_CODES = new Set([
  408, // Request Timeout
  425, // Too Early
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/**
 * Message patterns for failures that never reached a server
 */
const TRANSIENT_ERROR_PATTERNS = [
  /ECONNREFUSED/i,
  /ECONNRESET/i,
  /ETIMEDOUT/i,
  /ECONNABORTED/i,
  /ENOTFOUND/i,
  /EAI_AGAIN/i,
  /network error/i,
  /socket hang up/i,
  /timeout/i,
  /circuit breaker/i,
];

const log = createLogger('error-classifier');

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify by HTTP status and message
 */
export function classifyHttpFailure(httpStatus: number | undefined, message: string): ErrorClassificationResult {
  if (httpStatus !== undefined) {
    if (TRANSIENT_HTTP_CODES.has(httpStatus) || httpStatus >= 500) {
      return { category: 'TRANSIENT', httpStatus, reason: `HTTP ${httpStatus}` };
    }
    if (httpStatus >= 400) {
      return { category: 'PERMANENT', httpStatus, reason: `HTTP ${httpStatus}` };
    }
  }

  if (TRANSIENT_ERROR_PATTERNS.some((pattern) => pattern.test(message))) {
    return { category: 'TRANSIENT', httpStatus, reason: 'Network failure' };
  }

  // No response and no recognisable pattern: assume the link, not the request
  log.debug('Unrecognised failure treated as transient', { httpStatus, message });
  return { category: 'TRANSIENT', httpStatus, reason: 'Unclassified failure' };
}

/**
 * Classify anything thrown by an axios call
 */
export function classifyError(error: unknown): ErrorClassificationResult {
  if (axios.isAxiosError(error)) {
    return classifyHttpFailure(error.response?.status, `${error.code ?? ''} ${error.message}`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return classifyHttpFailure(undefined, message);
}
