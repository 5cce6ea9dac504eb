/**
 * Circuit Breaker Service
 *
 * Fails fast on the backend API path while it is unhealthy so a dead
 * secondary sink does not add a full request timeout to every outbox entry.
 *
 * States:
 * - CLOSED: Normal operation, requests flow through
 * - OPEN: Circuit is tripped, requests fail immediately
 * - HALF_OPEN: Testing recovery, limited requests allowed through
 *
 * @module services/circuit-breaker
 * @security ERR-008: Circuit breaker for external service calls
 */

import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Number of failures before circuit opens (default: 5) */
  failureThreshold: number;
  /** Time in milliseconds before attempting recovery (default: 30000) */
  resetTimeoutMs: number;
  /** Time window in milliseconds to count failures (default: 60000) */
  failureWindowMs: number;
  /** Successes needed to close from HALF_OPEN (default: 2) */
  successThreshold: number;
  /** HTTP status codes considered failures; errors without a status always count */
  failureStatusCodes: Set<number>;
}

export interface CircuitBreakerMetrics {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  openedAt: number | null;
  lastStateChangeAt: number;
  totalRequests: number;
  rejectedRequests: number;
  lastFailureAt: number | null;
  lastFailureReason: string | null;
}

interface FailureRecord {
  timestamp: number;
  statusCode?: number;
  reason: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
  failureWindowMs: 60_000,
  successThreshold: 2,
  failureStatusCodes: new Set([408, 429, 500, 502, 503, 504]),
};

/** Maximum recorded failures to prevent memory issues */
const MAX_RECORDED_FAILURES = 100;

const log = createLogger('circuit-breaker');

// ============================================================================
// Circuit Breaker Service
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const breaker = new CircuitBreakerService('backend-api');
 * const response = await breaker.execute(() => client.post('/scan', body));
 * ```
 */
export class CircuitBreakerService {
  private readonly name: string;
  private readonly config: CircuitBreakerConfig;

  private state: CircuitState = 'CLOSED';
  private failureRecords: FailureRecord[] = [];
  private successCountInHalfOpen = 0;
  private openedAt: number | null = null;
  private lastStateChangeAt: number = Date.now();
  private totalRequests = 0;
  private rejectedRequests = 0;
  private lastFailureAt: number | null = null;
  private lastFailureReason: string | null = null;

  constructor(name: string, config?: Partial<CircuitBreakerConfig>) {
    this.name = name;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Run `operation` through the breaker
   *
   * @throws CircuitOpenError when the circuit rejects the call
   * @throws whatever `operation` throws, after recording the failure
   */
  async execute<T>(operation: () => Promise<T>, getHttpStatus?: (error: unknown) => number | undefined): Promise<T> {
    this.totalRequests++;

    if (this.state === 'OPEN') {
      if (this.shouldAttemptReset()) {
        this.transitionTo('HALF_OPEN');
      } else {
        this.rejectedRequests++;
        throw new CircuitOpenError(`Circuit breaker [${this.name}] is OPEN. Request rejected.`, this.getMetrics());
      }
    }

    try {
      const result = await operation();
      this.recordSuccess();
      return result;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.recordFailure(reason, getHttpStatus?.(error));
      throw error;
    }
  }

  /**
   * Record a failure. Statuses outside `failureStatusCodes` (a 400, say) say
   * nothing about the service's health and are ignored.
   */
  recordFailure(reason: string, httpStatus?: number): void {
    if (httpStatus !== undefined && !this.config.failureStatusCodes.has(httpStatus)) {
      return;
    }

    const now = Date.now();
    this.failureRecords.push({ timestamp: now, statusCode: httpStatus, reason });
    this.lastFailureAt = now;
    this.lastFailureReason = reason;

    if (this.failureRecords.length > MAX_RECORDED_FAILURES) {
      this.failureRecords = this.failureRecords.slice(-MAX_RECORDED_FAILURES);
    }
    this.pruneOldFailures();

    if (this.state === 'CLOSED') {
      const recentFailures = this.failureRecords.length;
      if (recentFailures >= this.config.failureThreshold) {
        this.transitionTo('OPEN');
        log.warn('Circuit breaker opened due to failure threshold', {
          name: this.name,
          failures: recentFailures,
          threshold: this.config.failureThreshold,
        });
      }
    } else if (this.state === 'HALF_OPEN') {
      this.transitionTo('OPEN');
      log.warn('Circuit breaker reopened from HALF_OPEN state', { name: this.name, reason, httpStatus });
    }
  }

  recordSuccess(): void {
    if (this.state !== 'HALF_OPEN') {
      return;
    }
    this.successCountInHalfOpen++;
    if (this.successCountInHalfOpen >= this.config.successThreshold) {
      this.transitionTo('CLOSED');
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    this.pruneOldFailures();
    return {
      state: this.state,
      failureCount: this.failureRecords.length,
      successCount: this.successCountInHalfOpen,
      openedAt: this.openedAt,
      lastStateChangeAt: this.lastStateChangeAt,
      totalRequests: this.totalRequests,
      rejectedRequests: this.rejectedRequests,
      lastFailureAt: this.lastFailureAt,
      lastFailureReason: this.lastFailureReason,
    };
  }

  /**
   * Manually reset to CLOSED
   */
  reset(): void {
    this.transitionTo('CLOSED');
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private transitionTo(newState: CircuitState): void {
    const previousState = this.state;
    this.state = newState;
    this.lastStateChangeAt = Date.now();

    if (newState === 'OPEN') {
      this.openedAt = Date.now();
      this.successCountInHalfOpen = 0;
    } else if (newState === 'HALF_OPEN') {
      this.successCountInHalfOpen = 0;
    } else {
      this.openedAt = null;
      this.successCountInHalfOpen = 0;
      this.failureRecords = [];
    }

    if (previousState !== newState) {
      log.info('Circuit breaker state changed', { name: this.name, from: previousState, to: newState });
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.openedAt === null) return false;
    return Date.now() - this.openedAt >= this.config.resetTimeoutMs;
  }

  private pruneOldFailures(): void {
    const cutoff = Date.now() - this.config.failureWindowMs;
    this.failureRecords = this.failureRecords.filter((f) => f.timestamp >= cutoff);
  }
}

// ============================================================================
// Custom Error Types
// ============================================================================

/**
 * Error thrown when circuit breaker rejects a request
 */
export class CircuitOpenError extends Error {
  public readonly metrics: CircuitBreakerMetrics;

  constructor(message: string, metrics: CircuitBreakerMetrics) {
    super(message);
    this.name = 'CircuitOpenError';
    this.metrics = metrics;
    Object.setPrototypeOf(this, CircuitOpenError.prototype);
  }
}
