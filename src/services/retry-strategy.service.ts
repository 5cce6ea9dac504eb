/**
 * Retry Strategy Service
 *
 * Jittered exponential backoff shared by the Delivery Worker (per outbox
 * entry) and the Hub Client (per identity reconnect), plus dynamic batch
 * sizing for drain cycles.
 *
 * @module services/retry-strategy
 * @security ERR-007: Error retry logic with bounded attempts
 */

import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface RetryConfig {
  /** Delay after the first failure in milliseconds (default: 2000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 300000 = 5min) */
  maxDelayMs: number;
  /** Jitter factor (0-1, default: 0.3 = ±30% jitter) */
  jitterFactor: number;
  /** Exponential multiplier (default: 2) */
  multiplier: number;
}

export interface BatchSizeConfig {
  /** Default (and maximum) batch size (default: 20) */
  defaultBatchSize: number;
  /** Minimum batch size (default: 5) */
  minBatchSize: number;
  /** Reduction factor on failure (default: 0.5 = halve) */
  reductionFactor: number;
  /** Recovery factor on success (default: 1.5) */
  recoveryFactor: number;
  /** Consecutive clean cycles needed for recovery (default: 3) */
  recoveryThreshold: number;
}

export interface BatchSizeAdjustment {
  batchSize: number;
  wasAdjusted: boolean;
  direction: 'reduced' | 'increased' | 'unchanged';
  reason: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 2000,
  maxDelayMs: 300_000,
  jitterFactor: 0.3,
  multiplier: 2,
};

const DEFAULT_BATCH_SIZE_CONFIG: BatchSizeConfig = {
  defaultBatchSize: 20,
  minBatchSize: 5,
  reductionFactor: 0.5,
  recoveryFactor: 1.5,
  recoveryThreshold: 3,
};

const log = createLogger('retry-strategy');

// ============================================================================
// Retry Strategy Service
// ============================================================================

export class RetryStrategyService {
  private readonly retryConfig: RetryConfig;
  private readonly batchConfig: BatchSizeConfig;
  private readonly random: () => number;
  private currentBatchSize: number;
  private consecutiveSuccesses = 0;
  private consecutiveFailures = 0;

  constructor(
    retryConfig?: Partial<RetryConfig>,
    batchConfig?: Partial<BatchSizeConfig>,
    random: () => number = Math.random
  ) {
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
    const merged = { ...DEFAULT_BATCH_SIZE_CONFIG, ...batchConfig };
    this.batchConfig = { ...merged, minBatchSize: Math.min(merged.minBatchSize, merged.defaultBatchSize) };
    this.currentBatchSize = this.batchConfig.defaultBatchSize;
    this.random = random;

    log.debug('RetryStrategy initialized', {
      retryConfig: this.retryConfig,
      batchConfig: this.batchConfig,
    });
  }

  // ==========================================================================
  // Backoff Calculation
  // ==========================================================================

  /**
   * Jittered exponential backoff after `failureCount` consecutive failures
   *
   * Formula: min(base * multiplier^(failureCount-1), max) * (1 ± jitter)
   *
   * With defaults (base=2s, cap=5min, jitter=0.3):
   * - 1 failure: 1.4-2.6s
   * - 2 failures: 2.8-5.2s
   * - 8+ failures: 210-390s
   *
   * @param failureCount - Number of failures so far (1-based; 0 means no delay)
   * @returns Delay in milliseconds
   */
  calculateBackoffDelay(failureCount: number): number {
    if (failureCount <= 0) {
      return 0;
    }

    const exponentialDelay =
      this.retryConfig.baseDelayMs * Math.pow(this.retryConfig.multiplier, failureCount - 1);
    const cappedDelay = Math.min(exponentialDelay, this.retryConfig.maxDelayMs);

    const jitterRange = this.retryConfig.jitterFactor;
    const jitterMultiplier = 1 - jitterRange + this.random() * 2 * jitterRange;

    return Math.round(cappedDelay * jitterMultiplier);
  }

  /**
   * ISO timestamp at which an entry with `failureCount` failures may be retried
   */
  calculateNextAttemptAt(failureCount: number, now: Date = new Date()): string {
    return new Date(now.getTime() + this.calculateBackoffDelay(failureCount)).toISOString();
  }

  // ==========================================================================
  // Dynamic Batch Sizing
  // ==========================================================================

  getCurrentBatchSize(): number {
    return this.currentBatchSize;
  }

  /**
   * Record a drain cycle with no failures. Grows the batch back toward the
   * default after `recoveryThreshold` clean cycles.
   */
  recordBatchSuccess(): BatchSizeAdjustment {
    this.consecutiveSuccesses++;
    this.consecutiveFailures = 0;

    if (
      this.consecutiveSuccesses >= this.batchConfig.recoveryThreshold &&
      this.currentBatchSize < this.batchConfig.defaultBatchSize
    ) {
      const oldSize = this.currentBatchSize;
      this.currentBatchSize = Math.min(
        Math.ceil(this.currentBatchSize * this.batchConfig.recoveryFactor),
        this.batchConfig.defaultBatchSize
      );
      this.consecutiveSuccesses = 0;

      log.info('Batch size increased after recovery', { oldSize, newSize: this.currentBatchSize });
      return {
        batchSize: this.currentBatchSize,
        wasAdjusted: true,
        direction: 'increased',
        reason: `Recovery after ${this.batchConfig.recoveryThreshold} consecutive successes`,
      };
    }

    return {
      batchSize: this.currentBatchSize,
      wasAdjusted: false,
      direction: 'unchanged',
      reason: 'Success recorded, no adjustment needed',
    };
  }

  /**
   * Record a drain cycle with failures
   *
   * @param failureRatio - Ratio of failed entries in the cycle (0-1)
   */
  recordBatchFailure(failureRatio: number = 1): BatchSizeAdjustment {
    this.consecutiveFailures++;
    this.consecutiveSuccesses = 0;

    // A few stragglers in an otherwise healthy cycle do not shrink the batch
    if (failureRatio < 0.5 && this.consecutiveFailures < 2) {
      return {
        batchSize: this.currentBatchSize,
        wasAdjusted: false,
        direction: 'unchanged',
        reason: `Failure ratio ${(failureRatio * 100).toFixed(0)}% below threshold`,
      };
    }

    const newSize = Math.max(
      Math.floor(this.currentBatchSize * this.batchConfig.reductionFactor),
      this.batchConfig.minBatchSize
    );

    if (newSize < this.currentBatchSize) {
      const oldSize = this.currentBatchSize;
      this.currentBatchSize = newSize;

      log.warn('Batch size reduced due to failures', {
        oldSize,
        newSize,
        failureRatio: (failureRatio * 100).toFixed(0) + '%',
        consecutiveFailures: this.consecutiveFailures,
      });

      return {
        batchSize: newSize,
        wasAdjusted: true,
        direction: 'reduced',
        reason: `Reduced due to ${(failureRatio * 100).toFixed(0)}% failure rate`,
      };
    }

    return {
      batchSize: this.currentBatchSize,
      wasAdjusted: false,
      direction: 'unchanged',
      reason: 'Already at minimum batch size',
    };
  }
}
