/**
 * Delivery Worker Service
 *
 * Drains the outbox through the configured delivery sinks.
 *
 * Per entry: Pending -> Attempting -> Delivered | Pending(retryCount+1) | Abandoned
 *
 * - Cycles run on a fixed interval and on demand (`requestDrain`). Requests
 *   that arrive while a cycle is queued share that cycle.
 * - Each sink not yet successful for an entry is attempted under a deadline.
 *   The entry is cleared once every required sink has succeeded; a failing
 *   optional sink is logged and does not hold the entry.
 * - After a failure, later entries of the same identity in the batch are
 *   released untouched so per-identity order holds.
 * - While the device is offline (or its reachability is still unknown) a
 *   cycle leases nothing and spends no retries. The connectivity monitor
 *   requests the recovery drain once reachability returns.
 *
 * @module services/delivery-worker
 * @security ERR-007: Bounded retries with jittered backoff
 */

import type { OutboxDAL } from '../dal/outbox.dal';
import type { DeliverySink } from './delivery-sinks';
import type { RetryStrategyService } from './retry-strategy.service';
import type { DeliveryPath, OutboxEntry } from '../shared/types/scan.types';
import { RelayEvents, type RelayEventBus } from '../utils/event-bus';
import { getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

// ============================================================================
// Types
// ============================================================================

export interface DeliveryWorkerOptions {
  outbox: OutboxDAL;
  sinks: DeliverySink[];
  /** Paths that must succeed before an entry is removed */
  requiredSinks: DeliveryPath[];
  retryStrategy: RetryStrategyService;
  eventBus: RelayEventBus;
  /** Current reachability; cycles are skipped while false */
  isOnline: () => boolean;
  drainIntervalMs: number;
  deliveryTimeoutMs: number;
}

export interface DrainOptions {
  /** Attempt entries still waiting out their backoff */
  ignoreBackoff?: boolean;
}

export interface DrainCycleResult {
  attempted: number;
  delivered: number;
  failed: number;
  abandoned: number;
  /** Released without an attempt to keep per-identity order */
  deferred: number;
  durationMs: number;
  /** Set when the cycle did not run */
  skipped?: 'offline';
  error?: string;
}

export type EntryOutcome = 'delivered' | 'failed' | 'abandoned';

export interface DeliveryWorkerStatus {
  isStarted: boolean;
  isRunning: boolean;
  lastDrainAt: string | null;
  lastDrainResult: DrainCycleResult | null;
  pendingCount: number;
  currentBatchSize: number;
  totals: { delivered: number; failed: number; abandoned: number };
  recentErrors: Array<{ entryId: number; error: string; timestamp: string }>;
}

interface QueuedDrain {
  ignoreBackoff: boolean;
  promise: Promise<DrainCycleResult>;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_RECENT_ERRORS = 5;

const log = createLogger('delivery-worker');

// ============================================================================
// Delivery Worker Service
// ============================================================================

export class DeliveryWorkerService {
  private readonly outbox: OutboxDAL;
  private readonly sinks: DeliverySink[];
  private readonly requiredSinks: Set<DeliveryPath>;
  private readonly retryStrategy: RetryStrategyService;
  private readonly eventBus: RelayEventBus;
  private readonly isOnline: () => boolean;
  private readonly drainIntervalMs: number;
  private readonly deliveryTimeoutMs: number;

  private intervalId: NodeJS.Timeout | null = null;
  private isRunning = false;
  /** Serializes cycles */
  private tail: Promise<unknown> = Promise.resolve();
  private queued: QueuedDrain | null = null;

  private lastDrainAt: Date | null = null;
  private lastDrainResult: DrainCycleResult | null = null;
  private totals = { delivered: 0, failed: 0, abandoned: 0 };
  private recentErrors: Array<{ entryId: number; error: string; timestamp: string }> = [];

  constructor(options: DeliveryWorkerOptions) {
    this.outbox = options.outbox;
    this.sinks = options.sinks;
    this.requiredSinks = new Set(options.requiredSinks);
    this.retryStrategy = options.retryStrategy;
    this.eventBus = options.eventBus;
    this.isOnline = options.isOnline;
    this.drainIntervalMs = options.drainIntervalMs;
    this.deliveryTimeoutMs = options.deliveryTimeoutMs;

    const configured = new Set(this.sinks.map((sink) => sink.path));
    for (const path of this.requiredSinks) {
      if (!configured.has(path)) {
        throw new Error(`Required delivery sink "${path}" is not configured`);
      }
    }

    this.eventBus.subscribe(RelayEvents.DELIVERY_ABANDONED, () => {
      this.totals.abandoned++;
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Drain immediately, then every `drainIntervalMs`
   */
  start(): void {
    if (this.intervalId) {
      log.warn('Delivery worker already running');
      return;
    }

    log.info('Starting delivery worker', {
      drainIntervalSec: this.drainIntervalMs / 1000,
      sinks: this.sinks.map((sink) => sink.path),
      requiredSinks: Array.from(this.requiredSinks),
    });

    this.requestDrain().catch((err: unknown) => {
      log.error('Initial drain failed', { error: getErrorMessage(err) });
    });

    this.intervalId = setInterval(() => {
      this.requestDrain().catch((err: unknown) => {
        log.error('Scheduled drain failed', { error: getErrorMessage(err) });
      });
    }, this.drainIntervalMs);
    this.intervalId.unref();
  }

  /**
   * Stop the interval and wait for any queued cycle to finish
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      log.info('Delivery worker stopped');
    }
    await this.tail;
  }

  /**
   * Ask for a drain. Requests made before the queued cycle starts are
   * coalesced into it; `ignoreBackoff` from any of them carries over.
   */
  requestDrain(options: DrainOptions = {}): Promise<DrainCycleResult> {
    if (this.queued) {
      if (options.ignoreBackoff) {
        this.queued.ignoreBackoff = true;
      }
      return this.queued.promise;
    }

    const queued: QueuedDrain = {
      ignoreBackoff: options.ignoreBackoff ?? false,
      promise: Promise.resolve(emptyResult()),
    };
    queued.promise = this.tail.then(() => {
      if (this.queued === queued) {
        this.queued = null;
      }
      return this.runCycle(queued.ignoreBackoff);
    });

    this.queued = queued;
    this.tail = queued.promise;
    return queued.promise;
  }

  getStatus(): DeliveryWorkerStatus {
    return {
      isStarted: this.intervalId !== null,
      isRunning: this.isRunning,
      lastDrainAt: this.lastDrainAt?.toISOString() ?? null,
      lastDrainResult: this.lastDrainResult,
      pendingCount: this.outbox.count(),
      currentBatchSize: this.retryStrategy.getCurrentBatchSize(),
      totals: { ...this.totals },
      recentErrors: [...this.recentErrors],
    };
  }

  // ==========================================================================
  // Drain Cycle
  // ==========================================================================

  /**
   * One pass over a leased batch. Never rejects.
   */
  private async runCycle(ignoreBackoff: boolean): Promise<DrainCycleResult> {
    const result = emptyResult();
    if (!this.isOnline()) {
      log.debug('Drain skipped while offline', { pendingCount: this.outbox.count() });
      result.skipped = 'offline';
      return result;
    }

    const startTime = Date.now();
    this.isRunning = true;

    let entries: OutboxEntry[] = [];
    try {
      entries = this.outbox.dequeueBatch(this.retryStrategy.getCurrentBatchSize(), { ignoreBackoff });
      const blockedIdentities = new Set<string>();

      for (const entry of entries) {
        if (blockedIdentities.has(entry.identityId)) {
          this.outbox.release(entry.id);
          result.deferred++;
          continue;
        }

        result.attempted++;
        const outcome = await this.deliverEntry(entry);
        if (outcome === 'delivered') {
          result.delivered++;
        } else {
          blockedIdentities.add(entry.identityId);
          if (outcome === 'failed') {
            result.failed++;
          } else {
            result.abandoned++;
          }
        }
      }
    } catch (error) {
      result.error = getErrorMessage(error);
      log.error('Drain cycle failed', { error: result.error });
    } finally {
      for (const entry of entries) {
        if (this.outbox.isLeased(entry.id)) {
          this.outbox.release(entry.id);
        }
      }
      this.isRunning = false;
    }

    if (result.attempted > 0) {
      const unsuccessful = result.failed + result.abandoned;
      if (unsuccessful === 0) {
        this.retryStrategy.recordBatchSuccess();
      } else {
        this.retryStrategy.recordBatchFailure(unsuccessful / result.attempted);
      }
    }

    result.durationMs = Date.now() - startTime;
    this.totals.delivered += result.delivered;
    this.totals.failed += result.failed;
    this.lastDrainAt = new Date();
    this.lastDrainResult = result;

    if (result.attempted > 0 || result.error) {
      log.info(`Drain completed: ${result.delivered}/${result.attempted} delivered`, { ...result });
    }

    this.eventBus.publish(RelayEvents.DELIVERY_CYCLE_COMPLETED, {
      attempted: result.attempted,
      delivered: result.delivered,
      failed: result.failed,
      abandoned: result.abandoned,
      durationMs: result.durationMs,
    });

    return result;
  }

  /**
   * Attempt every outstanding sink for one entry, then settle it
   */
  private async deliverEntry(entry: OutboxEntry): Promise<EntryOutcome> {
    const succeeded = new Set<DeliveryPath>();
    if (entry.hubDeliveredAt) succeeded.add('hub');
    if (entry.apiDeliveredAt) succeeded.add('api');

    const errors: string[] = [];

    for (const sink of this.sinks) {
      if (succeeded.has(sink.path)) continue;

      try {
        await withTimeout(sink.deliver(entry), this.deliveryTimeoutMs, `${sink.path} delivery of entry ${entry.id}`);
        succeeded.add(sink.path);
        this.outbox.markPathDelivered(entry.id, sink.path);
      } catch (error) {
        errors.push(`${sink.path}: ${getErrorMessage(error)}`);
        log.warn('Sink delivery failed', {
          entryId: entry.id,
          identityId: entry.identityId,
          sink: sink.path,
          required: this.requiredSinks.has(sink.path),
          error: getErrorMessage(error),
        });
      }
    }

    const requiredMet = Array.from(this.requiredSinks).every((path) => succeeded.has(path));
    if (requiredMet) {
      if (errors.length > 0) {
        log.warn('Entry cleared with optional sink failures', { entryId: entry.id, errors });
      }
      this.outbox.markDelivered(entry.id);
      return 'delivered';
    }

    const error = errors.join('; ');
    this.addRecentError(entry.id, error);

    const retryCount = this.outbox.markFailed(entry.id, {
      nextAttemptAt: this.retryStrategy.calculateNextAttemptAt(entry.retryCount + 1),
      error,
    });

    return retryCount > 0 && this.outbox.exists(entry.id) ? 'failed' : 'abandoned';
  }

  private addRecentError(entryId: number, error: string): void {
    this.recentErrors.unshift({ entryId, error, timestamp: new Date().toISOString() });
    if (this.recentErrors.length > MAX_RECENT_ERRORS) {
      this.recentErrors = this.recentErrors.slice(0, MAX_RECENT_ERRORS);
    }
  }
}

function emptyResult(): DrainCycleResult {
  return { attempted: 0, delivered: 0, failed: 0, abandoned: 0, deferred: 0, durationMs: 0 };
}
