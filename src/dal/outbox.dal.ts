/**
 * Outbox Data Access Layer
 *
 * Durable queue of scan events awaiting delivery. Entries are written before
 * any network attempt and removed only on delivery or abandonment.
 *
 * Leases live in memory: a leased entry is skipped by `dequeueBatch` until the
 * worker releases it through `markDelivered`, `markFailed` or `release`.
 * After a restart there are no leases and every entry is pending again.
 *
 * Per-identity order: an entry is never handed out while an older entry of
 * the same identity is waiting out its backoff or leased to an earlier
 * batch. Within one batch an identity's entries come out oldest first.
 *
 * @module dal/outbox
 * @security SEC-006: All queries use prepared statements
 */

import { BaseDAL } from './base.dal';
import type { DatabaseInstance } from '../services/database.service';
import {
  ScanEventSchema,
  type DeliveryPath,
  type OutboxEntry,
  type ScanEvent,
} from '../shared/types/scan.types';
import { RelayEvents, type DeliveryAbandonedEvent, type RelayEventBus } from '../utils/event-bus';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface OutboxRow {
  id: number;
  identity_id: string;
  event_json: string;
  retry_count: number;
  last_attempt_at: string | null;
  next_attempt_at: string | null;
  hub_delivered_at: string | null;
  api_delivered_at: string | null;
  last_error: string | null;
  created_at: string;
}

export interface OutboxDALOptions {
  /** Entries are abandoned once retry_count exceeds this */
  maxRetries: number;
  /** Receives DeliveryAbandoned */
  eventBus: RelayEventBus;
}

export interface DequeueOptions {
  /** Reference time for backoff gates (default: now) */
  now?: Date;
  /** Hand out entries even if their backoff has not elapsed */
  ignoreBackoff?: boolean;
}

export interface FailureDetails {
  /** When the entry becomes eligible again */
  nextAttemptAt: string | null;
  error: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Column per delivery path (allowlist, never interpolated from input) */
const PATH_COLUMNS: Record<DeliveryPath, 'hub_delivered_at' | 'api_delivered_at'> = {
  hub: 'hub_delivered_at',
  api: 'api_delivered_at',
};

const MAX_ERROR_LENGTH = 500;

const log = createLogger('outbox-dal');

// ============================================================================
// Outbox DAL
// ============================================================================

export class OutboxDAL extends BaseDAL<OutboxRow> {
  protected readonly tableName = 'outbox';
  protected readonly primaryKey = 'id';

  private readonly maxRetries: number;
  private readonly eventBus: RelayEventBus;
  /** entry id -> identity id */
  private readonly leases = new Map<number, string>();

  constructor(db: DatabaseInstance, options: OutboxDALOptions) {
    super(db);
    this.maxRetries = options.maxRetries;
    this.eventBus = options.eventBus;
  }

  // ==========================================================================
  // Write Operations
  // ==========================================================================

  /**
   * Persist an event for delivery. Never touches the network.
   *
   * @returns The new entry id (monotonic)
   */
  enqueue(event: ScanEvent): number {
    const validated = ScanEventSchema.parse(event);
    const result = this.db
      .prepare(
        `INSERT INTO outbox (identity_id, event_json, retry_count, created_at)
         VALUES (?, ?, 0, ?)`
      )
      .run(validated.ownerIdentityId, JSON.stringify(validated), this.now());

    const id = Number(result.lastInsertRowid);
    log.debug('Event enqueued', {
      id,
      identityId: validated.ownerIdentityId,
      kind: validated.kind,
    });
    return id;
  }

  /**
   * Delete a delivered entry. Deleting a missing id is a no-op.
   *
   * @returns true if a row was removed
   */
  markDelivered(entryId: number): boolean {
    this.leases.delete(entryId);
    const deleted = this.deleteById(entryId);
    log.debug('Entry delivered', { id: entryId, deleted });
    return deleted;
  }

  /**
   * Record success on one delivery path without clearing the entry
   */
  markPathDelivered(entryId: number, path: DeliveryPath): void {
    const column = PATH_COLUMNS[path];
    this.db.prepare(`UPDATE outbox SET ${column} = ? WHERE id = ? AND ${column} IS NULL`).run(this.now(), entryId);
  }

  /**
   * Count a failed attempt. When the new count exceeds maxRetries the entry is
   * deleted and exactly one DeliveryAbandoned is published.
   *
   * @returns The new retry count, or 0 if the entry no longer exists
   */
  markFailed(entryId: number, details: FailureDetails): number {
    const error = details.error.substring(0, MAX_ERROR_LENGTH);
    const attemptedAt = this.now();

    const outcome = this.db.transaction((): { retryCount: number; abandoned: DeliveryAbandonedEvent | null } => {
      const row = this.findRowById(entryId);
      if (!row) {
        return { retryCount: 0, abandoned: null };
      }

      const retryCount = row.retry_count + 1;
      if (retryCount > this.maxRetries) {
        this.deleteById(entryId);
        return {
          retryCount,
          abandoned: {
            entryId,
            identityId: row.identity_id,
            retryCount,
            eventJson: row.event_json,
            lastError: error,
            abandonedAt: attemptedAt,
          },
        };
      }

      this.db
        .prepare(
          `UPDATE outbox
           SET retry_count = ?, last_attempt_at = ?, next_attempt_at = ?, last_error = ?
           WHERE id = ?`
        )
        .run(retryCount, attemptedAt, details.nextAttemptAt, error, entryId);
      return { retryCount, abandoned: null };
    })();

    this.leases.delete(entryId);

    if (outcome.abandoned) {
      this.abandon(outcome.abandoned);
    } else if (outcome.retryCount > 0) {
      log.debug('Entry failed, will retry', {
        id: entryId,
        retryCount: outcome.retryCount,
        nextAttemptAt: details.nextAttemptAt,
      });
    }

    return outcome.retryCount;
  }

  /**
   * Drop a lease without touching the entry
   */
  release(entryId: number): void {
    this.leases.delete(entryId);
  }

  // ==========================================================================
  // Read Operations
  // ==========================================================================

  /**
   * Lease up to `max` pending entries, oldest first
   */
  dequeueBatch(max: number, options: DequeueOptions = {}): OutboxEntry[] {
    if (max <= 0) {
      return [];
    }

    const now = (options.now ?? new Date()).toISOString();
    const rows = this.db
      .prepare<{ now: string; ignoreBackoff: number; limit: number }, OutboxRow>(
        `SELECT o.* FROM outbox o
         WHERE (@ignoreBackoff = 1 OR o.next_attempt_at IS NULL OR o.next_attempt_at <= @now)
           AND (@ignoreBackoff = 1 OR NOT EXISTS (
             SELECT 1 FROM outbox p
             WHERE p.identity_id = o.identity_id
               AND p.id < o.id
               AND p.next_attempt_at IS NOT NULL
               AND p.next_attempt_at > @now
           ))
         ORDER BY o.id ASC
         LIMIT @limit`
      )
      .all({ now, ignoreBackoff: options.ignoreBackoff ? 1 : 0, limit: max + this.leases.size });

    // Entries of one identity may share a batch; an older lease held by an
    // earlier batch still blocks them
    const heldLeases = new Map(this.leases);
    const batch: OutboxEntry[] = [];
    for (const row of rows) {
      if (batch.length >= max) break;
      if (heldLeases.has(row.id) || hasOlderLease(heldLeases, row)) continue;

      const entry = this.toEntry(row);
      if (!entry) continue;

      this.leases.set(row.id, row.identity_id);
      batch.push(entry);
    }

    if (batch.length > 0) {
      log.debug('Batch leased', { size: batch.length, leased: this.leases.size });
    }
    return batch;
  }

  findById(entryId: number): OutboxEntry | null | undefined {
    const row = this.findRowById(entryId);
    return row ? this.toEntry(row) : undefined;
  }

  getLeasedCount(): number {
    return this.leases.size;
  }

  isLeased(entryId: number): boolean {
    return this.leases.has(entryId);
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * Map a row to an entry. A payload that no longer parses can never be
   * delivered, so it is abandoned on the spot.
   */
  private toEntry(row: OutboxRow): OutboxEntry | null {
    let raw: unknown;
    try {
      raw = JSON.parse(row.event_json);
    } catch {
      raw = null;
    }

    const parsed = ScanEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.deleteById(row.id);
      this.abandon({
        entryId: row.id,
        identityId: row.identity_id,
        retryCount: row.retry_count,
        eventJson: row.event_json,
        lastError: 'Stored event payload is not a valid scan event',
        abandonedAt: this.now(),
      });
      return null;
    }

    return {
      id: row.id,
      identityId: row.identity_id,
      event: parsed.data,
      retryCount: row.retry_count,
      lastAttemptAt: row.last_attempt_at,
      nextAttemptAt: row.next_attempt_at,
      hubDeliveredAt: row.hub_delivered_at,
      apiDeliveredAt: row.api_delivered_at,
      lastError: row.last_error,
      createdAt: row.created_at,
    };
  }

  private abandon(event: DeliveryAbandonedEvent): void {
    this.leases.delete(event.entryId);
    log.error('Delivery abandoned', { ...event });
    this.eventBus.publish(RelayEvents.DELIVERY_ABANDONED, event);
  }
}

function hasOlderLease(leases: ReadonlyMap<number, string>, row: OutboxRow): boolean {
  for (const [leasedId, identityId] of leases) {
    if (identityId === row.identity_id && leasedId < row.id) {
      return true;
    }
  }
  return false;
}
