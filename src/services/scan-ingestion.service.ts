/**
 * Scan Ingestion Service
 *
 * Entry point for decoded scan codes. Every accepted scan is written to the
 * outbox before any delivery is attempted; the caller learns whether it will
 * go out now or waits for connectivity.
 *
 * @module services/scan-ingestion
 */

import type { OutboxDAL } from '../dal/outbox.dal';
import type { DeliveryWorkerService } from './delivery-worker.service';
import type { IdentityResolverService } from './identity-resolver.service';
import { normalizeCode } from '../shared/scan-code';
import type { IngestResult, ScanEvent, ScanEventKind } from '../shared/types/scan.types';
import { getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ScanIngestionOptions {
  resolver: Pick<IdentityResolverService, 'resolve'>;
  outbox: Pick<OutboxDAL, 'enqueue'>;
  worker: Pick<DeliveryWorkerService, 'requestDrain'>;
  /** Current reachability; unknown counts as offline */
  isOnline: () => boolean;
  sourceDeviceTag: string;
  /** 0 disables duplicate suppression */
  duplicateCooldownSeconds: number;
  clock?: () => Date;
}

export interface IngestOptions {
  quantityDelta?: number;
  sourceDeviceTag?: string;
}

const log = createLogger('scan-ingestion');

// ============================================================================
// Scan Ingestion Service
// ============================================================================

export class ScanIngestionService {
  private readonly resolver: Pick<IdentityResolverService, 'resolve'>;
  private readonly outbox: Pick<OutboxDAL, 'enqueue'>;
  private readonly worker: Pick<DeliveryWorkerService, 'requestDrain'>;
  private readonly isOnline: () => boolean;
  private readonly sourceDeviceTag: string;
  private readonly cooldownMs: number;
  private readonly clock: () => Date;

  /** normalized code -> epoch ms of last accepted scan */
  private readonly lastAccepted = new Map<string, number>();

  constructor(options: ScanIngestionOptions) {
    this.resolver = options.resolver;
    this.outbox = options.outbox;
    this.worker = options.worker;
    this.isOnline = options.isOnline;
    this.sourceDeviceTag = options.sourceDeviceTag;
    this.cooldownMs = options.duplicateCooldownSeconds * 1000;
    this.clock = options.clock ?? (() => new Date());
  }

  async ingest(code: string, options: IngestOptions = {}): Promise<IngestResult> {
    const observedAt = this.clock();
    const normalized = normalizeCode(code);

    if (this.isWithinCooldown(normalized, observedAt)) {
      log.info('Duplicate scan suppressed', { code: normalized });
      return { status: 'rejected', reason: 'duplicate-scan', detail: `scanned again within ${this.cooldownMs / 1000}s` };
    }

    const online = this.isOnline();
    const resolution = await this.resolver.resolve(code, { offline: !online });

    let identityId: string;
    let kind: ScanEventKind;
    let resolved: boolean;

    switch (resolution.kind) {
      case 'test-code-ignored':
        return { status: 'rejected', reason: 'test-code', detail: resolution.code };
      case 'invalid-code':
        return { status: 'rejected', reason: 'invalid-code', detail: resolution.reason };
      case 'resolved':
        identityId = resolution.identity.identityId;
        kind = resolution.firstSeen ? 'identity-registration' : 'quantity-update';
        resolved = true;
        break;
      case 'provisioning-unavailable':
        // Queued under the unresolved identity; the hub path provisions it on delivery
        identityId = resolution.identityId;
        kind = 'identity-registration';
        resolved = false;
        break;
    }

    const event: ScanEvent = {
      code: normalized,
      ownerIdentityId: identityId,
      observedAt: observedAt.toISOString(),
      quantityDelta: options.quantityDelta ?? 1,
      kind,
      sourceDeviceTag: options.sourceDeviceTag ?? this.sourceDeviceTag,
    };

    let entryId: number;
    try {
      entryId = this.outbox.enqueue(event);
    } catch (error) {
      log.error('Failed to persist scan event', { identityId, error: getErrorMessage(error) });
      return { status: 'rejected', reason: 'storage-unavailable', detail: getErrorMessage(error) };
    }

    this.rememberAccepted(normalized, observedAt);

    if (online && resolved) {
      this.worker.requestDrain().catch((err: unknown) => {
        log.error('Drain after ingest failed', { error: getErrorMessage(err) });
      });
      log.info('Scan accepted', { entryId, identityId, kind });
      return { status: 'accepted', entryId, identityId, kind };
    }

    log.info('Scan queued for later delivery', { entryId, identityId, kind, online });
    return { status: 'accepted-queued-offline', entryId, identityId, kind };
  }

  private isWithinCooldown(normalized: string, at: Date): boolean {
    if (this.cooldownMs <= 0) {
      return false;
    }
    this.pruneExpired(at.getTime());
    const previous = this.lastAccepted.get(normalized);
    return previous !== undefined && at.getTime() - previous < this.cooldownMs;
  }

  private rememberAccepted(normalized: string, at: Date): void {
    if (this.cooldownMs <= 0) {
      return;
    }
    // Re-insert so the map stays ordered oldest first
    this.lastAccepted.delete(normalized);
    this.lastAccepted.set(normalized, at.getTime());
  }

  private pruneExpired(nowMs: number): void {
    for (const [code, acceptedAt] of this.lastAccepted) {
      if (nowMs - acceptedAt < this.cooldownMs) {
        break;
      }
      this.lastAccepted.delete(code);
    }
  }
}
