/**
 * Identity Resolver Service
 *
 * Maps a scanned code to its hub identity and owns every credential lookup.
 *
 * Resolution order:
 * 1. Admission rules (normalize, reserved test codes, length/charset)
 * 2. In-memory cache warmed from the identities table
 * 3. Hub provisioning (fetch-or-create), single-flight per normalized code
 *
 * Provisioning failures are reported as `provisioning-unavailable` and never
 * produce an identity row; the caller queues the event and resolution is
 * retried when the event is delivered.
 *
 * @module services/identity-resolver
 */

import type { IdentitiesDAL } from '../dal/identities.dal';
import type { IdentityProvisioner } from './provisioning.service';
import { checkScanCode, type ScanCodeRules } from '../shared/scan-code';
import type { DeviceIdentity } from '../shared/types/scan.types';
import { RelayEvents, type RelayEventBus } from '../utils/event-bus';
import { InvalidCodeError, ProvisioningUnavailableError, getErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

// ============================================================================
// Types
// ============================================================================

export type IdentityResolution =
  | {
      kind: 'resolved';
      identity: DeviceIdentity;
      /** true when this call provisioned or first persisted the identity */
      firstSeen: boolean;
    }
  | { kind: 'test-code-ignored'; code: string }
  | { kind: 'invalid-code'; code: string; reason: string }
  | { kind: 'provisioning-unavailable'; identityId: string; error: string };

export interface ResolveOptions {
  /** Answer from cache only; a miss is reported as provisioning-unavailable */
  offline?: boolean;
}

export interface IdentityResolverOptions {
  identities: IdentitiesDAL;
  provisioner: IdentityProvisioner;
  eventBus: RelayEventBus;
  rules: ScanCodeRules;
  provisioningTimeoutMs: number;
}

const log = createLogger('identity-resolver');

// ============================================================================
// Identity Resolver Service
// ============================================================================

export class IdentityResolverService {
  private readonly identities: IdentitiesDAL;
  private readonly provisioner: IdentityProvisioner;
  private readonly eventBus: RelayEventBus;
  private readonly rules: ScanCodeRules;
  private readonly provisioningTimeoutMs: number;

  /** normalized code -> identity; written only on provision or status change */
  private readonly cache = new Map<string, DeviceIdentity>();
  /** normalized code -> in-flight provisioning */
  private readonly inFlight = new Map<string, Promise<IdentityResolution>>();

  constructor(options: IdentityResolverOptions) {
    this.identities = options.identities;
    this.provisioner = options.provisioner;
    this.eventBus = options.eventBus;
    this.rules = options.rules;
    this.provisioningTimeoutMs = options.provisioningTimeoutMs;
    this.warmCache();
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  async resolve(code: string, options: ResolveOptions = {}): Promise<IdentityResolution> {
    const check = checkScanCode(code, this.rules);

    if (check.verdict === 'test-code') {
      log.info('Reserved test code ignored', { code: check.normalized });
      return { kind: 'test-code-ignored', code: check.normalized };
    }
    if (check.verdict === 'invalid') {
      log.warn('Scan code rejected', { code: check.normalized, reason: check.reason });
      return { kind: 'invalid-code', code: check.normalized, reason: check.reason };
    }

    const identityId = check.normalized;
    const cached = this.cache.get(identityId);

    if (cached?.status === 'active') {
      this.refreshLastSeen(identityId);
      return { kind: 'resolved', identity: cached, firstSeen: false };
    }
    if (cached?.status === 'deactivated') {
      return { kind: 'invalid-code', code: identityId, reason: 'identity deactivated' };
    }

    if (options.offline) {
      return { kind: 'provisioning-unavailable', identityId, error: 'offline' };
    }

    const pending = this.inFlight.get(identityId);
    if (pending) {
      return pending;
    }

    const provisioning = this.provision(identityId).finally(() => {
      this.inFlight.delete(identityId);
    });
    this.inFlight.set(identityId, provisioning);
    return provisioning;
  }

  /**
   * Credential lookup for the hub path. Served from cache when possible.
   *
   * @throws ProvisioningUnavailableError when the identity cannot be resolved now
   * @throws InvalidCodeError when the identity can never be resolved
   */
  async getCredential(identityId: string): Promise<string> {
    const resolution = await this.resolve(identityId);
    switch (resolution.kind) {
      case 'resolved':
        return resolution.identity.credential;
      case 'provisioning-unavailable':
        throw new ProvisioningUnavailableError(identityId, resolution.error);
      case 'invalid-code':
        throw new InvalidCodeError(identityId, resolution.reason);
      case 'test-code-ignored':
        throw new InvalidCodeError(identityId, 'reserved test code');
    }
  }

  /**
   * Deactivate an identity. The row is kept; later scans are rejected.
   */
  deactivate(identityId: string): boolean {
    const changed = this.identities.setStatus(identityId, 'deactivated');
    const cached = this.cache.get(identityId);
    if (cached) {
      this.cache.set(identityId, { ...cached, status: 'deactivated' });
    }
    return changed;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private warmCache(): void {
    for (const identity of this.identities.findAll()) {
      this.cache.set(identity.identityId, identity);
    }
    log.info('Identity cache warmed', { identities: this.cache.size });
  }

  private async provision(identityId: string): Promise<IdentityResolution> {
    try {
      const provisioned = await withTimeout(
        this.provisioner.provisionOrFetchIdentity(identityId),
        this.provisioningTimeoutMs,
        `Provisioning ${identityId}`
      );

      const now = new Date().toISOString();
      const identity = this.identities.upsert({
        identityId,
        credential: provisioned.credential,
        provisionedAt: now,
        lastSeenAt: now,
        status: provisioned.enabled ? 'active' : 'deactivated',
      });
      this.cache.set(identityId, identity);

      if (identity.status === 'deactivated') {
        log.warn('Hub reports identity disabled', { identityId });
        return { kind: 'invalid-code', code: identityId, reason: 'identity disabled on hub' };
      }

      log.info('Identity provisioned', { identityId, created: provisioned.created });
      this.eventBus.publish(RelayEvents.IDENTITY_PROVISIONED, { identityId, created: provisioned.created });
      return { kind: 'resolved', identity, firstSeen: true };
    } catch (error) {
      if (error instanceof InvalidCodeError) {
        log.warn('Hub rejected identity', { identityId, error: error.message });
        return { kind: 'invalid-code', code: identityId, reason: error.message };
      }

      log.warn('Provisioning unavailable', { identityId, error: getErrorMessage(error) });
      return { kind: 'provisioning-unavailable', identityId, error: getErrorMessage(error) };
    }
  }

  /**
   * Deferred so a cache hit returns without touching the database
   */
  private refreshLastSeen(identityId: string): void {
    setImmediate(() => {
      try {
        this.identities.touchLastSeen(identityId);
      } catch (error) {
        log.warn('Failed to refresh lastSeenAt', { identityId, error: getErrorMessage(error) });
      }
    });
  }
}
