/**
 * In-process stand-ins for the relay's network edges
 *
 * @module tests/helpers/fakes
 */

import { EventEmitter } from 'events';
import { vi } from 'vitest';
import type { HubConnection } from '../../src/services/mqtt-transport';
import type { IdentityProvisioner, ProvisionedIdentity } from '../../src/services/provisioning.service';
import type { RelayConfig } from '../../src/shared/types/config.types';
import { HubScanPayloadSchema, type HubScanPayload } from '../../src/shared/types/scan.types';
import { DEFAULT_CONFIG } from '../../src/shared/types/config.types';
import type { HubCredential } from '../../src/utils/hub-credentials';
import { TransientNetworkError } from '../../src/utils/errors';

// ============================================================================
// Config
// ============================================================================

export function createTestConfig(overrides: Partial<RelayConfig> = {}): RelayConfig {
  return {
    ...DEFAULT_CONFIG,
    hubProvisioningEndpoint: 'https://registry.example.test',
    apiBaseUrl: 'https://api.example.test',
    databasePath: ':memory:',
    ...overrides,
  };
}

export function connectionStringFor(identityId: string): string {
  return `HostName=hub.example.test;DeviceId=${identityId};SharedAccessKey=dGVzdC1zZWNyZXQ=`;
}

// ============================================================================
// Hub
// ============================================================================

export interface PublishedMessage {
  deviceId: string;
  topic: string;
  payload: string;
}

/**
 * A hub link that acknowledges publishes while the shared hub is reachable
 */
export class FakeHubConnection extends EventEmitter implements HubConnection {
  ended = false;

  constructor(
    readonly credential: HubCredential,
    private readonly hub: FakeHub
  ) {
    super();
  }

  async publish(topic: string, payload: string): Promise<void> {
    if (this.ended) {
      throw new TransientNetworkError('connection closed');
    }
    if (!this.hub.reachable) {
      throw new TransientNetworkError('hub unreachable');
    }
    if (this.hub.holdAcks) {
      return new Promise<void>(() => undefined);
    }
    this.hub.published.push({ deviceId: this.credential.deviceId, topic, payload });
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  onDisconnect(listener: (reason: string) => void): void {
    this.on('disconnect', listener);
  }

  drop(reason = 'link lost'): void {
    this.emit('disconnect', reason);
  }
}

/**
 * Shared hub state plus the connection factory the relay dials through
 */
export class FakeHub {
  reachable = true;
  /** Publishes never acknowledge while set */
  holdAcks = false;
  readonly published: PublishedMessage[] = [];
  readonly connections: FakeHubConnection[] = [];

  readonly factory = vi.fn(async (credential: HubCredential): Promise<HubConnection> => {
    if (!this.reachable) {
      throw new TransientNetworkError('connect ECONNREFUSED');
    }
    const connection = new FakeHubConnection(credential, this);
    this.connections.push(connection);
    return connection;
  });

  publishedPayloads(): HubScanPayload[] {
    return this.published.map((message) => HubScanPayloadSchema.parse(JSON.parse(message.payload)));
  }
}

// ============================================================================
// Provisioning
// ============================================================================

/**
 * Registry stand-in that creates identities on first request
 */
export class FakeProvisioner implements IdentityProvisioner {
  reachable = true;
  readonly known = new Set<string>();
  readonly disabled = new Set<string>();
  readonly provisionOrFetchIdentity = vi.fn(async (identityId: string): Promise<ProvisionedIdentity> => {
    if (!this.reachable) {
      throw new TransientNetworkError('registry unreachable');
    }
    const created = !this.known.has(identityId);
    this.known.add(identityId);
    return {
      identityId,
      credential: connectionStringFor(identityId),
      enabled: !this.disabled.has(identityId),
      created,
    };
  });
}
